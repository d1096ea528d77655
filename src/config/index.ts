import { existsSync } from 'fs';
import { resolve } from 'path';
import { config as loadDotenv } from 'dotenv';
import type { AppConfig, ConfigOverrides, Timeouts } from './types.js';

export type { AppConfig, ConfigOverrides, Timeouts, BrowserLaunchConfig } from './types.js';

export const DEFAULT_TIMEOUTS: Timeouts = {
  navigationMs: 60_000,
  longMs: 300_000,
  shortMs: 10_000,
};

export const DEFAULT_BASE_URL = 'https://mytax.dc.gov/_/';

const CHROME_FOR_TESTING_PATH = '/app/.chrome-for-testing/chrome-linux64/chrome';

const CONTAINER_BROWSER_ARGS = [
  '--no-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--disable-extensions',
  '--disable-background-timer-throttling',
  '--disable-backgrounding-occluded-windows',
  '--disable-renderer-backgrounding',
];

let envLoaded = false;

/**
 * Load .env once per process; existing environment variables win
 */
export function loadEnvFile(): void {
  if (envLoaded) return;
  envLoaded = true;
  loadDotenv();
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true' || normalized === 'yes') {
    return true;
  }
  if (normalized === '0' || normalized === 'false' || normalized === 'no') {
    return false;
  }
  return fallback;
}

/**
 * Hosted containers (Heroku dynos) need a sandbox-free Chromium and may ship
 * Chrome for Testing through a buildpack
 */
function resolveBrowserLaunch(
  env: NodeJS.ProcessEnv,
  headless: boolean,
  pathExists: (path: string) => boolean
): AppConfig['browser'] {
  const explicitPath = env.CHROME_EXECUTABLE_PATH;
  if (!env.DYNO) {
    return {
      headless,
      executablePath: explicitPath,
      args: [],
    };
  }

  return {
    headless,
    executablePath: explicitPath ?? (pathExists(CHROME_FOR_TESTING_PATH) ? CHROME_FOR_TESTING_PATH : undefined),
    args: [...CONTAINER_BROWSER_ARGS],
  };
}

/**
 * Merge defaults, environment and explicit overrides (highest precedence)
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  pathExists: (path: string) => boolean = existsSync
): AppConfig {
  const timeouts: Timeouts = {
    navigationMs: overrides.timeouts?.navigationMs ?? toInt(env.NAV_TIMEOUT_MS, DEFAULT_TIMEOUTS.navigationMs),
    longMs: overrides.timeouts?.longMs ?? toInt(env.LONG_TIMEOUT_MS, DEFAULT_TIMEOUTS.longMs),
    shortMs: overrides.timeouts?.shortMs ?? toInt(env.SHORT_TIMEOUT_MS, DEFAULT_TIMEOUTS.shortMs),
  };

  const headless = overrides.headless ?? toBool(env.HEADLESS, true);

  return {
    baseUrl: overrides.baseUrl ?? env.BASE_URL ?? DEFAULT_BASE_URL,
    artifactsDir: resolve(overrides.artifactsDir ?? env.ARTIFACTS_DIR ?? 'artifacts'),
    artifactPrefix: overrides.artifactPrefix ?? env.ARTIFACT_PREFIX ?? 'clean-hands',
    port: overrides.port ?? toInt(env.PORT, 8000),
    verbose: overrides.verbose ?? (env.LOG_LEVEL ?? '').toLowerCase() === 'debug',
    screenshots: overrides.screenshots ?? toBool(env.SCREENSHOTS, true),
    timeouts,
    browser: resolveBrowserLaunch(env, headless, pathExists),
  };
}

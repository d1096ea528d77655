export interface Timeouts {
  /** Page loads and load-state waits */
  navigationMs: number;
  /** Document-producing waits (downloads, popups, PDF responses) */
  longMs: number;
  /** Clicks on optional affordances that may not exist */
  shortMs: number;
}

export interface BrowserLaunchConfig {
  headless: boolean;
  executablePath?: string;
  args: string[];
  userAgent?: string;
}

export interface AppConfig {
  baseUrl: string;
  artifactsDir: string;
  artifactPrefix: string;
  port: number;
  verbose: boolean;
  screenshots: boolean;
  timeouts: Timeouts;
  browser: BrowserLaunchConfig;
}

export interface ConfigOverrides {
  baseUrl?: string;
  artifactsDir?: string;
  artifactPrefix?: string;
  port?: number;
  verbose?: boolean;
  screenshots?: boolean;
  headless?: boolean;
  timeouts?: Partial<Timeouts>;
}

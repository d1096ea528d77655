import { loadConfig, DEFAULT_BASE_URL, DEFAULT_TIMEOUTS } from './index';
import { resolve } from 'path';

describe('loadConfig', () => {
  const never = () => false;

  it('should fall back to defaults with an empty environment', () => {
    const config = loadConfig({}, {}, never);

    expect(config.baseUrl).toBe(DEFAULT_BASE_URL);
    expect(config.artifactsDir).toBe(resolve('artifacts'));
    expect(config.artifactPrefix).toBe('clean-hands');
    expect(config.port).toBe(8000);
    expect(config.verbose).toBe(false);
    expect(config.screenshots).toBe(true);
    expect(config.timeouts).toEqual(DEFAULT_TIMEOUTS);
    expect(config.browser).toEqual({ headless: true, executablePath: undefined, args: [] });
  });

  it('should read values from the environment', () => {
    const config = loadConfig(
      {},
      {
        BASE_URL: 'http://localhost:4000/_/',
        ARTIFACTS_DIR: '/tmp/out',
        PORT: '9100',
        LOG_LEVEL: 'DEBUG',
        LONG_TIMEOUT_MS: '1500',
        HEADLESS: 'false',
        SCREENSHOTS: 'no',
      },
      never
    );

    expect(config.baseUrl).toBe('http://localhost:4000/_/');
    expect(config.artifactsDir).toBe('/tmp/out');
    expect(config.port).toBe(9100);
    expect(config.verbose).toBe(true);
    expect(config.timeouts.longMs).toBe(1500);
    expect(config.timeouts.shortMs).toBe(DEFAULT_TIMEOUTS.shortMs);
    expect(config.browser.headless).toBe(false);
    expect(config.screenshots).toBe(false);
  });

  it('should ignore malformed numbers', () => {
    const config = loadConfig({}, { PORT: 'eighty', NAV_TIMEOUT_MS: '-5' }, never);

    expect(config.port).toBe(8000);
    expect(config.timeouts.navigationMs).toBe(DEFAULT_TIMEOUTS.navigationMs);
  });

  it('should let explicit overrides win over the environment', () => {
    const config = loadConfig(
      { port: 7000, headless: true, timeouts: { shortMs: 50 } },
      { PORT: '9100', HEADLESS: 'false', SHORT_TIMEOUT_MS: '900' },
      never
    );

    expect(config.port).toBe(7000);
    expect(config.browser.headless).toBe(true);
    expect(config.timeouts.shortMs).toBe(50);
  });

  it('should add container args and Chrome for Testing on a dyno', () => {
    const config = loadConfig({}, { DYNO: 'web.1' }, () => true);

    expect(config.browser.executablePath).toBe('/app/.chrome-for-testing/chrome-linux64/chrome');
    expect(config.browser.args).toContain('--no-sandbox');
    expect(config.browser.args).toContain('--disable-dev-shm-usage');
  });

  it('should prefer an explicit executable path', () => {
    const config = loadConfig({}, { DYNO: 'web.1', CHROME_EXECUTABLE_PATH: '/usr/bin/chromium' }, () => true);

    expect(config.browser.executablePath).toBe('/usr/bin/chromium');
  });
});

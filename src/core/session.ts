import { chromium } from 'playwright';
import type { Browser, BrowserContext, Page } from 'playwright';
import type { BrowserLaunchConfig } from '../config/types.js';
import { describeError, getLogger } from '../utils/logger.js';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

export interface BrowserSession {
  browser: Browser;
  context: BrowserContext;
  page: Page;
  close: () => Promise<void>;
}

export type BrowserSessionOptions = Partial<BrowserLaunchConfig>;

export async function createBrowserSession(
  options: BrowserSessionOptions = {}
): Promise<BrowserSession> {
  const logger = getLogger();
  const headless = options.headless ?? true;
  const userAgent = options.userAgent ?? DEFAULT_USER_AGENT;

  let browser: Browser | null = null;
  let context: BrowserContext | null = null;
  let page: Page | null = null;
  let closed = false;

  const closeQuietly = async (label: string, target: { close(): Promise<void> } | null) => {
    if (!target) return;
    try {
      await target.close();
    } catch (error) {
      logger.debug(`Closing ${label} failed: ${describeError(error)}`);
    }
  };

  const close = async () => {
    if (closed) return;
    closed = true;

    await closeQuietly('page', page);
    await closeQuietly('context', context);
    await closeQuietly('browser', browser);
  };

  try {
    browser = await chromium.launch({
      headless,
      args: options.args ?? [],
      ...(options.executablePath ? { executablePath: options.executablePath } : {}),
    });
    // Downloads must be enabled at context level or the download strategies never fire
    context = await browser.newContext({ userAgent, acceptDownloads: true });
    page = await context.newPage();

    return {
      browser,
      context,
      page,
      close,
    };
  } catch (error) {
    await close();
    throw error;
  }
}

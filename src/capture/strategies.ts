/**
 * Active fetch strategies
 * Each one tries a single way of turning the "view document" affordance (or
 * a known document URL) into bytes on disk. They never throw: failures are
 * logged and reported as null so the chain can move on.
 */

import type { BrowserContext, Download, Locator, Page } from 'playwright';
import type { Timeouts } from '../config/types.js';
import { describeError, getLogger, type EpisodeLog } from '../utils/logger.js';
import { isPdfLikeResponse, isPdfLikeUrl } from './classifier.js';
import {
  clickAnchorDownload,
  clickBlobDownload,
  fetchCurrentDocument,
  revokeObjectUrl,
} from './page-scripts.js';
import type { CaptureSink } from './sink.js';

export const STRATEGY_NAMES = [
  'native-download',
  'same-tab-response',
  'popup-fetch',
  'context-request',
  'force-anchor',
  'force-blob',
] as const;

export type StrategyName = (typeof STRATEGY_NAMES)[number];

type DownloadWait = { download: Download } | { error: unknown };

export const DOCUMENT_ACCEPT = 'application/pdf,application/octet-stream,*/*';

/** Delay after a popup reaches domcontentloaded, before reading it */
export const DEFAULT_POPUP_SETTLE_MS = 2000;

/** Everything a strategy needs besides the trigger or URL */
export interface StrategyEnv {
  page: Page;
  context: BrowserContext;
  sink: CaptureSink;
  destinationPath: string;
  timeouts: Timeouts;
  /** Sent as Referer on direct requests, normally the site base URL */
  referer?: string;
  log?: EpisodeLog;
  popupSettleMs?: number;
}

/**
 * 1. Click and wait for a native download
 */
export async function captureNativeDownload(env: StrategyEnv, trigger: Locator): Promise<string | null> {
  const log = getLogger().scope('download', env.log);
  try {
    log.info('Waiting for native download');
    const [download] = await Promise.all([
      env.page.waitForEvent('download', { timeout: env.timeouts.longMs }),
      trigger.click({ timeout: env.timeouts.shortMs }),
    ]);
    return await saveDownload(env, download, 'native-download');
  } catch (error) {
    log.debug(`Native download failed: ${describeError(error)}`);
    return null;
  }
}

/**
 * 2. Click and wait for a PDF-like response in the same tab
 */
export async function captureSameTabResponse(env: StrategyEnv, trigger: Locator): Promise<string | null> {
  const log = getLogger().scope('response', env.log);
  try {
    log.info('Waiting for PDF response in the same tab');
    const [response] = await Promise.all([
      env.page.waitForResponse(
        (candidate) => isPdfLikeResponse(candidate.headers()['content-type'], candidate.url()),
        { timeout: env.timeouts.longMs }
      ),
      trigger.click({ timeout: env.timeouts.shortMs }),
    ]);
    const body = await response.body();
    if (body.length === 0) {
      log.warn(`Empty body from ${response.url()}`);
      return null;
    }
    return (await env.sink.trySave(body, env.destinationPath, 'same-tab-response'))
      ? env.destinationPath
      : null;
  } catch (error) {
    log.debug(`Same-tab response capture failed: ${describeError(error)}`);
    return null;
  }
}

/**
 * 3. Click, follow the popup and fetch its document with the page's cookies
 */
export async function capturePopup(env: StrategyEnv, trigger: Locator): Promise<string | null> {
  const log = getLogger().scope('popup', env.log);
  let popup: Page;
  try {
    log.info('Waiting for popup');
    [popup] = await Promise.all([
      env.page.waitForEvent('popup', { timeout: env.timeouts.longMs }),
      trigger.click({ timeout: env.timeouts.shortMs }),
    ]);
  } catch (error) {
    log.debug(`No popup opened: ${describeError(error)}`);
    return null;
  }

  try {
    await popup.waitForLoadState('domcontentloaded', { timeout: env.timeouts.navigationMs });
    await popup.waitForTimeout(env.popupSettleMs ?? DEFAULT_POPUP_SETTLE_MS);

    const url = popup.url();
    log.info(`Popup URL: ${url}`);

    if (isPdfLikeUrl(url)) {
      const viaRequest = await fetchViaContext(env, url);
      if (viaRequest) {
        return viaRequest;
      }
    }

    const bytes = await fetchDocumentInPage(popup);
    if (!bytes) {
      log.warn('In-page fetch returned no data');
      return null;
    }
    return (await env.sink.trySave(bytes, env.destinationPath, 'popup-fetch')) ? env.destinationPath : null;
  } catch (error) {
    log.debug(`Popup capture failed: ${describeError(error)}`);
    return null;
  } finally {
    await closeQuietly(popup, log.tag, env.log);
  }
}

/**
 * 4. Request the URL through the context's request API (shares cookies)
 */
export async function fetchViaContext(env: StrategyEnv, url: string): Promise<string | null> {
  const log = getLogger().scope('request', env.log);
  try {
    log.info(`Requesting ${url}`);
    const headers: Record<string, string> = { Accept: DOCUMENT_ACCEPT };
    if (env.referer) {
      headers.Referer = env.referer;
    }
    const response = await env.context.request.get(url, { headers, timeout: env.timeouts.longMs });
    if (!response.ok()) {
      log.warn(`Request failed: ${response.status()} ${response.statusText()}`);
      return null;
    }
    const body = await response.body();
    if (body.length === 0) {
      log.warn(`Empty body from ${url}`);
      return null;
    }
    return (await env.sink.trySave(body, env.destinationPath, 'context-request')) ? env.destinationPath : null;
  } catch (error) {
    log.debug(`Request error: ${describeError(error)}`);
    return null;
  }
}

/**
 * 5. Inject an <a download> for the URL and capture the download it starts
 */
export async function forceDownloadViaAnchor(env: StrategyEnv, url: string): Promise<string | null> {
  const log = getLogger().scope('anchor', env.log);
  try {
    log.info(`Forcing download of ${url}`);
    const [download] = await Promise.all([
      env.page.waitForEvent('download', { timeout: env.timeouts.longMs }),
      env.page.evaluate(clickAnchorDownload, url),
    ]);
    return await saveDownload(env, download, 'force-anchor');
  } catch (error) {
    log.debug(`Anchor download failed: ${describeError(error)}`);
    return null;
  }
}

/**
 * 6. Fetch in the page, wrap the bytes in a blob URL and download that
 */
export async function forceDownloadViaBlob(env: StrategyEnv, url: string): Promise<string | null> {
  const log = getLogger().scope('blob', env.log);
  try {
    log.info(`Downloading ${url} through a blob URL`);
    // Listener registered before the click
    const downloadWait: Promise<DownloadWait> = env.page
      .waitForEvent('download', { timeout: env.timeouts.longMs })
      .then(
        (download) => ({ download }),
        (error: unknown) => ({ error })
      );
    const objectUrl = await env.page.evaluate(clickBlobDownload, url);
    try {
      const waited = await downloadWait;
      if ('error' in waited) {
        throw waited.error;
      }
      return await saveDownload(env, waited.download, 'force-blob');
    } finally {
      await revokeQuietly(env.page, objectUrl, log.tag, env.log);
    }
  } catch (error) {
    log.debug(`Blob download failed: ${describeError(error)}`);
    return null;
  }
}

/**
 * Fetch the page's current URL from inside the page, with its cookies
 */
export async function fetchDocumentInPage(page: Page): Promise<Buffer | null> {
  const bytes = await page.evaluate(fetchCurrentDocument);
  return bytes && bytes.length > 0 ? Buffer.from(bytes) : null;
}

async function saveDownload(env: StrategyEnv, download: Download, source: StrategyName): Promise<string | null> {
  const saved = await env.sink.trySaveWith(env.destinationPath, (tempPath) => download.saveAs(tempPath), source);
  return saved ? env.destinationPath : null;
}

async function revokeQuietly(page: Page, objectUrl: string, tag: string, episode?: EpisodeLog): Promise<void> {
  try {
    await page.evaluate(revokeObjectUrl, objectUrl);
  } catch (error) {
    getLogger().scope(tag, episode).debug(`Could not revoke ${objectUrl}: ${describeError(error)}`);
  }
}

async function closeQuietly(page: Page, tag: string, episode?: EpisodeLog): Promise<void> {
  try {
    await page.close();
  } catch (error) {
    getLogger().scope(tag, episode).debug(`Could not close popup: ${describeError(error)}`);
  }
}

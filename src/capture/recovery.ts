/**
 * Post-run harvester and forced recovery
 * Last resort once the driver is done: read any tab already showing the
 * document, then navigate straight to the best-known document URL.
 */

import type { Page } from 'playwright';
import type { Timeouts } from '../config/types.js';
import { describeError, getLogger, type EpisodeLog } from '../utils/logger.js';
import { sleep } from '../utils/pacing.js';
import { runStrategyChain } from './chain.js';
import { isPdfLikeUrl } from './classifier.js';
import { pickRecoveryUrl } from './history.js';
import type { CaptureSink } from './sink.js';
import {
  fetchDocumentInPage,
  fetchViaContext,
  forceDownloadViaAnchor,
  forceDownloadViaBlob,
  type StrategyEnv,
} from './strategies.js';

export { pickRecoveryUrl };

/** Wait after the recovery navigation so the interceptor can finish */
export const DEFAULT_RECOVERY_SETTLE_MS = 1000;

export interface RecoveryOptions {
  timeouts: Timeouts;
  referer?: string;
  log?: EpisodeLog;
  settleMs?: number;
}

/**
 * In-page fetch from the first open tab whose URL is PDF-like
 */
export async function harvestOpenPages(
  pages: readonly Page[],
  destinationPath: string,
  sink: CaptureSink,
  episode?: EpisodeLog
): Promise<string | null> {
  const log = getLogger().scope('harvest', episode);

  if (await sink.flush()) {
    return sink.path;
  }

  for (const page of pages) {
    if (page.isClosed()) {
      continue;
    }
    const url = page.url();
    if (!isPdfLikeUrl(url)) {
      continue;
    }

    log.info(`Found open PDF tab: ${url}`);
    try {
      const bytes = await fetchDocumentInPage(page);
      if (!bytes) {
        log.debug(`No data from ${url}`);
        continue;
      }
      if (await sink.trySave(bytes, destinationPath, 'harvest')) {
        return destinationPath;
      }
      if (await sink.flush()) {
        return sink.path;
      }
    } catch (error) {
      log.debug(`Fetch in ${url} failed: ${describeError(error)}`);
    }
  }

  return null;
}

/**
 * Navigate the page to the best-known document URL and, if the interceptor
 * does not catch it, request it directly (strategies 4, 5, 6)
 */
export async function forceRecover(
  page: Page,
  history: readonly string[],
  destinationPath: string,
  sink: CaptureSink,
  options: RecoveryOptions
): Promise<string | null> {
  const log = getLogger().scope('recover', options.log);

  const url = pickRecoveryUrl(history, page.url());
  if (!url) {
    log.info('No PDF-like URL in history; nothing to recover');
    return null;
  }

  log.info(`Navigating directly to PDF URL to trigger capture: ${url}`);
  try {
    await page.goto(url, { waitUntil: 'load', timeout: options.timeouts.longMs });
  } catch (error) {
    // Expected when the URL starts a download instead of rendering
    log.debug(`Navigation ended with: ${describeError(error)}`);
  }
  await sleep(options.settleMs ?? DEFAULT_RECOVERY_SETTLE_MS);

  if (await sink.flush()) {
    return sink.path;
  }

  const env: StrategyEnv = {
    page,
    context: page.context(),
    sink,
    destinationPath,
    timeouts: options.timeouts,
    referer: options.referer,
    log: options.log,
  };

  const report = await runStrategyChain(
    [
      { name: 'context-request', run: () => fetchViaContext(env, url) },
      { name: 'force-anchor', run: () => forceDownloadViaAnchor(env, url) },
      { name: 'force-blob', run: () => forceDownloadViaBlob(env, url) },
    ],
    sink,
    options.log
  );
  return report.path;
}

/**
 * Harvest open tabs, then force recovery; path or null, never throws
 */
export async function harvestAndRecover(
  knownPages: readonly Page[],
  history: readonly string[],
  currentPage: Page,
  destinationPath: string,
  sink: CaptureSink,
  options: RecoveryOptions
): Promise<string | null> {
  const harvested = await harvestOpenPages(knownPages, destinationPath, sink, options.log);
  if (harvested) {
    return harvested;
  }
  return forceRecover(currentPage, history, destinationPath, sink, options);
}

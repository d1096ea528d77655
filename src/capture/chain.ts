/**
 * Strategy chain runner
 * Strategies run strictly in order; before each one the sink is flushed and
 * consulted so a document captured passively (or by a strategy that lost
 * its wait but still wrote) ends the chain.
 */

import type { BrowserContext, Locator, Page } from 'playwright';
import type { Timeouts } from '../config/types.js';
import { describeError, getLogger, type EpisodeLog } from '../utils/logger.js';
import { normalizeRemoteUrl } from '../utils/url.js';
import { isPdfLikeUrl } from './classifier.js';
import { pickRecoveryUrl, type EpisodeHistory } from './history.js';
import type { CaptureSink } from './sink.js';
import {
  captureNativeDownload,
  capturePopup,
  captureSameTabResponse,
  fetchViaContext,
  forceDownloadViaAnchor,
  forceDownloadViaBlob,
  type StrategyEnv,
  type StrategyName,
} from './strategies.js';

export interface ChainStep {
  name: StrategyName;
  run: () => Promise<string | null>;
}

export interface ChainReport {
  path: string | null;
  /** Strategies that actually ran, in order */
  attempted: StrategyName[];
  /** Strategy whose own write succeeded; null when the sink was filled elsewhere */
  winner: StrategyName | null;
}

export async function runStrategyChain(
  steps: readonly ChainStep[],
  sink: CaptureSink,
  episode?: EpisodeLog
): Promise<ChainReport> {
  const log = getLogger().scope('chain', episode);
  const attempted: StrategyName[] = [];

  for (const step of steps) {
    if (await sink.flush()) {
      log.info(`Already saved by ${sink.source ?? 'another channel'}; skipping ${step.name}`);
      return { path: sink.path, attempted, winner: null };
    }

    attempted.push(step.name);
    log.debug(`Trying ${step.name}`);
    try {
      const path = await step.run();
      if (path) {
        log.info(`Captured via ${step.name}`);
        return { path, attempted, winner: step.name };
      }
    } catch (error) {
      log.debug(`${step.name} failed: ${describeError(error)}`);
    }
  }

  const saved = await sink.flush();
  return { path: saved ? sink.path : null, attempted, winner: null };
}

export interface ActiveStrategyOptions {
  sink: CaptureSink;
  /** The "view document" affordance the driver located */
  trigger: Locator;
  timeouts: Timeouts;
  history?: EpisodeHistory;
  referer?: string;
  log?: EpisodeLog;
  popupSettleMs?: number;
}

/**
 * Run all six strategies against the view affordance; path or null
 */
export async function runActiveStrategies(
  page: Page,
  context: BrowserContext,
  destinationPath: string,
  options: ActiveStrategyOptions
): Promise<string | null> {
  const report = await runActiveStrategyChain(page, context, destinationPath, options);
  return report.path;
}

/**
 * runActiveStrategies with the full chain report
 */
export async function runActiveStrategyChain(
  page: Page,
  context: BrowserContext,
  destinationPath: string,
  options: ActiveStrategyOptions
): Promise<ChainReport> {
  const env: StrategyEnv = {
    page,
    context,
    sink: options.sink,
    destinationPath,
    timeouts: options.timeouts,
    referer: options.referer,
    log: options.log,
    popupSettleMs: options.popupSettleMs,
  };

  // Resolved lazily: strategies 1-3 may add the URL to history
  let documentUrl: Promise<string | null> | null = null;
  const withDocumentUrl =
    (strategy: (env: StrategyEnv, url: string) => Promise<string | null>) =>
    async (): Promise<string | null> => {
      if (!documentUrl) {
        documentUrl = resolveDocumentUrl(page, options.trigger, options.timeouts, options.history, options.log);
      }
      const url = await documentUrl;
      return url ? strategy(env, url) : null;
    };

  return runStrategyChain(
    [
      { name: 'native-download', run: () => captureNativeDownload(env, options.trigger) },
      { name: 'same-tab-response', run: () => captureSameTabResponse(env, options.trigger) },
      { name: 'popup-fetch', run: () => capturePopup(env, options.trigger) },
      { name: 'context-request', run: withDocumentUrl(fetchViaContext) },
      { name: 'force-anchor', run: withDocumentUrl(forceDownloadViaAnchor) },
      { name: 'force-blob', run: withDocumentUrl(forceDownloadViaBlob) },
    ],
    options.sink,
    options.log
  );
}

/**
 * Document URL for the direct strategies: the affordance's href when
 * PDF-like, else the most recent PDF-like history entry, else the page URL
 * when PDF-like
 */
export async function resolveDocumentUrl(
  page: Page,
  trigger: Locator,
  timeouts: Timeouts,
  history?: EpisodeHistory,
  episode?: EpisodeLog
): Promise<string | null> {
  const log = getLogger().scope('chain', episode);

  try {
    const href = await trigger.getAttribute('href', { timeout: timeouts.shortMs });
    if (href) {
      const normalized = normalizeRemoteUrl(href, page.url());
      if (normalized.ok && isPdfLikeUrl(normalized.url)) {
        return normalized.url;
      }
    }
  } catch (error) {
    log.debug(`Could not read affordance href: ${describeError(error)}`);
  }

  const url = pickRecoveryUrl(history?.urls() ?? [], page.url());
  if (!url) {
    log.info('No document URL known; direct strategies skipped');
  }
  return url;
}

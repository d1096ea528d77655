/**
 * One document-acquisition episode: a fresh sink, history and log bound to a
 * browser context, with the three entry points the driver calls.
 */

import type { BrowserContext, Locator, Page } from 'playwright';
import type { Timeouts } from '../config/types.js';
import { describeError, EpisodeLog, getLogger } from '../utils/logger.js';
import { runActiveStrategyChain } from './chain.js';
import { EpisodeHistory } from './history.js';
import { attachInterceptor, type InterceptorHandle } from './interceptor.js';
import { harvestAndRecover } from './recovery.js';
import { CaptureSink } from './sink.js';
import type { StrategyName } from './strategies.js';

export interface CaptureOutcome {
  saved: boolean;
  path: string | null;
  /** Channel that wrote the file: route, sniffer, a strategy name or harvest */
  source: string | null;
  /** Active strategies that ran, in order */
  attempts: StrategyName[];
  log: readonly string[];
}

export interface CaptureEpisodeOptions {
  timeouts: Timeouts;
  referer?: string;
  popupSettleMs?: number;
  recoverySettleMs?: number;
}

export class CaptureEpisode {
  readonly log = new EpisodeLog();
  readonly history = new EpisodeHistory();
  readonly sink = new CaptureSink({ log: this.log });
  private interceptor: InterceptorHandle | null = null;
  private readonly attempts: StrategyName[] = [];

  constructor(
    private readonly context: BrowserContext,
    readonly destinationPath: string,
    private readonly options: CaptureEpisodeOptions
  ) {}

  /** Pages the context has opened so far (empty before start) */
  get pages(): readonly Page[] {
    return this.interceptor ? this.interceptor.pages : [];
  }

  async start(): Promise<void> {
    this.interceptor = await attachInterceptor(this.context, this.destinationPath, this.sink, {
      history: this.history,
      log: this.log,
    });
  }

  async runActive(page: Page, trigger: Locator): Promise<string | null> {
    const report = await runActiveStrategyChain(page, this.context, this.destinationPath, {
      sink: this.sink,
      trigger,
      timeouts: this.options.timeouts,
      history: this.history,
      referer: this.options.referer,
      log: this.log,
      popupSettleMs: this.options.popupSettleMs,
    });
    this.attempts.push(...report.attempted);
    return report.path;
  }

  async recover(currentPage: Page): Promise<string | null> {
    return harvestAndRecover(
      this.pages,
      this.history.urls(),
      currentPage,
      this.destinationPath,
      this.sink,
      {
        timeouts: this.options.timeouts,
        referer: this.options.referer,
        log: this.log,
        settleMs: this.options.recoverySettleMs,
      }
    );
  }

  async outcome(): Promise<CaptureOutcome> {
    const saved = await this.sink.flush();
    return {
      saved,
      path: this.sink.path,
      source: this.sink.source,
      attempts: [...this.attempts],
      log: this.log.entries(),
    };
  }

  /** Detach the interceptor; a context that is already gone is not an error */
  async finish(): Promise<void> {
    if (!this.interceptor) {
      return;
    }
    const handle = this.interceptor;
    this.interceptor = null;
    try {
      await handle.detach();
    } catch (error) {
      getLogger().scope('route', this.log).debug(`Detach failed: ${describeError(error)}`);
    }
  }
}

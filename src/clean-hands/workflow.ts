import type { Page } from 'playwright';
import { CaptureEpisode } from '../capture/index.js';
import type { AppConfig } from '../config/types.js';
import { createBrowserSession, type BrowserSession, type BrowserSessionOptions } from '../core/session.js';
import { buildRunReport, writeRunReport } from '../download/run-report.js';
import { captureFailureArtifacts, captureScreenshot } from '../utils/artifacts.js';
import { describeError, getLogger } from '../utils/logger.js';
import { getArtifactPath, unixTimestamp, type ArtifactKey } from '../utils/paths.js';
import { MyTaxSite, type MyTaxSiteOptions, type SiteDriver } from './site.js';
import { describeStatus, detectStatusFromText } from './status.js';
import type { ComplianceStatus, LookupInput, WorkflowResult } from './types.js';

export interface WorkflowDependencies {
  createSession?: (options: BrowserSessionOptions) => Promise<BrowserSession>;
  createSite?: (page: Page, options: MyTaxSiteOptions) => SiteDriver;
  now?: () => Date;
  /** Settle delays inside capture, normally left at their defaults */
  popupSettleMs?: number;
  recoverySettleMs?: number;
}

/**
 * Run one lookup end to end: open the site, search, classify, request and
 * capture the document. Navigation and form failures reject; capture
 * failures only leave pdfPath null.
 */
export async function runWorkflow(
  input: LookupInput,
  config: AppConfig,
  deps: WorkflowDependencies = {}
): Promise<WorkflowResult> {
  const logger = getLogger();
  const now = deps.now ?? (() => new Date());
  const createSession = deps.createSession ?? createBrowserSession;
  const createSite =
    deps.createSite ?? ((page: Page, options: MyTaxSiteOptions): SiteDriver => new MyTaxSite(page, options));

  const startedAt = now();
  const key: ArtifactKey = {
    prefix: config.artifactPrefix,
    notice: input.notice,
    timestamp: unixTimestamp(startedAt),
  };
  const pdfPath = getArtifactPath(config.artifactsDir, key, 'PDF');
  const reportPath = getArtifactPath(config.artifactsDir, key, 'REPORT');

  logger.info(`Starting lookup for notice ${input.notice}`);
  const session = await createSession(config.browser);
  const { page, context } = session;

  const episode = new CaptureEpisode(context, pdfPath, {
    timeouts: config.timeouts,
    referer: config.baseUrl,
    popupSettleMs: deps.popupSettleMs,
    recoverySettleMs: deps.recoverySettleMs,
  });
  const site = createSite(page, { timeouts: config.timeouts });
  const visit = () => episode.history.record(page.url());

  let status: ComplianceStatus = 'unknown';
  let screenshotPath: string | null = null;

  const buildResult = (message: string, capturedPath: string | null, source: string | null): WorkflowResult =>
    Object.freeze({
      status,
      message,
      screenshotPath,
      pdfPath: capturedPath,
      pdfSource: source,
      urls: Object.freeze(episode.history.visited()),
      notice: input.notice,
      last4: input.last4,
      startedAt: startedAt.toISOString(),
      finishedAt: now().toISOString(),
    });

  try {
    await episode.start();

    await site.open(config.baseUrl);
    visit();
    await site.dismissSecurityWarning();
    visit();

    if (config.screenshots) {
      screenshotPath = await captureScreenshot(page, config.artifactsDir, key, 'LANDING_SCREENSHOT');
    }

    await site.openValidateForm();
    visit();
    await site.fillAndSearch(input);

    status = detectStatusFromText(await site.readResultText());
    visit();
    logger.info(`Status detected from page: ${status}`);

    if (config.screenshots) {
      await captureScreenshot(page, config.artifactsDir, key, 'RESULT_SCREENSHOT');
    }

    logger.info('Attempting to request the document (non-fatal if unavailable)');
    if (await site.requestDocument()) {
      visit();
    }

    const trigger = await site.findViewTrigger();
    if (trigger) {
      logger.info('Attempting to fetch the PDF');
      await episode.runActive(page, trigger);
    } else {
      logger.info('No view affordance found; falling back to recovery');
    }
    await episode.recover(page);

    const outcome = await episode.outcome();
    if (outcome.path) {
      logger.phaseComplete('PDF capture', `${outcome.path} via ${outcome.source ?? 'unknown'}`);
    } else {
      logger.warn('No PDF could be captured');
    }

    const result = buildResult(describeStatus(status), outcome.path, outcome.source);
    await writeRunReport(reportPath, buildRunReport(result, outcome));
    return result;
  } catch (error) {
    logger.error(`Lookup failed: ${describeError(error)}`);
    await captureFailureArtifacts(page, config.artifactsDir, key);
    const outcome = await episode.outcome();
    const result = buildResult(`Processing failed: ${describeError(error)}`, outcome.path, outcome.source);
    await writeRunReport(reportPath, buildRunReport(result, outcome, describeError(error)));
    throw error;
  } finally {
    await episode.finish();
    await session.close();
  }
}

/**
 * MyTax page steps
 * Each method is one step of the validation wizard. Only the site load, the
 * Validate link and the two form fields are fatal; everything else is
 * optional and logged.
 */

import type { Locator, Page } from 'playwright';
import type { Timeouts } from '../config/types.js';
import { FormError, NavigationError } from '../utils/errors.js';
import { describeError, getLogger } from '../utils/logger.js';
import { attemptInOrder, resolveFirst } from '../utils/candidates.js';
import { humanPause, type PacingOptions } from '../utils/pacing.js';
import { retry, RetryError } from '../utils/retry.js';
import {
  last4FieldCandidates,
  nextButtonCandidates,
  noticeFieldCandidates,
  requestLinkCandidates,
  searchButtonCandidates,
  startOverCandidates,
  submitButtonCandidates,
  validateLinkCandidates,
  viewDocumentCandidates,
} from './selectors.js';
import type { LookupInput } from './types.js';

/** Wait after searching before the result text is read */
export const RESULT_SETTLE_MS = 3000;
/** Wait before looking for the request links, which render late */
export const REQUEST_LINKS_SETTLE_MS = 2000;

/**
 * The wizard steps the workflow drives
 */
export interface SiteDriver {
  open(baseUrl: string): Promise<void>;
  dismissSecurityWarning(): Promise<boolean>;
  openValidateForm(): Promise<void>;
  fillAndSearch(input: LookupInput): Promise<void>;
  readResultText(): Promise<string>;
  requestDocument(): Promise<boolean>;
  findViewTrigger(): Promise<Locator | null>;
}

export interface MyTaxSiteOptions {
  timeouts: Timeouts;
  pacing?: PacingOptions;
  resultSettleMs?: number;
  requestSettleMs?: number;
}

export class MyTaxSite implements SiteDriver {
  private readonly logger = getLogger();

  constructor(
    private readonly page: Page,
    private readonly options: MyTaxSiteOptions
  ) {}

  private get timeouts(): Timeouts {
    return this.options.timeouts;
  }

  async open(baseUrl: string): Promise<void> {
    this.logger.info(`Navigating to ${baseUrl}`);
    try {
      await retry(
        () => this.page.goto(baseUrl, { waitUntil: 'domcontentloaded', timeout: this.timeouts.longMs }),
        { maxAttempts: 3, label: 'site load' }
      );
    } catch (error) {
      const reason = error instanceof RetryError ? error.lastError.message : describeError(error);
      throw NavigationError.fromSiteLoad(baseUrl, reason);
    }
  }

  /** Duplicate-tab warning; true if it was dismissed */
  async dismissSecurityWarning(): Promise<boolean> {
    const clicked = await this.clickFirst(startOverCandidates(this.page));
    if (clicked) {
      this.logger.debug('Dismissed duplicate-tab security warning');
      await this.settle();
    }
    return clicked;
  }

  async openValidateForm(): Promise<void> {
    this.logger.info('Clicking Validate link');
    if (!(await this.clickFirst(validateLinkCandidates(this.page)))) {
      throw NavigationError.fromMissingLink('Validate a Certificate of Clean Hands');
    }
    await this.settle();
  }

  async fillAndSearch(input: LookupInput): Promise<void> {
    this.logger.info('Filling form and searching');
    const fill = { timeout: this.timeouts.longMs };

    const noticeField = await attemptInOrder(noticeFieldCandidates(this.page), (field) =>
      field.fill(input.notice, fill)
    );
    if (!noticeField) {
      throw FormError.fromField('Notice Number');
    }

    const last4Candidates = last4FieldCandidates(this.page);
    const last4Field = await attemptInOrder(last4Candidates, async (field) => {
      await field.click(fill);
      await field.fill(input.last4, fill);
    });
    if (!last4Field) {
      throw FormError.fromField('Last 4');
    }

    if (!(await this.clickFirst(searchButtonCandidates(this.page)))) {
      this.logger.debug('No Search button; submitting with Enter');
      await last4Field.press('Enter', { timeout: this.timeouts.shortMs });
    }
  }

  async readResultText(): Promise<string> {
    await this.page.waitForTimeout(this.options.resultSettleMs ?? RESULT_SETTLE_MS);
    try {
      const text = (await this.page.textContent('body', { timeout: this.timeouts.navigationMs })) ?? '';
      this.logger.debug(`Page text snippet: ${text.replace(/\s+/g, ' ').trim().slice(0, 200)}...`);
      return text;
    } catch (error) {
      this.logger.debug(`Could not read result text: ${describeError(error)}`);
      return '';
    }
  }

  /**
   * Request link, Next, Submit. Never throws; true when Submit was clicked.
   */
  async requestDocument(): Promise<boolean> {
    try {
      await this.page.waitForTimeout(this.options.requestSettleMs ?? REQUEST_LINKS_SETTLE_MS);

      if (!(await this.clickFirst(requestLinkCandidates(this.page)))) {
        this.logger.info('No request link found; continuing.');
        return false;
      }
      this.logger.info('Clicked request link');
      await this.settle();

      await humanPause(this.options.pacing);
      if (await this.clickFirst(nextButtonCandidates(this.page))) {
        this.logger.info('Clicked Next button');
        await this.settle();
      } else {
        this.logger.warn('Next button not found - trying Submit');
      }

      await humanPause(this.options.pacing);
      if (!(await this.clickFirst(submitButtonCandidates(this.page)))) {
        this.logger.warn('Submit button not found');
        return false;
      }
      this.logger.info('Clicked Submit button');
      await this.settle();
      return true;
    } catch (error) {
      this.logger.info(`Request flow not completed (non-fatal): ${describeError(error)}`);
      return false;
    }
  }

  async findViewTrigger(): Promise<Locator | null> {
    const match = await resolveFirst(viewDocumentCandidates(this.page), async (locator) => (await locator.count()) > 0);
    return match ? match.first() : null;
  }

  /**
   * Click the first candidate present on the page; false when none is
   */
  private async clickFirst(candidates: readonly Locator[]): Promise<boolean> {
    const clicked = await attemptInOrder(candidates, async (locator) => {
      if ((await locator.count()) === 0) {
        throw new Error('not present');
      }
      await locator.first().click({ timeout: this.timeouts.shortMs });
    });
    return clicked !== null;
  }

  private async settle(): Promise<void> {
    try {
      await this.page.waitForLoadState('domcontentloaded', { timeout: this.timeouts.navigationMs });
    } catch (error) {
      this.logger.debug(`Load state wait ended: ${describeError(error)}`);
    }
  }
}

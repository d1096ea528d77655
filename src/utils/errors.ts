/**
 * Standardized error taxonomy with stable exit codes
 * Each error class extends Error and provides:
 * - code: stable exit code (1-4)
 * - message: user-facing message
 * - details: optional verbose details
 *
 * Capture strategies never raise these; only the mandatory navigation and
 * form path of an episode (and the standalone downloader) do.
 */

import { getLogger } from './logger.js';

/**
 * Base error class with exit code
 */
export abstract class CleanHandsError extends Error {
  abstract readonly code: number;
  readonly details?: string;

  constructor(message: string, details?: string) {
    super(message);
    this.name = this.constructor.name;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Get the exit code for this error
   */
  getExitCode(): number {
    return this.code;
  }

  /**
   * Log error with appropriate level
   */
  log(): void {
    const logger = getLogger();
    logger.error(this.message);
    if (this.details) {
      logger.debug(`Details: ${this.details}`);
    }
  }
}

/**
 * Invalid input error (exit code 1)
 * Triggered by: malformed notice number, bad last-4 digits, invalid options
 */
export class InvalidInputError extends CleanHandsError {
  readonly code = 1;

  static fromNotice(notice: string): InvalidInputError {
    return new InvalidInputError(
      `Invalid notice number: "${notice}". Expected 5 to 64 characters.`,
      'Notice numbers look like L0012345678'
    );
  }

  static fromLast4(last4: string): InvalidInputError {
    return new InvalidInputError(
      `Invalid last 4 digits: "${last4}". Expected exactly four digits.`,
      'Use the last four digits of the taxpayer identification number'
    );
  }

  static fromOption(option: string, value: string, expected: string): InvalidInputError {
    return new InvalidInputError(`${option} must be ${expected}, got: ${value}`);
  }
}

/**
 * Fatal navigation error (exit code 2)
 * Triggered by: initial site load failure, missing "Validate" entry point
 */
export class NavigationError extends CleanHandsError {
  readonly code = 2;

  static fromSiteLoad(url: string, reason: string): NavigationError {
    return new NavigationError(
      `Could not load ${url}. Compliance status cannot be determined.`,
      `Navigation error: ${reason}`
    );
  }

  static fromMissingLink(label: string): NavigationError {
    return new NavigationError(
      `Could not find the '${label}' link.`,
      'The site layout may have changed'
    );
  }
}

/**
 * Fatal form error (exit code 3)
 * Triggered by: no candidate field accepts the notice number or last 4 digits
 */
export class FormError extends CleanHandsError {
  readonly code = 3;

  static fromField(field: string): FormError {
    return new FormError(
      `Could not fill the ${field} field.`,
      'None of the known field locators matched an editable input'
    );
  }
}

/**
 * Download error (exit code 4)
 * Triggered by: standalone PDF download failures
 */
export class DownloadError extends CleanHandsError {
  readonly code = 4;

  static fromInvalidUrl(url: string, reason: string): DownloadError {
    return new DownloadError(`Invalid URL "${url}": ${reason}`);
  }

  static fromNetworkFailure(url: string, reason: string): DownloadError {
    return new DownloadError(
      `Failed to download PDF: ${url}`,
      `Network error: ${reason}`
    );
  }

  static fromEmptyBody(url: string): DownloadError {
    return new DownloadError(`Downloaded file is empty (0 bytes): ${url}`);
  }
}

/**
 * HTTP failure carrying its status so the retry wrapper can classify it
 */
export class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    statusText: string
  ) {
    super(`HTTP ${status}: ${statusText}`);
    this.name = 'HttpStatusError';
    Object.setPrototypeOf(this, HttpStatusError.prototype);
  }
}

/**
 * Handle and log error, then exit
 */
export function handleError(error: unknown): never {
  if (error instanceof CleanHandsError) {
    error.log();
    process.exit(error.getExitCode());
  }

  const logger = getLogger();
  if (error instanceof Error) {
    logger.error(`Unexpected error: ${error.message}`);
    if (error.stack) {
      logger.debug(`Stack: ${error.stack}`);
    }
  } else {
    logger.error(`Unexpected error: ${String(error)}`);
  }
  process.exit(1);
}

/**
 * Retry wrapper with exponential backoff + jitter
 * - Retries transient failures: timeouts, connection resets, 5xx errors, 429
 * - Fails fast on deterministic failures: other 4xx, parse errors
 * - Formula: delay = baseDelay * 2^attempt + random(0, jitterMax)
 */

import { getLogger } from './logger.js';
import { HttpStatusError } from './errors.js';

export interface RetryOptions {
  maxAttempts?: number; // default 3
  baseDelayMs?: number; // default 1000
  maxDelayMs?: number; // default 30000
  jitterMaxMs?: number; // default 1000
  /** Label used in debug output */
  label?: string;
}

export class RetryError extends Error {
  constructor(
    message: string,
    readonly isTransient: boolean,
    readonly attempts: number,
    readonly lastError: Error
  ) {
    super(message);
    this.name = 'RetryError';
    Object.setPrototypeOf(this, RetryError.prototype);
  }
}

/**
 * Determine if an error is transient (should retry) or deterministic (fail fast)
 */
function isTransientError(error: unknown): boolean {
  if (error instanceof HttpStatusError) {
    return (error.status >= 500 && error.status < 600) || error.status === 429;
  }

  if (error instanceof SyntaxError) {
    return false;
  }

  if (error instanceof TypeError && /invalid url/i.test(error.message)) {
    return false;
  }

  if (error instanceof Error) {
    const msg = error.message.toLowerCase();
    if (
      msg.includes('timeout') ||
      msg.includes('econnrefused') ||
      msg.includes('econnreset') ||
      msg.includes('net::err_')
    ) {
      return true;
    }
  }

  // Default to transient for unknown errors
  return true;
}

/**
 * Calculate delay with exponential backoff and jitter
 */
function calculateDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  jitterMaxMs: number
): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  const jitter = Math.random() * jitterMaxMs;
  return cappedDelay + jitter;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Executes fn with exponential backoff on transient failures
 */
export async function retry<T>(
  fn: () => Promise<T>,
  options?: RetryOptions
): Promise<T> {
  const maxAttempts = options?.maxAttempts ?? 3;
  const baseDelayMs = options?.baseDelayMs ?? 1000;
  const maxDelayMs = options?.maxDelayMs ?? 30000;
  const jitterMaxMs = options?.jitterMaxMs ?? 1000;
  const label = options?.label ? `${options.label}: ` : '';

  const logger = getLogger();

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const lastError = error instanceof Error ? error : new Error(String(error));

      if (!isTransientError(error)) {
        logger.debug(`${label}deterministic failure (not retrying): ${lastError.message}`);
        throw new RetryError(
          `Failed after ${attempt + 1} attempt(s): ${lastError.message}`,
          false,
          attempt + 1,
          lastError
        );
      }

      if (attempt >= maxAttempts - 1) {
        logger.debug(`${label}max attempts (${maxAttempts}) reached: ${lastError.message}`);
        throw new RetryError(
          `Failed after ${maxAttempts} attempts: ${lastError.message}`,
          true,
          maxAttempts,
          lastError
        );
      }

      const delayMs = calculateDelay(attempt, baseDelayMs, maxDelayMs, jitterMaxMs);
      logger.debug(
        `${label}transient failure (attempt ${attempt + 1}/${maxAttempts}): ${lastError.message}. Retrying in ${Math.round(delayMs)}ms...`
      );

      await sleep(delayMs);
    }
  }
}

export { isTransientError };

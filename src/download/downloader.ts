/**
 * Standalone PDF downloader
 * - Plain HTTP GET of a known document URL, outside any browser session
 * - Browser-like headers; MyTax URLs also get the site Referer
 * - Uses retry wrapper for transient failures
 * - Warns (but keeps the file) when the content type is not a document type
 */

import { mkdir, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { DEFAULT_BASE_URL } from '../config/index.js';
import { DEFAULT_USER_AGENT } from '../core/session.js';
import { DownloadError, HttpStatusError } from '../utils/errors.js';
import { getLogger, describeError } from '../utils/logger.js';
import { retry, RetryError, type RetryOptions } from '../utils/retry.js';
import { normalizeRemoteUrl } from '../utils/url.js';

const MYTAX_HOST = 'mytax.dc.gov';

export interface DownloadPdfOptions {
  /** Per-request timeout (default 60000) */
  timeoutMs?: number;
  retry?: RetryOptions;
  /** Injected for tests */
  fetchImpl?: typeof fetch;
}

export interface DownloadPdfResult {
  url: string;
  outputPath: string;
  sizeBytes: number;
  contentType: string;
}

/**
 * Request headers for a document URL
 */
export function buildDownloadHeaders(url: string): Record<string, string> {
  const headers: Record<string, string> = {
    'User-Agent': DEFAULT_USER_AGENT,
    Accept: 'application/pdf,application/octet-stream,*/*',
    'Accept-Language': 'en-US,en;q=0.9',
    DNT: '1',
  };
  if (new URL(url).hostname.toLowerCase() === MYTAX_HOST) {
    headers.Referer = DEFAULT_BASE_URL;
  }
  return headers;
}

/**
 * Download url to outputPath; throws DownloadError on any failure
 */
export async function downloadPdf(
  url: string,
  outputPath: string,
  options: DownloadPdfOptions = {}
): Promise<DownloadPdfResult> {
  const logger = getLogger();
  const fetchImpl = options.fetchImpl ?? fetch;
  const timeoutMs = options.timeoutMs ?? 60000;

  const normalized = normalizeRemoteUrl(url);
  if (!normalized.ok) {
    throw DownloadError.fromInvalidUrl(url, normalized.reason);
  }
  const target = normalized.url;

  logger.info(`Downloading PDF from: ${target}`);
  logger.debug(`Saving to: ${outputPath}`);

  let body: Buffer;
  let contentType: string;
  try {
    ({ body, contentType } = await retry(
      async () => {
        const response = await fetchImpl(target, {
          headers: buildDownloadHeaders(target),
          signal: AbortSignal.timeout(timeoutMs),
        });
        if (!response.ok) {
          throw new HttpStatusError(response.status, response.statusText);
        }
        return {
          body: Buffer.from(await response.arrayBuffer()),
          contentType: (response.headers.get('content-type') ?? '').toLowerCase(),
        };
      },
      { label: 'fetch-pdf', ...options.retry }
    ));
  } catch (error) {
    const reason = error instanceof RetryError ? error.lastError.message : describeError(error);
    throw DownloadError.fromNetworkFailure(target, reason);
  }

  if (body.length === 0) {
    throw DownloadError.fromEmptyBody(target);
  }

  if (!contentType.includes('application/pdf') && !contentType.includes('application/octet-stream')) {
    logger.warn(`Content-Type is '${contentType}', not PDF`);
  }

  const tempPath = `${outputPath}.tmp`;
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(tempPath, body);
  await rename(tempPath, outputPath);

  logger.info(`PDF downloaded successfully: ${body.length} bytes`);
  return { url: target, outputPath, sizeBytes: body.length, contentType };
}

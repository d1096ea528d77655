/**
 * POST /check-clean-hands
 * Runs one lookup and returns the result with the PDF inline as base64
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { lookupInputSchema } from '../clean-hands/input.js';
import type { LookupInput, WorkflowResult } from '../clean-hands/types.js';
import type { AppConfig } from '../config/types.js';
import { describeError, getLogger } from '../utils/logger.js';

export const checkRequestSchema = lookupInputSchema.extend({
  email: z.string().trim().email(),
});

export type CheckRequest = z.infer<typeof checkRequestSchema>;

export interface CheckResponse {
  status: WorkflowResult['status'] | 'error';
  notice: string;
  last4: string;
  email: string;
  message: string;
  pdfPath: string | null;
  pdfBase64: string | null;
  pdfAvailable: boolean;
  urlsVisited: string[];
  processingTimeSeconds: number;
  success: boolean;
}

export type WorkflowRunner = (input: LookupInput, config: AppConfig) => Promise<WorkflowResult>;

async function encodePdf(pdfPath: string | null): Promise<string | null> {
  if (!pdfPath) {
    return null;
  }
  try {
    const bytes = await readFile(pdfPath);
    getLogger().info(`PDF encoded for response: ${bytes.length} bytes`);
    return bytes.toString('base64');
  } catch (error) {
    getLogger().error(`Failed to encode PDF: ${describeError(error)}`);
    return null;
  }
}

const elapsedSeconds = (startedAt: number, now: () => number): number =>
  Math.round((now() - startedAt) / 10) / 100;

/**
 * Run the workflow headless and without screenshots; a failure becomes an
 * error-shaped response instead of a rejection
 */
export async function processCheckRequest(
  request: CheckRequest,
  config: AppConfig,
  runWorkflow: WorkflowRunner,
  now: () => number = Date.now
): Promise<CheckResponse> {
  const logger = getLogger();
  const startedAt = now();
  const { notice, last4, email } = request;

  logger.info(`Processing request for notice ${notice}`);
  const apiConfig: AppConfig = {
    ...config,
    screenshots: false,
    browser: { ...config.browser, headless: true },
  };

  try {
    const result = await runWorkflow({ notice, last4 }, apiConfig);
    const pdfBase64 = await encodePdf(result.pdfPath);
    const processingTimeSeconds = elapsedSeconds(startedAt, now);
    logger.info(`Request completed in ${processingTimeSeconds}s with status ${result.status}`);

    return {
      status: result.status,
      notice: result.notice,
      last4: result.last4,
      email,
      message: result.message,
      pdfPath: result.pdfPath,
      pdfBase64,
      pdfAvailable: pdfBase64 !== null,
      urlsVisited: [...result.urls],
      processingTimeSeconds,
      success: true,
    };
  } catch (error) {
    const processingTimeSeconds = elapsedSeconds(startedAt, now);
    logger.error(`Request failed after ${processingTimeSeconds}s: ${describeError(error)}`);

    return {
      status: 'error',
      notice,
      last4,
      email,
      message: `Processing failed: ${describeError(error)}`,
      pdfPath: null,
      pdfBase64: null,
      pdfAvailable: false,
      urlsVisited: [],
      processingTimeSeconds,
      success: false,
    };
  }
}

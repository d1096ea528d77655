/**
 * Run report writer
 * Writes the episode result as JSON beside the PDF:
 *   <artifactsDir>/<prefix>-<notice>-<ts>.json
 * Temp file + rename so readers never see a partial report.
 */

import { mkdir, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { CaptureOutcome } from '../capture/index.js';
import type { WorkflowResult } from '../clean-hands/types.js';
import { describeError, getLogger } from '../utils/logger.js';

export const RUN_REPORT_VERSION = 1;

export interface RunReport {
  version: number;
  result: WorkflowResult;
  capture: {
    saved: boolean;
    source: string | null;
    attempts: string[];
    log: readonly string[];
  };
  /** Set when the episode aborted */
  error?: string;
}

export function buildRunReport(result: WorkflowResult, outcome: CaptureOutcome, error?: string): RunReport {
  return {
    version: RUN_REPORT_VERSION,
    result,
    capture: {
      saved: outcome.saved,
      source: outcome.source,
      attempts: [...outcome.attempts],
      log: outcome.log,
    },
    ...(error ? { error } : {}),
  };
}

/**
 * Write the report; failures are logged, never thrown
 *
 * @returns the report path, or null if it could not be written
 */
export async function writeRunReport(reportPath: string, report: RunReport): Promise<string | null> {
  const logger = getLogger();
  const tempPath = `${reportPath}.tmp`;

  try {
    await mkdir(dirname(reportPath), { recursive: true });
    await writeFile(tempPath, JSON.stringify(report, null, 2), 'utf-8');
    await rename(tempPath, reportPath);
    logger.debug(`Run report written: ${reportPath}`);
    return reportPath;
  } catch (error) {
    logger.warn(`Failed to write run report: ${describeError(error)}`);
    return null;
  }
}

/**
 * Tests for the run report writer
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { mkdir, readFile, readdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { buildRunReport, writeRunReport } from './run-report.js';
import type { WorkflowResult } from '../clean-hands/types.js';
import type { CaptureOutcome } from '../capture/episode.js';
import { resetLogger } from '../utils/logger.js';

const result: WorkflowResult = {
  status: 'compliant',
  message: 'Detected compliance status from page.',
  screenshotPath: null,
  pdfPath: '/artifacts/clean-hands-L0012345678-1700000000.pdf',
  pdfSource: 'route',
  urls: ['https://mytax.dc.gov/_/'],
  notice: 'L0012345678',
  last4: '1234',
  startedAt: '2024-01-01T00:00:00.000Z',
  finishedAt: '2024-01-01T00:00:30.000Z',
};

const outcome: CaptureOutcome = {
  saved: true,
  path: result.pdfPath,
  source: 'route',
  attempts: ['native-download'],
  log: ['INFO [route] Intercepting PDF request: https://mytax.dc.gov/_/Retrieve/?FILE__=1'],
};

describe('run-report', () => {
  let testDir: string;

  beforeEach(async () => {
    resetLogger();
    testDir = join(tmpdir(), `clean-hands-report-${Date.now()}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(testDir, { recursive: true, force: true });
  });

  describe('buildRunReport', () => {
    it('should combine the result with the capture outcome', () => {
      expect(buildRunReport(result, outcome)).toEqual({
        version: 1,
        result,
        capture: {
          saved: true,
          source: 'route',
          attempts: ['native-download'],
          log: outcome.log,
        },
      });
    });

    it('should include the error when the episode aborted', () => {
      expect(buildRunReport(result, outcome, 'Could not load site').error).toBe('Could not load site');
    });
  });

  describe('writeRunReport', () => {
    it('should write pretty-printed JSON and create directories', async () => {
      const reportPath = join(testDir, 'nested', 'report.json');
      const report = buildRunReport(result, outcome);

      await expect(writeRunReport(reportPath, report)).resolves.toBe(reportPath);

      const content = await readFile(reportPath, 'utf-8');
      expect(content).toBe(JSON.stringify(report, null, 2));
      expect(await readdir(join(testDir, 'nested'))).toEqual(['report.json']);
    });

    it('should return null instead of throwing when the path is unusable', async () => {
      jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      const blocker = join(testDir, 'file');
      await writeFile(blocker, 'x');

      await expect(writeRunReport(join(blocker, 'report.json'), buildRunReport(result, outcome))).resolves.toBeNull();
    });
  });
});

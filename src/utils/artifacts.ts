/**
 * Screenshot and HTML snapshot capture
 * Landing/result screenshots are part of a normal run; the failure pair is
 * taken when an episode aborts on a navigation or form error.
 */

import type { Page } from 'playwright';
import { mkdir, writeFile } from 'fs/promises';
import { getLogger, describeError } from './logger.js';
import { getArtifactPath, type ArtifactKey, type ArtifactKind } from './paths.js';

export interface CapturedArtifacts {
  screenshotPath: string | null;
  htmlPath: string | null;
}

/**
 * Full-page screenshot of one episode stage; path, or null if it failed
 */
export async function captureScreenshot(
  page: Page,
  artifactsDir: string,
  key: ArtifactKey,
  kind: Extract<ArtifactKind, 'LANDING_SCREENSHOT' | 'RESULT_SCREENSHOT' | 'FAILURE_SCREENSHOT'>
): Promise<string | null> {
  const logger = getLogger();
  const path = getArtifactPath(artifactsDir, key, kind);

  try {
    await mkdir(artifactsDir, { recursive: true });
    await page.screenshot({ path, fullPage: true });
    logger.debug(`Screenshot saved: ${path}`);
    return path;
  } catch (error) {
    logger.warn(`Failed to capture screenshot: ${describeError(error)}`);
    return null;
  }
}

/**
 * Capture screenshot and HTML snapshot when an episode fails
 */
export async function captureFailureArtifacts(
  page: Page,
  artifactsDir: string,
  key: ArtifactKey
): Promise<CapturedArtifacts> {
  const logger = getLogger();
  const screenshotPath = await captureScreenshot(page, artifactsDir, key, 'FAILURE_SCREENSHOT');

  let htmlPath: string | null = getArtifactPath(artifactsDir, key, 'FAILURE_HTML');
  try {
    await writeFile(htmlPath, await page.content(), 'utf-8');
  } catch (error) {
    logger.warn(`Failed to capture HTML snapshot: ${describeError(error)}`);
    htmlPath = null;
  }

  logger.debug(`Failure artifacts: ${screenshotPath ?? '-'}, ${htmlPath ?? '-'}`);
  return { screenshotPath, htmlPath };
}

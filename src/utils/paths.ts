/**
 * Artifact naming policy
 * Every episode writes under one artifacts directory, keyed on notice + unix
 * timestamp so concurrent or repeated lookups never collide:
 *   <prefix>-<notice>-<ts>.pdf
 *   <prefix>-<notice>-<ts>-landing.png
 *   <prefix>-<notice>-<ts>-result.png
 *   <prefix>-<notice>-<ts>.json
 */

import { join } from 'path';

export const DEFAULT_ARTIFACT_PREFIX = 'clean-hands';

export const ARTIFACT_KINDS = {
  /** Captured certificate or notice */
  PDF: { suffix: '', ext: 'pdf' },
  /** Screenshot of the site landing page */
  LANDING_SCREENSHOT: { suffix: '-landing', ext: 'png' },
  /** Screenshot of the search result page */
  RESULT_SCREENSHOT: { suffix: '-result', ext: 'png' },
  /** Screenshot taken when the episode fails */
  FAILURE_SCREENSHOT: { suffix: '-failure', ext: 'png' },
  /** HTML snapshot taken when the episode fails */
  FAILURE_HTML: { suffix: '-failure', ext: 'html' },
  /** JSON run report */
  REPORT: { suffix: '', ext: 'json' },
} as const;

export type ArtifactKind = keyof typeof ARTIFACT_KINDS;

export interface ArtifactKey {
  prefix?: string;
  notice: string;
  timestamp: number;
}

/**
 * Seconds since the epoch, used as the episode key
 */
export function unixTimestamp(date: Date = new Date()): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * Reduce a notice number to filename-safe characters
 */
export function sanitizeNotice(notice: string): string {
  const safe = notice.trim().replace(/[^a-z0-9-]/gi, '');
  return safe || 'unknown';
}

/**
 * Build the filename for one artifact of an episode
 */
export function generateArtifactFilename(key: ArtifactKey, kind: ArtifactKind): string {
  const { suffix, ext } = ARTIFACT_KINDS[kind];
  const prefix = key.prefix ?? DEFAULT_ARTIFACT_PREFIX;
  return `${prefix}-${sanitizeNotice(key.notice)}-${key.timestamp}${suffix}.${ext}`;
}

/**
 * Full path of one artifact of an episode
 */
export function getArtifactPath(artifactsDir: string, key: ArtifactKey, kind: ArtifactKind): string {
  return join(artifactsDir, generateArtifactFilename(key, kind));
}

/**
 * Validate that a filename is safe and within constraints
 */
export function isValidFilename(filename: string): boolean {
  // Check length (filesystem limit is typically 255)
  if (filename.length === 0 || filename.length > 255) {
    return false;
  }

  if (!/^[a-z0-9._-]+$/i.test(filename)) {
    return false;
  }

  // Disallow path traversal
  if (filename.includes('/') || filename.includes('\\') || filename.includes('..')) {
    return false;
  }

  return true;
}

/**
 * A plain PDF file name that may be served from the artifacts directory
 */
export function isPdfFilename(filename: string): boolean {
  return isValidFilename(filename) && filename.toLowerCase().endsWith('.pdf');
}

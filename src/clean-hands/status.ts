/**
 * Compliance status from the search result page text
 * The result page offers either "request a current Certificate of Clean
 * Hands" (compliant) or "request a Notice of Non-Compliance" (noncompliant);
 * free-text phrases are the fallback.
 */

import type { ComplianceStatus } from './types.js';

const OFFERS_CERTIFICATE = /click\s*here\s*to\s*request\s*a\s*current\s*certificate\s*of\s*clean\s*hands/i;
const OFFERS_NOTICE = /request.*notice\s*of\s*non[-\s]?compliance/i;

const NONCOMPLIANT_PHRASES = [
  /\bnot\s+in\s+compliance\b/i,
  /\bis\s+not\s+compliant\b/i,
  /\bnot\s+compliant\b/i,
  /\bnon[-\s]?compliant\b/i,
];

const COMPLIANT_PHRASES = [
  /\bthis\s+taxpayer\s+is\s+currently\s+compliant\b/i,
  /\bin\s+compliance\b/i,
  /\bis\s+compliant\b/i,
  /\bcompliant\b/i,
];

export function detectStatusFromText(text: string | null | undefined): ComplianceStatus {
  const body = text ?? '';

  if (OFFERS_CERTIFICATE.test(body)) {
    return 'compliant';
  }
  if (OFFERS_NOTICE.test(body)) {
    return 'noncompliant';
  }
  // Negative phrases contain the positive ones, so they go first
  if (NONCOMPLIANT_PHRASES.some((pattern) => pattern.test(body))) {
    return 'noncompliant';
  }
  if (COMPLIANT_PHRASES.some((pattern) => pattern.test(body))) {
    return 'compliant';
  }
  return 'unknown';
}

export function describeStatus(status: ComplianceStatus): string {
  return status === 'unknown'
    ? 'Could not detect compliance status.'
    : 'Detected compliance status from page.';
}

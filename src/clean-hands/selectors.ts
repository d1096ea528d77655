/**
 * Ordered locator candidates for each MyTax page element
 * The site's markup changes without notice, so every element has several
 * ways of being found; the first candidate that matches wins.
 */

import type { Locator, Page } from 'playwright';

export const START_OVER_TEXT = /Click\s*Here\s*to\s*Start\s*Over/i;
export const VALIDATE_TEXT = /Validate a Certificate of Clean Hands/i;
export const VIEW_DOCUMENT_TEXT = /view\s*(certificate|notice)/i;

export function startOverCandidates(page: Page): Locator[] {
  return [page.getByRole('link', { name: START_OVER_TEXT }), page.getByText(START_OVER_TEXT)];
}

export function validateLinkCandidates(page: Page): Locator[] {
  return [
    page.getByRole('link', { name: /Validate.*Clean\s*Hands/i }),
    page.getByText(VALIDATE_TEXT),
    page.locator("a:has-text('Validate a Certificate of Clean Hands')"),
  ];
}

export function noticeFieldCandidates(page: Page): Locator[] {
  return [
    page.getByLabel(/notice\s*number/i),
    page.getByPlaceholder(/notice/i),
    page.locator('input').nth(0),
  ];
}

export function last4FieldCandidates(page: Page): Locator[] {
  return [
    page.getByLabel(/(last\s*4|last\s*four)/i),
    page.getByPlaceholder(/last\s*4/i),
    page.locator('input').nth(1),
  ];
}

export function searchButtonCandidates(page: Page): Locator[] {
  return [
    page.getByRole('button', { name: /^Search$/i }),
    page.locator('button:has-text("Search"), input[type="submit"][value*="Search" i]'),
  ];
}

/** Both the certificate and the non-compliance notice request links */
export function requestLinkCandidates(page: Page): Locator[] {
  return [
    page.getByRole('link', { name: /request.*Certificate of Clean Hands/i }),
    page.getByText(/Click here to request a current Certificate of Clean Hands/i),
    page.getByRole('link', { name: /request.*Notice of Non-Compliance/i }),
    page.getByText(/Click here to request a Notice of Non-Compliance/i),
    page.locator("a:has-text('Click here to request')"),
    page.locator("a:has-text('request')"),
    page.locator("a[href*='request' i]"),
  ];
}

export function nextButtonCandidates(page: Page): Locator[] {
  return [
    page.getByRole('button', { name: /next/i }),
    page.locator("button:has-text('Next')"),
    page.locator("input[type='submit'][value*='Next' i]"),
    page.locator("button[value*='Next' i]"),
  ];
}

export function submitButtonCandidates(page: Page): Locator[] {
  return [
    page.getByRole('button', { name: /submit/i }),
    page.locator("button:has-text('Submit')"),
    page.locator("input[type='submit'][value*='Submit' i]"),
    page.locator("button[value*='Submit' i]"),
    page.locator("input[type='submit']"),
  ];
}

/** The affordance the active capture strategies click */
export function viewDocumentCandidates(page: Page): Locator[] {
  return [
    page.getByRole('button', { name: VIEW_DOCUMENT_TEXT }),
    page.getByRole('link', { name: VIEW_DOCUMENT_TEXT }),
    page.getByText(VIEW_DOCUMENT_TEXT),
    page.locator("button:has-text('View Certificate'), button:has-text('View Notice')"),
    page.locator("a:has-text('View Certificate'), a:has-text('View Notice')"),
    page.locator("[onclick*='view' i]"),
  ];
}

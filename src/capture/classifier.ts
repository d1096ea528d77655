/**
 * PDF-like classification of URLs and responses
 * Called on every network event, so everything here is pure and cheap.
 */

/** Content-type tokens the site uses when it serves a document */
export const PDF_CONTENT_TYPES = [
  'application/pdf',
  'application/octet-stream',
  'application/force-download',
] as const;

/** The site's document endpoint: /Retrieve/?FILE__=<id> */
const RETRIEVE_PATH_MARKER = '/retrieve/';
const RETRIEVE_FILE_PARAM = 'file__=';

/**
 * True iff the URL ends in .pdf (query and fragment ignored) or matches the
 * retrieve-by-file-identifier endpoint. Case-insensitive.
 */
export function isPdfLikeUrl(url: string | null | undefined): boolean {
  const lowered = (url ?? '').toLowerCase();
  if (!lowered) {
    return false;
  }

  const path = lowered.split(/[?#]/, 1)[0];
  if (path.endsWith('.pdf') || lowered.endsWith('.pdf')) {
    return true;
  }

  return lowered.includes(RETRIEVE_PATH_MARKER) && lowered.includes(RETRIEVE_FILE_PARAM);
}

/**
 * True iff the declared content type carries a PDF/binary token, or the URL
 * alone is PDF-like
 */
export function isPdfLikeResponse(
  contentType: string | null | undefined,
  url: string | null | undefined
): boolean {
  const ct = (contentType ?? '').toLowerCase();
  if (PDF_CONTENT_TYPES.some((token) => ct.includes(token))) {
    return true;
  }
  return isPdfLikeUrl(url);
}

/**
 * Whether bytes start with the %PDF- signature
 */
export function isPdfBytes(bytes: Uint8Array): boolean {
  return (
    bytes.length >= 5 &&
    bytes[0] === 0x25 &&
    bytes[1] === 0x50 &&
    bytes[2] === 0x44 &&
    bytes[3] === 0x46 &&
    bytes[4] === 0x2d
  );
}

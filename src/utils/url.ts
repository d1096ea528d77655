/**
 * URL normalization and validation for document links
 * Handles relative hrefs, protocol-relative URLs, and rejects unsupported protocols
 */

export type NormalizeResult =
  | { ok: true; url: string }
  | { ok: false; reason: string; input: string };

/**
 * Normalize and validate a document URL
 *
 * Rules:
 * - Protocol-relative URLs (//host/path) → https://host/path
 * - Relative URLs resolve against base when given
 * - HTTP(S) URLs → unchanged apart from canonical serialization
 * - Query strings preserved exactly
 * - Rejects: data:, blob:, javascript:, empty, and other non-http(s) schemes
 */
export function normalizeRemoteUrl(input: string, base?: string): NormalizeResult {
  if (!input || input.trim() === '') {
    return {
      ok: false,
      reason: 'Invalid URL: empty input',
      input,
    };
  }

  const trimmed = input.trim();

  if (trimmed.startsWith('//')) {
    try {
      const url = new URL(`https:${trimmed}`);
      return { ok: true, url: url.toString() };
    } catch {
      return {
        ok: false,
        reason: 'Invalid URL: malformed protocol-relative URL',
        input,
      };
    }
  }

  let url: URL;
  try {
    url = base ? new URL(trimmed, base) : new URL(trimmed);
  } catch {
    return {
      ok: false,
      reason: 'Invalid URL: failed to parse',
      input,
    };
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return {
      ok: false,
      reason: `Unsupported protocol: ${url.protocol}`,
      input,
    };
  }

  return { ok: true, url: url.toString() };
}

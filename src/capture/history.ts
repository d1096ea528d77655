/**
 * Ordered URL log for one episode
 * Navigation entries are what the driver visited (reported to callers);
 * network entries are PDF-like URLs the interceptor saw go by.
 */

import { isPdfLikeUrl } from './classifier.js';

export type HistorySource = 'navigation' | 'network';

export interface HistoryEntry {
  readonly url: string;
  readonly source: HistorySource;
}

export class EpisodeHistory {
  private readonly entries: HistoryEntry[] = [];

  /**
   * Append a URL; blank pages and immediate repeats of the same entry are skipped
   */
  record(url: string, source: HistorySource = 'navigation'): void {
    if (!url || url === 'about:blank') {
      return;
    }
    const last = this.entries[this.entries.length - 1];
    if (last && last.url === url && last.source === source) {
      return;
    }
    this.entries.push({ url, source });
  }

  /** URLs the driver navigated through, in order */
  visited(): string[] {
    return this.entries.filter((entry) => entry.source === 'navigation').map((entry) => entry.url);
  }

  /** Every recorded URL, in order */
  urls(): string[] {
    return this.entries.map((entry) => entry.url);
  }

  all(): readonly HistoryEntry[] {
    return [...this.entries];
  }
}

/**
 * Choose the URL forced recovery should navigate to: the most recent PDF-like
 * history entry, else the current URL when it is PDF-like, else null
 */
export function pickRecoveryUrl(history: readonly string[], currentUrl: string | null): string | null {
  for (let i = history.length - 1; i >= 0; i--) {
    if (isPdfLikeUrl(history[i])) {
      return history[i];
    }
  }
  return currentUrl && isPdfLikeUrl(currentUrl) ? currentUrl : null;
}

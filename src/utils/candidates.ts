/**
 * Ordered candidate resolution
 * Selector heuristics try several locators in order; the first one whose
 * predicate holds wins. A predicate that throws counts as "not present".
 */

import { getLogger, describeError } from './logger.js';

export type CandidatePredicate<T> = (candidate: T, index: number) => Promise<boolean>;

/**
 * Return the first candidate whose predicate resolves true, or null
 */
export async function resolveFirst<T>(
  candidates: readonly T[],
  predicate: CandidatePredicate<T>
): Promise<T | null> {
  const logger = getLogger();

  for (let i = 0; i < candidates.length; i++) {
    const candidate = candidates[i];
    try {
      if (await predicate(candidate, i)) {
        return candidate;
      }
    } catch (error) {
      logger.debug(`Candidate ${i} rejected: ${describeError(error)}`);
    }
  }

  return null;
}

/**
 * Run action against each candidate in order until one completes without throwing
 */
export async function attemptInOrder<T>(
  candidates: readonly T[],
  action: (candidate: T, index: number) => Promise<void>
): Promise<T | null> {
  return resolveFirst(candidates, async (candidate, index) => {
    await action(candidate, index);
    return true;
  });
}

import { resolveFirst, attemptInOrder } from './candidates.js';
import { getLogger, resetLogger } from './logger.js';

describe('candidates', () => {
  beforeEach(() => {
    resetLogger();
    getLogger({ verbose: false });
  });

  describe('resolveFirst', () => {
    it('returns the first candidate whose predicate holds', async () => {
      const seen: string[] = [];
      const result = await resolveFirst(['a', 'b', 'c'], async (candidate) => {
        seen.push(candidate);
        return candidate !== 'a';
      });

      expect(result).toBe('b');
      expect(seen).toEqual(['a', 'b']);
    });

    it('treats a throwing predicate as absent and moves on', async () => {
      const result = await resolveFirst([1, 2], async (candidate) => {
        if (candidate === 1) {
          throw new Error('locator detached');
        }
        return true;
      });

      expect(result).toBe(2);
    });

    it('returns null when nothing matches', async () => {
      const result = await resolveFirst(['x', 'y'], async () => false);
      expect(result).toBeNull();
    });

    it('returns null for an empty list', async () => {
      const result = await resolveFirst<string>([], async () => true);
      expect(result).toBeNull();
    });

    it('passes the candidate index to the predicate', async () => {
      const indexes: number[] = [];
      await resolveFirst(['a', 'b', 'c'], async (_candidate, index) => {
        indexes.push(index);
        return false;
      });
      expect(indexes).toEqual([0, 1, 2]);
    });
  });

  describe('attemptInOrder', () => {
    it('returns the first candidate whose action completes', async () => {
      const attempted: string[] = [];
      const result = await attemptInOrder(['label', 'placeholder', 'nth'], async (candidate) => {
        attempted.push(candidate);
        if (candidate === 'label') {
          throw new Error('Timeout 10000ms exceeded');
        }
      });

      expect(result).toBe('placeholder');
      expect(attempted).toEqual(['label', 'placeholder']);
    });

    it('returns null when every action throws', async () => {
      const result = await attemptInOrder(['a', 'b'], async () => {
        throw new Error('nope');
      });
      expect(result).toBeNull();
    });
  });
});

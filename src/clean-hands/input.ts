import { z } from 'zod';
import { InvalidInputError } from '../utils/errors.js';
import type { LookupInput } from './types.js';

export const lookupInputSchema = z.object({
  notice: z.string().trim().min(5).max(64),
  last4: z.string().regex(/^\d{4}$/, 'must be exactly four digits'),
});

/**
 * Validate CLI-supplied lookup input, throwing the matching InvalidInputError
 */
export function parseLookupInput(raw: { notice?: unknown; last4?: unknown }): LookupInput {
  const parsed = lookupInputSchema.safeParse(raw);
  if (parsed.success) {
    return parsed.data;
  }

  const field = parsed.error.issues[0]?.path[0];
  if (field === 'last4') {
    throw InvalidInputError.fromLast4(String(raw.last4 ?? ''));
  }
  throw InvalidInputError.fromNotice(String(raw.notice ?? ''));
}

import {z} from 'zod';
import {CountOverflowError, InvalidCountError} from './error/count-errors.js';
import type {Count} from './types.js';

export const countSchema = z
  .number()
  .int()
  .nonnegative()
  .max(Number.MAX_SAFE_INTEGER);

/**
 * Parses a caller supplied count. Zero is accepted and means "no entry".
 */
export function parseCount(count: unknown): Count {
  const result = countSchema.safeParse(count);
  if (!result.success) {
    throw new InvalidCountError(
      count,
      result.error.issues.map(issue => issue.message).join('; '),
    );
  }
  return result.data;
}

export function checkedAdd(current: Count, increment: Count): Count {
  const sum = current + increment;
  if (!Number.isSafeInteger(sum)) {
    throw new CountOverflowError(current, increment);
  }
  return sum;
}

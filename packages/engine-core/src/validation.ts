import type { ConstraintSet } from './types.js';
import { EngineError } from './types.js';

/**
 * Validate a single constraint set. Returns the first error found, or null.
 *
 * A seller's ideal must not be below its bound, a buyer's ideal must not be
 * above it. ideal === bound is allowed (no room to concede).
 */
export function validateConstraints(c: ConstraintSet): EngineError | null {
  if (!Number.isFinite(c.bound) || !Number.isFinite(c.ideal)) {
    return EngineError.NON_FINITE_VALUE;
  }
  if (c.bound <= 0 || c.ideal <= 0) {
    return EngineError.NON_POSITIVE_VALUE;
  }
  if (c.role === 'SELLER' && c.ideal < c.bound) {
    return EngineError.INVERTED_RANGE;
  }
  if (c.role === 'BUYER' && c.ideal > c.bound) {
    return EngineError.INVERTED_RANGE;
  }
  return null;
}

import type { ConstraintSet } from '../types.js';
import { clamp } from '../utils.js';

/**
 * Linear utility of an agreed price for one party:
 * 0 at the bound, 1 at the ideal, clamped to [0, 1].
 *
 * When ideal === bound the utility is 1 if the price is at least as good as
 * the ideal, else 0.
 */
export function computeOutcomeUtility(price: number, c: ConstraintSet): number {
  const span = c.ideal - c.bound;
  if (span === 0) {
    const atLeastIdeal = c.role === 'SELLER' ? price >= c.ideal : price <= c.ideal;
    return atLeastIdeal ? 1 : 0;
  }
  return clamp((price - c.bound) / span, 0, 1);
}

import type { ConstraintSet, Zopa } from '../types.js';

/**
 * Compute the zone of possible agreement for a seller/buyer pair.
 * Returns null when the seller's minimum exceeds the buyer's maximum.
 */
export function computeZopa(seller: ConstraintSet, buyer: ConstraintSet): Zopa | null {
  if (seller.bound > buyer.bound) {
    return null;
  }
  return { low: seller.bound, high: buyer.bound };
}

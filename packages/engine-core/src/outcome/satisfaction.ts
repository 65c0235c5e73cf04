import type { ConstraintSet, SatisfactionTier } from '../types.js';
import { computeOutcomeUtility } from './utility.js';

/** Distance-from-ideal ratios at or below which a tier is reported. */
export interface SatisfactionThresholds {
  high: number;
  medium: number;
}

/** Fallback defaults: within 10% of ideal ⇒ high, within 50% ⇒ medium. */
export const DEFAULT_SATISFACTION_THRESHOLDS: SatisfactionThresholds = {
  high: 0.1,
  medium: 0.5,
};

const TIER_RANK: Record<SatisfactionTier, number> = { low: 0, medium: 1, high: 2 };

/**
 * Map an agreed price to a satisfaction tier for one party.
 *
 * The ratio is the distance from the ideal as a share of the [bound, ideal]
 * interval: 0 at (or past) the ideal, 1 at (or past) the bound. This is the
 * fallback heuristic only; a judge may tier differently.
 */
export function satisfactionTier(
  price: number,
  c: ConstraintSet,
  thresholds: SatisfactionThresholds = DEFAULT_SATISFACTION_THRESHOLDS,
): SatisfactionTier {
  const ratio = 1 - computeOutcomeUtility(price, c);
  if (ratio <= thresholds.high) return 'high';
  if (ratio <= thresholds.medium) return 'medium';
  return 'low';
}

export type Winner = 'A' | 'B' | 'Both' | 'Neither';

/**
 * Derive the winner from both parties' tiers.
 * Higher tier wins; equal tiers ⇒ Both, unless both are low ⇒ Neither.
 */
export function deriveWinner(tierA: SatisfactionTier, tierB: SatisfactionTier): Winner {
  const diff = TIER_RANK[tierA] - TIER_RANK[tierB];
  if (diff > 0) return 'A';
  if (diff < 0) return 'B';
  return tierA === 'low' ? 'Neither' : 'Both';
}

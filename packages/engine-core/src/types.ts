/**
 * Negotiation role. A SELLER maximizes the price and concedes downward,
 * a BUYER minimizes it and concedes upward.
 */
export type NegotiationRole = 'SELLER' | 'BUYER';

/** Direction in which a role wants the price to move. */
export type PriceDirection = 'MAXIMIZE' | 'MINIMIZE';

/**
 * Private constraints of one party. Immutable once a negotiation starts.
 *
 * `bound` is the walk-away price: the seller's minimum or the buyer's maximum.
 * `ideal` is the target: above the bound for a seller, below it for a buyer.
 */
export interface ConstraintSet {
  readonly role: NegotiationRole;
  readonly bound: number;
  readonly ideal: number;
  readonly urgency?: string;
}

/** Reported satisfaction with an outcome, highest first. */
export type SatisfactionTier = 'high' | 'medium' | 'low';

/** Zone of possible agreement: between the seller's minimum and the buyer's maximum. */
export interface Zopa {
  low: number;
  high: number;
}

/** Constraint validation errors. */
export enum EngineError {
  NON_FINITE_VALUE = 'NON_FINITE_VALUE',
  NON_POSITIVE_VALUE = 'NON_POSITIVE_VALUE',
  INVERTED_RANGE = 'INVERTED_RANGE',
}

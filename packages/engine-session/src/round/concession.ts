import { priceDirection, type NegotiationRole } from '@parley/engine-core';

/** Signed movement of an offer in the speaker's own favour. */
function ownFavourDelta(previous: number, current: number, role: NegotiationRole): number {
  return priceDirection(role) === 'MAXIMIZE' ? current - previous : previous - current;
}

/**
 * True when the new offer moves toward the counterpart: a seller asking
 * less, or a buyer offering more.
 */
export function trackConcession(previous: number, current: number, role: NegotiationRole): boolean {
  return ownFavourDelta(previous, current, role) < 0;
}

/**
 * True when an offer walks back an earlier position: a seller asking more
 * than before, or a buyer offering less. Repeating an offer is neither.
 */
export function isConcessionViolation(previous: number, current: number, role: NegotiationRole): boolean {
  return ownFavourDelta(previous, current, role) > 0;
}

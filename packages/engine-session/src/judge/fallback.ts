import {
  deriveWinner,
  extractAcceptedPrice,
  satisfactionTier,
  DEFAULT_SATISFACTION_THRESHOLDS,
  type ConstraintSet,
  type SatisfactionThresholds,
} from '@parley/engine-core';
import { formatPrice } from '../format.js';
import type { Transcript, Turn } from '../protocol/types.js';
import type { QuickCheckPayload } from './schema.js';
import type { Verdict } from './types.js';

/** Number of trailing turns scanned for acceptance. */
export const FALLBACK_TAIL_SIZE = 6;

export const NO_AGREEMENT_RATIONALE =
  'No explicit acceptance of a stated price was found in the transcript.';

interface Acceptance {
  turn: Turn;
  price: number;
}

/** Turns pairing acceptance language with a context price, newest first. */
function findAcceptances(turns: readonly Turn[]): Acceptance[] {
  const found: Acceptance[] = [];
  for (let i = turns.length - 1; i >= 0; i--) {
    const turn = turns[i];
    if (turn.error) continue;
    const price = extractAcceptedPrice(turn.message);
    if (price !== null) {
      found.push({ turn, price });
    }
  }
  return found;
}

/** The other party offered the accepted price somewhere in the window. */
function counterOffered(acceptance: Acceptance, window: readonly Turn[]): boolean {
  return window.some((t) => t.speaker !== acceptance.turn.speaker && t.offer === acceptance.price);
}

/**
 * Heuristic verdict from transcript text alone. Used when the judging
 * capability is unavailable or its response does not conform.
 *
 * Agreement is the newest acceptance in the tail whose price the other party
 * also offered within the tail.
 */
export function fallbackVerdict(
  transcript: Transcript,
  a: ConstraintSet,
  b: ConstraintSet,
  thresholds: SatisfactionThresholds = DEFAULT_SATISFACTION_THRESHOLDS,
  tailSize: number = FALLBACK_TAIL_SIZE,
): Verdict {
  const tail = transcript.slice(-tailSize);
  const acceptance = findAcceptances(tail).find((x) => counterOffered(x, tail));
  if (!acceptance) {
    const none: Verdict = {
      agreement_reached: false,
      agreed_terms: null,
      winner: 'Neither',
      rationale: NO_AGREEMENT_RATIONALE,
      satisfaction_A: 'low',
      satisfaction_B: 'low',
    };
    return Object.freeze(none);
  }

  const { turn, price } = acceptance;
  return agreedVerdict(price, `${turn.agent_id} accepted ${formatPrice(price)} in round ${turn.round}.`, a, b, thresholds);
}

/** Verdict for an agreed price, tiers and winner by the fallback heuristic. */
export function agreedVerdict(
  price: number,
  rationale: string,
  a: ConstraintSet,
  b: ConstraintSet,
  thresholds: SatisfactionThresholds = DEFAULT_SATISFACTION_THRESHOLDS,
): Verdict {
  const tierA = satisfactionTier(price, a, thresholds);
  const tierB = satisfactionTier(price, b, thresholds);
  const verdict: Verdict = {
    agreement_reached: true,
    agreed_terms: Object.freeze({ price }),
    winner: deriveWinner(tierA, tierB),
    rationale,
    satisfaction_A: tierA,
    satisfaction_B: tierB,
  };
  return Object.freeze(verdict);
}

/**
 * Heuristic quick check over one round. An acceptance only counts when its
 * price matches an offer the other party made this round or the round before.
 */
export function fallbackQuickCheck(transcript: Transcript, round: number): QuickCheckPayload {
  const turnA = transcript.find((t) => t.round === round && t.speaker === 'A');
  const turnB = transcript.find((t) => t.round === round && t.speaker === 'B');
  const turns = [turnA, turnB].filter((t): t is Turn => t !== undefined);

  const window = transcript.filter((t) => t.round >= round - 1 && t.round <= round);
  const found = findAcceptances(turns);
  const accepted = found.find((x) => counterOffered(x, window));
  const unmatched: Acceptance | undefined = found[0];

  let explanation = 'No explicit acceptance this round.';
  if (accepted) {
    explanation = `${accepted.turn.agent_id} accepted ${formatPrice(accepted.price)}.`;
  } else if (unmatched) {
    explanation = `${unmatched.turn.agent_id} accepted ${formatPrice(unmatched.price)}, which the other party did not offer.`;
  }

  return {
    agreement_reached: accepted !== undefined,
    agreed_price: accepted?.price ?? null,
    agent_a_offer: turnA?.offer ?? null,
    agent_b_offer: turnB?.offer ?? null,
    explanation,
  };
}

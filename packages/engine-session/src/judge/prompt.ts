import { computeZopa, type ConstraintSet } from '@parley/engine-core';
import { formatPrice } from '../format.js';
import type { Transcript, Turn } from '../protocol/types.js';

const RULE = '='.repeat(70);

export const VERDICT_SYSTEM =
  'You are an expert negotiation adjudicator. Analyze negotiations objectively and return the structured verdict only.';

export const QUICK_CHECK_SYSTEM =
  'You are an expert negotiation referee. Be strict: only confirm agreement when BOTH agents explicitly accept the SAME terms.';

/** Format a transcript as `[Round n] Agent X (ROLE):` blocks. */
export function formatTranscript(transcript: Transcript): string {
  return transcript
    .map((turn) => {
      const text = turn.error ? '[no message]' : turn.message;
      return `[Round ${turn.round}] ${turn.agent_id} (${turn.role}):\n  ${text}`;
    })
    .join('\n\n');
}

function describeConstraints(label: string, c: ConstraintSet): string {
  const boundLabel = c.role === 'SELLER' ? 'minimum acceptable price' : 'maximum budget';
  const urgency = c.urgency ? `, urgency: ${c.urgency}` : '';
  return `${label} (${c.role}): ${boundLabel} ${formatPrice(c.bound)}, ideal price ${formatPrice(c.ideal)}${urgency}`;
}

function describeZopa(a: ConstraintSet, b: ConstraintSet): string {
  const seller = a.role === 'SELLER' ? a : b;
  const buyer = a.role === 'SELLER' ? b : a;
  const zopa = computeZopa(seller, buyer);
  return zopa
    ? `Zone of possible agreement: ${formatPrice(zopa.low)} to ${formatPrice(zopa.high)}`
    : 'Zone of possible agreement: none (seller minimum exceeds buyer maximum)';
}

export function buildVerdictPrompt(
  transcript: Transcript,
  a: ConstraintSet,
  b: ConstraintSet,
  scenario: string | null,
): string {
  const lines = [RULE, 'NEGOTIATION TRANSCRIPT:', RULE, formatTranscript(transcript), ''];

  if (scenario) {
    lines.push(RULE, 'SCENARIO:', RULE, scenario, '');
  }

  lines.push(
    RULE,
    'PRIVATE CONSTRAINTS (not visible to the other party):',
    RULE,
    describeConstraints('Agent A', a),
    describeConstraints('Agent B', b),
    describeZopa(a, b),
    '',
    'RULES:',
    '- agreement_reached is true only if BOTH agents explicitly agreed to the SAME price.',
    "- Explicit acceptance looks like 'I accept', 'I agree', 'deal', 'sold'.",
    '- agreed_terms holds the exact agreed price, or null when there is no agreement.',
    '- Ignore numbers that describe the item (model years, mileage).',
    "- satisfaction_A / satisfaction_B: how close the outcome is to each agent's ideal within its acceptable range.",
    '- winner: the agent that did better relative to its own constraints, Both if both did well, Neither if no agreement.',
    '- Keep the rationale factual (e.g. "Both agents accepted $712 in round 7").',
  );

  return lines.join('\n');
}

export function buildQuickCheckPrompt(round: number, turnA: Turn | undefined, turnB: Turn | undefined): string {
  const quote = (turn: Turn | undefined) => (turn && !turn.error ? turn.message : '[no message]');
  return [
    'Analyze this negotiation round and report agreement status and each agent\'s price offer.',
    '',
    `ROUND ${round}:`,
    '',
    `Agent A (${turnA?.role ?? 'unknown'}): "${quote(turnA)}"`,
    '',
    `Agent B (${turnB?.role ?? 'unknown'}): "${quote(turnB)}"`,
    '',
    'AGREEMENT RULES:',
    '- agreement_reached is true only if BOTH agents explicitly agreed to the SAME price.',
    '- If one proposes and the other accepts the same price, that is agreement.',
    '- Still counter-offering different prices is not agreement.',
    '',
    'PRICE EXTRACTION RULES:',
    '- Extract the primary price each agent proposes this round.',
    '- Ignore year numbers (like "2018 Honda Civic").',
    '- An acceptance without a new offer, or no offer at all, is null.',
  ].join('\n');
}

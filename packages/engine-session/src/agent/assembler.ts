import type { NegotiationRole } from '@parley/engine-core';
import type { Transcript } from '../protocol/types.js';
import type { AgentProfile, PromptContext } from './types.js';

const GOALS: Record<NegotiationRole, string> = {
  SELLER: 'Sell for the HIGHEST price possible within your acceptable range.',
  BUYER: 'Buy for the LOWEST price possible within your acceptable range.',
};

/**
 * Assembles a PromptContext from an AgentProfile and per-round data.
 *
 * The profile holds what stays fixed for the run; the transcript, round
 * number and offer history change every turn.
 */
export function assembleContext(
  profile: AgentProfile,
  scenario: string | null,
  previousOffers: readonly number[],
  transcript: Transcript,
  round: number,
): PromptContext {
  return {
    agent_id: profile.agent_id,
    role: profile.constraints.role,
    goal: GOALS[profile.constraints.role],
    constraints: profile.constraints,
    persona_modifier: profile.persona_modifier,
    scenario,
    previous_offers: [...previousOffers],
    transcript,
    round,
  };
}

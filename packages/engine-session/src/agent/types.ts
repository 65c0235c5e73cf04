import type { ConstraintSet, NegotiationRole } from '@parley/engine-core';
import type { Speaker, Transcript } from '../protocol/types.js';

/** Invariant per-agent configuration for a run. */
export interface AgentProfile {
  agent_id: string;
  speaker: Speaker;
  constraints: ConstraintSet;
  persona: string;
  persona_modifier: string;
}

/**
 * Everything the text generator is told for one turn. Assembled from the
 * invariant profile plus the situation of the current round.
 */
export interface PromptContext {
  agent_id: string;
  role: NegotiationRole;
  goal: string;
  constraints: ConstraintSet;
  persona_modifier: string;
  scenario: string | null;
  previous_offers: readonly number[];
  transcript: Transcript;
  round: number;
}

/**
 * External text-generation capability. Resolves to free-form text; rejects
 * with a GenerationError to signal recoverable or non-recoverable failure.
 */
export interface TextGenerator {
  generate(context: PromptContext): Promise<string>;
}

/** An offer that moved away from the agent's previous position. */
export interface ConcessionViolation {
  round: number;
  previous_offer: number;
  offer: number;
}

/** Snapshot of an agent's state at the end of a run. */
export interface AgentSummary {
  agent_id: string;
  speaker: Speaker;
  role: NegotiationRole;
  persona: string;
  offers: number[];
  concessions: number;
  violations: ConcessionViolation[];
}

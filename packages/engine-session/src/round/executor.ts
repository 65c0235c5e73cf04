import { extractOffer } from '@parley/engine-core';
import type { NegotiationAgent } from '../agent/agent-state.js';
import { GenerationError, errorMessage } from '../errors.js';
import type { SessionLogger } from '../logger.js';
import type { Turn } from '../protocol/types.js';
import type { NegotiationSession } from '../session/types.js';
import type { RoundResult } from './types.js';

/** Speaking order is fixed: index 0 is Agent A, index 1 is Agent B. */
export type AgentPair = readonly [NegotiationAgent, NegotiationAgent];

/**
 * Execute a single negotiation round.
 *
 * Pipeline, per agent in speaking order:
 * 1. Ask the agent for its next message against the transcript so far
 * 2. Non-recoverable generation failure → stop, report failure
 * 3. Any other failure or empty text → record an unparseable turn
 * 4. Extract the offer, append the turn and report it to onTurn
 *
 * Returns a new session. The input session is not mutated.
 */
export async function executeRound(
  session: NegotiationSession,
  agents: AgentPair,
  round: number,
  logger: SessionLogger,
  onTurn?: (turn: Turn) => void,
): Promise<RoundResult> {
  let current: NegotiationSession = { ...session, current_round: round, updated_at: Date.now() };

  for (const agent of agents) {
    const { agent_id, speaker, constraints, persona } = agent.profile;
    const violationsBefore = agent.consistencyViolations.length;

    let message = '';
    let error: string | undefined;
    try {
      message = await agent.proposeNext(current.turns, round);
    } catch (err) {
      if (err instanceof GenerationError && !err.recoverable) {
        return { session: current, failure: `${agent_id}: ${err.message}` };
      }
      error = errorMessage(err);
    }
    if (error === undefined && message === '') {
      error = 'empty response';
    }

    const turn: Turn = Object.freeze({
      round,
      speaker,
      agent_id,
      role: constraints.role,
      persona,
      message,
      offer: error === undefined ? extractOffer(message) : null,
      ...(error === undefined ? {} : { error }),
    });

    if (error !== undefined) {
      logger.warn({ session_id: session.session_id, round, agent_id, error }, 'unparseable turn');
    }
    const violation = agent.consistencyViolations[violationsBefore];
    if (violation) {
      logger.warn({ session_id: session.session_id, agent_id, ...violation }, 'offer walked back an earlier concession');
    }

    current = { ...current, turns: [...current.turns, turn], updated_at: Date.now() };
    onTurn?.(turn);
  }

  return { session: current };
}

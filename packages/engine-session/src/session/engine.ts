import { randomUUID } from 'node:crypto';
import { computeOutcomeUtility, computeZopa, counterpartRole } from '@parley/engine-core';
import type { NegotiationAgent } from '../agent/agent-state.js';
import { NegotiationError } from '../errors.js';
import type { Adjudicator } from '../judge/adjudicator.js';
import type { Adjudication, QuickCheck } from '../judge/types.js';
import { silentLogger, type SessionLogger } from '../logger.js';
import type { Transcript, Turn } from '../protocol/types.js';
import { executeRound, type AgentPair } from '../round/executor.js';
import { isTerminal, transition, type SessionEvent } from './state-machine.js';
import type { NegotiationOutcome, NegotiationSession } from './types.js';

export const DEFAULT_MAX_ROUNDS = 10;

export interface EngineOptions {
  adjudicator: Adjudicator;
  max_rounds?: number;
  logger?: SessionLogger;
}

export interface RunOptions {
  session_id?: string;
  /** Public scenario text for the adjudicator. */
  scenario?: string;
  /** Checked between rounds; an in-flight generation call is let to complete. */
  signal?: AbortSignal;
  /** Called after each turn is appended to the transcript. */
  onTurn?: (turn: Turn) => void;
  /** Called after each round's quick check. */
  onCheck?: (check: QuickCheck) => void;
}

function createSession(sessionId: string, maxRounds: number): NegotiationSession {
  const now = Date.now();
  return {
    session_id: sessionId,
    status: 'NOT_STARTED',
    max_rounds: maxRounds,
    current_round: 0,
    turns: [],
    checks: [],
    failure_reason: null,
    created_at: now,
    updated_at: now,
  };
}

function advance(session: NegotiationSession, event: SessionEvent): NegotiationSession {
  const status = transition(session.status, event);
  if (status === null) {
    throw new Error(`Invalid session transition: ${session.status} via ${event}`);
  }
  return { ...session, status, updated_at: Date.now() };
}

function fail(session: NegotiationSession, reason: string): NegotiationSession {
  return { ...advance(session, 'failure'), failure_reason: reason };
}

/**
 * Drives alternating turns between two agents, checks for agreement after
 * every round, and hands the finished transcript to the adjudicator.
 *
 * Runs are independent: an engine holds no per-run state and may run several
 * negotiations concurrently, each with its own pair of agents. Agents are
 * reset when a run starts and belong to one run at a time.
 */
export class NegotiationEngine {
  private readonly adjudicator: Adjudicator;
  private readonly maxRounds: number;
  private readonly logger: SessionLogger;

  constructor(options: EngineOptions) {
    const maxRounds = options.max_rounds ?? DEFAULT_MAX_ROUNDS;
    if (!Number.isInteger(maxRounds) || maxRounds < 1) {
      throw new NegotiationError('INVALID_MAX_ROUNDS', `max_rounds must be a positive integer, got ${maxRounds}`, {
        max_rounds: maxRounds,
      });
    }
    this.adjudicator = options.adjudicator;
    this.maxRounds = maxRounds;
    this.logger = options.logger ?? silentLogger();
  }

  async run(agentA: NegotiationAgent, agentB: NegotiationAgent, options: RunOptions = {}): Promise<NegotiationOutcome> {
    const a = agentA.profile.constraints;
    const b = agentB.profile.constraints;
    if (b.role !== counterpartRole(a.role)) {
      throw new NegotiationError('DUPLICATE_ROLE', `Both agents have role ${a.role}`, { role: a.role });
    }
    const speakers = { a: agentA.profile.speaker, b: agentB.profile.speaker };
    if (speakers.a !== 'A' || speakers.b !== 'B') {
      throw new NegotiationError(
        'SPEAKER_MISMATCH',
        `Agents must speak as A then B, got ${speakers.a} then ${speakers.b}`,
        speakers,
      );
    }
    if (agentA.profile.agent_id === agentB.profile.agent_id) {
      throw new NegotiationError('DUPLICATE_AGENT_ID', `Both agents are named ${agentA.profile.agent_id}`, {
        agent_id: agentA.profile.agent_id,
      });
    }
    agentA.reset();
    agentB.reset();

    const agents: AgentPair = [agentA, agentB];
    let session = advance(createSession(options.session_id ?? randomUUID(), this.maxRounds), 'start');
    const log = { session_id: session.session_id };
    this.logger.info({ ...log, max_rounds: this.maxRounds, role_a: a.role, role_b: b.role }, 'negotiation started');

    let stoppedEarly = false;
    for (let round = 1; round <= this.maxRounds; round++) {
      if (options.signal?.aborted) {
        session = fail(session, 'aborted');
        break;
      }

      const result = await executeRound(session, agents, round, this.logger, options.onTurn);
      session = result.session;
      if (result.failure !== undefined) {
        session = fail(session, result.failure);
        break;
      }

      const [turnA, turnB] = session.turns.slice(-2);
      this.logger.info({ ...log, round, offer_a: turnA?.offer ?? null, offer_b: turnB?.offer ?? null }, 'round completed');

      const check = await this.adjudicator.quickCheck(session.turns, round);
      session = { ...session, checks: [...session.checks, check] };
      options.onCheck?.(check);
      this.logger.info(
        { ...log, round, agreement: check.agreement_reached, price: check.agreed_price, source: check.source },
        'quick check',
      );
      if (check.agreement_reached) {
        session = advance(session, 'agreement');
        stoppedEarly = true;
        break;
      }
    }

    const transcript: Transcript = Object.freeze([...session.turns]);
    const base = {
      session_id: session.session_id,
      rounds_played: session.current_round,
      max_rounds: session.max_rounds,
      transcript,
      checks: Object.freeze([...session.checks]),
      agents: { A: agentA.summary(), B: agentB.summary() },
    };

    if (session.status === 'FAILED') {
      const reason = session.failure_reason ?? 'unknown failure';
      this.logger.error({ ...log, reason, turns: transcript.length }, 'negotiation failed');
      return { ...base, status: 'FAILED', reason };
    }

    let adjudication: Adjudication = await this.adjudicator.judge(transcript, a, b, options.scenario ?? null);

    if (!isTerminal(session.status)) {
      session = advance(session, adjudication.verdict.agreement_reached ? 'agreement' : 'round_limit');
    } else if (!adjudication.verdict.agreement_reached) {
      // The confirmed quick check stands over a final verdict that missed the agreement.
      const confirmed = session.checks.at(-1);
      const override = confirmed ? this.adjudicator.confirmedVerdict(confirmed, a, b) : null;
      if (override) {
        const reason = 'final verdict found no agreement after quick check confirmed one';
        this.logger.warn({ ...log, price: override.agreed_terms?.price ?? null }, reason);
        adjudication = { verdict: override, source: 'fallback', fallback_reason: reason };
      }
    }
    const { verdict } = adjudication;

    const status = session.status === 'AGREED' ? 'AGREED' : 'EXHAUSTED';
    const price = verdict.agreed_terms?.price ?? null;
    const seller = a.role === 'SELLER' ? a : b;
    const buyer = a.role === 'SELLER' ? b : a;

    this.logger.info({ ...log, status, price, source: adjudication.source }, 'negotiation finished');

    return {
      ...base,
      status,
      stopped_early: stoppedEarly,
      verdict,
      verdict_source: adjudication.source,
      fallback_reason: adjudication.fallback_reason,
      utility_a: price === null ? null : computeOutcomeUtility(price, a),
      utility_b: price === null ? null : computeOutcomeUtility(price, b),
      zopa: computeZopa(seller, buyer),
    };
  }
}

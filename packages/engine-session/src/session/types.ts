import type { Zopa } from '@parley/engine-core';
import type { AgentSummary } from '../agent/types.js';
import type { QuickCheck, Verdict, VerdictSource } from '../judge/types.js';
import type { Transcript, Turn } from '../protocol/types.js';

/** Session lifecycle status. */
export type SessionStatus = 'NOT_STARTED' | 'IN_PROGRESS' | 'AGREED' | 'EXHAUSTED' | 'FAILED';

/** Full run state. Each update produces a new object. */
export interface NegotiationSession {
  session_id: string;
  status: SessionStatus;
  max_rounds: number;
  current_round: number;
  turns: Turn[];
  checks: QuickCheck[];
  failure_reason: string | null;
  created_at: number;
  updated_at: number;
}

interface OutcomeBase {
  session_id: string;
  rounds_played: number;
  max_rounds: number;
  transcript: Transcript;
  checks: readonly QuickCheck[];
  agents: { A: AgentSummary; B: AgentSummary };
}

/** A run that produced a verdict. */
export interface AdjudicatedOutcome extends OutcomeBase {
  status: 'AGREED' | 'EXHAUSTED';
  /** A quick check confirmed agreement before the round limit logic ran. */
  stopped_early: boolean;
  verdict: Verdict;
  verdict_source: VerdictSource;
  fallback_reason: string | null;
  utility_a: number | null;
  utility_b: number | null;
  zopa: Zopa | null;
}

/** A run that ended on a non-recoverable failure or was abandoned. */
export interface FailedOutcome extends OutcomeBase {
  status: 'FAILED';
  reason: string;
}

export type NegotiationOutcome = AdjudicatedOutcome | FailedOutcome;

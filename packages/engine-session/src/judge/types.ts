import type { z } from 'zod';
import type { QuickCheckPayload, VerdictPayload } from './schema.js';

/** Structured final adjudication of a negotiation. Immutable. */
export type Verdict = Readonly<VerdictPayload>;

/** Which path produced a verdict or check. */
export type VerdictSource = 'judge' | 'fallback';

export interface QuickCheck extends QuickCheckPayload {
  round: number;
  source: VerdictSource;
}

/** A schema-constrained request to a judging capability. */
export interface JudgeRequest<T extends z.ZodTypeAny = z.ZodTypeAny> {
  /** Schema name passed to the capability. */
  name: string;
  schema: T;
  system: string;
  prompt: string;
  temperature: number;
  max_tokens: number;
}

/**
 * External judging capability. Resolves to the decoded structured response
 * (validated again by the adjudicator), or null when it produced none.
 * Rejects when unavailable.
 */
export interface JudgingClient {
  complete(request: JudgeRequest): Promise<unknown>;
}

/** A verdict together with how it was obtained. */
export interface Adjudication {
  verdict: Verdict;
  source: VerdictSource;
  fallback_reason: string | null;
}

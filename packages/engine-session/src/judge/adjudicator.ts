import type { z } from 'zod';
import {
  DEFAULT_SATISFACTION_THRESHOLDS,
  type ConstraintSet,
  type SatisfactionThresholds,
} from '@parley/engine-core';
import { errorMessage } from '../errors.js';
import { silentLogger, type SessionLogger } from '../logger.js';
import type { Transcript } from '../protocol/types.js';
import { formatPrice } from '../format.js';
import { FALLBACK_TAIL_SIZE, agreedVerdict, fallbackQuickCheck, fallbackVerdict } from './fallback.js';
import {
  QUICK_CHECK_SYSTEM,
  VERDICT_SYSTEM,
  buildQuickCheckPrompt,
  buildVerdictPrompt,
} from './prompt.js';
import { QuickCheckSchema, VerdictSchema } from './schema.js';
import type { Adjudication, JudgeRequest, JudgingClient, QuickCheck, Verdict } from './types.js';

export interface AdjudicatorOptions {
  /** null runs the fallback path only. */
  client: JudgingClient | null;
  logger?: SessionLogger;
  /** Sampling temperature for the final verdict. */
  temperature?: number;
  quick_check_temperature?: number;
  max_tokens?: number;
  quick_check_max_tokens?: number;
  satisfaction_thresholds?: SatisfactionThresholds;
  fallback_tail_size?: number;
}

type PrimaryResult<T> = { ok: true; value: T } | { ok: false; reason: string };

/**
 * Produces verdicts through a schema-constrained judging request, with a
 * heuristic fallback selected whenever that request yields no conforming,
 * self-consistent result.
 */
export class Adjudicator {
  private readonly client: JudgingClient | null;
  private readonly logger: SessionLogger;
  private readonly temperature: number;
  private readonly quickCheckTemperature: number;
  private readonly maxTokens: number;
  private readonly quickCheckMaxTokens: number;
  private readonly thresholds: SatisfactionThresholds;
  private readonly tailSize: number;

  constructor(options: AdjudicatorOptions) {
    this.client = options.client;
    this.logger = options.logger ?? silentLogger();
    this.temperature = options.temperature ?? 0;
    this.quickCheckTemperature = options.quick_check_temperature ?? 0;
    this.maxTokens = options.max_tokens ?? 1000;
    this.quickCheckMaxTokens = options.quick_check_max_tokens ?? 200;
    this.thresholds = options.satisfaction_thresholds ?? DEFAULT_SATISFACTION_THRESHOLDS;
    this.tailSize = options.fallback_tail_size ?? FALLBACK_TAIL_SIZE;
  }

  /** Adjudicate a finished transcript against both parties' constraints. */
  async adjudicate(
    transcript: Transcript,
    a: ConstraintSet,
    b: ConstraintSet,
    scenario: string | null = null,
  ): Promise<Verdict> {
    const { verdict } = await this.judge(transcript, a, b, scenario);
    return verdict;
  }

  /** Like adjudicate, also reporting which path produced the verdict. */
  async judge(
    transcript: Transcript,
    a: ConstraintSet,
    b: ConstraintSet,
    scenario: string | null = null,
  ): Promise<Adjudication> {
    const primary = await this.request({
      name: 'negotiation_verdict',
      schema: VerdictSchema,
      system: VERDICT_SYSTEM,
      prompt: buildVerdictPrompt(transcript, a, b, scenario),
      temperature: this.temperature,
      max_tokens: this.maxTokens,
    });

    if (primary.ok) {
      const inconsistency = verdictInconsistency(primary.value);
      if (!inconsistency) {
        const terms = primary.value.agreed_terms;
        const verdict: Verdict = {
          ...primary.value,
          agreed_terms: terms ? Object.freeze({ ...terms }) : null,
        };
        return { verdict: Object.freeze(verdict), source: 'judge', fallback_reason: null };
      }
      return this.fallback(transcript, a, b, inconsistency);
    }
    return this.fallback(transcript, a, b, primary.reason);
  }

  /** Agreement-only check over the turns of one round. */
  async quickCheck(transcript: Transcript, round: number): Promise<QuickCheck> {
    const turnA = transcript.find((t) => t.round === round && t.speaker === 'A');
    const turnB = transcript.find((t) => t.round === round && t.speaker === 'B');

    const primary = await this.request({
      name: 'quick_agreement_check',
      schema: QuickCheckSchema,
      system: QUICK_CHECK_SYSTEM,
      prompt: buildQuickCheckPrompt(round, turnA, turnB),
      temperature: this.quickCheckTemperature,
      max_tokens: this.quickCheckMaxTokens,
    });

    if (primary.ok && (!primary.value.agreement_reached || primary.value.agreed_price !== null)) {
      return { ...primary.value, round, source: 'judge' };
    }

    const reason = primary.ok ? 'agreement reported without a price' : primary.reason;
    this.logger.debug({ round, reason }, 'quick check using fallback');
    return { ...fallbackQuickCheck(transcript, round), round, source: 'fallback' };
  }

  /**
   * Verdict for an agreement a quick check confirmed, tiered by the fallback
   * heuristic. null when the check did not confirm one.
   */
  confirmedVerdict(check: QuickCheck, a: ConstraintSet, b: ConstraintSet): Verdict | null {
    if (!check.agreement_reached || check.agreed_price === null) {
      return null;
    }
    const price = check.agreed_price;
    return agreedVerdict(price, `Agreement on ${formatPrice(price)} confirmed in round ${check.round}.`, a, b, this.thresholds);
  }

  private fallback(transcript: Transcript, a: ConstraintSet, b: ConstraintSet, reason: string): Adjudication {
    this.logger.warn({ reason }, 'adjudication using fallback');
    return {
      verdict: fallbackVerdict(transcript, a, b, this.thresholds, this.tailSize),
      source: 'fallback',
      fallback_reason: reason,
    };
  }

  /** The single primary call: unavailable, failed, empty or non-conformant ⇒ not ok. */
  private async request<T extends z.ZodTypeAny>(request: JudgeRequest<T>): Promise<PrimaryResult<z.infer<T>>> {
    if (!this.client) {
      return { ok: false, reason: 'judging capability unavailable' };
    }

    let raw: unknown;
    try {
      raw = await this.client.complete(request);
    } catch (err) {
      return { ok: false, reason: `judging request failed: ${errorMessage(err)}` };
    }
    if (raw === null || raw === undefined) {
      return { ok: false, reason: 'judging response was empty' };
    }

    const parsed = request.schema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
      return { ok: false, reason: `schema violation: ${issues.join('; ')}` };
    }
    return { ok: true, value: parsed.data };
  }
}

function verdictInconsistency(v: z.infer<typeof VerdictSchema>): string | null {
  if (v.agreement_reached && v.agreed_terms === null) {
    return 'agreement reported without terms';
  }
  if (!v.agreement_reached && v.agreed_terms !== null) {
    return 'terms reported without agreement';
  }
  return null;
}

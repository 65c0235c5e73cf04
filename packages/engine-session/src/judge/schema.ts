import { z } from 'zod';

export const SatisfactionTierSchema = z.enum(['high', 'medium', 'low']);

export const WinnerSchema = z.enum(['A', 'B', 'Both', 'Neither']);

/** Final verdict. Fixed fields, fixed enumerations, no extra fields. */
export const VerdictSchema = z
  .object({
    agreement_reached: z.boolean().describe('Whether both agents explicitly agreed to the same terms'),
    agreed_terms: z
      .object({
        price: z.number().describe('The agreed price'),
      })
      .strict()
      .nullable()
      .describe('The agreed terms, or null if no agreement'),
    winner: WinnerSchema.describe('Which agent came out ahead relative to its own constraints'),
    rationale: z.string().describe('Brief factual explanation of the outcome'),
    satisfaction_A: SatisfactionTierSchema,
    satisfaction_B: SatisfactionTierSchema,
  })
  .strict();

/** Lightweight per-round agreement check. */
export const QuickCheckSchema = z
  .object({
    agreement_reached: z.boolean().describe('Whether both agents explicitly agreed to the same price'),
    agreed_price: z.number().nullable().describe('The agreed price, or null if no agreement'),
    agent_a_offer: z.number().nullable().describe("Agent A's new price offer this round, or null"),
    agent_b_offer: z.number().nullable().describe("Agent B's new price offer this round, or null"),
    explanation: z.string().describe('Brief explanation of why agreement was or was not reached'),
  })
  .strict();

export type VerdictPayload = z.infer<typeof VerdictSchema>;
export type QuickCheckPayload = z.infer<typeof QuickCheckSchema>;

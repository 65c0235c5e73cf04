import type { NegotiationRole } from '@parley/engine-core';

/** Fixed speaking order within a round: A first, then B. */
export type Speaker = 'A' | 'B';

/** A single transcript entry. */
export interface Turn {
  readonly round: number;
  readonly speaker: Speaker;
  readonly agent_id: string;
  readonly role: NegotiationRole;
  readonly persona: string;
  readonly message: string;
  /** Offer extracted from the message, null when none was found. */
  readonly offer: number | null;
  /** Set when the turn is unparseable: generation failed or returned no text. */
  readonly error?: string;
}

/** Append-only during a run, frozen once the run ends. */
export type Transcript = readonly Turn[];

import type { NegotiationSession } from '../session/types.js';

/** Result of executing a single negotiation round. */
export interface RoundResult {
  session: NegotiationSession;
  /** Set when a non-recoverable generation failure ended the round early. */
  failure?: string;
}

/**
 * Failure signalled by a text-generation capability.
 *
 * A recoverable failure costs the speaker its turn; a non-recoverable one
 * fails the whole run.
 */
export class GenerationError extends Error {
  readonly recoverable: boolean;

  constructor(message: string, options: { recoverable: boolean; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = 'GenerationError';
    this.recoverable = options.recoverable;
  }
}

export type NegotiationErrorCode =
  | 'INVALID_CONSTRAINTS'
  | 'DUPLICATE_ROLE'
  | 'SPEAKER_MISMATCH'
  | 'DUPLICATE_AGENT_ID'
  | 'INVALID_MAX_ROUNDS'
  | 'UNKNOWN_PERSONA';

/** Invalid run configuration, raised before any round is played. */
export class NegotiationError extends Error {
  readonly code: NegotiationErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: NegotiationErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'NegotiationError';
    this.code = code;
    this.details = details;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

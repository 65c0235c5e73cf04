// Protocol types
export type { Speaker, Turn, Transcript } from './protocol/types.js';

// Errors + logging
export { GenerationError, NegotiationError, errorMessage } from './errors.js';
export type { NegotiationErrorCode } from './errors.js';
export type { SessionLogger } from './logger.js';
export { silentLogger } from './logger.js';
export { formatPrice } from './format.js';

// Agent state + prompt context
export type {
  AgentProfile,
  AgentSummary,
  ConcessionViolation,
  PromptContext,
  TextGenerator,
} from './agent/types.js';
export { NegotiationAgent } from './agent/agent-state.js';
export type { AgentOptions } from './agent/agent-state.js';
export { assembleContext } from './agent/assembler.js';
export { renderPrompt } from './agent/prompt.js';
export { PERSONAS, PERSONA_NAMES, isPersonaName } from './agent/personas.js';
export type { PersonaName } from './agent/personas.js';

// Session types + state machine + engine
export type {
  SessionStatus,
  NegotiationSession,
  NegotiationOutcome,
  AdjudicatedOutcome,
  FailedOutcome,
} from './session/types.js';
export { transition, isTerminal } from './session/state-machine.js';
export type { SessionEvent } from './session/state-machine.js';
export { NegotiationEngine, DEFAULT_MAX_ROUNDS } from './session/engine.js';
export type { EngineOptions, RunOptions } from './session/engine.js';

// Round executor + concession
export type { RoundResult } from './round/types.js';
export { executeRound } from './round/executor.js';
export type { AgentPair } from './round/executor.js';
export { trackConcession, isConcessionViolation } from './round/concession.js';

// Adjudicator
export type {
  Verdict,
  VerdictSource,
  QuickCheck,
  JudgeRequest,
  JudgingClient,
  Adjudication,
} from './judge/types.js';
export { Adjudicator } from './judge/adjudicator.js';
export type { AdjudicatorOptions } from './judge/adjudicator.js';
export { VerdictSchema, QuickCheckSchema, SatisfactionTierSchema, WinnerSchema } from './judge/schema.js';
export { agreedVerdict, fallbackVerdict, fallbackQuickCheck, FALLBACK_TAIL_SIZE } from './judge/fallback.js';
export { buildVerdictPrompt, buildQuickCheckPrompt, formatTranscript } from './judge/prompt.js';

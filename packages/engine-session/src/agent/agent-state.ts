import { extractOffer, validateConstraints, type ConstraintSet } from '@parley/engine-core';
import { NegotiationError } from '../errors.js';
import { isConcessionViolation, trackConcession } from '../round/concession.js';
import type { Speaker, Transcript } from '../protocol/types.js';
import { assembleContext } from './assembler.js';
import { PERSONAS, isPersonaName } from './personas.js';
import type {
  AgentProfile,
  AgentSummary,
  ConcessionViolation,
  PromptContext,
  TextGenerator,
} from './types.js';

export interface AgentOptions {
  speaker: Speaker;
  constraints: ConstraintSet;
  generator: TextGenerator;
  /** Defaults to "Agent A" / "Agent B". */
  agent_id?: string;
  /** Catalogue persona name, or a free label when persona_modifier is given. */
  persona?: string;
  /** Overrides the catalogue text for the persona. */
  persona_modifier?: string;
  /** Public scenario text shared by both agents. */
  scenario?: string;
}

function resolvePersonaModifier(persona: string, override: string | undefined): string {
  if (override !== undefined) {
    return override;
  }
  if (!isPersonaName(persona)) {
    throw new NegotiationError('UNKNOWN_PERSONA', `Persona '${persona}' not found`, { persona });
  }
  return PERSONAS[persona];
}

/**
 * Per-party negotiation state: constraints, persona and own offer history.
 * Generation is delegated to the injected TextGenerator.
 */
export class NegotiationAgent {
  readonly profile: AgentProfile;
  private readonly generator: TextGenerator;
  private readonly scenario: string | null;
  private offers: number[] = [];
  private violations: ConcessionViolation[] = [];
  private concessions = 0;
  private lastContext: PromptContext | null = null;

  constructor(options: AgentOptions) {
    const error = validateConstraints(options.constraints);
    if (error) {
      throw new NegotiationError('INVALID_CONSTRAINTS', `Invalid constraints for agent ${options.speaker}: ${error}`, {
        speaker: options.speaker,
        error,
      });
    }
    const persona = options.persona ?? 'None';
    this.profile = {
      agent_id: options.agent_id ?? `Agent ${options.speaker}`,
      speaker: options.speaker,
      constraints: Object.freeze({ ...options.constraints }),
      persona,
      persona_modifier: resolvePersonaModifier(persona, options.persona_modifier),
    };
    this.generator = options.generator;
    this.scenario = options.scenario ?? null;
  }

  get offerHistory(): readonly number[] {
    return this.offers;
  }

  get consistencyViolations(): readonly ConcessionViolation[] {
    return this.violations;
  }

  /** The context sent with the most recent generation request. */
  get lastPromptContext(): PromptContext | null {
    return this.lastContext;
  }

  /**
   * Ask the generator for this agent's next message and record any offer in it.
   * Generator failures propagate to the caller untouched.
   */
  async proposeNext(transcript: Transcript, round: number): Promise<string> {
    const context = assembleContext(this.profile, this.scenario, this.offers, transcript, round);
    this.lastContext = context;

    const message = (await this.generator.generate(context)).trim();
    const offer = extractOffer(message);
    if (offer !== null) {
      this.recordOffer(offer, round);
    }
    return message;
  }

  /** Violations are recorded, not rejected. */
  private recordOffer(offer: number, round: number): void {
    const previous = this.offers.at(-1);
    if (previous !== undefined) {
      const role = this.profile.constraints.role;
      if (trackConcession(previous, offer, role)) {
        this.concessions++;
      } else if (isConcessionViolation(previous, offer, role)) {
        this.violations.push({ round, previous_offer: previous, offer });
      }
    }
    this.offers.push(offer);
  }

  /** Forget offers, concessions and violations from an earlier run. */
  reset(): void {
    this.offers = [];
    this.violations = [];
    this.concessions = 0;
    this.lastContext = null;
  }

  summary(): AgentSummary {
    return {
      agent_id: this.profile.agent_id,
      speaker: this.profile.speaker,
      role: this.profile.constraints.role,
      persona: this.profile.persona,
      offers: [...this.offers],
      concessions: this.concessions,
      violations: this.violations.map((v) => ({ ...v })),
    };
  }
}

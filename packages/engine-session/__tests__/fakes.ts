import { extractOffer } from '@parley/engine-core';
import type { JudgeRequest, JudgingClient } from '../src/judge/types.js';
import type { PromptContext, TextGenerator } from '../src/agent/types.js';
import type { Speaker, Turn } from '../src/protocol/types.js';

type Script = Array<string | Error> | ((context: PromptContext) => string);

/** Generator that replays a fixed script, or answers from a function. */
export class ScriptedGenerator implements TextGenerator {
  readonly contexts: PromptContext[] = [];
  private readonly queue: Array<string | Error> | null;
  private readonly respond: ((context: PromptContext) => string) | null;

  constructor(script: Script) {
    this.queue = Array.isArray(script) ? [...script] : null;
    this.respond = Array.isArray(script) ? null : script;
  }

  async generate(context: PromptContext): Promise<string> {
    this.contexts.push(context);
    if (this.respond) {
      return this.respond(context);
    }
    const next = this.queue?.shift();
    if (next === undefined) {
      throw new Error('script exhausted');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

/** Judging client answering from a function; throw inside it to simulate an outage. */
export class FakeJudgingClient implements JudgingClient {
  readonly requests: JudgeRequest[] = [];

  constructor(private readonly respond: (request: JudgeRequest) => unknown) {}

  async complete(request: JudgeRequest): Promise<unknown> {
    this.requests.push(request);
    return this.respond(request);
  }
}

export const SELLER = { role: 'SELLER', bound: 600, ideal: 750 } as const;
export const BUYER = { role: 'BUYER', bound: 800, ideal: 650 } as const;

/** Build a transcript turn the way the executor would. */
export function makeTurn(round: number, speaker: Speaker, message: string): Turn {
  return {
    round,
    speaker,
    agent_id: `Agent ${speaker}`,
    role: speaker === 'A' ? 'SELLER' : 'BUYER',
    persona: 'None',
    message,
    offer: extractOffer(message),
  };
}

import { describe, it, expect, vi } from 'vitest';
import { NegotiationAgent } from '../src/agent/agent-state.js';
import { GenerationError } from '../src/errors.js';
import { silentLogger } from '../src/logger.js';
import { executeRound } from '../src/round/executor.js';
import type { NegotiationSession } from '../src/session/types.js';
import { BUYER, SELLER, ScriptedGenerator } from './fakes.js';

function makeSession(overrides?: Partial<NegotiationSession>): NegotiationSession {
  return {
    session_id: 'sess-1',
    status: 'IN_PROGRESS',
    max_rounds: 10,
    current_round: 0,
    turns: [],
    checks: [],
    failure_reason: null,
    created_at: 1,
    updated_at: 1,
    ...overrides,
  };
}

function makePair(scriptA: Array<string | Error>, scriptB: Array<string | Error>) {
  const genA = new ScriptedGenerator(scriptA);
  const genB = new ScriptedGenerator(scriptB);
  const agents = [
    new NegotiationAgent({ speaker: 'A', constraints: SELLER, generator: genA }),
    new NegotiationAgent({ speaker: 'B', constraints: BUYER, generator: genB }),
  ] as const;
  return { agents, genA, genB };
}

describe('executeRound', () => {
  it('records one turn per agent in speaking order', async () => {
    const { agents, genB } = makePair(['Asking $780.'], ['I can offer $650.']);
    const session = makeSession();

    const result = await executeRound(session, agents, 1, silentLogger());

    expect(result.failure).toBeUndefined();
    expect(result.session.current_round).toBe(1);
    expect(result.session.turns).toEqual([
      { round: 1, speaker: 'A', agent_id: 'Agent A', role: 'SELLER', persona: 'None', message: 'Asking $780.', offer: 780 },
      { round: 1, speaker: 'B', agent_id: 'Agent B', role: 'BUYER', persona: 'None', message: 'I can offer $650.', offer: 650 },
    ]);
    expect(genB.contexts[0].transcript).toHaveLength(1);
    expect(genB.contexts[0].transcript[0].message).toBe('Asking $780.');
  });

  it('does not mutate the input session', async () => {
    const { agents } = makePair(['Asking $780.'], ['I can offer $650.']);
    const session = makeSession();

    const result = await executeRound(session, agents, 1, silentLogger());

    expect(result.session).not.toBe(session);
    expect(session.turns).toEqual([]);
    expect(session.current_round).toBe(0);
  });

  it('freezes recorded turns', async () => {
    const { agents } = makePair(['Asking $780.'], ['I can offer $650.']);

    const result = await executeRound(makeSession(), agents, 1, silentLogger());

    expect(Object.isFrozen(result.session.turns[0])).toBe(true);
  });

  it('stops the round on a non-recoverable generation failure', async () => {
    const fatal = new GenerationError('invalid api key', { recoverable: false });
    const { agents } = makePair(['Asking $780.'], [fatal]);

    const result = await executeRound(makeSession(), agents, 1, silentLogger());

    expect(result.failure).toBe('Agent B: invalid api key');
    expect(result.session.turns).toHaveLength(1);
    expect(result.session.turns[0].speaker).toBe('A');
  });

  it('records an unparseable turn for a recoverable failure and continues', async () => {
    const logger = silentLogger();
    const warn = vi.spyOn(logger, 'warn');
    const { agents } = makePair([new Error('socket hang up')], ['I can offer $650.']);

    const result = await executeRound(makeSession(), agents, 1, logger);

    expect(result.failure).toBeUndefined();
    expect(result.session.turns[0]).toEqual({
      round: 1,
      speaker: 'A',
      agent_id: 'Agent A',
      role: 'SELLER',
      persona: 'None',
      message: '',
      offer: null,
      error: 'socket hang up',
    });
    expect(result.session.turns[1].offer).toBe(650);
    expect(warn).toHaveBeenCalledWith(
      { session_id: 'sess-1', round: 1, agent_id: 'Agent A', error: 'socket hang up' },
      'unparseable turn',
    );
  });

  it('treats blank text as an unparseable turn', async () => {
    const { agents } = makePair(['Asking $780.'], ['   ']);

    const result = await executeRound(makeSession(), agents, 1, silentLogger());

    expect(result.session.turns[1].error).toBe('empty response');
    expect(result.session.turns[1].offer).toBeNull();
  });

  it('reports each turn as it is appended', async () => {
    const { agents } = makePair(['Asking $780.'], [new Error('socket hang up')]);
    const seen: Array<[string, number | null, string | undefined]> = [];

    await executeRound(makeSession(), agents, 1, silentLogger(), (turn) => {
      seen.push([turn.speaker, turn.offer, turn.error]);
    });

    expect(seen).toEqual([
      ['A', 780, undefined],
      ['B', null, 'socket hang up'],
    ]);
  });

  it('logs a walked-back concession', async () => {
    const logger = silentLogger();
    const warn = vi.spyOn(logger, 'warn');
    const { agents } = makePair(['Asking $780.', 'Now $800.'], ['I can offer $650.', 'How about $700?']);

    const first = await executeRound(makeSession(), agents, 1, logger);
    const second = await executeRound(first.session, agents, 2, logger);

    expect(second.session.turns).toHaveLength(4);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      { session_id: 'sess-1', agent_id: 'Agent A', round: 2, previous_offer: 780, offer: 800 },
      'offer walked back an earlier concession',
    );
  });
});

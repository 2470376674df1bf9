import { describe, it, expect } from 'vitest';
import { MemoryHistoryStore } from '../../history/memoryHistoryStore.js';
import { RedisHistoryStore } from '../../history/redisHistoryStore.js';
import { SessionRegistry } from '../../session/sessionRegistry.js';
import { FakeRedis } from '../../testing/fakeRedis.js';
import { makeRound } from '../../testing/fixtures.js';
import { INVALID_ACTION_MESSAGE, applySessionAction, buildSessionReport, parseSessionQuery } from './session.js';

const TS = '2026-01-01T00:00:00.000Z';
const NO_FLAGS = { detail: false, prompts: false, responses: false, easterEggs: false };

function sequentialSessions(): SessionRegistry {
  let n = 0;
  return new SessionRegistry(() => `session-${++n}`);
}

async function seed(history: MemoryHistoryStore | RedisHistoryStore, sessionId: string, rounds: number): Promise<void> {
  for (let i = 1; i <= rounds; i++) {
    await history.appendPromptLog(sessionId, {
      round_number: i,
      prompt: 'BASE',
      history_context: null,
      full_prompt: `BASE ${i}`,
      is_easter_egg_set: i % 3 === 0,
      timestamp: TS,
    });
    await history.appendResponseLog(sessionId, { round_number: i, response: `reply ${i}`, timestamp: TS });
    await history.append(sessionId, makeRound(i));
  }
}

describe('parseSessionQuery', () => {
  it('only treats "true" as set', () => {
    expect(parseSessionQuery({ detail: 'TRUE', prompts: '1', responses: 'true', easter_eggs: ['true'] })).toEqual({
      detail: true,
      prompts: false,
      responses: true,
      easterEggs: false,
    });
  });
});

describe('buildSessionReport', () => {
  it('summarises the current session', async () => {
    const deps = { sessions: sequentialSessions(), history: new MemoryHistoryStore() };
    await seed(deps.history, 'session-1', 2);

    const report = await buildSessionReport(deps, NO_FLAGS);
    expect(report).toEqual({
      session_id: 'session-1',
      round_count: 2,
      rounds_in_history: 2,
      session_started_at: deps.sessions.startedAt(),
      using_persisted_backend: false,
    });
  });

  it('filters easter-egg rounds by round number on the in-memory backend', async () => {
    const deps = { sessions: sequentialSessions(), history: new MemoryHistoryStore() };
    await seed(deps.history, 'session-1', 4);

    const report = await buildSessionReport(deps, { ...NO_FLAGS, detail: true, easterEggs: true, prompts: true });
    expect(report.rounds).toEqual([makeRound(3)]);
    expect(report.prompts).toBeUndefined();
  });

  it('uses the prompt logs on the persisted backend', async () => {
    const history = new RedisHistoryStore(new FakeRedis(), new MemoryHistoryStore());
    const deps = { sessions: sequentialSessions(), history };
    await seed(history, 'session-1', 6);

    const report = await buildSessionReport(deps, { detail: true, prompts: true, responses: true, easterEggs: true });
    expect(report.using_persisted_backend).toBe(true);
    expect(report.rounds).toEqual([makeRound(6), makeRound(3)]);
    expect(report.prompts?.map(p => p.round_number)).toEqual([6, 3]);
    expect(report.responses?.map(r => r.response)).toEqual(['reply 6', 'reply 3']);
  });

  it('lists every log entry without the easter-egg filter', async () => {
    const history = new RedisHistoryStore(new FakeRedis(), new MemoryHistoryStore());
    const deps = { sessions: sequentialSessions(), history };
    await seed(history, 'session-1', 2);

    const report = await buildSessionReport(deps, { ...NO_FLAGS, responses: true });
    expect(report.responses?.map(r => r.round_number)).toEqual([2, 1]);
    expect(report.rounds).toBeUndefined();
  });
});

describe('applySessionAction', () => {
  it('reset clears the current session and keeps its id', async () => {
    const deps = { sessions: sequentialSessions(), history: new MemoryHistoryStore() };
    await seed(deps.history, 'session-1', 2);

    expect(await applySessionAction(deps, { action: 'reset' })).toEqual({
      status: 200,
      body: { message: 'Session reset. Cleared 2 rounds.' },
    });
    expect(deps.sessions.current()).toBe('session-1');
    expect((await deps.history.get('session-1')).roundCount).toBe(0);
    expect(deps.sessions.epoch()).toBe(1);
  });

  it('new switches to a fresh session and leaves the old history alone', async () => {
    const deps = { sessions: sequentialSessions(), history: new MemoryHistoryStore() };
    const oldId = deps.sessions.current();
    await seed(deps.history, oldId, 1);

    expect(await applySessionAction(deps, { action: 'new' })).toEqual({
      status: 200,
      body: { message: 'New session created', session_id: 'session-2' },
    });
    expect(deps.sessions.current()).not.toBe(oldId);
    expect((await deps.history.get(oldId)).roundCount).toBe(1);
    expect((await deps.history.get('session-2')).roundCount).toBe(0);
  });

  it('rejects anything else', async () => {
    const deps = { sessions: sequentialSessions(), history: new MemoryHistoryStore() };
    for (const body of [{ action: 'bogus' }, {}, undefined, 'reset']) {
      expect(await applySessionAction(deps, body)).toEqual({ status: 400, body: { error: INVALID_ACTION_MESSAGE } });
    }
  });
});

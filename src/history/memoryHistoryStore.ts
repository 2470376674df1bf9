import { MAX_HISTORY } from '../config/index.js';
import type { History, PromptLogEntry, ResponseLogEntry, Round } from '../domain/round.js';
import { RingBuffer } from '../utils/ringBuffer.js';
import { logger } from '../utils/logger.js';
import type { HistoryStore } from './types.js';

type SessionRecord = {
  roundCount: number;
  rounds: RingBuffer<Round>;
};

/**
 * Process-local history. Used alone when no Redis is configured and as the
 * fallback for a failing Redis. Every method body is synchronous, so each
 * operation is one critical section on the event loop.
 *
 * Prompt and response logs are only kept by the persisted backend.
 */
export class MemoryHistoryStore implements HistoryStore {
  readonly usingPersistedBackend = false;
  private sessions = new Map<string, SessionRecord>();

  constructor(private readonly capacity: number = MAX_HISTORY) {}

  private record(sessionId: string): SessionRecord {
    let rec = this.sessions.get(sessionId);
    if (!rec) {
      rec = { roundCount: 0, rounds: new RingBuffer<Round>(this.capacity) };
      this.sessions.set(sessionId, rec);
    }
    return rec;
  }

  async get(sessionId: string): Promise<History> {
    const rec = this.record(sessionId);
    return { roundCount: rec.roundCount, rounds: rec.rounds.newestFirst() };
  }

  async append(sessionId: string, round: Round): Promise<void> {
    const rec = this.record(sessionId);
    rec.roundCount += 1;
    rec.rounds.push(round);
    logger.info('history_appended', {
      backend: 'memory',
      sessionId,
      roundCount: rec.roundCount,
      historySize: rec.rounds.length,
    });
  }

  async reset(sessionId: string): Promise<number> {
    const rec = this.record(sessionId);
    const cleared = rec.roundCount;
    rec.roundCount = 0;
    rec.rounds.clear();
    return cleared;
  }

  async appendPromptLog(_sessionId: string, _entry: PromptLogEntry): Promise<void> {}

  async appendResponseLog(_sessionId: string, _entry: ResponseLogEntry): Promise<void> {}

  async listPromptLogs(_sessionId: string): Promise<PromptLogEntry[]> {
    return [];
  }

  async listResponseLogs(_sessionId: string): Promise<ResponseLogEntry[]> {
    return [];
  }
}

import type { History, PromptLogEntry, ResponseLogEntry, Round } from '../domain/round.js';

/**
 * Per-session round history. Implementations never throw from get/append/reset:
 * a failing backend is absorbed by the process-local fallback.
 */
export interface HistoryStore {
  readonly usingPersistedBackend: boolean;

  get(sessionId: string): Promise<History>;
  append(sessionId: string, round: Round): Promise<void>;
  /** Returns the round count that was cleared. */
  reset(sessionId: string): Promise<number>;

  appendPromptLog(sessionId: string, entry: PromptLogEntry): Promise<void>;
  appendResponseLog(sessionId: string, entry: ResponseLogEntry): Promise<void>;
  /** Most recent first. */
  listPromptLogs(sessionId: string): Promise<PromptLogEntry[]>;
  /** Most recent first. */
  listResponseLogs(sessionId: string): Promise<ResponseLogEntry[]>;
}

/** The subset of Redis commands the persisted history uses. */
export interface KeyValueClient {
  hgetall(key: string): Promise<Record<string, string>>;
  hget(key: string, field: string): Promise<string | null>;
  hset(key: string, field: string, value: string | number): Promise<number>;
  hincrby(key: string, field: string, increment: number): Promise<number>;
  expire(key: string, seconds: number): Promise<number>;
  lpush(key: string, value: string): Promise<number>;
  ltrim(key: string, start: number, stop: number): Promise<unknown>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  del(...keys: string[]): Promise<number>;
  ping(): Promise<string>;
}

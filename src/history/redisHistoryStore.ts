import type { ZodType, ZodTypeDef } from 'zod';
import { MAX_HISTORY, SESSION_EXPIRY_SECONDS } from '../config/index.js';
import {
  PromptLogEntrySchema,
  ResponseLogEntrySchema,
  RoundStatementsSchema,
  type History,
  type PromptLogEntry,
  type ResponseLogEntry,
  type Round,
} from '../domain/round.js';
import { logger } from '../utils/logger.js';
import type { HistoryStore, KeyValueClient } from './types.js';

const SESSION_PREFIX = 'twotruths:session:';
const STATEMENTS_PREFIX = 'twotruths:statements:';

export function sessionKeys(sessionId: string): {
  session: string;
  statements: string;
  prompts: string;
  responses: string;
} {
  return {
    session: `${SESSION_PREFIX}${sessionId}`,
    statements: `${STATEMENTS_PREFIX}${sessionId}`,
    prompts: `${SESSION_PREFIX}${sessionId}:prompts`,
    responses: `${SESSION_PREFIX}${sessionId}:responses`,
  };
}

type RedisHistoryStoreOptions = {
  maxHistory?: number;
  expirySeconds?: number;
};

/**
 * Redis-backed history with a process-local fallback.
 *
 * A failed command sends that operation to the fallback and nothing reconciles
 * the two afterwards: whatever was written there stays there.
 */
export class RedisHistoryStore implements HistoryStore {
  readonly usingPersistedBackend = true;
  private readonly maxHistory: number;
  private readonly expirySeconds: number;

  constructor(
    private readonly client: KeyValueClient,
    private readonly fallback: HistoryStore,
    opts: RedisHistoryStoreOptions = {}
  ) {
    this.maxHistory = opts.maxHistory ?? MAX_HISTORY;
    this.expirySeconds = opts.expirySeconds ?? SESSION_EXPIRY_SECONDS;
  }

  async get(sessionId: string): Promise<History> {
    const keys = sessionKeys(sessionId);
    try {
      const meta = await this.client.hgetall(keys.session);
      if (Object.keys(meta).length === 0) {
        await this.client.hset(keys.session, 'round_count', 0);
        await this.client.expire(keys.session, this.expirySeconds);
      }

      const raw = await this.client.lrange(keys.statements, 0, this.maxHistory - 1);
      const rounds = this.decodeAll(raw, RoundStatementsSchema, 'round', sessionId);
      return { roundCount: parseCount(meta.round_count), rounds };
    } catch (err) {
      logger.warn('history_backend_unavailable', { op: 'get', sessionId, err: String(err) });
      return this.fallback.get(sessionId);
    }
  }

  async append(sessionId: string, round: Round): Promise<void> {
    const keys = sessionKeys(sessionId);
    try {
      const roundCount = await this.client.hincrby(keys.session, 'round_count', 1);
      await this.client.expire(keys.session, this.expirySeconds);

      const pushed = await this.client.lpush(keys.statements, JSON.stringify(round));
      await this.client.ltrim(keys.statements, 0, this.maxHistory - 1);
      await this.client.expire(keys.statements, this.expirySeconds);

      logger.info('history_appended', {
        backend: 'redis',
        sessionId,
        roundCount,
        historySize: Math.min(pushed, this.maxHistory),
      });
    } catch (err) {
      logger.warn('history_backend_unavailable', { op: 'append', sessionId, err: String(err) });
      await this.fallback.append(sessionId, round);
    }
  }

  async reset(sessionId: string): Promise<number> {
    const keys = sessionKeys(sessionId);
    try {
      const cleared = parseCount(await this.client.hget(keys.session, 'round_count'));
      await this.client.del(keys.session, keys.statements, keys.prompts, keys.responses);
      await this.client.hset(keys.session, 'round_count', 0);
      await this.client.expire(keys.session, this.expirySeconds);
      logger.info('history_reset', { backend: 'redis', sessionId, cleared });
      return cleared;
    } catch (err) {
      logger.warn('history_backend_unavailable', { op: 'reset', sessionId, err: String(err) });
      return this.fallback.reset(sessionId);
    }
  }

  async appendPromptLog(sessionId: string, entry: PromptLogEntry): Promise<void> {
    await this.pushLog(sessionKeys(sessionId).prompts, entry, 'prompt', sessionId);
  }

  async appendResponseLog(sessionId: string, entry: ResponseLogEntry): Promise<void> {
    await this.pushLog(sessionKeys(sessionId).responses, entry, 'response', sessionId);
  }

  async listPromptLogs(sessionId: string): Promise<PromptLogEntry[]> {
    return this.readLog(sessionKeys(sessionId).prompts, PromptLogEntrySchema, 'prompt', sessionId);
  }

  async listResponseLogs(sessionId: string): Promise<ResponseLogEntry[]> {
    return this.readLog(sessionKeys(sessionId).responses, ResponseLogEntrySchema, 'response', sessionId);
  }

  private async pushLog(key: string, entry: unknown, kind: string, sessionId: string): Promise<void> {
    try {
      await this.client.lpush(key, JSON.stringify(entry));
      await this.client.ltrim(key, 0, this.maxHistory - 1);
      await this.client.expire(key, this.expirySeconds);
    } catch (err) {
      logger.error('generation_log_store_failed', { kind, sessionId, err: String(err) });
    }
  }

  private async readLog<T>(
    key: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    kind: string,
    sessionId: string
  ): Promise<T[]> {
    try {
      const raw = await this.client.lrange(key, 0, this.maxHistory - 1);
      return this.decodeAll(raw, schema, kind, sessionId);
    } catch (err) {
      logger.error('generation_log_read_failed', { kind, sessionId, err: String(err) });
      return [];
    }
  }

  private decodeAll<T>(raw: string[], schema: ZodType<T, ZodTypeDef, unknown>, kind: string, sessionId: string): T[] {
    const out: T[] = [];
    for (const item of raw) {
      let json: unknown;
      try {
        json = JSON.parse(item);
      } catch {
        logger.error('history_entry_undecodable', { kind, sessionId, entry: item.slice(0, 120) });
        continue;
      }
      const parsed = schema.safeParse(json);
      if (parsed.success) out.push(parsed.data);
      else logger.error('history_entry_invalid', { kind, sessionId, issues: parsed.error.issues.length });
    }
    return out;
  }
}

function parseCount(v: string | null | undefined): number {
  const n = Number(v ?? 0);
  return Number.isInteger(n) && n >= 0 ? n : 0;
}

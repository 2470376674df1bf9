import { z } from 'zod';
import { isEasterEggRound, type PromptLogEntry, type ResponseLogEntry, type Round } from '../../domain/round.js';
import type { HistoryStore } from '../../history/types.js';
import type { SessionRegistry } from '../../session/sessionRegistry.js';
import { logger } from '../../utils/logger.js';

export type SessionQuery = {
  detail: boolean;
  prompts: boolean;
  responses: boolean;
  easterEggs: boolean;
};

export type SessionReport = {
  session_id: string;
  round_count: number;
  rounds_in_history: number;
  session_started_at: string;
  using_persisted_backend: boolean;
  rounds?: Round[];
  prompts?: PromptLogEntry[];
  responses?: ResponseLogEntry[];
};

type SessionDeps = {
  sessions: SessionRegistry;
  history: HistoryStore;
};

function isTrue(v: unknown): boolean {
  return typeof v === 'string' && v.toLowerCase() === 'true';
}

export function parseSessionQuery(query: Record<string, unknown>): SessionQuery {
  return {
    detail: isTrue(query.detail),
    prompts: isTrue(query.prompts),
    responses: isTrue(query.responses),
    easterEggs: isTrue(query.easter_eggs),
  };
}

export async function buildSessionReport(deps: SessionDeps, q: SessionQuery): Promise<SessionReport> {
  const sessionId = deps.sessions.current();
  const history = await deps.history.get(sessionId);

  const report: SessionReport = {
    session_id: sessionId,
    round_count: history.roundCount,
    rounds_in_history: history.rounds.length,
    session_started_at: deps.sessions.startedAt(),
    using_persisted_backend: deps.history.usingPersistedBackend,
  };

  const wantsLogs = q.prompts || q.responses;
  const prompts = (q.easterEggs || wantsLogs) && deps.history.usingPersistedBackend
    ? await deps.history.listPromptLogs(sessionId)
    : [];

  // Prompt logs record which rounds asked for an easter egg; without them the round number decides.
  const eggRounds = deps.history.usingPersistedBackend
    ? new Set(prompts.filter(p => p.is_easter_egg_set).map(p => p.round_number))
    : undefined;
  const isEggRound = (roundNumber: number): boolean => eggRounds?.has(roundNumber) ?? isEasterEggRound(roundNumber);

  if (q.detail) {
    report.rounds = q.easterEggs
      ? history.rounds.filter((_round, i) => isEggRound(history.roundCount - i))
      : history.rounds;
  }

  if (q.prompts && deps.history.usingPersistedBackend) {
    report.prompts = q.easterEggs ? prompts.filter(p => p.is_easter_egg_set) : prompts;
  }

  if (q.responses && deps.history.usingPersistedBackend) {
    const responses = await deps.history.listResponseLogs(sessionId);
    report.responses = q.easterEggs ? responses.filter(r => isEggRound(r.round_number)) : responses;
  }

  return report;
}

const SessionActionSchema = z.object({
  action: z.enum(['reset', 'new']),
});

export const INVALID_ACTION_MESSAGE =
  "Invalid action. Use 'reset' to clear session history or 'new' to create a new session.";

export type SessionActionOutcome =
  | { status: 200; body: { message: string; session_id?: string } }
  | { status: 400; body: { error: string } };

export async function applySessionAction(deps: SessionDeps, body: unknown): Promise<SessionActionOutcome> {
  const parsed = SessionActionSchema.safeParse(body);
  if (!parsed.success) {
    logger.warn('session_action_invalid', { issues: parsed.error.issues.length });
    return { status: 400, body: { error: INVALID_ACTION_MESSAGE } };
  }

  if (parsed.data.action === 'reset') {
    const sessionId = deps.sessions.current();
    const cleared = await deps.history.reset(sessionId);
    deps.sessions.markReset();
    logger.info('session_reset', { sessionId, cleared });
    return { status: 200, body: { message: `Session reset. Cleared ${cleared} rounds.` } };
  }

  const sessionId = deps.sessions.renew();
  return { status: 200, body: { message: 'New session created', session_id: sessionId } };
}

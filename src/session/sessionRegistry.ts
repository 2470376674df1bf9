import { v4 as uuidv4 } from 'uuid';
import { logger } from '../utils/logger.js';

/**
 * The process has one active game session at a time. Its id is created on
 * first use and only changes through renew().
 *
 * epoch() moves on every renew() and markReset(); anything computed against
 * an older epoch (a preloaded round) no longer belongs to the session.
 */
export class SessionRegistry {
  private currentId: string | undefined;
  private startedAtMs: number | undefined;
  private epochCount = 0;

  constructor(private readonly newId: () => string = uuidv4) {}

  current(): string {
    if (!this.currentId) {
      this.currentId = this.newId();
      this.startedAtMs = Date.now();
      logger.info('session_created', { sessionId: this.currentId });
    }
    return this.currentId;
  }

  renew(): string {
    const previous = this.currentId;
    this.currentId = this.newId();
    this.epochCount += 1;
    this.startedAtMs = Date.now();
    logger.info('session_renewed', { sessionId: this.currentId, previous });
    return this.currentId;
  }

  /** The current session's history was cleared. */
  markReset(): void {
    this.epochCount += 1;
  }

  epoch(): number {
    return this.epochCount;
  }

  /** ISO timestamp of when the current id was issued. */
  startedAt(): string {
    this.current();
    return new Date(this.startedAtMs ?? Date.now()).toISOString();
  }
}

import type { BroadcastHub } from '../broadcast/hub.js';
import { toGenerationError } from '../generator/errors.js';
import type { GenerationResult, RoundGenerator } from '../generator/roundGenerator.js';
import type { SessionRegistry } from '../session/sessionRegistry.js';
import { logger } from '../utils/logger.js';
import { PreloadSlot, RoundRequestFlag } from './state.js';

export type SchedulerPhase = 'Idle' | 'RequestPending' | 'Generating' | 'Preloading';

type RoundSchedulerDeps = {
  generator: Pick<RoundGenerator, 'generate'>;
  hub: Pick<BroadcastHub, 'publish'>;
  sessions: Pick<SessionRegistry, 'current' | 'epoch'>;
  requestFlag?: RoundRequestFlag;
  preload?: PreloadSlot;
  pollIntervalMs?: number;
};

type SchedulerCounters = {
  roundsServed: number;
  servedFromPreload: number;
  errorsReported: number;
  preloadsStarted: number;
  preloadsFailed: number;
};

export type SchedulerStatus = SchedulerCounters & {
  running: boolean;
  phase: SchedulerPhase;
  requestPending: boolean;
  preloadCached: boolean;
  preloading: boolean;
  lastTickAt?: number;
  lastError?: string;
};

/**
 * The single background worker. Each tick either serves a pending round
 * request (preloaded round first, synchronous generation otherwise) or, when
 * idle, keeps one preloaded round ready.
 */
export class RoundScheduler {
  private readonly flag: RoundRequestFlag;
  private readonly preload: PreloadSlot;
  private readonly pollIntervalMs: number;

  private running = false;
  private loopDone: Promise<void> | undefined;
  private sleepTimer: ReturnType<typeof setTimeout> | undefined;
  private wakeUp: (() => void) | undefined;

  private serving: 'RequestPending' | 'Generating' | undefined;
  private lastTickAt: number | undefined;
  private lastError: string | undefined;
  private counters: SchedulerCounters = {
    roundsServed: 0,
    servedFromPreload: 0,
    errorsReported: 0,
    preloadsStarted: 0,
    preloadsFailed: 0,
  };

  constructor(private readonly deps: RoundSchedulerDeps) {
    this.flag = deps.requestFlag ?? new RoundRequestFlag();
    this.preload = deps.preload ?? new PreloadSlot();
    this.pollIntervalMs = deps.pollIntervalMs ?? 500;
  }

  /** Flags a round request. False when one is already pending (nothing new is started). */
  requestRound(): boolean {
    const accepted = this.flag.trySet();
    if (accepted) this.wake();
    return accepted;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    logger.info('scheduler_started', { pollIntervalMs: this.pollIntervalMs });
    this.loopDone = this.loop();
  }

  /** Stops polling after the current tick. An in-flight preload is left to finish on its own. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.wake();
    await this.loopDone;
    logger.info('scheduler_stopped');
  }

  getStatus(): SchedulerStatus {
    return {
      ...this.counters,
      running: this.running,
      phase: this.phase(),
      requestPending: this.flag.isSet(),
      preloadCached: this.preload.hasCached(),
      preloading: this.preload.isPreloading(),
      lastTickAt: this.lastTickAt,
      lastError: this.lastError,
    };
  }

  /** Resolves once no preload is running. */
  async whenPreloadSettled(): Promise<void> {
    let p = this.preload.pending();
    while (p) {
      await p;
      p = this.preload.pending();
    }
  }

  /** One pass of the worker loop. */
  async tick(): Promise<void> {
    this.lastTickAt = Date.now();
    if (this.flag.isSet()) {
      await this.serveRequest();
    } else {
      this.maybeStartPreload('idle');
    }
  }

  private phase(): SchedulerPhase {
    if (this.serving) return this.serving;
    if (this.flag.isSet()) return 'RequestPending';
    if (this.preload.isPreloading()) return 'Preloading';
    return 'Idle';
  }

  private async loop(): Promise<void> {
    while (this.running) {
      try {
        await this.tick();
      } catch (err) {
        logger.error('scheduler_tick_failed', { err: String(err) });
      }
      if (this.running) await this.sleep();
    }
  }

  private sleep(): Promise<void> {
    return new Promise<void>(resolve => {
      const done = () => {
        if (this.sleepTimer) clearTimeout(this.sleepTimer);
        this.sleepTimer = undefined;
        this.wakeUp = undefined;
        resolve();
      };
      this.wakeUp = done;
      this.sleepTimer = setTimeout(done, this.pollIntervalMs);
    });
  }

  private wake(): void {
    this.wakeUp?.();
  }

  private async serveRequest(): Promise<void> {
    this.serving = 'RequestPending';
    const start = Date.now();
    try {
      let result: GenerationResult | undefined;
      let fromPreload = false;

      let cached = this.preload.take();
      if (!cached) {
        const running = this.preload.pending();
        if (running) {
          logger.info('round_request_waiting_for_preload');
          const preloaded = await running;
          cached = this.preload.take();
          if (!cached && !preloaded.ok) {
            logger.warn('preloaded_round_failed_falling_back', { kind: preloaded.error.kind });
          }
        }
      }

      // A preload made before a session change was recorded in the old history.
      const { sessions } = this.deps;
      if (cached && (cached.sessionId !== sessions.current() || cached.epoch !== sessions.epoch())) {
        logger.info('preloaded_round_discarded', {
          reason: 'session_changed',
          preloadedFor: cached.sessionId,
          roundNumber: cached.roundNumber,
        });
        cached = undefined;
      }

      if (cached) {
        result = { ok: true, round: cached.round, roundNumber: cached.roundNumber };
        fromPreload = true;
      } else {
        this.serving = 'Generating';
        result = await this.safeGenerate('request', this.deps.sessions.current());
      }

      if (result.ok) {
        this.deps.hub.publish('new_round', { statements: result.round, roundNumber: result.roundNumber });
        this.counters.roundsServed += 1;
        if (fromPreload) this.counters.servedFromPreload += 1;
        this.lastError = undefined;
        logger.info('round_served', { roundNumber: result.roundNumber, fromPreload, elapsedMs: Date.now() - start });
      } else {
        this.deps.hub.publish('error', { message: result.error.message });
        this.counters.errorsReported += 1;
        this.lastError = result.error.message;
        logger.warn('round_request_failed', { kind: result.error.kind, elapsedMs: Date.now() - start });
      }

      // Cleared only after the broadcast, so a trigger during generation sees "already pending".
      this.flag.clear();

      if (result.ok) this.maybeStartPreload('after_round');
    } finally {
      this.serving = undefined;
    }
  }

  private maybeStartPreload(reason: 'idle' | 'after_round'): void {
    const sessionId = this.deps.sessions.current();
    const owner = { sessionId, epoch: this.deps.sessions.epoch() };
    const started = this.preload.tryStart(owner, () => this.safeGenerate('preload', sessionId));
    if (!started) return;

    this.counters.preloadsStarted += 1;
    logger.info('preload_started', { reason, sessionId });
    started
      .then(result => {
        if (result.ok) {
          logger.info('preload_ready', { roundNumber: result.roundNumber });
        } else {
          this.counters.preloadsFailed += 1;
          logger.warn('preload_failed', { kind: result.error.kind, err: result.error.message });
        }
      })
      .catch(err => {
        this.counters.preloadsFailed += 1;
        logger.error('preload_threw', { err: String(err) });
      });
  }

  private async safeGenerate(purpose: 'request' | 'preload', sessionId: string): Promise<GenerationResult> {
    try {
      return await this.deps.generator.generate(sessionId);
    } catch (err) {
      logger.error('round_generation_threw', { purpose, err: String(err) });
      return { ok: false, error: toGenerationError(err) };
    }
  }
}

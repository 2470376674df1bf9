import type { Round } from '../domain/round.js';
import type { GenerationResult } from '../generator/roundGenerator.js';

/**
 * "A round has been requested" flag. Each method is a single synchronous step
 * on the event loop, so check-and-set cannot interleave with another caller.
 */
export class RoundRequestFlag {
  private pending = false;

  /** Sets the flag. False when a request was already pending. */
  trySet(): boolean {
    if (this.pending) return false;
    this.pending = true;
    return true;
  }

  isSet(): boolean {
    return this.pending;
  }

  clear(): void {
    this.pending = false;
  }
}

export type PreloadedRound = {
  round: Round;
  roundNumber: number;
  sessionId: string;
  /** SessionRegistry epoch the round was generated under. */
  epoch: number;
  preparedAt: number;
};

/**
 * Holds at most one precomputed round and the one preload allowed in flight.
 * A failed preload leaves the slot empty so the next idle check retries.
 */
export class PreloadSlot {
  private cached: PreloadedRound | undefined;
  private inFlight: Promise<GenerationResult> | undefined;

  hasCached(): boolean {
    return this.cached !== undefined;
  }

  isPreloading(): boolean {
    return this.inFlight !== undefined;
  }

  /** Removes and returns the cached round. */
  take(): PreloadedRound | undefined {
    const c = this.cached;
    this.cached = undefined;
    return c;
  }

  /** The running preload, if any; settles after the slot is updated. */
  pending(): Promise<GenerationResult> | undefined {
    return this.inFlight;
  }

  /**
   * Check-and-set: starts `run` only when nothing is cached and nothing is in
   * flight. Returns undefined (a no-op) otherwise. `run` must not reject.
   */
  tryStart(
    owner: { sessionId: string; epoch: number },
    run: () => Promise<GenerationResult>
  ): Promise<GenerationResult> | undefined {
    if (this.cached || this.inFlight) return undefined;

    const p = run()
      .then(result => {
        if (result.ok) {
          this.cached = { round: result.round, roundNumber: result.roundNumber, ...owner, preparedAt: Date.now() };
        }
        return result;
      })
      .finally(() => {
        this.inFlight = undefined;
      });
    this.inFlight = p;
    return p;
  }
}

export type ChannelReceive =
  | { kind: 'event'; frame: string }
  | { kind: 'timeout' }
  | { kind: 'aborted' }
  | { kind: 'closed' };

type Waiter = {
  resolve: (r: ChannelReceive) => void;
  timer: ReturnType<typeof setTimeout>;
  signal?: AbortSignal;
  onAbort?: () => void;
};

/**
 * Unbounded FIFO of formatted frames with a single consumer.
 * Producers never block; the consumer waits with a timeout.
 */
export class EventChannel {
  private queue: string[] = [];
  private waiter: Waiter | undefined;
  private closed = false;

  get pending(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(frame: string): void {
    if (this.closed) throw new Error('channel closed');
    const w = this.takeWaiter();
    if (w) w.resolve({ kind: 'event', frame });
    else this.queue.push(frame);
  }

  /** Waits up to `timeoutMs` for the next frame. */
  next(timeoutMs: number, signal?: AbortSignal): Promise<ChannelReceive> {
    const frame = this.queue.shift();
    if (frame !== undefined) return Promise.resolve({ kind: 'event', frame });
    if (this.closed) return Promise.resolve({ kind: 'closed' });
    if (signal?.aborted) return Promise.resolve({ kind: 'aborted' });
    if (this.waiter) return Promise.reject(new Error('channel already has a consumer'));

    return new Promise<ChannelReceive>(resolve => {
      const waiter: Waiter = {
        resolve,
        signal,
        timer: setTimeout(() => {
          if (this.takeWaiter() === waiter) resolve({ kind: 'timeout' });
        }, timeoutMs),
      };
      if (signal) {
        waiter.onAbort = () => {
          if (this.takeWaiter() === waiter) resolve({ kind: 'aborted' });
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }
      this.waiter = waiter;
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.queue = [];
    this.takeWaiter()?.resolve({ kind: 'closed' });
  }

  private takeWaiter(): Waiter | undefined {
    const w = this.waiter;
    if (!w) return undefined;
    this.waiter = undefined;
    clearTimeout(w.timer);
    if (w.onAbort) w.signal?.removeEventListener('abort', w.onAbort);
    return w;
  }
}

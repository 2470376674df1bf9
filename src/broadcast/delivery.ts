import { logger } from '../utils/logger.js';
import { KEEP_ALIVE_FRAME, type BroadcastHub, type Subscription } from './hub.js';

/** Where frames go; an Express response in production. */
export interface FrameSink {
  write(frame: string): unknown;
}

export type DeliveryExit = 'aborted' | 'closed' | 'write_failed';

/**
 * Forwards one subscriber's events to its sink until the consumer goes away.
 * Idle waits longer than keepAliveMs produce a comment-only keep-alive frame.
 * The subscription is released on every exit path.
 */
export async function runDeliveryLoop(
  hub: BroadcastHub,
  sub: Subscription,
  sink: FrameSink,
  opts: { keepAliveMs: number; signal: AbortSignal }
): Promise<DeliveryExit> {
  let exit: DeliveryExit = 'aborted';
  try {
    while (!opts.signal.aborted) {
      const received = await sub.channel.next(opts.keepAliveMs, opts.signal);
      if (received.kind === 'aborted') break;
      if (received.kind === 'closed') {
        exit = 'closed';
        break;
      }

      try {
        sink.write(received.kind === 'timeout' ? KEEP_ALIVE_FRAME : received.frame);
      } catch (err) {
        logger.warn('subscriber_write_failed', { id: sub.id, err: String(err) });
        exit = 'write_failed';
        break;
      }
    }
    return exit;
  } finally {
    hub.unsubscribe(sub.id);
  }
}

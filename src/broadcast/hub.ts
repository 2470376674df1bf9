import { v4 as uuidv4 } from 'uuid';
import { logger } from '../utils/logger.js';
import { EventChannel } from './channel.js';

export type ErrorEvent = { type: 'error'; message: string };
export type PayloadEvent = { type: string; payload: unknown };
export type BroadcastEvent = ErrorEvent | PayloadEvent;

export const KEEP_ALIVE_FRAME = ': keep-alive\n\n';

/** One SSE frame: `data: <json>` followed by a blank line. */
export function formatEvent(event: BroadcastEvent | Record<string, unknown>): string {
  return `data: ${JSON.stringify(event)}\n\n`;
}

export function toEnvelope(eventType: string, payload: unknown): BroadcastEvent {
  if (eventType === 'error') {
    const message =
      typeof payload === 'object' && payload !== null && 'message' in payload && typeof payload.message === 'string'
        ? payload.message
        : 'Unknown error';
    return { type: 'error', message };
  }
  return { type: eventType, payload };
}

export type Subscription = { id: string; channel: EventChannel };

/**
 * Registry of open event streams. publish() walks a snapshot of the registry,
 * so subscribe/unsubscribe during a publish never touch the collection being walked.
 */
export class BroadcastHub {
  private subscribers = new Map<string, EventChannel>();

  constructor(private readonly newId: () => string = uuidv4) {}

  subscribe(): Subscription {
    const id = this.newId();
    const channel = new EventChannel();
    this.subscribers.set(id, channel);
    logger.info('subscriber_connected', { id, subscribers: this.subscribers.size });
    return { id, channel };
  }

  /** Idempotent; returns whether anything was removed. */
  unsubscribe(id: string): boolean {
    const channel = this.subscribers.get(id);
    if (!channel) return false;
    this.subscribers.delete(id);
    channel.close();
    logger.info('subscriber_disconnected', { id, subscribers: this.subscribers.size });
    return true;
  }

  size(): number {
    return this.subscribers.size;
  }

  /** Enqueues the event on every registered channel. Returns how many accepted it. */
  publish(eventType: string, payload: unknown): number {
    const envelope = toEnvelope(eventType, payload);
    const snapshot = Array.from(this.subscribers.entries());

    if (snapshot.length === 0) {
      logger.info('broadcast_no_subscribers', { type: envelope.type });
      return 0;
    }

    let delivered = 0;
    for (const [id, channel] of snapshot) {
      try {
        channel.push(formatEvent(envelope));
        delivered += 1;
      } catch (err) {
        logger.error('broadcast_subscriber_failed', { id, type: envelope.type, err: String(err) });
      }
    }

    logger.info('broadcast_sent', { type: envelope.type, delivered, subscribers: snapshot.length });
    return delivered;
  }

  /** Closes every channel; used at shutdown so delivery loops exit. */
  closeAll(): void {
    for (const id of Array.from(this.subscribers.keys())) this.unsubscribe(id);
  }
}

import { describe, it, expect } from 'vitest';
import { EventChannel } from './channel.js';

describe('EventChannel', () => {
  it('delivers queued frames in order', async () => {
    const ch = new EventChannel();
    ch.push('a');
    ch.push('b');
    expect(ch.pending).toBe(2);
    expect(await ch.next(100)).toEqual({ kind: 'event', frame: 'a' });
    expect(await ch.next(100)).toEqual({ kind: 'event', frame: 'b' });
  });

  it('hands a frame straight to a waiting consumer', async () => {
    const ch = new EventChannel();
    const pending = ch.next(1000);
    ch.push('x');
    expect(await pending).toEqual({ kind: 'event', frame: 'x' });
    expect(ch.pending).toBe(0);
  });

  it('times out when nothing arrives', async () => {
    const ch = new EventChannel();
    expect(await ch.next(5)).toEqual({ kind: 'timeout' });
  });

  it('wakes the consumer on abort', async () => {
    const ch = new EventChannel();
    const ac = new AbortController();
    const pending = ch.next(1000, ac.signal);
    ac.abort();
    expect(await pending).toEqual({ kind: 'aborted' });
  });

  it('wakes the consumer on close and rejects later pushes', async () => {
    const ch = new EventChannel();
    const pending = ch.next(1000);
    ch.close();
    expect(await pending).toEqual({ kind: 'closed' });
    expect(ch.isClosed).toBe(true);
    expect(() => ch.push('late')).toThrow('channel closed');
    expect(await ch.next(1000)).toEqual({ kind: 'closed' });
  });

  it('allows a single consumer', async () => {
    const ch = new EventChannel();
    const first = ch.next(1000);
    await expect(ch.next(1000)).rejects.toThrow('channel already has a consumer');
    ch.close();
    expect(await first).toEqual({ kind: 'closed' });
  });
});

import { describe, it, expect } from 'vitest';
import { RingBuffer } from './ringBuffer.js';

describe('RingBuffer', () => {
  it('rejects a non-positive capacity', () => {
    expect(() => new RingBuffer<number>(0)).toThrow('Invalid ring buffer capacity: 0');
  });

  it('reads newest first', () => {
    const rb = new RingBuffer<number>(5);
    rb.push(1);
    rb.push(2);
    rb.push(3);
    expect(rb.newestFirst()).toEqual([3, 2, 1]);
  });

  it('drops the oldest entry once full', () => {
    const rb = new RingBuffer<string>(2);
    rb.push('a');
    rb.push('b');
    rb.push('c');
    expect(rb.length).toBe(2);
    expect(rb.newestFirst()).toEqual(['c', 'b']);
  });

  it('clear empties the buffer and keeps its capacity', () => {
    const rb = new RingBuffer<number>(2);
    rb.push(1);
    rb.push(2);
    rb.clear();
    expect(rb.length).toBe(0);
    expect(rb.newestFirst()).toEqual([]);
    rb.push(7);
    rb.push(8);
    rb.push(9);
    expect(rb.newestFirst()).toEqual([9, 8]);
  });
});

/**
 * Fixed-capacity buffer that drops its oldest entry when full.
 * Backs the in-process session history, which reads newest-first.
 */
export class RingBuffer<T> {
  private buf: Array<T | undefined>;
  private head = 0; // points to oldest element
  private size = 0;

  constructor(private capacity: number) {
    if (!Number.isFinite(capacity) || capacity <= 0) {
      throw new Error(`Invalid ring buffer capacity: ${capacity}`);
    }
    this.buf = new Array<T | undefined>(capacity);
  }

  get length(): number {
    return this.size;
  }

  /** Pushes an item, overwriting the oldest one when full. */
  push(item: T): void {
    if (this.size === this.capacity) {
      this.buf[this.head] = undefined;
      this.head = (this.head + 1) % this.capacity;
      this.size--;
    }

    const tail = (this.head + this.size) % this.capacity;
    this.buf[tail] = item;
    this.size++;
  }

  /** Newest -> oldest. */
  newestFirst(): T[] {
    const out: T[] = [];
    for (let i = 0; i < this.size; i++) {
      const idx = (this.head + this.size - 1 - i) % this.capacity;
      const v = this.buf[idx];
      if (v !== undefined) out.push(v);
    }
    return out;
  }

  clear(): void {
    this.buf = new Array<T | undefined>(this.capacity);
    this.head = 0;
    this.size = 0;
  }
}

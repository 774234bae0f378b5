/**
 * BoundedQueue - FIFO with a fixed capacity that sheds its oldest entry on overflow
 *
 * Producers never wait: `push` always succeeds and reports what it evicted.
 */

export type PushResult<T> = { dropped: false } | { dropped: true; evicted: T };

export class BoundedQueue<T> {
  private readonly items: T[] = [];
  private head = 0;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`BoundedQueue capacity must be a positive integer, got ${capacity}`);
    }
  }

  push(item: T): PushResult<T> {
    this.items.push(item);
    if (this.size <= this.capacity) return { dropped: false };

    const evicted = this.shift();
    return evicted === undefined ? { dropped: false } : { dropped: true, evicted };
  }

  shift(): T | undefined {
    if (this.head >= this.items.length) return undefined;

    const item = this.items[this.head];
    this.head++;

    // compact once the consumed prefix dominates
    if (this.head > 1024 && this.head * 2 > this.items.length) {
      this.items.splice(0, this.head);
      this.head = 0;
    }
    return item;
  }

  get size(): number {
    return this.items.length - this.head;
  }

  get maxSize(): number {
    return this.capacity;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }
}

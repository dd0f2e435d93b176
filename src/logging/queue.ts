/**
 * Bounded dispatch queue for log records.
 *
 * Producers never block: `offer` appends and returns. A background drain runs
 * on the next `setImmediate` tick and hands every queued item to the
 * consumer. When the queue is full the newest item is dropped and counted;
 * the count is reported on the next drain.
 */

export interface DispatchQueueHooks {
  /** Called after a drain that dropped items since the previous report */
  onDrop?(count: number): void;
  /** Called when the consumer throws for an item */
  onError?(error: unknown): void;
}

export class DispatchQueue<T> {
  private readonly capacity: number;
  private readonly consume: (item: T) => void;
  private readonly hooks: DispatchQueueHooks;
  private items: T[] = [];
  private scheduled = false;
  private closed = false;
  private dropped = 0;

  constructor(capacity: number, consume: (item: T) => void, hooks: DispatchQueueHooks = {}) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.consume = consume;
    this.hooks = hooks;
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Enqueue an item
   *
   * @returns false when the item was dropped (queue full or closed)
   */
  offer(item: T): boolean {
    if (this.closed) {
      return false;
    }

    if (this.items.length >= this.capacity) {
      this.dropped++;
      this.schedule();
      return false;
    }

    this.items.push(item);
    this.schedule();
    return true;
  }

  /**
   * Hand every queued item to the consumer now
   */
  drain(): void {
    const batch = this.items;
    this.items = [];

    for (const item of batch) {
      try {
        this.consume(item);
      } catch (error) {
        this.hooks.onError?.(error);
      }
    }

    if (this.dropped > 0) {
      const count = this.dropped;
      this.dropped = 0;
      this.hooks.onDrop?.(count);
    }
  }

  /**
   * Stop accepting items and drain what is left
   */
  close(): void {
    this.closed = true;
    this.drain();
  }

  private schedule(): void {
    if (this.scheduled) {
      return;
    }
    this.scheduled = true;
    setImmediate(() => {
      this.scheduled = false;
      this.drain();
    });
  }
}

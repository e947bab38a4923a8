/**
 * BoundedQueue
 *
 * Single-producer, single-consumer hand-off with a fixed capacity. `push`
 * waits while the queue is full; the consumer iterates until the producer
 * closes it, and sees the producer's error after the items queued before it.
 */

type Waiter = () => void;

export class BoundedQueue<T> implements AsyncIterable<T> {
  private readonly items: T[] = [];
  private readonly pushWaiters: Waiter[] = [];
  private readonly pullWaiters: Waiter[] = [];
  private closed = false;
  private cancelled = false;
  private failure: { error: unknown } | undefined;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`BoundedQueue capacity must be >= 1 (got ${capacity})`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  /** True once the consumer gave up; producers should stop */
  get isCancelled(): boolean {
    return this.cancelled;
  }

  /**
   * Enqueue, waiting for room
   * @returns false if the consumer cancelled and the item was dropped
   */
  async push(item: T): Promise<boolean> {
    while (this.items.length >= this.capacity && !this.cancelled) {
      await new Promise<void>((resolve) => this.pushWaiters.push(resolve));
    }
    if (this.cancelled || this.closed) return false;

    this.items.push(item);
    this.wake(this.pullWaiters);
    return true;
  }

  /** No more items */
  close(): void {
    this.closed = true;
    this.wake(this.pullWaiters);
  }

  /** Close with an error the consumer rethrows after draining */
  fail(error: unknown): void {
    this.failure = { error };
    this.close();
  }

  /** Consumer is done; drop queued items and release the producer */
  cancel(): void {
    this.cancelled = true;
    this.items.length = 0;
    this.wake(this.pushWaiters);
    this.wake(this.pullWaiters);
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      const item = this.items.shift();
      if (item !== undefined) {
        this.wake(this.pushWaiters);
        yield item;
        continue;
      }
      if (this.cancelled) return;
      if (this.closed) {
        if (this.failure) throw this.failure.error;
        return;
      }
      await new Promise<void>((resolve) => this.pullWaiters.push(resolve));
    }
  }

  private wake(waiters: Waiter[]): void {
    for (const waiter of waiters.splice(0)) {
      waiter();
    }
  }
}

/**
 * Drain `source` into `queue`, closing it when done. Never rejects:
 * source errors are handed to the consumer through the queue.
 */
export async function pump<T>(source: AsyncIterable<T>, queue: BoundedQueue<T>): Promise<void> {
  const iterator = source[Symbol.asyncIterator]();
  try {
    while (!queue.isCancelled) {
      const next = await iterator.next();
      if (next.done) break;
      if (!(await queue.push(next.value))) break;
    }
    queue.close();
  } catch (err) {
    queue.fail(err);
  } finally {
    if (queue.isCancelled) {
      await iterator.return?.();
    }
  }
}

import { EventEmitter } from "node:events";
import { parseCapacity } from "../config";
import { Logger, silentLogger } from "../logger";
import { Option, ValueLifecycle, plainLifecycle } from "../option/Option";
import { BoundedQueueEventMap } from "../types/QueueEvents";

export interface BoundedQueueOptions<T> {
  lifecycle?: ValueLifecycle<T>;
  logger?: Logger;
}

/**
 * Fixed-capacity FIFO ring buffer.
 *
 * All slots are allocated by the constructor and the backing array never
 * grows. `count` alone decides full and empty; `front` and `rear` only locate
 * slots and wrap modulo the capacity.
 *
 * Nothing here throws once the queue exists: a full queue rejects through
 * `enqueue`'s return value and an empty one answers `dequeue` with an absent
 * {@link Option}.
 */
export class BoundedQueue<T> extends EventEmitter {
  private readonly slots: ReadonlyArray<Option<T>>;
  private readonly maxSize: number;
  private readonly lifecycle: ValueLifecycle<T>;
  private readonly logger: Logger;

  private front: number = 0;
  private rear: number = 0;
  private count: number = 0;

  /** @throws ConfigurationError when `capacity` is not a positive integer. */
  constructor(capacity: number, options: BoundedQueueOptions<T> = {}) {
    super();
    this.maxSize = parseCapacity(capacity);
    this.lifecycle = options.lifecycle ?? plainLifecycle<T>();
    this.logger = options.logger ?? silentLogger;
    this.slots = Array.from({ length: this.maxSize }, () => Option.none(this.lifecycle));
  }

  /** Appends a copy of `item`. Returns false, changing nothing, when full. */
  enqueue(item: T): boolean {
    if (this.isFull()) {
      this.logger.debug("Queue is full, item rejected", { capacity: this.maxSize });
      this.notify('item:rejected', { item, capacity: this.maxSize });
      return false;
    }

    this.slots[this.rear].set(item);
    this.rear = this.advance(this.rear);
    this.count++;

    this.notify('item:enqueued', { item, size: this.count });
    if (this.isFull()) this.notify('queue:full', { capacity: this.maxSize });
    return true;
  }

  /**
   * Appends a copy of `item`, first evicting the oldest item when full.
   *
   * When full, the evicted value leaves and the new item lands before any
   * listener runs, so `count` never changes and listeners see a full queue.
   */
  forceEnqueue(item: T): true {
    if (!this.isFull()) {
      this.enqueue(item);
      return true;
    }

    // Full means front === rear: the evicted slot is the one being written.
    const evicted = this.slots[this.front].take();
    this.slots[this.rear].set(item);
    this.front = this.advance(this.front);
    this.rear = this.advance(this.rear);

    this.logger.debug("Queue is full, oldest item evicted", { capacity: this.maxSize });
    try {
      evicted.ifPresent((value) => this.notify('item:evicted', { item: value }));
      this.notify('item:enqueued', { item, size: this.count });
    } finally {
      evicted.dispose();
    }
    return true;
  }

  /** Removes the oldest item. The returned option owns it. */
  dequeue(): Option<T> {
    if (this.isEmpty()) {
      return Option.none(this.lifecycle);
    }

    const item = this.slots[this.front].take();
    this.front = this.advance(this.front);
    this.count--;

    item.ifPresent((value) => this.notify('item:dequeued', { item: value, size: this.count }));
    if (this.isEmpty()) this.notify('queue:drained', { capacity: this.maxSize });
    return item;
  }

  size(): number {
    return this.count;
  }

  capacity(): number {
    return this.maxSize;
  }

  isFull(): boolean {
    return this.count === this.maxSize;
  }

  isEmpty(): boolean {
    return this.count === 0;
  }

  /**
   * Destroys every item still queued and resets the queue to empty. Call it
   * when the owner is done with the queue.
   */
  dispose(): void {
    for (let i = 0; i < this.count; i++) {
      this.slots[(this.front + i) % this.maxSize].dispose();
    }
    this.front = 0;
    this.rear = 0;
    this.count = 0;
  }

  private advance(index: number): number {
    return (index + 1) % this.maxSize;
  }

  private notify<K extends keyof BoundedQueueEventMap<T>>(
    event: K,
    payload: BoundedQueueEventMap<T>[K],
  ): void {
    this.emit(event, payload);
  }
}

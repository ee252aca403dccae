/**
 * Opportunity Queue
 *
 * Fixed-capacity FIFO between the classification fan-out (producers) and the
 * worker pool (consumers), backed by a CircularBuffer.
 *
 * - enqueue() waits for space when full, in producer arrival order, and
 *   rejects with QueueFullError once its timeout elapses
 * - dequeue() waits for an item, or resolves with QUEUE_CLOSED once the
 *   queue is closed and empty
 * - close() rejects blocked and future producers; buffered items stay
 *   dequeueable
 *
 * Every state change happens synchronously between awaits, so a dequeue
 * that frees a slot admits the oldest waiting producer before any other
 * caller can observe the free slot.
 *
 * @see CircularBuffer for the O(1) storage
 */

import type { Opportunity } from '@swarmwatch/types';
import { QueueClosedError, QueueFullError } from '@swarmwatch/types';
import { CircularBuffer } from '../data-structures/circular-buffer';

/**
 * Sentinel resolved by dequeue() once the queue is closed and drained.
 */
export const QUEUE_CLOSED: unique symbol = Symbol('QUEUE_CLOSED');
export type QueueClosed = typeof QUEUE_CLOSED;

export const DEFAULT_QUEUE_CAPACITY = 1000;

export interface QueueStats {
  size: number;
  capacity: number;
  fillRatio: number;
  waitingProducers: number;
  waitingConsumers: number;
  closed: boolean;
  /** Items accepted since creation */
  enqueued: number;
  /** Producers that gave up after their timeout */
  timedOut: number;
}

interface WaitingProducer<T> {
  item: T;
  resolve: () => void;
  reject: (error: Error) => void;
  timer?: NodeJS.Timeout;
}

type WaitingConsumer<T> = (value: T | QueueClosed) => void;

/** Boxed so an item that is itself undefined is still distinguishable from an empty shift() */
interface Slot<T> {
  value: T;
}

export class OpportunityQueue<T = Opportunity> {
  private readonly buffer: CircularBuffer<Slot<T>>;
  private readonly producers: WaitingProducer<T>[] = [];
  private readonly consumers: WaitingConsumer<T>[] = [];
  private closed = false;
  private enqueuedCount = 0;
  private timedOutCount = 0;

  constructor(capacity: number = DEFAULT_QUEUE_CAPACITY) {
    this.buffer = new CircularBuffer<Slot<T>>(capacity);
  }

  get capacity(): number {
    return this.buffer.capacity;
  }

  get size(): number {
    return this.buffer.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Store an item, waiting for space while the queue is full.
   *
   * @param timeoutMs - Give up after this long; omit to wait indefinitely
   * @throws QueueFullError when the timeout elapses first
   * @throws QueueClosedError when the queue is or becomes closed
   */
  enqueue(item: T, timeoutMs?: number): Promise<void> {
    if (this.closed) {
      return Promise.reject(new QueueClosedError());
    }
    if (this.offer(item)) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: WaitingProducer<T> = { item, resolve, reject };
      if (timeoutMs !== undefined) {
        waiter.timer = setTimeout(() => {
          const index = this.producers.indexOf(waiter);
          if (index === -1) return;
          this.producers.splice(index, 1);
          this.timedOutCount++;
          reject(new QueueFullError(this.capacity, timeoutMs));
        }, timeoutMs);
      }
      this.producers.push(waiter);
    });
  }

  /**
   * Non-blocking enqueue.
   *
   * @returns false when the queue is full (or producers are already waiting)
   * @throws QueueClosedError when the queue is closed
   */
  tryEnqueue(item: T): boolean {
    if (this.closed) {
      throw new QueueClosedError();
    }
    return this.offer(item);
  }

  /**
   * Take the oldest item, waiting while the queue is empty.
   * Resolves with QUEUE_CLOSED once the queue is closed and empty.
   */
  dequeue(): Promise<T | QueueClosed> {
    const item = this.take();
    if (item) {
      return Promise.resolve(item.value);
    }
    if (this.closed) {
      return Promise.resolve(QUEUE_CLOSED);
    }
    return new Promise<T | QueueClosed>(resolve => {
      this.consumers.push(resolve);
    });
  }

  /**
   * Stop accepting items. Waiting producers are rejected with
   * QueueClosedError; waiting consumers get QUEUE_CLOSED. Idempotent.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const producer of this.producers.splice(0)) {
      clearTimeout(producer.timer);
      producer.reject(new QueueClosedError());
    }
    // Consumers only wait while the buffer is empty
    for (const consumer of this.consumers.splice(0)) {
      consumer(QUEUE_CLOSED);
    }
  }

  /**
   * Remove and return everything buffered, oldest first.
   * Freed slots are handed to waiting producers.
   */
  drain(): T[] {
    const items: T[] = [];
    for (let slot = this.take(); slot; slot = this.take()) {
      items.push(slot.value);
    }
    return items;
  }

  getStats(): QueueStats {
    return {
      size: this.buffer.size,
      capacity: this.buffer.capacity,
      fillRatio: this.buffer.size / this.buffer.capacity,
      waitingProducers: this.producers.length,
      waitingConsumers: this.consumers.length,
      closed: this.closed,
      enqueued: this.enqueuedCount,
      timedOut: this.timedOutCount,
    };
  }

  /**
   * Accept an item without waiting, if fairness and capacity allow.
   */
  private offer(item: T): boolean {
    const consumer = this.consumers.shift();
    if (consumer) {
      // A waiting consumer implies an empty buffer; hand over directly
      this.enqueuedCount++;
      consumer(item);
      return true;
    }
    if (this.producers.length > 0 || this.buffer.isFull) {
      return false;
    }
    this.buffer.push({ value: item });
    this.enqueuedCount++;
    return true;
  }

  /**
   * Shift one slot and admit the oldest waiting producer into the freed space.
   */
  private take(): Slot<T> | undefined {
    const slot = this.buffer.shift();
    if (!slot) return undefined;

    const producer = this.producers.shift();
    if (producer) {
      clearTimeout(producer.timer);
      this.buffer.push({ value: producer.item });
      this.enqueuedCount++;
      producer.resolve();
    }
    return slot;
  }
}

/**
 * Upload Queue
 *
 * Fixed-capacity FIFO between the detector (producer) and the upload worker
 * (consumer). A full queue rejects the new entry; nothing is evicted and
 * nothing blocks.
 *
 * Every method is synchronous, so each call runs to completion on the event
 * loop before the other side can touch the buffer.
 */

import { ValidationError, type QueueEntry } from '@capture-relay/core';

export const DEFAULT_QUEUE_CAPACITY = 8;

export class UploadQueue {
  private readonly slots: Array<QueueEntry | undefined>;
  private head = 0;
  private tail = 0;
  private count = 0;

  constructor(readonly capacity: number = DEFAULT_QUEUE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new ValidationError('capacity', 'must be a positive integer');
    }
    this.slots = new Array<QueueEntry | undefined>(capacity).fill(undefined);
  }

  /**
   * Store `entry` at the tail; false when the queue is full
   */
  enqueue(entry: QueueEntry): boolean {
    if (this.count >= this.capacity) {
      return false;
    }

    this.slots[this.tail] = { path: entry.path, size: entry.size };
    this.tail = (this.tail + 1) % this.capacity;
    this.count++;
    return true;
  }

  /**
   * Remove and return the head entry; null when the queue is empty
   */
  dequeue(): QueueEntry | null {
    const entry = this.count > 0 ? this.slots[this.head] : undefined;
    if (entry === undefined) {
      return null;
    }

    this.slots[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.count--;
    return { path: entry.path, size: entry.size };
  }

  size(): number {
    return this.count;
  }

  isFull(): boolean {
    return this.count >= this.capacity;
  }
}

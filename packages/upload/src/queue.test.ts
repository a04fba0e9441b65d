import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { ValidationError, createQueueEntry } from '@capture-relay/core';
import { DEFAULT_QUEUE_CAPACITY, UploadQueue } from './queue.js';

const entry = (n: number) => createQueueEntry(`/album/2024/01/15/${n}.jpg`, n + 1);

describe('UploadQueue', () => {
  it('defaults to a capacity of 8', () => {
    const queue = new UploadQueue();
    assert.equal(queue.capacity, DEFAULT_QUEUE_CAPACITY);
    assert.equal(queue.capacity, 8);
  });

  it('dequeues in insertion order', () => {
    const queue = new UploadQueue(4);
    for (let n = 0; n < 3; n++) {
      assert.equal(queue.enqueue(entry(n)), true);
    }

    assert.deepEqual(
      [queue.dequeue(), queue.dequeue(), queue.dequeue()].map(e => e?.path),
      ['/album/2024/01/15/0.jpg', '/album/2024/01/15/1.jpg', '/album/2024/01/15/2.jpg']
    );
    assert.equal(queue.dequeue(), null);
  });

  it('rejects the newest entry when full and keeps the existing ones', () => {
    const queue = new UploadQueue();
    for (let n = 0; n < 8; n++) {
      assert.equal(queue.enqueue(entry(n)), true);
    }

    assert.equal(queue.isFull(), true);
    assert.equal(queue.enqueue(entry(8)), false);
    assert.equal(queue.size(), 8);

    const drained: string[] = [];
    let next = queue.dequeue();
    while (next !== null) {
      drained.push(next.path);
      next = queue.dequeue();
    }
    assert.equal(drained.length, 8);
    assert.equal(drained[0], '/album/2024/01/15/0.jpg');
    assert.equal(drained[7], '/album/2024/01/15/7.jpg');
  });

  it('keeps FIFO order across wrap-around', () => {
    const queue = new UploadQueue(2);
    queue.enqueue(entry(0));
    queue.enqueue(entry(1));
    assert.equal(queue.dequeue()?.path, '/album/2024/01/15/0.jpg');
    assert.equal(queue.enqueue(entry(2)), true);
    assert.equal(queue.dequeue()?.path, '/album/2024/01/15/1.jpg');
    assert.equal(queue.dequeue()?.path, '/album/2024/01/15/2.jpg');
    assert.equal(queue.size(), 0);
  });

  it('returns a copy, not the stored entry', () => {
    const queue = new UploadQueue(1);
    const original = entry(0);
    queue.enqueue(original);
    const out = queue.dequeue();
    assert.deepEqual(out, { path: original.path, size: original.size });
    assert.notEqual(out, original);
  });

  it('rejects a capacity below 1', () => {
    assert.throws(() => new UploadQueue(0), ValidationError);
    assert.throws(() => new UploadQueue(1.5), ValidationError);
  });
});

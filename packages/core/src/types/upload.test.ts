import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { ValidationError } from '../errors/index.js';
import { createQueueEntry } from './upload.js';

describe('createQueueEntry', () => {
  it('builds a frozen entry', () => {
    const entry = createQueueEntry('/album/2024/01/15/a.jpg', 2048);
    assert.deepEqual(entry, { path: '/album/2024/01/15/a.jpg', size: 2048 });
    assert.equal(Object.isFrozen(entry), true);
  });

  it('rejects paths over the length bound', () => {
    assert.throws(() => createQueueEntry('/album/' + 'x'.repeat(20), 1, 16), ValidationError);
  });

  it('rejects empty paths and non-positive sizes', () => {
    assert.throws(() => createQueueEntry('', 1), ValidationError);
    assert.throws(() => createQueueEntry('/album/a.jpg', 0), ValidationError);
    assert.throws(() => createQueueEntry('/album/a.jpg', 1.5), ValidationError);
  });
});

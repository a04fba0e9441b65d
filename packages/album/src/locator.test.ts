import assert from 'node:assert/strict';
import { afterEach, beforeEach, describe, it } from 'node:test';

import type { Storage } from '@capture-relay/core';
import { silentLogger } from '@capture-relay/utils';
import { AlbumLocator } from './locator.js';
import { FsStorage } from './storage.js';
import { createTempAlbum, type TempAlbum } from './testing/tempAlbum.js';

class CountingStorage extends FsStorage {
  readonly listed: string[] = [];

  override async listDirectories(path: string): Promise<string[]> {
    this.listed.push(path);
    return super.listDirectories(path);
  }

  override async listFiles(path: string): Promise<string[]> {
    this.listed.push(path);
    return super.listFiles(path);
  }
}

function newLocator(album: TempAlbum, storage: Storage = new FsStorage()): AlbumLocator {
  return new AlbumLocator({ root: album.root, storage, logger: silentLogger() });
}

async function newerPaths(locator: AlbumLocator, lastPath: string): Promise<string[]> {
  const result = await locator.locateNewerThan(lastPath);
  assert.equal(result.ok, true);
  return result.ok ? result.value.map(item => item.path) : [];
}

describe('AlbumLocator', () => {
  let album: TempAlbum;

  beforeEach(async () => {
    album = await createTempAlbum();
  });

  afterEach(async () => {
    await album.remove();
  });

  describe('locateNewest', () => {
    it('returns the lexicographically greatest well-formed item', async () => {
      await album.add('2023/12/31/z.jpg');
      await album.add('2024/01/15/a.jpg');
      await album.add('2024/01/15/b.jpg');
      await album.add('2024/01/09/y.jpg');
      await album.add('2025x/01/01/ignored.jpg');
      await album.add('2024/1/20/ignored.jpg');

      const result = await newLocator(album).locateNewest();

      assert.equal(result.ok, true);
      if (result.ok) {
        assert.equal(result.value.path, album.path('2024/01/15/b.jpg'));
        assert.equal(result.value.filename, 'b.jpg');
      }
    });

    it('reports an empty album at the year level', async () => {
      const result = await newLocator(album).locateNewest();
      assert.equal(result.ok, false);
      if (!result.ok) {
        assert.equal(result.error.level, 'year');
        assert.equal(result.error.parent, album.root);
      }
    });

    it('names the first empty level and its parent', async () => {
      await album.add('2023/05/01/old.jpg');
      await album.addDir('2024/02');

      const result = await newLocator(album).locateNewest();
      assert.equal(result.ok, false);
      if (!result.ok) {
        assert.equal(result.error.level, 'day');
        assert.equal(result.error.parent, album.path('2024/02'));
        assert.equal(result.error.message, `No valid day directories in ${album.path('2024/02')}`);
      }
    });

    it('reports a day without files', async () => {
      await album.addDir('2024/02/03');
      const result = await newLocator(album).locateNewest();
      assert.equal(result.ok, false);
      if (!result.ok) {
        assert.equal(result.error.level, 'file');
      }
    });
  });

  describe('locateNewerThan', () => {
    it('follows a capture session day by day', async () => {
      const locator = newLocator(album);
      await album.add('2024/01/15/a.jpg');

      const newest = await locator.locateNewest();
      assert.equal(newest.ok && newest.value.path, album.path('2024/01/15/a.jpg'));

      await album.add('2024/01/16/b.jpg');
      assert.deepEqual(
        await newerPaths(locator, album.path('2024/01/15/a.jpg')),
        [album.path('2024/01/16/b.jpg')]
      );

      await album.add('2024/02/01/c.mp4');
      assert.deepEqual(
        await newerPaths(locator, album.path('2024/01/16/b.jpg')),
        [album.path('2024/02/01/c.mp4')]
      );
    });

    it('returns exactly the items after the watermark, sorted', async () => {
      const all = [
        '2023/11/30/x.jpg',
        '2024/01/15/a.jpg',
        '2024/01/15/b.jpg',
        '2024/01/15/c.jpg',
        '2024/01/20/d.jpg',
        '2024/03/01/e.mp4',
        '2025/01/01/f.jpg',
      ];
      for (const item of [...all].reverse()) {
        await album.add(item);
      }
      await album.add('2024/01/xx/ignored.jpg');
      await album.add('notes/2024/01/15/ignored.jpg');

      const watermark = album.path('2024/01/15/b.jpg');
      const newer = await newerPaths(newLocator(album), watermark);

      const expected = all.map(item => album.path(item)).filter(path => path > watermark);
      assert.deepEqual(newer, expected);
      assert.equal(newer.every(path => path > watermark), true);
    });

    it('returns nothing when no items were added since the last diff', async () => {
      const locator = newLocator(album);
      await album.add('2024/01/15/a.jpg');
      await album.add('2024/01/16/b.jpg');

      const first = await newerPaths(locator, album.path('2024/01/15/a.jpg'));
      const last = first[first.length - 1];
      assert.equal(last, album.path('2024/01/16/b.jpg'));

      assert.deepEqual(await newerPaths(locator, last ?? ''), []);
    });

    it('returns nothing when every year is older than the watermark', async () => {
      await album.add('2022/01/01/a.jpg');
      assert.deepEqual(await newerPaths(newLocator(album), album.path('2024/01/01/a.jpg')), []);
    });

    it('does not descend into branches below the watermark', async () => {
      await album.add('2022/06/01/old.jpg');
      await album.add('2024/01/02/old.jpg');
      await album.add('2024/01/15/a.jpg');
      await album.add('2024/01/16/b.jpg');

      const storage = new CountingStorage();
      await newerPaths(newLocator(album, storage), album.path('2024/01/15/a.jpg'));

      assert.equal(storage.listed.includes(album.path('2022')), false);
      assert.equal(storage.listed.includes(album.path('2024/01/02')), false);
      assert.equal(storage.listed.includes(album.path('2024/01/16')), true);
    });

    it('rejects a watermark above the day level', async () => {
      const result = await newLocator(album).locateNewerThan(album.path('2024/01'));
      assert.equal(result.ok, false);
      if (!result.ok) {
        assert.equal(result.error.name, 'InvalidWatermarkError');
      }
    });
  });
});

import assert from 'node:assert/strict';
import { after, before, describe, it } from 'node:test';

import { HierarchyScanner, maxByName } from './scanner.js';
import { FsStorage } from './storage.js';
import { createTempAlbum, type TempAlbum } from './testing/tempAlbum.js';

describe('HierarchyScanner', () => {
  let album: TempAlbum;
  const scanner = new HierarchyScanner(new FsStorage());

  before(async () => {
    album = await createTempAlbum();
    await album.addDir('2023');
    await album.addDir('2024');
    await album.addDir('202');
    await album.addDir('20x4');
    await album.addDir('Thumbnails');
    await album.add('9999', 'a file named like a year');
    await album.add('2024/01/15/a.jpg');
    await album.addDir('2024/01/15/nested');
  });

  after(async () => {
    await album.remove();
  });

  it('lists only digit directories of the expected length', async () => {
    const years = await scanner.listMatching(album.root, 4);
    const names = years.map(entry => entry.name).sort();
    assert.deepEqual(names, ['2023', '2024']);
    assert.equal(years.find(entry => entry.name === '2024')?.path, album.path('2024'));
  });

  it('lists regular files regardless of name', async () => {
    const files = await scanner.listFiles(album.path('2024/01/15'));
    assert.deepEqual(files, [{ name: 'a.jpg', path: album.path('2024/01/15/a.jpg') }]);
  });

  it('returns nothing for a missing directory', async () => {
    assert.deepEqual(await scanner.listMatching(album.path('1999'), 2), []);
    assert.deepEqual(await scanner.listFiles(album.path('1999/01/01')), []);
  });

  it('picks the greatest name', () => {
    const max = maxByName([
      { name: '03', path: '/a/03' },
      { name: '11', path: '/a/11' },
      { name: '09', path: '/a/09' },
    ]);
    assert.equal(max?.name, '11');
    assert.equal(maxByName([]), null);
  });
});

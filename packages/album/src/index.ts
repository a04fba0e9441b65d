/**
 * @capture-relay/album
 *
 * Capture album access:
 * - Filesystem storage
 * - Hierarchy scanner (year/month/day nodes)
 * - Newest-item locator and incremental differ
 */

export { FsStorage } from './storage.js';

export {
  HierarchyScanner,
  maxByName,
  YEAR_LENGTH,
  MONTH_LENGTH,
  DAY_LENGTH,
} from './scanner.js';

export {
  toAlbumPath,
  parseAlbumPath,
  compareAlbumPaths,
  parseCaptureName,
  type CaptureName,
} from './albumPath.js';

export { AlbumLocator, type AlbumLocatorOptions } from './locator.js';

/**
 * Storage Contract
 *
 * Read-only view of the capture album. Listings are single-level and return
 * bare names; a missing directory lists as empty.
 */

import type { Readable } from 'node:stream';

export interface Storage {
  listDirectories(path: string): Promise<string[]>;
  listFiles(path: string): Promise<string[]>;
  // 0 when the file is absent or unreadable
  statSize(path: string): Promise<number>;
  openForRead(path: string): Readable;
}

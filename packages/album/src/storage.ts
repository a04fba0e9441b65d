/**
 * Filesystem Storage
 *
 * `Storage` over node:fs. Missing directories list as empty, missing files
 * stat as 0 bytes; any other I/O error propagates.
 */

import { createReadStream } from 'node:fs';
import { readdir } from 'node:fs/promises';
import type { Readable } from 'node:stream';
import type { Storage } from '@capture-relay/core';
import { isMissingPathError, safeFileSize } from '@capture-relay/utils';

export class FsStorage implements Storage {
  async listDirectories(path: string): Promise<string[]> {
    return this.list(path, 'directory');
  }

  async listFiles(path: string): Promise<string[]> {
    return this.list(path, 'file');
  }

  async statSize(path: string): Promise<number> {
    return safeFileSize(path);
  }

  openForRead(path: string): Readable {
    return createReadStream(path);
  }

  private async list(path: string, kind: 'directory' | 'file'): Promise<string[]> {
    try {
      const entries = await readdir(path, { withFileTypes: true });
      return entries
        .filter(entry => (kind === 'directory' ? entry.isDirectory() : entry.isFile()))
        .map(entry => entry.name);
    } catch (error) {
      if (isMissingPathError(error)) {
        return [];
      }
      throw error;
    }
  }
}

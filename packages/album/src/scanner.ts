/**
 * Hierarchy Scanner
 *
 * Single-level listings of the album. A hierarchy node is a directory whose
 * name is all digits and exactly as long as its level requires (4 for
 * years, 2 for months and days).
 */

import { join } from 'node:path';
import type { HierarchyEntry, Storage } from '@capture-relay/core';
import { isDigits } from '@capture-relay/utils';

export const YEAR_LENGTH = 4;
export const MONTH_LENGTH = 2;
export const DAY_LENGTH = 2;

export class HierarchyScanner {
  constructor(private readonly storage: Storage) {}

  /**
   * Hierarchy nodes directly under `dir`
   */
  async listMatching(dir: string, expectedLength: number): Promise<HierarchyEntry[]> {
    const names = await this.storage.listDirectories(dir);
    return names
      .filter(name => isDigits(name, expectedLength))
      .map(name => ({ name, path: join(dir, name) }));
  }

  /**
   * Regular files directly under `dir`, whatever their names
   */
  async listFiles(dir: string): Promise<HierarchyEntry[]> {
    const names = await this.storage.listFiles(dir);
    return names.map(name => ({ name, path: join(dir, name) }));
  }
}

/**
 * Entry with the greatest name, or null for an empty list
 */
export function maxByName(entries: HierarchyEntry[]): HierarchyEntry | null {
  let max: HierarchyEntry | null = null;
  for (const entry of entries) {
    if (max === null || entry.name > max.name) {
      max = entry;
    }
  }
  return max;
}

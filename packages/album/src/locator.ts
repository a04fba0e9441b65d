/**
 * Album Locator
 *
 * Finds the newest item of the album and, given a watermark item, every
 * item newer than it. Branches below the watermark are pruned whole, so a
 * diff costs the nodes at or above the watermark, not the album size.
 */

import { normalize, sep } from 'node:path';
import {
  AlbumNotReadyError,
  err,
  ok,
  type AlbumPath,
  type HierarchyEntry,
  type InvalidWatermarkError,
  type Result,
  type Storage,
} from '@capture-relay/core';
import { createLogger, type Logger } from '@capture-relay/utils';
import { compareAlbumPaths, parseAlbumPath, toAlbumPath } from './albumPath.js';
import {
  DAY_LENGTH,
  HierarchyScanner,
  MONTH_LENGTH,
  YEAR_LENGTH,
  maxByName,
} from './scanner.js';
import { FsStorage } from './storage.js';

export interface AlbumLocatorOptions {
  root: string;
  storage?: Storage;
  logger?: Logger;
}

export class AlbumLocator {
  private readonly root: string;
  private readonly scanner: HierarchyScanner;
  private readonly logger: Logger;

  constructor(options: AlbumLocatorOptions) {
    const root = normalize(options.root);
    this.root = root.length > 1 && root.endsWith(sep) ? root.slice(0, -1) : root;
    this.scanner = new HierarchyScanner(options.storage ?? new FsStorage());
    this.logger = options.logger ?? createLogger({ component: 'album' });
  }

  get albumRoot(): string {
    return this.root;
  }

  /**
   * Newest item: greatest year, then month, then day, then file
   */
  async locateNewest(): Promise<Result<AlbumPath, AlbumNotReadyError>> {
    const startTime = Date.now();

    const year = maxByName(await this.scanner.listMatching(this.root, YEAR_LENGTH));
    if (!year) {
      return err(new AlbumNotReadyError('year', this.root));
    }

    const month = maxByName(await this.scanner.listMatching(year.path, MONTH_LENGTH));
    if (!month) {
      return err(new AlbumNotReadyError('month', year.path));
    }

    const day = maxByName(await this.scanner.listMatching(month.path, DAY_LENGTH));
    if (!day) {
      return err(new AlbumNotReadyError('day', month.path));
    }

    const file = maxByName(await this.scanner.listFiles(day.path));
    if (!file) {
      return err(new AlbumNotReadyError('file', day.path));
    }

    const item = toAlbumPath(this.root, year.name, month.name, day.name, file.name);
    this.logger.debug({ item: item.path, durationMs: Date.now() - startTime }, 'Located newest item');
    return ok(item);
  }

  /**
   * Every item whose path sorts after `lastPath`, ascending
   */
  async locateNewerThan(lastPath: string): Promise<Result<AlbumPath[], InvalidWatermarkError>> {
    const startTime = Date.now();

    const parsed = parseAlbumPath(this.root, lastPath);
    if (!parsed.ok) {
      return parsed;
    }
    const mark = parsed.value;

    const items: AlbumPath[] = [];
    const years = await this.scanner.listMatching(this.root, YEAR_LENGTH);

    for (const year of years) {
      if (year.name < mark.year) continue;
      await this.collectYear(year, year.name === mark.year ? mark : null, items);
    }

    // Listing order is filesystem order; this sort is what callers rely on
    items.sort(compareAlbumPaths);

    this.logger.debug(
      { watermark: lastPath, found: items.length, durationMs: Date.now() - startTime },
      'Located new items'
    );
    return ok(items);
  }

  // `mark` is null once the branch is strictly newer than the watermark

  private async collectYear(
    year: HierarchyEntry,
    mark: AlbumPath | null,
    items: AlbumPath[]
  ): Promise<void> {
    const months = await this.scanner.listMatching(year.path, MONTH_LENGTH);
    for (const month of months) {
      if (mark && month.name < mark.month) continue;
      await this.collectMonth(year, month, mark && month.name === mark.month ? mark : null, items);
    }
  }

  private async collectMonth(
    year: HierarchyEntry,
    month: HierarchyEntry,
    mark: AlbumPath | null,
    items: AlbumPath[]
  ): Promise<void> {
    const days = await this.scanner.listMatching(month.path, DAY_LENGTH);
    for (const day of days) {
      if (mark && day.name < mark.day) continue;
      const dayMark = mark && day.name === mark.day ? mark : null;

      const files = await this.scanner.listFiles(day.path);
      for (const file of files) {
        const item = toAlbumPath(this.root, year.name, month.name, day.name, file.name);
        if (!dayMark || item.path > dayMark.path) {
          items.push(item);
        }
      }
    }
  }
}

/**
 * Album Paths
 */

import { join, sep } from 'node:path';
import {
  InvalidWatermarkError,
  err,
  ok,
  type AlbumPath,
  type Result,
} from '@capture-relay/core';
import { isDigits } from '@capture-relay/utils';
import { DAY_LENGTH, MONTH_LENGTH, YEAR_LENGTH } from './scanner.js';

export function toAlbumPath(
  root: string,
  year: string,
  month: string,
  day: string,
  filename: string
): AlbumPath {
  return Object.freeze({
    year,
    month,
    day,
    filename,
    path: join(root, year, month, day, filename),
  });
}

/**
 * Code-unit order on the full path; never locale-aware
 */
export function compareAlbumPaths(a: AlbumPath, b: AlbumPath): number {
  if (a.path < b.path) return -1;
  if (a.path > b.path) return 1;
  return 0;
}

/**
 * Split `<root>/YYYY/MM/DD/<file>` into its components
 */
export function parseAlbumPath(
  root: string,
  fullPath: string
): Result<AlbumPath, InvalidWatermarkError> {
  const prefix = root.endsWith(sep) ? root : root + sep;
  if (!fullPath.startsWith(prefix)) {
    return err(new InvalidWatermarkError(fullPath, `not under ${root}`));
  }

  const segments = fullPath.slice(prefix.length).split(sep);
  if (segments.length !== 4) {
    return err(new InvalidWatermarkError(fullPath, 'expected YYYY/MM/DD/<file>'));
  }

  const [year = '', month = '', day = '', filename = ''] = segments;
  if (
    !isDigits(year, YEAR_LENGTH) ||
    !isDigits(month, MONTH_LENGTH) ||
    !isDigits(day, DAY_LENGTH) ||
    filename === ''
  ) {
    return err(new InvalidWatermarkError(fullPath, 'expected YYYY/MM/DD/<file>'));
  }

  return ok(Object.freeze({ year, month, day, filename, path: fullPath }));
}

export interface CaptureName {
  capturedAt: Date;
  // 32-character hex id of the application that took the capture
  sourceId: string;
}

const CAPTURE_NAME = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})\d{2}-([0-9A-Fa-f]{32})\.[A-Za-z0-9]+$/;

/**
 * Parse capture filenames shaped `YYYYMMDDhhmmssNN-<source id>.<ext>`
 */
export function parseCaptureName(filename: string): CaptureName | null {
  const match = CAPTURE_NAME.exec(filename);
  if (!match) {
    return null;
  }

  const [, year, month, day, hour, minute, second, sourceId] = match;
  if (sourceId === undefined) {
    return null;
  }

  const capturedAt = new Date(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hour),
    Number(minute),
    Number(second)
  );
  if (Number.isNaN(capturedAt.getTime())) {
    return null;
  }

  return { capturedAt, sourceId: sourceId.toUpperCase() };
}

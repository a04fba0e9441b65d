/**
 * Upload Types
 */

import { ValidationError } from '../errors/index.js';

export type MediaKind = 'image' | 'video';

export const UPLOAD_MODES = ['compressed', 'original', 'both'] as const;

export type UploadMode = (typeof UPLOAD_MODES)[number];

// What a single delivery call sends; `both` expands to the two of these
export type DeliveryMode = Exclude<UploadMode, 'both'>;

export type DestinationName = 'telegram' | 'ntfy' | 'discord';

export interface DestinationSettings {
  enabled: boolean;
  uploadScreenshots: boolean;
  uploadMovies: boolean;
}

export interface QueueEntry {
  readonly path: string;
  readonly size: number;
}

export const DEFAULT_MAX_PATH_LENGTH = 1024;

/**
 * Bounded constructor for queue entries
 */
export function createQueueEntry(
  path: string,
  size: number,
  maxPathLength: number = DEFAULT_MAX_PATH_LENGTH
): QueueEntry {
  if (path.length === 0) {
    throw new ValidationError('path', 'must not be empty');
  }
  if (path.length > maxPathLength) {
    throw new ValidationError('path', `longer than ${maxPathLength} characters`);
  }
  if (!Number.isSafeInteger(size) || size <= 0) {
    throw new ValidationError('size', 'must be a positive integer');
  }
  return Object.freeze({ path, size });
}

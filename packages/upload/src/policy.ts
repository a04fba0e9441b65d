/**
 * Transfer Policy
 *
 * Per-media-kind attempt budget and HTTP timeouts. Videos are larger and
 * get more attempts and longer timeouts.
 */

import type { MediaKind } from '@capture-relay/core';
import { getExtension } from '@capture-relay/utils';

export interface TransferPolicy {
  maxAttempts: number;
  connectTimeoutMs: number;
  // Longest stretch without progress before the attempt is abandoned
  idleTimeoutMs: number;
  totalTimeoutMs: number;
}

export const TRANSFER_POLICIES: Readonly<Record<MediaKind, TransferPolicy>> = {
  image: {
    maxAttempts: 2,
    connectTimeoutMs: 10_000,
    idleTimeoutMs: 30_000,
    totalTimeoutMs: 60_000,
  },
  video: {
    maxAttempts: 3,
    connectTimeoutMs: 15_000,
    idleTimeoutMs: 60_000,
    totalTimeoutMs: 300_000,
  },
};

const VIDEO_EXTENSIONS = new Set(['mp4', 'mov', 'webm']);

const MIME_TYPES: Record<string, string> = {
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  png: 'image/png',
  webp: 'image/webp',
  mp4: 'video/mp4',
  mov: 'video/quicktime',
  webm: 'video/webm',
};

export function classifyMedia(path: string): MediaKind {
  return VIDEO_EXTENSIONS.has(getExtension(path)) ? 'video' : 'image';
}

export function getTransferPolicy(kind: MediaKind): TransferPolicy {
  return TRANSFER_POLICIES[kind];
}

export function getMimeType(path: string): string {
  return MIME_TYPES[getExtension(path)] ?? 'application/octet-stream';
}

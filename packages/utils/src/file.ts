/**
 * File Operations
 */

import { stat } from 'node:fs/promises';

/**
 * Check whether an error is a missing-path error from node:fs
 */
export function isMissingPathError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return false;
  }
  const code = error.code;
  return code === 'ENOENT' || code === 'ENOTDIR';
}

/**
 * Size of a regular file, or 0 when it is missing, unreadable or not a file
 */
export async function safeFileSize(filePath: string): Promise<number> {
  try {
    const stats = await stat(filePath);
    return stats.isFile() ? stats.size : 0;
  } catch {
    return 0;
  }
}

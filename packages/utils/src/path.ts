/**
 * Path Utilities
 */

import { extname } from 'node:path';

/**
 * Get file extension (lowercase, without dot)
 */
export function getExtension(filename: string): string {
  const ext = extname(filename);
  return ext.toLowerCase().replace(/^\./, '');
}

/**
 * Whether `name` is exactly `length` ASCII digits
 */
export function isDigits(name: string, length: number): boolean {
  return name.length === length && /^[0-9]+$/.test(name);
}

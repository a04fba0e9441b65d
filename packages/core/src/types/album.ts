/**
 * Album Types
 */

/**
 * One item of the capture album, `<root>/<year>/<month>/<day>/<filename>`.
 * Items order by `path` alone.
 */
export interface AlbumPath {
  readonly year: string;
  readonly month: string;
  readonly day: string;
  readonly filename: string;
  readonly path: string;
}

export interface HierarchyEntry {
  name: string;
  path: string;
}

export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

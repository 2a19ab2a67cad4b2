/**
 * Success/failure value returned by operations whose failures the caller
 * decides how to treat (fatal for the latest snapshot, absorbed for a
 * historical day).
 */

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

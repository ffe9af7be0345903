/**
 * Outcome of a host-facing operation that can fail at run time
 */
export type Result<T, E extends Error = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value };
}

export function err<E extends Error>(error: E): { readonly ok: false; readonly error: E } {
  return { ok: false, error };
}

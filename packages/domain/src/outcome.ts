/**
 * Result of an operation whose failures are part of its contract
 * (validation, not-found, conflict). Unexpected failures are still thrown.
 */
export type Outcome<T, E extends Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function succeed<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value };
}

export function fail<E extends Error>(error: E): { readonly ok: false; readonly error: E } {
  return { ok: false, error };
}

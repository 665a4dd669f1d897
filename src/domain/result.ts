/**
 * Outcome of a fallible operation that must not throw.
 *
 * Network calls return this instead of rejecting so callers decide,
 * visibly, whether a failure is surfaced or discarded.
 */
export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

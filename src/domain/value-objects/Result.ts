/**
 * Explicit success/failure value returned across the RPC boundary
 */

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function resultOf<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function resultOfErr<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Outcome of an operation that can fail in an expected way. Store, manager and adapter
 * methods return these instead of throwing.
 */

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E }

export function Ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function Err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}

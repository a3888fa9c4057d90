/**
 * Result type for rule checks and other expected failures.
 *
 * Illegal moves and undecodable messages are ordinary outcomes, not
 * exceptions: they come back as `{ ok: false, error }` and the caller
 * narrows on `ok`. Exceptions stay reserved for bugs.
 *
 * @example
 * ```ts
 * const result = proposeMove(world, move);
 * if (!result.ok) {
 *   showRejection(result.error.reason);
 * }
 * ```
 */

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

/** Transform the success value, passing failures through. */
export function mapResult<T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => U,
): Result<U, E> {
  return result.ok ? ok(fn(result.value)) : result;
}

/** Chain a fallible step onto a success value. */
export function andThen<T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, E>,
): Result<U, E> {
  return result.ok ? fn(result.value) : result;
}

/**
 * Unwrap the success value.
 *
 * @throws The error (wrapped in an Error if it is not one) on failure.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value;
  const { error } = result;
  throw error instanceof Error ? error : new Error(describeError(error));
}

function describeError(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}

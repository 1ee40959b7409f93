/**
 * Result type for functional error handling
 *
 * Fallible operations across binembed return a Result instead of throwing,
 * so callers decide how a failure is reported.
 */

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export const ok = <T, E>(value: T): Result<T, E> => ({
  ok: true,
  value,
});

export const error = <T, E>(error: E): Result<T, E> => ({
  ok: false,
  error,
});

export const map = <T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => U
): Result<U, E> => (result.ok ? ok(fn(result.value)) : result);

export const flatMap = <T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, E>
): Result<U, E> => (result.ok ? fn(result.value) : result);

/**
 * Outcome of an operation that can fail in an expected way. Callers branch
 * on `kind` (or the guards below) instead of catching.
 */

export type Ok<T> = {
  readonly kind: "ok";
  readonly value: T;
};

export type Err<E> = {
  readonly kind: "err";
  readonly error: E;
};

export type Result<T, E> = Ok<T> | Err<E>;

export const ok = <T>(value: T): Ok<T> => ({ kind: "ok", value });

export const err = <E>(error: E): Err<E> => ({ kind: "err", error });

export const isOk = <T, E>(result: Result<T, E>): result is Ok<T> =>
  result.kind === "ok";

export const isErr = <T, E>(result: Result<T, E>): result is Err<E> =>
  result.kind === "err";

/**
 * Returns the value, throwing if the result is an `Err`. Meant for tests
 * and for values already known to be valid.
 */
export const unwrap = <T, E>(result: Result<T, E>): T => {
  if (isOk(result)) {
    return result.value;
  }
  throw new Error(`Attempted to unwrap an Err: ${String(result.error)}`);
};

export const map = <T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => U,
): Result<U, E> => (isOk(result) ? ok(fn(result.value)) : result);

export const mapErr = <T, E, F>(
  result: Result<T, E>,
  fn: (error: E) => F,
): Result<T, F> => (isErr(result) ? err(fn(result.error)) : result);

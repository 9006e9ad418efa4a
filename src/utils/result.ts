/**
 * Typed result for operations that can fail.
 *
 * Role in system:
 * - Repositories, ports and services return `Result` instead of throwing, so a
 *   single failed request never takes the process down.
 * - `Ok(null)` means "no data"; `Err(error)` means "the operation failed".
 *
 * Contract:
 * - `Err.unwrap()` does not throw. It logs a warning and yields `undefined`, so
 *   callers check `isOk()`/`isErr()` before unwrapping.
 * - Inside a unit of work, `unwrapOrThrow` turns an `Err` back into a throw so
 *   the transaction aborts.
 *
 * ```ts
 * const res = await repoCall();
 * if (res.isErr()) return ErrResult(res.error);
 * const value = res.unwrap();
 * ```
 */
export type Result<T, E = Error> = Ok<T, E> | Err<T, E>;

export class Ok<T, E> {
  readonly ok = true;
  readonly err = false;

  constructor(public readonly value: T) {}

  isOk(): this is Ok<T, E> {
    return true;
  }

  isErr(): this is Err<T, E> {
    return false;
  }

  unwrap(): T {
    return this.value;
  }

  unwrapOr(_default: T): T {
    return this.value;
  }

  map<U>(fn: (value: T) => U): Result<U, E> {
    return new Ok<U, E>(fn(this.value));
  }
}

export class Err<T, E> {
  readonly ok = false;
  readonly err = true;

  constructor(public readonly error: E) {}

  isOk(): this is Ok<T, E> {
    return false;
  }

  isErr(): this is Err<T, E> {
    return true;
  }

  /**
   * Logs and returns `undefined`; see the module contract.
   */
  unwrap(): undefined {
    console.warn("Result.unwrap called on Err; returning undefined.", this.error);
    return undefined;
  }

  unwrapOr(defaultValue: T): T {
    return defaultValue;
  }

  map<U>(_fn: (value: T) => U): Result<U, E> {
    return new Err<U, E>(this.error);
  }
}

/** Successful result. */
export const OkResult = <T, E = Error>(value: T): Result<T, E> => new Ok(value);

/** Failed result. */
export const ErrResult = <T, E = Error>(error: E): Result<T, E> => new Err(error);

/**
 * Returns the value or throws the error.
 *
 * Only for code running inside a transaction callback, where throwing is how
 * the unit of work is aborted.
 */
export function unwrapOrThrow<T, E>(result: Result<T, E>): T {
  if (result.isErr()) throw result.error;
  return result.value;
}

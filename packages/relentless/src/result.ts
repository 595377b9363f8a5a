/**
 * relentless/result
 *
 * Result primitives shared by every module. Actions handed to the
 * retrier report failure by returning `err(...)` instead of throwing.
 */

// =============================================================================
// Core Result Types
// =============================================================================

/**
 * Represents a successful result.
 * Use `ok(value)` to create instances.
 */
export type Ok<T> = { ok: true; value: T };

/**
 * Represents a failed result.
 * Use `err(error)` to create instances.
 */
export type Err<E> = { ok: false; error: E };

/**
 * Represents a successful computation or a failed one.
 */
export type Result<T, E = unknown> = Ok<T> | Err<E>;

/**
 * A Promise that resolves to a Result.
 */
export type AsyncResult<T, E = unknown> = Promise<Result<T, E>>;

/**
 * A Result, or a Promise of one. This is what a retried action may return.
 */
export type MaybeAsyncResult<T, E = unknown> = Result<T, E> | Promise<Result<T, E>>;

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates a successful Result.
 *
 * @example
 * ```typescript
 * const r = ok(42);
 * // Type: Ok<number>
 * ```
 */
export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });

/**
 * Creates a failed Result.
 *
 * @example
 * ```typescript
 * const r1 = err("NOT_FOUND");
 * const r2 = err(new Error("connection refused"));
 * ```
 */
export const err = <E>(error: E): Err<E> => ({ ok: false, error });

// =============================================================================
// Type Guards
// =============================================================================

export const isOk = <T, E>(r: Result<T, E>): r is Ok<T> => r.ok;

export const isErr = <T, E>(r: Result<T, E>): r is Err<E> => !r.ok;

// =============================================================================
// Adapters
// =============================================================================

/**
 * Turn a function that throws or rejects into a Result-returning action.
 *
 * The retrier does not catch exceptions: a throwing action aborts the whole
 * call. Wrap such functions with `fromThrowable` to have their failures
 * retried like any other `err`.
 *
 * @param fn - Function to call on every attempt
 * @param onError - Maps the thrown value to the error type (defaults to identity)
 *
 * @example
 * ```typescript
 * const action = fromThrowable(() => fetch(url).then((r) => r.json()));
 * await retrier.single("fetch-config", action);
 * ```
 */
export function fromThrowable<T>(fn: () => T | Promise<T>): () => AsyncResult<T, unknown>;
export function fromThrowable<T, E>(
  fn: () => T | Promise<T>,
  onError: (thrown: unknown) => E
): () => AsyncResult<T, E>;
export function fromThrowable<T, E>(
  fn: () => T | Promise<T>,
  onError?: (thrown: unknown) => E
): () => AsyncResult<T, E | unknown> {
  return async () => {
    try {
      return ok(await fn());
    } catch (thrown) {
      return err(onError ? onError(thrown) : thrown);
    }
  };
}

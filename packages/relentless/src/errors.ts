/**
 * relentless/errors
 *
 * Tagged error types produced by the retrier, and cause-chain matching.
 *
 * Every failure the retrier reports is wrapped once per layer: the step name
 * first, then the topology ("chain" or "parallel"). The original error stays
 * reachable through `cause`, so `matchesError` can test for a sentinel
 * however deep it sits.
 *
 * @example
 * ```typescript
 * const result = await retrier.chain(loadConfig, connectDb);
 * if (!result.ok && matchesError(result.error, DB_UNAVAILABLE)) {
 *   // ...
 * }
 * ```
 */

// =============================================================================
// Helpers
// =============================================================================

/**
 * Render any error value for use inside a message.
 */
export function describeError(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (typeof value === "string") return value;
  if (typeof value === "object" && value !== null) {
    try {
      return JSON.stringify(value);
    } catch {
      return String(value);
    }
  }
  return String(value);
}

function causeOf(value: unknown): unknown {
  if (typeof value === "object" && value !== null && "cause" in value) {
    return value.cause;
  }
  return undefined;
}

/**
 * Iterate an error and every value reachable through its `cause` links,
 * outermost first. Stops on cycles.
 */
export function* causeChain(error: unknown): Generator<unknown> {
  const seen = new Set<unknown>();
  let current: unknown = error;
  while (current !== undefined && !seen.has(current)) {
    seen.add(current);
    yield current;
    current = causeOf(current);
  }
}

/**
 * Whether `error` is `target`, or wraps it anywhere in its cause chain.
 * Comparison is by identity (`Object.is`), never by message.
 */
export function matchesError(error: unknown, target: unknown): boolean {
  for (const link of causeChain(error)) {
    if (Object.is(link, target)) return true;
  }
  return false;
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * A step failed: either its attempts ran out or it hit a fatal error.
 * `error` (also `cause`) is the last error the action returned.
 */
export class StepError<E = unknown> extends Error {
  readonly _tag = "StepError" as const;
  /** Name of the step that failed */
  readonly step: string;
  /** Number of times the action was invoked */
  readonly attempts: number;
  /** True when retrying stopped on a fatal error */
  readonly fatal: boolean;
  /** The last error returned by the action */
  readonly error: E;
  declare readonly cause: E;

  constructor(props: { step: string; attempts: number; fatal: boolean; error: E }) {
    super(`${props.step}: ${describeError(props.error)}`, { cause: props.error });
    this.name = "StepError";
    this.step = props.step;
    this.attempts = props.attempts;
    this.fatal = props.fatal;
    this.error = props.error;
  }
}

/**
 * A chain stopped at a failing step. Later steps never ran.
 */
export class ChainError<E = unknown> extends Error {
  readonly _tag = "ChainError" as const;
  declare readonly cause: StepError<E>;

  constructor(cause: StepError<E>) {
    super(`chain: ${cause.message}`, { cause });
    this.name = "ChainError";
  }
}

/**
 * At least one step of a parallel run failed.
 * `cause` is the first failure to complete; `errors` holds all of them in
 * completion order.
 */
export class ParallelError<E = unknown> extends Error {
  readonly _tag = "ParallelError" as const;
  declare readonly cause: StepError<E>;
  readonly errors: readonly StepError<E>[];

  constructor(errors: readonly [StepError<E>, ...StepError<E>[]]) {
    super(`parallel: ${errors[0].message}`, { cause: errors[0] });
    this.name = "ParallelError";
    this.errors = errors;
  }
}

/**
 * Union of the error types the retrier returns.
 */
export type RetryError<E = unknown> = StepError<E> | ChainError<E> | ParallelError<E>;

// =============================================================================
// Type Guards
// =============================================================================

export const isStepError = (e: unknown): e is StepError =>
  e instanceof StepError;

export const isChainError = (e: unknown): e is ChainError =>
  e instanceof ChainError;

export const isParallelError = (e: unknown): e is ParallelError =>
  e instanceof ParallelError;

export const isRetryError = (e: unknown): e is RetryError =>
  isStepError(e) || isChainError(e) || isParallelError(e);

/**
 * Failure reporting for verbose policies, and the event stream emitted by
 * the retrier.
 */

import { describeError } from "./errors";

// =============================================================================
// Failure Records
// =============================================================================

/**
 * One failed attempt, as handed to the logger when the policy is verbose.
 */
export interface FailureRecord {
  /** Step name */
  step: string;
  /** Zero-based attempt index */
  attempt: number;
  /** Error the action returned */
  error: unknown;
}

/**
 * Log sink. Receives failure records; its return value is ignored.
 */
export type RetryLogger = (record: FailureRecord) => void;

/**
 * Human-readable line for a failure record.
 *
 * @example
 * ```typescript
 * formatFailure({ step: "fetch", attempt: 2, error: new Error("timeout") });
 * // "step fetch:2 err: timeout"
 * ```
 */
export function formatFailure(record: FailureRecord): string {
  return `step ${record.step}:${record.attempt} err: ${describeError(record.error)}`;
}

/**
 * Default logger: one line per failed attempt on stderr.
 */
export const consoleLogger: RetryLogger = (record) => {
  console.warn(formatFailure(record));
};

// =============================================================================
// Events
// =============================================================================

/**
 * Events emitted while a step is being retried. Attempt numbers are
 * 1-based here, matching the count of invocations so far.
 */
export type RetryEvent<E = unknown> =
  | { type: "step_start"; step: string; ts: number }
  | { type: "attempt_failed"; step: string; ts: number; attempt: number; error: E; fatal: boolean }
  | { type: "step_retry"; step: string; ts: number; attempt: number; maxAttempts: number; delayMs: number }
  | { type: "step_success"; step: string; ts: number; attempts: number; durationMs: number }
  | { type: "step_error"; step: string; ts: number; attempts: number; fatal: boolean; error: E; durationMs: number };

export type RetryEventHandler<E = unknown> = (event: RetryEvent<E>) => void;

/**
 * Call a user-supplied hook. A hook that throws must not break the retry
 * loop, so the exception is reported and dropped.
 */
export function callHook<A>(label: string, hook: (arg: A) => void, arg: A): void {
  try {
    hook(arg);
  } catch (error) {
    console.warn(`relentless: ${label} threw: ${describeError(error)}`);
  }
}

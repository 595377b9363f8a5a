/**
 * relentless
 *
 * Retry orchestration with typed results: run a fallible step, a chain of
 * steps, or a bounded fan-out of steps under one retry policy.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createRetrier, createPolicy, count, sleep, mode, fatal, ok, err } from 'relentless';
 *
 * const retrier = createRetrier(
 *   createPolicy(count(4), sleep("250ms"), mode("fibonacci"), fatal(INVALID_CREDENTIALS))
 * );
 *
 * const result = await retrier.single("login", async () => {
 *   const session = await tryLogin();
 *   return session ? ok(session) : err(LOGIN_FAILED);
 * });
 * ```
 */

// =============================================================================
// Result
// =============================================================================
export {
  type Ok,
  type Err,
  type Result,
  type AsyncResult,
  type MaybeAsyncResult,
  ok,
  err,
  isOk,
  isErr,
  fromThrowable,
} from "./result";

// =============================================================================
// Duration
// =============================================================================
export {
  type Duration,
  type DurationInput,
  millis,
  seconds,
  minutes,
  hours,
  isDuration,
  parseDuration,
  toMillis,
} from "./duration";

// =============================================================================
// Errors
// =============================================================================
export {
  type RetryError,
  StepError,
  ChainError,
  ParallelError,
  isStepError,
  isChainError,
  isParallelError,
  isRetryError,
  matchesError,
  causeChain,
  describeError,
} from "./errors";

// =============================================================================
// Policy
// =============================================================================
export {
  type Policy,
  type PolicyDraft,
  type PolicyOption,
  type PolicyConfig,
  Strategy,
  MIN_ATTEMPTS,
  MIN_SLEEP,
  count,
  sleep,
  jitter,
  mode,
  parallelism,
  verbose,
  fatal,
  validate,
  isStrategy,
  createPolicy,
  policyFromConfig,
  policyPresets,
  fibonacci,
  delay,
  isFatal,
} from "./policy";

// =============================================================================
// Concurrency
// =============================================================================
export {
  type ConcurrencyLimiterConfig,
  type ConcurrencyLimiterStats,
  type ConcurrencyLimiter,
  createConcurrencyLimiter,
} from "./limiter";

// =============================================================================
// Logging
// =============================================================================
export {
  type FailureRecord,
  type RetryLogger,
  type RetryEvent,
  type RetryEventHandler,
  formatFailure,
  consoleLogger,
} from "./logging";

// =============================================================================
// Retrier
// =============================================================================
export {
  type Step,
  type RetrierOptions,
  type Retrier,
  MAX_TIMER_DELAY,
  step,
  createRetrier,
} from "./retry";

/**
 * relentless/retry
 *
 * The retrier runs named steps under a policy, in one of three shapes:
 *
 * - `single`: one step, retried until it succeeds, runs out of attempts,
 *   or returns a fatal error.
 * - `chain`: steps one after another; the first step that fails for good
 *   stops the chain.
 * - `parallel`: all steps at once (up to the policy's parallelism); every
 *   step runs to the end, even when a sibling has already failed.
 *
 * Steps report failure by returning `err(...)`. An action that throws or
 * rejects is not retried: the exception propagates to the caller.
 *
 * @example
 * ```typescript
 * import { createRetrier, createPolicy, count, sleep, mode, step } from 'relentless';
 *
 * const retrier = createRetrier(
 *   createPolicy(count(3), sleep("100ms"), mode("exponential"))
 * );
 *
 * const result = await retrier.parallel(
 *   step("cache", connectCache),
 *   step("queue", connectQueue),
 * );
 *
 * if (!result.ok) {
 *   console.error(result.error.message); // e.g. "parallel: queue: ECONNREFUSED"
 * }
 * ```
 */

import { ok, err, type AsyncResult, type MaybeAsyncResult } from "./result";
import { StepError, ChainError, ParallelError } from "./errors";
import { delay, isFatal, type Policy } from "./policy";
import { createConcurrencyLimiter } from "./limiter";
import {
  callHook,
  consoleLogger,
  type RetryEvent,
  type RetryEventHandler,
  type RetryLogger,
} from "./logging";

// =============================================================================
// Types
// =============================================================================

/**
 * A named, re-invocable action.
 */
export interface Step<T = unknown, E = unknown> {
  /** Used in error messages and log records */
  name: string;
  /** Called once per attempt */
  run: () => MaybeAsyncResult<T, E>;
}

/**
 * Pair a name with an action.
 */
export const step = <T, E>(name: string, run: () => MaybeAsyncResult<T, E>): Step<T, E> => ({
  name,
  run,
});

/**
 * Options for the retrier itself (as opposed to the policy it applies).
 */
export interface RetrierOptions {
  /**
   * Receives a record for every failed attempt when the policy is verbose.
   * @default consoleLogger
   */
  logger?: RetryLogger;

  /**
   * Receives lifecycle events for every step, regardless of verbosity.
   */
  onEvent?: RetryEventHandler;

  /**
   * Waits between attempts.
   * @default setTimeout-based sleep, capped at MAX_TIMER_DELAY
   */
  sleep?: (ms: number) => Promise<void>;
}

export interface Retrier {
  /** The policy this retrier applies */
  readonly policy: Policy;

  /**
   * Run one action until it succeeds, exhausts the policy's attempts, or
   * returns a fatal error.
   */
  single<T, E>(name: string, action: () => MaybeAsyncResult<T, E>): AsyncResult<T, StepError<E>>;

  /**
   * Run steps in order, stopping at the first step that fails for good.
   */
  chain<E>(...steps: Step<unknown, E>[]): AsyncResult<void, ChainError<E>>;

  /**
   * Run steps concurrently and wait for all of them. Fails with the first
   * step failure to complete.
   */
  parallel<E>(...steps: Step<unknown, E>[]): AsyncResult<void, ParallelError<E>>;
}

// =============================================================================
// Sleep
// =============================================================================

/**
 * Longest delay a Node timer honours; longer ones fire immediately.
 */
export const MAX_TIMER_DELAY = 2_147_483_647;

function timerSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.min(ms, MAX_TIMER_DELAY)));
}

// =============================================================================
// Retrier
// =============================================================================

/**
 * Create a retrier for a policy. The retrier holds no per-call state, so a
 * single instance can serve any number of concurrent calls.
 */
export function createRetrier(policy: Policy, options: RetrierOptions = {}): Retrier {
  const { logger = consoleLogger, onEvent, sleep = timerSleep } = options;

  const emit = (event: RetryEvent): void => {
    if (onEvent) {
      callHook("onEvent", onEvent, event);
    }
  };

  async function single<T, E>(
    name: string,
    action: () => MaybeAsyncResult<T, E>
  ): AsyncResult<T, StepError<E>> {
    const startTime = performance.now();
    emit({ type: "step_start", step: name, ts: Date.now() });

    for (let attempt = 0; ; attempt++) {
      const result = await action();
      const tries = attempt + 1;

      if (result.ok) {
        emit({
          type: "step_success",
          step: name,
          ts: Date.now(),
          attempts: tries,
          durationMs: performance.now() - startTime,
        });
        return ok(result.value);
      }

      const fatal = isFatal(policy, result.error);
      emit({
        type: "attempt_failed",
        step: name,
        ts: Date.now(),
        attempt: tries,
        error: result.error,
        fatal,
      });

      // Fatal failures are not logged.
      if (!fatal && policy.verbose) {
        callHook("logger", logger, { step: name, attempt, error: result.error });
      }

      if (fatal || tries >= policy.attempts) {
        emit({
          type: "step_error",
          step: name,
          ts: Date.now(),
          attempts: tries,
          fatal,
          error: result.error,
          durationMs: performance.now() - startTime,
        });
        return err(new StepError({ step: name, attempts: tries, fatal, error: result.error }));
      }

      const delayMs = delay(policy, tries);
      emit({
        type: "step_retry",
        step: name,
        ts: Date.now(),
        attempt: tries + 1,
        maxAttempts: policy.attempts,
        delayMs,
      });
      await sleep(delayMs);
    }
  }

  async function chain<E>(...steps: Step<unknown, E>[]): AsyncResult<void, ChainError<E>> {
    for (const { name, run } of steps) {
      const result = await single(name, run);
      if (!result.ok) {
        return err(new ChainError(result.error));
      }
    }
    return ok(undefined);
  }

  async function parallel<E>(...steps: Step<unknown, E>[]): AsyncResult<void, ParallelError<E>> {
    if (steps.length === 0) {
      return ok(undefined);
    }

    const limiter = createConcurrencyLimiter("parallel", {
      maxConcurrent: policy.parallelism > 0 ? policy.parallelism : Infinity,
    });

    // Both lists fill in completion order.
    const failures: StepError<E>[] = [];
    const thrown: Array<{ reason: unknown }> = [];

    await Promise.all(
      steps.map(({ name, run }) =>
        limiter.execute(() => single(name, run)).then(
          (result) => {
            if (!result.ok) failures.push(result.error);
          },
          (reason: unknown) => {
            thrown.push({ reason });
          }
        )
      )
    );

    if (thrown.length > 0) {
      throw thrown[0].reason;
    }

    const [first, ...rest] = failures;
    if (first) {
      return err(new ParallelError([first, ...rest]));
    }
    return ok(undefined);
  }

  return { policy, single, chain, parallel };
}

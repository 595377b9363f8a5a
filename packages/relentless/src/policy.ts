/**
 * relentless/policy
 *
 * Retry policy: how many times to try, how long to wait in between, which
 * errors end retrying early, and how many steps may run at once.
 *
 * A policy is built from option functions applied in order, then validated.
 * Validation clamps bad values to safe minimums instead of throwing, so
 * `createPolicy` always returns something usable. The result is frozen and
 * can be shared between any number of concurrent calls.
 *
 * @example
 * ```typescript
 * import { createPolicy, count, sleep, mode, fatal } from 'relentless';
 *
 * const policy = createPolicy(
 *   count(5),
 *   sleep("200ms"),
 *   mode("exponential"),
 *   fatal(AUTH_REJECTED),
 * );
 *
 * delay(policy, 1); // 400
 * delay(policy, 2); // 800
 * ```
 */

import { toMillis, type DurationInput } from "./duration";
import { matchesError } from "./errors";

// =============================================================================
// Types
// =============================================================================

/**
 * Backoff strategy: how the delay grows with the attempt number.
 * - 'simple': sleep + jitter * attempt
 * - 'linear': sleep * attempt + jitter
 * - 'exponential': sleep * 2^attempt + jitter
 * - 'fibonacci': sleep * fib(attempt) + jitter
 */
export type Strategy = "simple" | "linear" | "exponential" | "fibonacci";

/** Named strategy constants, for callers who prefer them to string literals. */
export const Strategy = {
  Simple: "simple",
  Linear: "linear",
  Exponential: "exponential",
  Fibonacci: "fibonacci",
} as const satisfies Record<string, Strategy>;

/**
 * A validated retry policy. Never mutated after `createPolicy` returns it.
 */
export interface Policy {
  /** Total number of tries per step, including the first one. Always >= 1. */
  readonly attempts: number;
  /** Base delay in milliseconds. Always > 0. */
  readonly sleep: number;
  /** Jitter in milliseconds. Always >= 0. */
  readonly jitter: number;
  readonly strategy: Strategy;
  /** Max steps running at once in `parallel`; 0 means no limit. */
  readonly parallelism: number;
  /** Report each failed attempt to the retrier's logger. */
  readonly verbose: boolean;
  /** Sentinel errors that stop retrying as soon as they are seen. */
  readonly fatal: readonly unknown[];
}

/**
 * Mutable draft the options write to before validation.
 */
export interface PolicyDraft {
  attempts: number;
  sleep: number;
  jitter: number;
  strategy: Strategy;
  parallelism: number;
  verbose: boolean;
  fatal: unknown[];
}

/**
 * An option sets exactly one field of the draft.
 */
export type PolicyOption = (draft: PolicyDraft) => void;

/**
 * Plain-object form of a policy, for configuration loaded from elsewhere.
 */
export interface PolicyConfig {
  attempts?: number;
  sleep?: DurationInput;
  jitter?: DurationInput;
  strategy?: Strategy;
  parallelism?: number;
  verbose?: boolean;
  fatal?: readonly unknown[];
}

// =============================================================================
// Constants
// =============================================================================

/** Fewest attempts a policy can have. */
export const MIN_ATTEMPTS = 1;

/** Base delay used when none (or a non-positive one) is given. */
export const MIN_SLEEP = 500;

/** Smallest allowed jitter and parallelism. */
const MIN_JITTER = 0;
const MIN_PARALLELISM = 0;

// =============================================================================
// Options
// =============================================================================

/** Set the total number of attempts per step. */
export const count =
  (n: number): PolicyOption =>
  (draft) => {
    draft.attempts = n;
  };

/** Set the base delay between attempts. */
export const sleep =
  (d: DurationInput): PolicyOption =>
  (draft) => {
    draft.sleep = toMillis(d);
  };

/**
 * Set the jitter. Its effect depends on the strategy: with 'simple' every
 * attempt waits sleep + jitter * attempt, otherwise jitter is a flat addend.
 */
export const jitter =
  (d: DurationInput): PolicyOption =>
  (draft) => {
    draft.jitter = toMillis(d);
  };

/** Select the backoff strategy. */
export const mode =
  (strategy: Strategy): PolicyOption =>
  (draft) => {
    draft.strategy = strategy;
  };

/** Cap the number of steps `parallel` runs at once. 0 (default) is no cap. */
export const parallelism =
  (n: number): PolicyOption =>
  (draft) => {
    draft.parallelism = n;
  };

/** Report every failed attempt to the logger. */
export const verbose =
  (flag = true): PolicyOption =>
  (draft) => {
    draft.verbose = flag;
  };

/** Register fatal sentinels. Repeated calls add to the set. */
export const fatal =
  (...errors: unknown[]): PolicyOption =>
  (draft) => {
    for (const error of errors) {
      if (!draft.fatal.some((known) => Object.is(known, error))) {
        draft.fatal.push(error);
      }
    }
  };

// =============================================================================
// Construction
// =============================================================================

const STRATEGIES: readonly Strategy[] = Object.values(Strategy);

export function isStrategy(value: unknown): value is Strategy {
  return STRATEGIES.some((strategy) => strategy === value);
}

function validCount(n: number, min: number): number {
  const whole = Math.trunc(n);
  return Number.isNaN(whole) || whole < min ? min : whole;
}

/**
 * Clamp every field of a draft into its valid range.
 */
export function validate(draft: PolicyDraft): Policy {
  return Object.freeze({
    attempts: validCount(draft.attempts, MIN_ATTEMPTS),
    sleep: !(draft.sleep > 0) ? MIN_SLEEP : draft.sleep,
    jitter: !(draft.jitter >= MIN_JITTER) ? MIN_JITTER : draft.jitter,
    // Config loaded at run time can carry any string.
    strategy: isStrategy(draft.strategy) ? draft.strategy : Strategy.Simple,
    parallelism: validCount(draft.parallelism, MIN_PARALLELISM),
    verbose: draft.verbose,
    fatal: Object.freeze([...draft.fatal]),
  });
}

/**
 * Build a policy from options. With no options: one attempt, 500ms sleep,
 * no jitter, simple strategy, unlimited parallelism.
 */
export function createPolicy(...options: PolicyOption[]): Policy {
  const draft: PolicyDraft = {
    attempts: 0,
    sleep: 0,
    jitter: 0,
    strategy: "simple",
    parallelism: 0,
    verbose: false,
    fatal: [],
  };

  for (const option of options) {
    option(draft);
  }

  return validate(draft);
}

/**
 * Build a policy from a plain configuration object.
 */
export function policyFromConfig(config: PolicyConfig): Policy {
  const options: PolicyOption[] = [];
  if (config.attempts !== undefined) options.push(count(config.attempts));
  if (config.sleep !== undefined) options.push(sleep(config.sleep));
  if (config.jitter !== undefined) options.push(jitter(config.jitter));
  if (config.strategy !== undefined) options.push(mode(config.strategy));
  if (config.parallelism !== undefined) options.push(parallelism(config.parallelism));
  if (config.verbose !== undefined) options.push(verbose(config.verbose));
  if (config.fatal !== undefined) options.push(fatal(...config.fatal));
  return createPolicy(...options);
}

/**
 * Ready-made configurations.
 */
export const policyPresets = {
  /** One try, no retries */
  none: { attempts: 1 },
  /** Short-lived blips: 3 tries, 100ms apart */
  quick: { attempts: 3, sleep: 100, strategy: "simple" },
  /** General purpose: 5 tries, doubling from 200ms */
  standard: { attempts: 5, sleep: 100, strategy: "exponential" },
  /** Slow dependencies: 8 tries on a Fibonacci schedule from 1s */
  patient: { attempts: 8, sleep: 1000, jitter: 250, strategy: "fibonacci" },
} as const satisfies Record<string, PolicyConfig>;

// =============================================================================
// Delay
// =============================================================================

/** 2^n, exact for any n. */
function pow2(n: number): bigint {
  return 1n << BigInt(n);
}

/** nth Fibonacci number, iteratively. */
export function fibonacci(n: number): bigint {
  let a = 0n;
  let b = 1n;
  for (let i = 0; i < n; i++) {
    [a, b] = [b, a + b];
  }
  return a;
}

/**
 * Delay in milliseconds to wait after the given attempt number.
 * Pure: the same policy and attempt always give the same delay.
 */
export function delay(policy: Policy, attempt: number): number {
  const n = Math.max(0, Math.trunc(attempt));

  switch (policy.strategy) {
    case "linear":
      return policy.sleep * n + policy.jitter;
    case "exponential":
      return policy.sleep * Number(pow2(n)) + policy.jitter;
    case "fibonacci":
      return policy.sleep * Number(fibonacci(n)) + policy.jitter;
    case "simple":
      return policy.sleep + policy.jitter * n;
  }
}

// =============================================================================
// Fatal Classification
// =============================================================================

/**
 * Whether the error is, or wraps, one of the policy's fatal sentinels.
 */
export function isFatal(policy: Policy, error: unknown): boolean {
  return policy.fatal.some((sentinel) => matchesError(error, sentinel));
}

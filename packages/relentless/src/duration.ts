/**
 * relentless/duration
 *
 * Durations are plain milliseconds internally. Options accept a number of
 * milliseconds, a string such as "250ms", "1.5s" or "-1h", or a Duration
 * object built with the helpers below.
 *
 * @example
 * ```typescript
 * createPolicy(sleep("500ms"), jitter(seconds(1)));
 * ```
 */

/** Duration object with tagged type for type safety */
export type Duration = { readonly _tag: "Duration"; readonly millis: number };

/** Anything an option accepting a duration will take */
export type DurationInput = number | string | Duration;

const UNIT_MILLIS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
};

export const millis = (ms: number): Duration => ({ _tag: "Duration", millis: ms });
export const seconds = (s: number): Duration => millis(s * UNIT_MILLIS.s);
export const minutes = (m: number): Duration => millis(m * UNIT_MILLIS.m);
export const hours = (h: number): Duration => millis(h * UNIT_MILLIS.h);

export function isDuration(value: unknown): value is Duration {
  return (
    typeof value === "object" &&
    value !== null &&
    "_tag" in value &&
    value._tag === "Duration" &&
    "millis" in value &&
    typeof value.millis === "number"
  );
}

/**
 * Parse a duration string like "100ms", "5s", "-2m", "1h", "1d".
 * Returns undefined when the string is not a duration.
 */
export function parseDuration(input: string): Duration | undefined {
  const match = input.trim().match(/^(-?\d+(?:\.\d+)?)\s*(ms|s|m|h|d)$/i);
  if (!match) return undefined;
  const value = parseFloat(match[1]);
  const unit = match[2].toLowerCase();
  return millis(value * (UNIT_MILLIS[unit] ?? 1));
}

/**
 * Convert any duration input to milliseconds.
 * Unparseable strings become NaN, which policy validation treats as invalid.
 */
export function toMillis(input: DurationInput): number {
  if (typeof input === "number") return input;
  if (typeof input === "string") return parseDuration(input)?.millis ?? Number.NaN;
  return input.millis;
}

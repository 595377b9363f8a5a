/**
 * Tests for errors.ts - wrapping layers and cause-chain matching
 */
import { describe, it, expect } from "vitest";
import {
  StepError,
  ChainError,
  ParallelError,
  describeError,
  causeChain,
  matchesError,
  isStepError,
  isChainError,
  isParallelError,
  isRetryError,
} from "./errors";

const TIMEOUT = new Error("timeout");

const stepError = (step: string, error: unknown = TIMEOUT) =>
  new StepError({ step, attempts: 3, fatal: false, error });

describe("describeError", () => {
  it("uses the message of Error instances", () => {
    expect(describeError(new TypeError("bad input"))).toBe("bad input");
  });

  it("passes strings through", () => {
    expect(describeError("NOT_FOUND")).toBe("NOT_FOUND");
  });

  it("serializes plain objects", () => {
    expect(describeError({ type: "QUEUE_FULL", size: 3 })).toBe('{"type":"QUEUE_FULL","size":3}');
  });

  it("falls back to String() for circular objects", () => {
    const circular: Record<string, unknown> = {};
    circular.self = circular;
    expect(describeError(circular)).toBe("[object Object]");
  });

  it("stringifies primitives", () => {
    expect(describeError(42)).toBe("42");
    expect(describeError(undefined)).toBe("undefined");
  });
});

describe("StepError", () => {
  it("prefixes the message with the step name", () => {
    const error = stepError("fetch-user");

    expect(error.message).toBe("fetch-user: timeout");
    expect(error.name).toBe("StepError");
    expect(error._tag).toBe("StepError");
  });

  it("keeps the original error as error and cause", () => {
    const error = new StepError({ step: "login", attempts: 1, fatal: true, error: "DENIED" });

    expect(error.error).toBe("DENIED");
    expect(error.cause).toBe("DENIED");
    expect(error.attempts).toBe(1);
    expect(error.fatal).toBe(true);
  });

  it("is an Error", () => {
    expect(stepError("x") instanceof Error).toBe(true);
  });
});

describe("ChainError", () => {
  it("tags the step error with 'chain'", () => {
    const inner = stepError("migrate");
    const error = new ChainError(inner);

    expect(error.message).toBe("chain: migrate: timeout");
    expect(error.cause).toBe(inner);
    expect(error._tag).toBe("ChainError");
  });
});

describe("ParallelError", () => {
  it("uses the first failure as cause and keeps all of them", () => {
    const first = stepError("cache");
    const second = stepError("queue", "ECONNREFUSED");
    const error = new ParallelError([first, second]);

    expect(error.message).toBe("parallel: cache: timeout");
    expect(error.cause).toBe(first);
    expect(error.errors).toHaveLength(2);
    expect(error.errors[1]).toBe(second);
  });
});

describe("causeChain", () => {
  it("walks from the outermost error inwards", () => {
    const inner = stepError("migrate");
    const outer = new ChainError(inner);

    const links = [...causeChain(outer)];

    expect(links).toHaveLength(3);
    expect(links[0]).toBe(outer);
    expect(links[1]).toBe(inner);
    expect(links[2]).toBe(TIMEOUT);
  });

  it("stops on cycles", () => {
    const a = new Error("a");
    const b = new Error("b", { cause: a });
    a.cause = b;

    const links = [...causeChain(b)];

    expect(links).toHaveLength(2);
    expect(links[0]).toBe(b);
    expect(links[1]).toBe(a);
  });
});

describe("matchesError", () => {
  it("finds a sentinel through every wrapping layer", () => {
    const error = new ParallelError([stepError("queue")]);
    expect(matchesError(error, TIMEOUT)).toBe(true);
  });

  it("compares by identity, not message", () => {
    expect(matchesError(stepError("queue"), new Error("timeout"))).toBe(false);
  });

  it("matches primitive sentinels", () => {
    expect(matchesError(stepError("queue", "EAGAIN"), "EAGAIN")).toBe(true);
    expect(matchesError("EAGAIN", "EAGAIN")).toBe(true);
    expect(matchesError("EAGAIN", "EBUSY")).toBe(false);
  });
});

describe("type guards", () => {
  it("recognize each layer", () => {
    const step = stepError("a");
    const chain = new ChainError(step);
    const parallel = new ParallelError([step]);

    expect(isStepError(step)).toBe(true);
    expect(isChainError(step)).toBe(false);
    expect(isChainError(chain)).toBe(true);
    expect(isParallelError(parallel)).toBe(true);
    expect(isRetryError(parallel)).toBe(true);
    expect(isRetryError(new Error("plain"))).toBe(false);
    expect(isRetryError({ _tag: "StepError" })).toBe(false);
  });
});

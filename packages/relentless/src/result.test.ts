import { describe, it, expect } from "vitest";
import { ok, err, isOk, isErr, fromThrowable } from "./result";

describe("Result", () => {
  it("creates and narrows successes and failures", () => {
    const success = ok(42);
    const failure = err("NOT_FOUND");

    expect(success).toEqual({ ok: true, value: 42 });
    expect(failure).toEqual({ ok: false, error: "NOT_FOUND" });
    expect(isOk(success)).toBe(true);
    expect(isErr(success)).toBe(false);
    expect(isErr(failure)).toBe(true);
  });
});

describe("fromThrowable", () => {
  it("wraps a resolved value in ok", async () => {
    const action = fromThrowable(async () => "value");
    await expect(action()).resolves.toEqual({ ok: true, value: "value" });
  });

  it("wraps a synchronous return value in ok", async () => {
    const action = fromThrowable(() => 7);
    await expect(action()).resolves.toEqual({ ok: true, value: 7 });
  });

  it("turns a rejection into err", async () => {
    const failure = new Error("refused");
    const action = fromThrowable(async () => {
      throw failure;
    });

    const result = await action();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBe(failure);
  });

  it("maps thrown values when given a mapper", async () => {
    const action = fromThrowable(
      () => {
        throw new Error("disk full");
      },
      (thrown) => ({ type: "IO_ERROR" as const, reason: thrown instanceof Error ? thrown.message : "unknown" })
    );

    await expect(action()).resolves.toEqual({
      ok: false,
      error: { type: "IO_ERROR", reason: "disk full" },
    });
  });
});

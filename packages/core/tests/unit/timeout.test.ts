// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { describe, expect, it } from "vitest";
import { abortableSleep, errorMessage, withTimeout } from "../../src/control/timeout.js";
import { CollaboratorTimeoutError } from "../../src/exceptions.js";

describe("withTimeout", () => {
  it("passes through a result that arrives in time", async () => {
    await expect(withTimeout(Promise.resolve(42), 1000, "read")).resolves.toBe(42);
  });

  it("rejects with CollaboratorTimeoutError when the work hangs", async () => {
    const never = new Promise<number>(() => undefined);
    const result = withTimeout(never, 10, "radiator sample");
    await expect(result).rejects.toBeInstanceOf(CollaboratorTimeoutError);
    await expect(result).rejects.toThrow("radiator sample timed out after 10ms");
  });

  it("propagates the work's own rejection", async () => {
    await expect(withTimeout(Promise.reject(new Error("boom")), 1000, "read")).rejects.toThrow("boom");
  });
});

describe("abortableSleep", () => {
  it("returns early once the signal aborts", async () => {
    const controller = new AbortController();
    const started = Date.now();
    const sleeping = abortableSleep(10_000, controller.signal);
    controller.abort();
    await sleeping;
    expect(Date.now() - started).toBeLessThan(5_000);
  });

  it("returns immediately for an already aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(abortableSleep(10_000, controller.signal)).resolves.toBeUndefined();
  });
});

describe("errorMessage", () => {
  it("unwraps errors and stringifies everything else", () => {
    expect(errorMessage(new Error("bad"))).toBe("bad");
    expect(errorMessage("plain")).toBe("plain");
  });
});

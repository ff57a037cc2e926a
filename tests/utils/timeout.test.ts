import { describe, it, expect } from "vitest";
import { TimeoutError, withTimeout } from "../../src/utils/timeout.js";

describe("withTimeout", () => {
  it("resolves with the promise's value", async () => {
    expect(await withTimeout(Promise.resolve(42), 1000)).toBe(42);
  });

  it("rejects with a TimeoutError after the budget", async () => {
    const pending = new Promise<string>(() => undefined);
    const error = await withTimeout(pending, 20, "ollama generation").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error instanceof TimeoutError ? error.timeoutMs : 0).toBe(20);
    expect(error instanceof Error ? error.message : "").toBe("Timed out after 20ms: ollama generation");
  });

  it("propagates the promise's own rejection", async () => {
    await expect(withTimeout(Promise.reject(new Error("nope")), 1000)).rejects.toThrow("nope");
  });

  it("passes the promise through without a usable timeout", async () => {
    expect(await withTimeout(Promise.resolve("a"))).toBe("a");
    expect(await withTimeout(Promise.resolve("b"), 0)).toBe("b");
  });

  it("uses a generic message without context", () => {
    expect(new TimeoutError(5).message).toBe("Operation timed out after 5ms");
  });
});

import { describe, expect, it } from "vitest";
import { ConvergenceTimeout, TransientRejection } from "../src/core/errors.js";
import { waitUntil } from "../src/core/poll.js";
import { handleRejection } from "../src/core/retry-policy.js";

describe("waitUntil", () => {
  it("returns as soon as the predicate holds", async () => {
    let calls = 0;
    await waitUntil(async () => ++calls === 3, { timeoutMs: 1000, intervalMs: 1, description: "third call" });
    expect(calls).toBe(3);
  });

  it("throws ConvergenceTimeout when the bound elapses", async () => {
    const error = await waitUntil(async () => false, { timeoutMs: 20, intervalMs: 5, description: "never" }).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(ConvergenceTimeout);
    if (!(error instanceof ConvergenceTimeout)) return;
    expect(error.description).toBe("never");
    expect(error.timeoutMs).toBe(20);
    expect(error.attempts).toBeGreaterThanOrEqual(2);
  });

  it("treats a transient rejection as not yet converged", async () => {
    let calls = 0;
    await waitUntil(
      async () => {
        calls += 1;
        if (calls === 1) throw new TransientRejection("host0", "busy");
        return true;
      },
      { timeoutMs: 1000, intervalMs: 1, description: "host0" }
    );
    expect(calls).toBe(2);
  });

  it("propagates other predicate errors immediately", async () => {
    let calls = 0;
    const failing = waitUntil(
      async () => {
        calls += 1;
        throw new Error("api exploded");
      },
      { timeoutMs: 1000, intervalMs: 1, description: "x" }
    );
    await expect(failing).rejects.toThrow("api exploded");
    expect(calls).toBe(1);
  });

  it("honours a custom tolerate function", async () => {
    let calls = 0;
    await waitUntil(
      async () => {
        calls += 1;
        if (calls < 3) throw new Error("connection refused");
        return true;
      },
      { timeoutMs: 1000, intervalMs: 1, description: "api", tolerate: () => true }
    );
    expect(calls).toBe(3);
  });
});

describe("handleRejection", () => {
  const rejection = new TransientRejection("host0", "busy", 409);

  it("maps each policy to its verdict", () => {
    expect(handleRejection("swallow", rejection)).toBe("skip");
    expect(handleRejection("requeue", rejection)).toBe("requeue");
    expect(() => handleRejection("propagate", rejection)).toThrow(rejection);
  });

  it("never absorbs errors that are not transient rejections", () => {
    const fatal = new Error("disk on fire");
    expect(() => handleRejection("swallow", fatal)).toThrow(fatal);
    expect(() => handleRejection("requeue", fatal)).toThrow(fatal);
  });
});

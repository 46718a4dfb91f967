import { describe, expect, it } from "vitest";
import { JobFailure } from "../src/core/errors.js";
import { sleep } from "../src/core/poll.js";
import { runBatch, runBatchOrThrow, type Job } from "../src/harness/job-runner.js";

describe("job runner", () => {
  it("runs every job exactly once and reports success", async () => {
    const counts = [0, 0, 0];
    const jobs: Job[] = counts.map((_, i) => async () => {
      await sleep(3 - i);
      counts[i] = (counts[i] ?? 0) + 1;
    });

    const result = await runBatch(jobs);

    expect(result.ok).toBe(true);
    expect(result.failures).toEqual([]);
    expect(counts).toEqual([1, 1, 1]);
    expect(result.outcomes.map((o) => o.index)).toEqual([0, 1, 2]);
  });

  it("keeps running siblings when a job fails and reports every failure in batch order", async () => {
    const ran: string[] = [];
    const result = await runBatch([
      { name: "a", run: async () => void ran.push("a") },
      {
        name: "b",
        run: async () => {
          ran.push("b");
          throw new Error("b broke");
        }
      },
      {
        name: "c",
        run: async () => {
          await sleep(5);
          ran.push("c");
        }
      },
      {
        name: "d",
        run: () => {
          ran.push("d");
          throw new Error("d broke");
        }
      }
    ]);

    expect(result.ok).toBe(false);
    expect(ran.sort()).toEqual(["a", "b", "c", "d"]);
    expect(result.outcomes.map((o) => o.ok)).toEqual([true, false, true, false]);
    expect(result.failures.map((f) => f.name)).toEqual(["b", "d"]);
    expect(result.failures.map((f) => (f.error instanceof Error ? f.error.message : ""))).toEqual(["b broke", "d broke"]);
  });

  it("starts every job before any of them finishes", async () => {
    let started = 0;
    let observedByFirst = -1;
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const jobs: Job[] = [
      async () => {
        started += 1;
        await gate;
        observedByFirst = started;
      },
      async () => {
        started += 1;
      },
      async () => {
        started += 1;
        release();
      }
    ];

    await runBatch(jobs);
    expect(observedByFirst).toBe(3);
  });

  it("treats an empty batch as success", async () => {
    const result = await runBatch([]);
    expect(result).toEqual({ ok: true, outcomes: [], failures: [] });
  });

  it("raises JobFailure carrying all failures", async () => {
    const failing = runBatchOrThrow([
      { name: "one", run: () => Promise.reject(new Error("first")) },
      { name: "two", run: () => undefined },
      { name: "three", run: () => Promise.reject(new Error("third")) }
    ]);

    await expect(failing).rejects.toBeInstanceOf(JobFailure);
    const error = await failing.catch((e: unknown) => e);
    expect(error instanceof JobFailure && error.failures.map((f) => f.index)).toEqual([0, 2]);
    expect(error instanceof JobFailure && error.code).toBe("JOB_FAILURE");
    expect(error instanceof JobFailure && error.message).toBe("2 of 3 jobs failed: #0 one: first; #2 three: third");
  });
});

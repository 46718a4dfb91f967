import { JobFailure, type JobOutcome } from "../core/errors.js";
import { createLogger, type Logger } from "../core/logger.js";

/** A unit of work with no return value; identity is its position in the batch. */
export type Job = () => void | Promise<void>;

export interface NamedJob {
  name: string;
  run: Job;
}

export interface BatchResult {
  ok: boolean;
  outcomes: JobOutcome[];
  failures: JobOutcome[];
}

export interface RunBatchOptions {
  logger?: Logger;
}

function normalize(job: Job | NamedJob, index: number): NamedJob {
  if (typeof job === "function") {
    return { name: job.name || `job-${index}`, run: job };
  }
  return job;
}

async function settle(job: NamedJob, index: number): Promise<JobOutcome> {
  const startedAt = new Date().toISOString();
  try {
    await job.run();
    return { index, name: job.name, ok: true, error: null, startedAt, finishedAt: new Date().toISOString() };
  } catch (error) {
    return { index, name: job.name, ok: false, error, startedAt, finishedAt: new Date().toISOString() };
  }
}

/**
 * Starts every job before waiting on any, then waits for all of them.
 * A failing job never cancels its siblings. There is no concurrency limit:
 * callers size the batch.
 */
export async function runBatch(jobs: ReadonlyArray<Job | NamedJob>, options: RunBatchOptions = {}): Promise<BatchResult> {
  const log = options.logger ?? createLogger("job-runner");
  const named = jobs.map(normalize);
  log.debug("starting batch", { size: named.length, jobs: named.map((job) => job.name) });

  const running = named.map((job, index) => settle(job, index));
  const outcomes = await Promise.all(running);
  const failures = outcomes.filter((outcome) => !outcome.ok);

  for (const failure of failures) {
    log.error(`job ${failure.name} failed`, {
      index: failure.index,
      error: failure.error instanceof Error ? failure.error.message : String(failure.error)
    });
  }

  return { ok: failures.length === 0, outcomes, failures };
}

export function assertBatch(result: BatchResult): void {
  if (!result.ok) {
    throw new JobFailure(result.outcomes);
  }
}

export async function runBatchOrThrow(jobs: ReadonlyArray<Job | NamedJob>, options: RunBatchOptions = {}): Promise<void> {
  assertBatch(await runBatch(jobs, options));
}

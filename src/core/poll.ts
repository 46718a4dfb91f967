import { ConvergenceTimeout, TransientRejection } from "./errors.js";

export interface WaitOptions {
  timeoutMs: number;
  intervalMs: number;
  description: string;
  /** Errors from the predicate that count as "not yet". Defaults to TransientRejection. */
  tolerate?: (error: unknown) => boolean;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Polls `predicate` until it holds. The first evaluation happens immediately;
 * errors accepted by `tolerate` count as "not yet".
 */
export async function waitUntil(predicate: () => Promise<boolean>, options: WaitOptions): Promise<void> {
  const started = Date.now();
  let attempts = 0;

  for (;;) {
    attempts += 1;
    try {
      if (await predicate()) return;
    } catch (error) {
      const tolerated = options.tolerate ? options.tolerate(error) : error instanceof TransientRejection;
      if (!tolerated) {
        throw error;
      }
    }

    if (Date.now() - started >= options.timeoutMs) {
      throw new ConvergenceTimeout(options.description, options.timeoutMs, attempts);
    }
    await sleep(options.intervalMs);
  }
}

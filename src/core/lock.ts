import fs from "node:fs/promises";
import path from "node:path";
import lockfile from "proper-lockfile";
import { EnvrigError, errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";

export interface FileLockOptions {
  /** Roughly how long to keep retrying before giving up. */
  timeoutMs?: number;
  /** A lock not refreshed for this long belongs to a dead holder and is taken over. */
  staleMs?: number;
}

const log = createLogger("lock");

function lockOptions(lockPath: string, options: FileLockOptions) {
  const timeoutMs = options.timeoutMs ?? 60 * 60 * 1000;
  return {
    lockfilePath: lockPath,
    realpath: false,
    stale: options.staleMs ?? 30_000,
    retries: {
      retries: Math.max(1, Math.ceil(timeoutMs / 1000)),
      factor: 2,
      minTimeout: 50,
      maxTimeout: 1000
    },
    onCompromised: (error: Error) => {
      log.error(`lock ${lockPath} compromised`, { error: error.message });
    }
  };
}

/**
 * Runs `fn` while holding the lock at `lockPath`, a directory created and
 * refreshed by proper-lockfile. The lock guards the directory containing it.
 */
export async function withFileLock<T>(lockPath: string, fn: () => Promise<T>, options: FileLockOptions = {}): Promise<T> {
  const resource = path.dirname(lockPath);
  await fs.mkdir(resource, { recursive: true });

  let release: () => Promise<void>;
  try {
    release = await lockfile.lock(resource, lockOptions(lockPath, options));
  } catch (error) {
    if (!(error instanceof Error && "code" in error && error.code === "ELOCKED")) {
      throw error;
    }
    throw new EnvrigError("LOCK_HELD", `Lock ${lockPath} is held: ${errorMessage(error)}`, { lockPath }, { cause: error });
  }

  try {
    return await fn();
  } finally {
    await release();
  }
}

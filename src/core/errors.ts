export type ErrorCode =
  | "TRANSIENT_REJECTION"
  | "CONVERGENCE_TIMEOUT"
  | "JOB_FAILURE"
  | "UNDO_FAILURE"
  | "ROLLBACK_FAILED"
  | "CONFIG_INVALID"
  | "COMMAND_FAILED"
  | "LOCK_HELD"
  | "SNAPSHOT_MISSING";

export class EnvrigError extends Error {
  readonly code: ErrorCode;
  readonly context: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
  }
}

/**
 * A management API request refused for one entity. Retried, ignored or
 * propagated depending on the rejection policy of the calling operation.
 */
export class TransientRejection extends EnvrigError {
  constructor(
    readonly entity: string,
    message: string,
    readonly status: number | null = null
  ) {
    super("TRANSIENT_REJECTION", `${entity}: ${message}`, { entity, status });
  }
}

export class ConvergenceTimeout extends EnvrigError {
  constructor(
    readonly description: string,
    readonly timeoutMs: number,
    readonly attempts: number
  ) {
    super("CONVERGENCE_TIMEOUT", `Timed out after ${timeoutMs}ms (${attempts} polls) waiting for ${description}`, {
      description,
      timeoutMs,
      attempts
    });
  }
}

export interface JobOutcome {
  index: number;
  name: string;
  ok: boolean;
  error: unknown;
  startedAt: string;
  finishedAt: string;
}

export class JobFailure extends EnvrigError {
  readonly failures: JobOutcome[];

  constructor(readonly outcomes: JobOutcome[]) {
    const failures = outcomes.filter((outcome) => !outcome.ok);
    const listed = failures.map((f) => `#${f.index} ${f.name}: ${errorMessage(f.error)}`).join("; ");
    super("JOB_FAILURE", `${failures.length} of ${outcomes.length} jobs failed: ${listed}`, {
      failed: failures.map((f) => f.index)
    });
    this.failures = failures;
  }
}

export class UndoFailure extends EnvrigError {
  constructor(
    readonly label: string,
    cause: unknown
  ) {
    super("UNDO_FAILURE", `Undo step "${label}" failed: ${errorMessage(cause)}`, { label }, { cause });
  }
}

export class RollbackError extends EnvrigError {
  constructor(
    readonly cause: unknown,
    readonly undoFailures: UndoFailure[]
  ) {
    const summary = undoFailures.map((f) => f.label).join(", ");
    const message =
      cause === undefined
        ? `Cleanup failed: ${undoFailures.length} undo step(s) failed (${summary})`
        : `Operation failed and cleanup also failed: ${errorMessage(cause)}; ${undoFailures.length} undo step(s) failed (${summary})`;
    super("ROLLBACK_FAILED", message, { undoFailures: undoFailures.map((f) => f.message) }, { cause });
  }

  get operationFailed(): boolean {
    return this.cause !== undefined;
  }
}

export class ConfigError extends EnvrigError {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super("CONFIG_INVALID", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, { issues });
  }
}

export class CommandError extends EnvrigError {
  constructor(
    readonly command: string,
    readonly exitCode: number,
    readonly stdout: string,
    readonly stderr: string,
    message = `${command} failed with status ${exitCode}`
  ) {
    super("COMMAND_FAILED", message, { command, exitCode });
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function describeError(error: unknown): string {
  if (error instanceof EnvrigError) {
    return `[${error.code}] ${error.message}`;
  }
  return errorMessage(error);
}

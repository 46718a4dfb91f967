import { RollbackError, UndoFailure } from "../core/errors.js";
import { createLogger, type Logger } from "../core/logger.js";

export type UndoAction = () => void | Promise<void>;

interface UndoStep {
  label: string;
  action: UndoAction;
}

export interface UnwindReport {
  executed: string[];
  failures: UndoFailure[];
}

/**
 * LIFO list of compensating actions owned by a single forward operation.
 * Not safe to share: push from one logical flow only.
 */
export class RollbackStack {
  private steps: UndoStep[] = [];
  private readonly log: Logger;

  constructor(logger?: Logger) {
    this.log = logger ?? createLogger("rollback");
  }

  get size(): number {
    return this.steps.length;
  }

  push(action: UndoAction, label = `undo-${this.steps.length + 1}`): void {
    this.steps.push({ label, action });
  }

  /** Drops every registered step without running it. */
  discard(): void {
    this.steps = [];
  }

  /**
   * Runs every registered step once, last registered first. A failing step is
   * recorded and the remaining steps still run.
   */
  async unwind(): Promise<UnwindReport> {
    const pending = this.steps;
    this.steps = [];
    const report: UnwindReport = { executed: [], failures: [] };

    for (let i = pending.length - 1; i >= 0; i--) {
      const step = pending[i];
      if (!step) continue;
      this.log.debug(`undo ${step.label}`);
      try {
        await step.action();
        report.executed.push(step.label);
      } catch (error) {
        const failure = new UndoFailure(step.label, error);
        this.log.error(failure.message);
        report.failures.push(failure);
      }
    }

    return report;
  }

  /** Unwinds and throws a RollbackError when any step failed. */
  async unwindOrThrow(): Promise<void> {
    const report = await this.unwind();
    if (report.failures.length > 0) {
      throw new RollbackError(undefined, report.failures);
    }
  }
}

/**
 * Runs `body` with a fresh RollbackStack. Unless the body calls `discard()`,
 * the stack is unwound on every exit, normal return included. When the body
 * threw, its error propagates unchanged if unwinding was clean and wrapped in
 * a RollbackError otherwise.
 */
export async function withRollback<T>(body: (rollback: RollbackStack) => Promise<T>, logger?: Logger): Promise<T> {
  const rollback = new RollbackStack(logger);
  let result: T;

  try {
    result = await body(rollback);
  } catch (error) {
    const report = await rollback.unwind();
    if (report.failures.length > 0) {
      throw new RollbackError(error, report.failures);
    }
    throw error;
  }

  const report = await rollback.unwind();
  if (report.failures.length > 0) {
    throw new RollbackError(undefined, report.failures);
  }
  return result;
}

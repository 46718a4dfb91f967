import { RollbackError, errorMessage } from "../core/errors.js";
import { waitUntil } from "../core/poll.js";
import type { TransactionPhase, TransactionRecord, TransactionStatus } from "../core/types.js";
import { machinesOf, type LifecycleContext } from "../harness/environment.js";
import { runBatchOrThrow } from "../harness/job-runner.js";
import { writeTransactionRecord } from "./journal.js";
import { RollbackStack, withRollback } from "./rollback.js";

export interface CreateSnapshotOptions {
  /** Bring the environment back up once the snapshot is captured. */
  restore?: boolean;
  journal?: boolean;
}

export interface SnapshotResult {
  record: TransactionRecord;
  journalPath: string | null;
}

/**
 * Quiesces the environment, captures a snapshot of every machine and, on
 * failure (or when `restore` is set), reverses every quiesce step that
 * completed, last first. Without `restore` a successful capture leaves the
 * environment deactivated.
 */
export async function createSnapshot(
  ctx: LifecycleContext,
  name: string,
  options: CreateSnapshotOptions = {}
): Promise<SnapshotResult> {
  const restore = options.restore ?? true;
  const log = ctx.logger.child("snapshot");
  const startedAt = new Date().toISOString();
  const phases: TransactionPhase[] = ["running"];
  let captured = false;
  let failure: unknown = undefined;

  try {
    await withRollback(async (rollback) => {
      phases.push("quiescing");
      await quiesce(ctx, rollback);

      log.info(`creating snapshot ${name}`);
      await ctx.virt.createSnapshot(
        machinesOf(ctx.environment).map((m) => m.name),
        name
      );
      captured = true;
      phases.push("captured");

      if (restore) {
        phases.push("restoring");
      } else {
        rollback.discard();
      }
    }, log);
  } catch (error) {
    failure = error;
    if (!phases.includes("restoring")) phases.push("restoring");
  }

  if (phases.includes("restoring") && !(failure instanceof RollbackError)) {
    phases.push("running");
  }

  const status: TransactionStatus = !captured ? "aborted" : restore ? "restored" : "captured";
  const undoFailures = failure instanceof RollbackError ? failure.undoFailures.map((f) => f.message) : [];
  const originalError = failure instanceof RollbackError ? failure.cause : failure;

  const record: TransactionRecord = {
    name,
    restore,
    status,
    phases,
    startedAt,
    finishedAt: new Date().toISOString(),
    error: originalError === undefined ? null : errorMessage(originalError),
    undoFailures
  };

  let journalPath: string | null = null;
  if (options.journal !== false) {
    journalPath = await writeTransactionRecord(ctx.paths, record).catch((error: unknown) => {
      log.warn(`could not journal snapshot ${name}`, { error: errorMessage(error) });
      return null;
    });
  }

  if (failure !== undefined) {
    log.error(`snapshot ${name} ${status}`, { error: errorMessage(failure) });
    throw failure;
  }
  log.info(`snapshot ${name} ${status}`);
  return { record, journalPath };
}

async function quiesce(ctx: LifecycleContext, rollback: RollbackStack): Promise<void> {
  const { controller, environment, services } = ctx;
  const log = ctx.logger.child("quiesce");

  // Registered before each deactivation so a partial one is still reversed.
  rollback.push(() => controller.activateAllStorageDomains(), "reactivate storage domains");
  await controller.deactivateAllStorageDomains();

  rollback.push(() => controller.activateAllHosts(), "reactivate hosts");
  await controller.deactivateAllHosts();

  rollback.push(
    () =>
      waitUntil(
        async () => {
          await ctx.api.ping();
          return true;
        },
        {
          timeoutMs: ctx.timeouts.longMs,
          intervalMs: ctx.timeouts.pollIntervalMs,
          description: "management API to answer",
          tolerate: () => true
        }
      ),
    "wait for management API"
  );
  for (const service of services.engine) {
    const control = environment.engine.service(service);
    await control.stop();
    rollback.push(() => control.start(), `start ${service} on ${environment.engine.name}`);
  }

  // Child stacks are registered before the batch starts; each job pushes only to its own.
  const perHost = environment.hosts.map((host) => {
    const child = new RollbackStack(log.child(host.name));
    rollback.push(() => child.unwindOrThrow(), `restart services on ${host.name}`);
    return { host, child };
  });

  await runBatchOrThrow(
    perHost.map(({ host, child }) => ({
      name: `stop services on ${host.name}`,
      run: async () => {
        for (const service of services.host) {
          const control = host.service(service);
          await control.stop();
          child.push(() => control.start(), `start ${service} on ${host.name}`);
        }
      }
    })),
    { logger: log }
  );
}

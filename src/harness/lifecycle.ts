import { EnvrigError } from "../core/errors.js";
import { machinesOf, type LifecycleContext } from "./environment.js";
import { runBatchOrThrow } from "./job-runner.js";

export async function waitForMachines(ctx: LifecycleContext): Promise<void> {
  await runBatchOrThrow(
    machinesOf(ctx.environment).map((machine) => ({
      name: `reach ${machine.name}`,
      run: () => machine.waitReachable(ctx.timeouts.reachableMs)
    })),
    { logger: ctx.logger }
  );
}

/** Hosts first, then storage domains (masters before the rest in each data center). */
export async function activateEnvironment(ctx: LifecycleContext): Promise<void> {
  await waitForMachines(ctx);
  ctx.logger.info("machines reachable");
  await ctx.controller.activateAllHosts();
  ctx.logger.info("hosts activated");
  await ctx.controller.activateAllStorageDomains();
  ctx.logger.info("storage domains activated");
}

/** Storage domains first (non-masters before masters), then hosts. */
export async function deactivateEnvironment(ctx: LifecycleContext): Promise<void> {
  await ctx.controller.deactivateAllStorageDomains();
  ctx.logger.info("storage domains in maintenance");
  await ctx.controller.deactivateAllHosts();
  ctx.logger.info("hosts in maintenance");
}

export async function startPrefix(ctx: LifecycleContext): Promise<void> {
  await ctx.virt.start(machinesOf(ctx.environment).map((m) => m.name));
  await activateEnvironment(ctx);
}

export async function stopPrefix(ctx: LifecycleContext): Promise<void> {
  await deactivateEnvironment(ctx);
  await ctx.virt.stop(machinesOf(ctx.environment).map((m) => m.name));
}

/** Fails before touching any machine unless every machine has the snapshot. */
export async function revertSnapshot(ctx: LifecycleContext, name: string): Promise<void> {
  const machines = machinesOf(ctx.environment).map((m) => m.name);
  const missing: string[] = [];
  for (const machine of machines) {
    if (!(await ctx.virt.listSnapshots(machine)).includes(name)) missing.push(machine);
  }
  if (missing.length > 0) {
    throw new EnvrigError("SNAPSHOT_MISSING", `Snapshot ${name} not found on ${missing.join(", ")}`, {
      snapshot: name,
      machines: missing
    });
  }

  ctx.logger.info(`reverting to snapshot ${name}`);
  await ctx.virt.revertSnapshot(machines, name);
  await activateEnvironment(ctx);
}

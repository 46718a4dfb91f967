import fs from "node:fs/promises";
import path from "node:path";
import type { Machine } from "../adapters/machine.js";
import { CommandError } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import type { Timeouts } from "../core/types.js";
import { machinesOf, type Environment } from "./environment.js";
import { runBatchOrThrow } from "./job-runner.js";

export interface DeployContext {
  environment: Environment;
  timeouts: Pick<Timeouts, "reachableMs">;
  logger: Logger;
}

async function deployMachine(machine: Machine, ctx: DeployContext): Promise<void> {
  await machine.waitReachable(ctx.timeouts.reachableMs);
  for (const script of machine.deployScripts) {
    ctx.logger.info(`running ${script} on ${machine.name}`);
    const result = await machine.runScript(script);
    if (result.code !== 0) {
      throw new CommandError(
        script,
        result.code,
        result.stdout,
        result.stderr,
        `${script} failed with status ${result.code} on ${machine.name}`
      );
    }
  }
}

/** Runs every machine's deploy scripts, machines in parallel, scripts in order. */
export async function deployEnvironment(ctx: DeployContext): Promise<void> {
  await runBatchOrThrow(
    machinesOf(ctx.environment).map((machine) => ({
      name: `deploy ${machine.name}`,
      run: () => deployMachine(machine, ctx)
    })),
    { logger: ctx.logger }
  );
}

export async function collectArtifacts(ctx: DeployContext, outputDir: string): Promise<string[]> {
  await fs.mkdir(outputDir, { recursive: true });
  const targets = machinesOf(ctx.environment).map((machine) => ({
    machine,
    dir: path.join(outputDir, machine.name)
  }));

  await runBatchOrThrow(
    targets.map(({ machine, dir }) => ({
      name: `collect ${machine.name}`,
      run: async () => {
        await fs.mkdir(dir, { recursive: true });
        await machine.collectArtifacts(dir);
      }
    })),
    { logger: ctx.logger }
  );
  return targets.map((target) => target.dir);
}

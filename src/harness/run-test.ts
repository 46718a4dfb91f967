import fs from "node:fs/promises";
import path from "node:path";
import { runCommand } from "../core/exec.js";
import type { Logger } from "../core/logger.js";
import type { PrefixPaths } from "../core/paths.js";

export interface TestRunResult {
  exitCode: number;
  logPath: string;
}

/** Runs a test command against the prefix; ENVRIG_PREFIX points at its root. */
export async function runTestCommand(
  paths: PrefixPaths,
  command: string,
  args: string[],
  logger: Logger,
  env: Record<string, string> = {}
): Promise<TestRunResult> {
  logger.info(`running test: ${[command, ...args].join(" ")}`);
  const result = await runCommand(command, args, {
    cwd: paths.root,
    env: { ...process.env, ...env, ENVRIG_PREFIX: paths.root }
  });

  await fs.mkdir(paths.logs, { recursive: true });
  const logPath = path.join(paths.logs, `${path.basename(args.at(-1) ?? command)}.log`);
  await fs.writeFile(logPath, `${result.stdout}\n${result.stderr}`.trim() + "\n", "utf8");

  if (!result.ok) {
    logger.warn(`test exited with ${result.code}`, { log: logPath });
  }
  return { exitCode: result.code, logPath };
}

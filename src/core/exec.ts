import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { CommandError } from "./errors.js";

const execFileAsync = promisify(execFile);

export interface CommandResult {
  ok: boolean;
  code: number;
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number;
}

/** Runs a binary without a shell; never throws on a nonzero exit. */
export async function runCommand(file: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
  try {
    const { stdout, stderr } = await execFileAsync(file, args, {
      cwd: options.cwd,
      env: options.env,
      timeout: options.timeout,
      maxBuffer: 10 * 1024 * 1024
    });
    return { ok: true, code: 0, stdout: String(stdout || ""), stderr: String(stderr || "") };
  } catch (error) {
    const err = error as Error & { stdout?: string; stderr?: string; code?: number | string };
    return {
      ok: false,
      code: typeof err.code === "number" ? err.code : 1,
      stdout: String(err.stdout || ""),
      stderr: `${String(err.stderr || "")}\n${err.message}`.trim()
    };
  }
}

export async function runCommandOrThrow(file: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
  const result = await runCommand(file, args, options);
  if (!result.ok) {
    throw new CommandError([file, ...args].join(" "), result.code, result.stdout, result.stderr);
  }
  return result;
}

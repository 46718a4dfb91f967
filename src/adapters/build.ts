import fs from "node:fs/promises";
import path from "node:path";
import { CommandError } from "../core/errors.js";
import { runCommand, runCommandOrThrow } from "../core/exec.js";
import { withFileLock } from "../core/lock.js";
import { createLogger, type Logger } from "../core/logger.js";

export interface RpmBuildSpec {
  name: string;
  script: string;
  sourceDir: string;
  outputDir: string;
  dists: string[];
  env?: Record<string, string>;
}

/** Package build and repository operations scheduled by the preparation pipeline. */
export interface BuildToolkit {
  syncRepository(repoPath: string, yumConfig: string, repoIds: string[]): Promise<void>;
  buildRpms(spec: RpmBuildSpec): Promise<void>;
  gitRevision(dir: string): Promise<string>;
  mergeRepositories(outputDir: string, sourceDirs: string[]): Promise<void>;
}

async function findRpms(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true }).catch(() => []);
  const found: string[] = [];
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      found.push(...(await findRpms(full)));
    } else if (entry.name.endsWith(".rpm")) {
      found.push(full);
    }
  }
  return found;
}

export class ScriptBuildToolkit implements BuildToolkit {
  private readonly log: Logger;

  constructor(logger?: Logger) {
    this.log = logger ?? createLogger("build");
  }

  async syncRepository(repoPath: string, yumConfig: string, repoIds: string[]): Promise<void> {
    await fs.mkdir(repoPath, { recursive: true });
    await withFileLock(path.join(repoPath, ".lock"), async () => {
      this.log.info(`syncing ${repoIds.length} repositories into ${repoPath}`);
      await runCommandOrThrow("reposync", [
        `--config=${yumConfig}`,
        `--download_path=${repoPath}`,
        "--newest-only",
        "--delete",
        ...repoIds.map((id) => `--repoid=${id}`)
      ]);
    });
  }

  async buildRpms(spec: RpmBuildSpec): Promise<void> {
    this.log.info(`building ${spec.name}(${spec.script}) from ${spec.sourceDir}, for ${spec.dists.join(", ")}, storing results in ${spec.outputDir}`);
    const result = await runCommand(spec.script, [spec.sourceDir, spec.outputDir, ...spec.dists], {
      env: { ...process.env, ...spec.env }
    });
    if (!result.ok) {
      this.log.error(`${spec.script} returned with error ${result.code}`, {
        stdout: result.stdout,
        stderr: result.stderr
      });
      throw new CommandError(spec.script, result.code, result.stdout, result.stderr, `${spec.script} failed, see logs`);
    }
  }

  async gitRevision(dir: string): Promise<string> {
    const result = await runCommand("git", ["rev-parse", "HEAD"], { cwd: dir });
    return result.ok ? result.stdout.trim() : "unknown";
  }

  async mergeRepositories(outputDir: string, sourceDirs: string[]): Promise<void> {
    await fs.mkdir(outputDir, { recursive: true });
    let copied = 0;
    for (const dir of sourceDirs) {
      for (const rpm of await findRpms(dir)) {
        await fs.copyFile(rpm, path.join(outputDir, path.basename(rpm)));
        copied += 1;
      }
    }
    this.log.info(`merged ${copied} packages into ${outputDir}`);
    await runCommandOrThrow("createrepo", [outputDir]);
  }
}

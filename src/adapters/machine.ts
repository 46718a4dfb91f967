import fs from "node:fs/promises";
import path from "node:path";
import { runCommand, runCommandOrThrow } from "../core/exec.js";
import { createLogger, type Logger } from "../core/logger.js";
import { waitUntil } from "../core/poll.js";

export interface ServiceControl {
  start(): Promise<void>;
  stop(): Promise<void>;
}

export interface ScriptResult {
  code: number;
  stdout: string;
  stderr: string;
}

/** One addressable machine of the environment, driven over a remote channel. */
export interface Machine {
  readonly name: string;
  readonly distro: string;
  readonly deployScripts: string[];
  readonly artifacts: string[];
  waitReachable(timeoutMs: number): Promise<void>;
  service(name: string): ServiceControl;
  runScript(localPath: string): Promise<ScriptResult>;
  collectArtifacts(outputDir: string): Promise<void>;
}

export interface SshMachineSpec {
  name: string;
  address: string;
  user: string;
  port: number;
  identityFile?: string;
  distro: string;
  deployScripts: string[];
  artifacts: string[];
}

const REACHABLE_POLL_MS = 3_000;

export class SshMachine implements Machine {
  private readonly log: Logger;

  constructor(
    private readonly spec: SshMachineSpec,
    logger?: Logger
  ) {
    this.log = logger ?? createLogger(`machine:${spec.name}`);
  }

  get name(): string {
    return this.spec.name;
  }

  get distro(): string {
    return this.spec.distro;
  }

  get deployScripts(): string[] {
    return this.spec.deployScripts;
  }

  get artifacts(): string[] {
    return this.spec.artifacts;
  }

  private sshOptions(portFlag: "-p" | "-P"): string[] {
    const options = [
      portFlag,
      String(this.spec.port),
      "-o",
      "BatchMode=yes",
      "-o",
      "StrictHostKeyChecking=no",
      "-o",
      "UserKnownHostsFile=/dev/null",
      "-o",
      "ConnectTimeout=10"
    ];
    if (this.spec.identityFile) {
      options.push("-i", this.spec.identityFile);
    }
    return options;
  }

  private get target(): string {
    return `${this.spec.user}@${this.spec.address}`;
  }

  async ssh(command: string[]): Promise<ScriptResult> {
    const result = await runCommand("ssh", [...this.sshOptions("-p"), this.target, ...command]);
    return { code: result.code, stdout: result.stdout, stderr: result.stderr };
  }

  async waitReachable(timeoutMs: number): Promise<void> {
    await waitUntil(async () => (await this.ssh(["true"])).code === 0, {
      timeoutMs,
      intervalMs: REACHABLE_POLL_MS,
      description: `ssh on ${this.name}`
    });
    this.log.debug("reachable");
  }

  service(name: string): ServiceControl {
    const control = async (verb: "start" | "stop"): Promise<void> => {
      this.log.info(`${verb} ${name}`);
      const result = await this.ssh(["systemctl", verb, name]);
      if (result.code !== 0) {
        throw new Error(`systemctl ${verb} ${name} on ${this.name} exited ${result.code}: ${result.stderr}`);
      }
    };
    return {
      start: () => control("start"),
      stop: () => control("stop")
    };
  }

  async runScript(localPath: string): Promise<ScriptResult> {
    const remote = `/tmp/${path.basename(localPath)}`;
    await this.copyTo(localPath, remote);
    return this.ssh(["bash", "-e", remote]);
  }

  private async copyTo(localPath: string, remotePath: string): Promise<void> {
    await runCommandOrThrow("scp", [...this.sshOptions("-P"), localPath, `${this.target}:${remotePath}`]);
  }

  async collectArtifacts(outputDir: string): Promise<void> {
    await fs.mkdir(outputDir, { recursive: true });
    for (const artifact of this.artifacts) {
      const result = await runCommand("scp", [...this.sshOptions("-P"), "-r", `${this.target}:${artifact}`, outputDir]);
      if (!result.ok) {
        this.log.warn(`could not collect ${artifact}`, { stderr: result.stderr });
      }
    }
  }
}

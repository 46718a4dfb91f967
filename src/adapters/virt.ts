import { runCommandOrThrow } from "../core/exec.js";
import { createLogger, type Logger } from "../core/logger.js";

/** Hypervisor operations on the environment's virtual machines. */
export interface VirtBackend {
  start(names: string[]): Promise<void>;
  stop(names: string[]): Promise<void>;
  createSnapshot(names: string[], snapshotName: string): Promise<void>;
  revertSnapshot(names: string[], snapshotName: string): Promise<void>;
  listSnapshots(name: string): Promise<string[]>;
}

export class VirshBackend implements VirtBackend {
  private readonly log: Logger;

  constructor(
    private readonly uri = "qemu:///system",
    logger?: Logger
  ) {
    this.log = logger ?? createLogger("virsh");
  }

  private async virsh(...args: string[]): Promise<string> {
    const { stdout } = await runCommandOrThrow("virsh", ["--connect", this.uri, ...args]);
    return stdout;
  }

  async start(names: string[]): Promise<void> {
    for (const name of names) {
      await this.virsh("start", name);
    }
  }

  async stop(names: string[]): Promise<void> {
    for (const name of names) {
      await this.virsh("shutdown", name);
    }
  }

  async createSnapshot(names: string[], snapshotName: string): Promise<void> {
    for (const name of names) {
      this.log.info(`snapshot ${name} as ${snapshotName}`);
      await this.virsh("snapshot-create-as", name, snapshotName);
    }
  }

  async revertSnapshot(names: string[], snapshotName: string): Promise<void> {
    for (const name of names) {
      this.log.info(`revert ${name} to ${snapshotName}`);
      await this.virsh("snapshot-revert", name, snapshotName);
    }
  }

  async listSnapshots(name: string): Promise<string[]> {
    const out = await this.virsh("snapshot-list", name, "--name");
    return out
      .split("\n")
      .map((line) => line.trim())
      .filter(Boolean);
  }
}

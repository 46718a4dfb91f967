import fs from "node:fs/promises";
import path from "node:path";
import { ScriptBuildToolkit, type BuildToolkit } from "../adapters/build.js";
import { SshMachine } from "../adapters/machine.js";
import type { ManagementApi } from "../adapters/management-api.js";
import { RestManagementApi } from "../adapters/rest-api.js";
import { VirshBackend, type VirtBackend } from "../adapters/virt.js";
import { loadPrefixConfig, type MachineConfig, type PrefixConfig } from "../core/config.js";
import { errorMessage } from "../core/errors.js";
import { createLogger, type Logger } from "../core/logger.js";
import { ensurePrefixDirs, type PrefixPaths } from "../core/paths.js";
import type { PrefixMetadata } from "../core/types.js";
import { ActivationController } from "../guardian/activation.js";
import { createSnapshot, type SnapshotResult } from "../guardian/snapshot.js";
import { collectArtifacts, deployEnvironment } from "./deploy.js";
import type { Environment, LifecycleContext } from "./environment.js";
import {
  activateEnvironment,
  deactivateEnvironment,
  revertSnapshot,
  startPrefix,
  stopPrefix
} from "./lifecycle.js";
import { prepareRepository, type PrepareRepositoryOptions, type PreparationSummary } from "./prepare.js";
import { withRepoServer } from "./repo-server.js";
import { runTestCommand, type TestRunResult } from "./run-test.js";

export interface PrefixCollaborators {
  environment: Environment;
  api: ManagementApi;
  virt: VirtBackend;
  toolkit: BuildToolkit;
}

export interface PrefixTestResult extends TestRunResult {
  /** Per-machine directories the post-test logs were collected into; empty when collection failed. */
  artifacts: string[];
}

function machineFromConfig(config: MachineConfig, logger: Logger): SshMachine {
  return new SshMachine(config, logger.child(config.name));
}

export function defaultCollaborators(config: PrefixConfig, logger: Logger): PrefixCollaborators {
  return {
    environment: {
      engine: machineFromConfig(config.engine, logger),
      hosts: config.hosts.map((host) => machineFromConfig(host, logger))
    },
    api: new RestManagementApi(config.api),
    virt: new VirshBackend(config.virt.uri, logger.child("virt")),
    toolkit: new ScriptBuildToolkit(logger.child("build"))
  };
}

async function loadMetadata(paths: PrefixPaths): Promise<PrefixMetadata> {
  const raw = await fs.readFile(paths.metadata, "utf8").catch(() => "");
  if (!raw) return {};
  const parsed: unknown = JSON.parse(raw);
  const metadata: PrefixMetadata = {};
  if (typeof parsed === "object" && parsed !== null) {
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === "string") metadata[key] = value;
    }
  }
  return metadata;
}

/** A live environment rooted at one directory, with every collaborator wired in. */
export class Prefix {
  readonly context: LifecycleContext;

  private constructor(
    readonly config: PrefixConfig,
    readonly paths: PrefixPaths,
    readonly metadata: PrefixMetadata,
    private readonly collaborators: PrefixCollaborators,
    private readonly logger: Logger
  ) {
    const controller = new ActivationController(collaborators.api, {
      timeouts: config.timeouts,
      policies: config.policies,
      logger: logger.child("activation")
    });
    this.context = {
      environment: collaborators.environment,
      api: collaborators.api,
      controller,
      virt: collaborators.virt,
      paths,
      timeouts: config.timeouts,
      services: config.services,
      logger
    };
  }

  static async open(
    root = process.cwd(),
    overrides: Partial<PrefixCollaborators> = {},
    logger: Logger = createLogger("prefix")
  ): Promise<Prefix> {
    const config = await loadPrefixConfig(root);
    return Prefix.fromConfig(root, config, overrides, logger);
  }

  static async fromConfig(
    root: string,
    config: PrefixConfig,
    overrides: Partial<PrefixCollaborators> = {},
    logger: Logger = createLogger("prefix")
  ): Promise<Prefix> {
    const paths = await ensurePrefixDirs(root);
    const collaborators = { ...defaultCollaborators(config, logger), ...overrides };
    const metadata = await loadMetadata(paths);
    return new Prefix(config, paths, metadata, collaborators, logger);
  }

  async save(): Promise<void> {
    await fs.writeFile(this.paths.metadata, JSON.stringify(this.metadata, null, 2), "utf8");
  }

  activate(): Promise<void> {
    return activateEnvironment(this.context);
  }

  deactivate(): Promise<void> {
    return deactivateEnvironment(this.context);
  }

  start(): Promise<void> {
    return startPrefix(this.context);
  }

  stop(): Promise<void> {
    return stopPrefix(this.context);
  }

  createSnapshot(name: string, restore = true): Promise<SnapshotResult> {
    return createSnapshot(this.context, name, { restore });
  }

  revertSnapshot(name: string): Promise<void> {
    return revertSnapshot(this.context, name);
  }

  async prepareRepository(options: PrepareRepositoryOptions): Promise<PreparationSummary> {
    const summary = await prepareRepository(
      {
        environment: this.context.environment,
        paths: this.paths,
        toolkit: this.collaborators.toolkit,
        metadata: this.metadata,
        logger: this.logger.child("prepare")
      },
      options
    );
    await this.save();
    return summary;
  }

  /** Deploys with the internal repositories served to the machines. */
  deploy(): Promise<void> {
    const logger = this.logger.child("deploy");
    return withRepoServer(this.paths.internalRepos, this.config.repo, logger.child("repo"), () =>
      deployEnvironment({ ...this.context, logger })
    );
  }

  collectArtifacts(outputDir = this.paths.artifacts): Promise<string[]> {
    return collectArtifacts({ ...this.context, logger: this.logger.child("collect") }, outputDir);
  }

  /**
   * Runs a test command with the repository server up (its URL in
   * ENVRIG_REPO_URL), then collects the machines' logs under
   * `artifacts/<test name>`. A failed collection leaves the test result as is.
   */
  async runTest(command: string, args: string[]): Promise<PrefixTestResult> {
    const logger = this.logger.child("test");
    const result = await withRepoServer(this.paths.internalRepos, this.config.repo, logger.child("repo"), (server) =>
      runTestCommand(this.paths, command, args, logger, { ENVRIG_REPO_URL: server.url })
    );

    const outputDir = path.join(this.paths.artifacts, path.basename(result.logPath, ".log"));
    const artifacts = await this.collectArtifacts(outputDir).catch((error: unknown) => {
      logger.warn("could not collect test logs", { error: errorMessage(error) });
      return [];
    });
    return { ...result, artifacts };
  }
}

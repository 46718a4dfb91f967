import fs from "node:fs/promises";
import path from "node:path";
import type { BuildToolkit } from "../adapters/build.js";
import type { Logger } from "../core/logger.js";
import { pathExists, type PrefixPaths } from "../core/paths.js";
import type { PrefixMetadata } from "../core/types.js";
import type { Environment } from "./environment.js";
import { runBatch, assertBatch, type NamedJob } from "./job-runner.js";

export interface PrepareRepositoryOptions {
  rpmRepo?: string;
  yumConfig?: string;
  skipSync?: boolean;
  vdsmDir?: string;
  engineDir?: string;
  engineBuildGwt?: boolean;
  jsonrpcJavaDir?: string;
}

export interface PreparationContext {
  environment: Environment;
  paths: PrefixPaths;
  toolkit: BuildToolkit;
  metadata: PrefixMetadata;
  logger: Logger;
}

export interface PreparationSummary {
  dists: string[];
  repoIds: string[];
  jobs: string[];
  merged: Record<string, string[]>;
}

export const BUILD_PROJECTS = {
  vdsm: { project: "vdsm", script: "build_vdsm_rpms.sh" },
  engine: { project: "ovirt-engine", script: "build_engine_rpms.sh" },
  jsonrpcJava: { project: "vdsm-jsonrpc-java", script: "build_vdsm-jsonrpc-java_rpms.sh" }
} as const;

export interface DistLayout {
  engine: string[];
  hosts: string[];
  all: string[];
}

export function detectDists(environment: Environment): DistLayout {
  const engine = [environment.engine.distro];
  const hosts: string[] = [];
  for (const host of environment.hosts) {
    if (!hosts.includes(host.distro)) hosts.push(host.distro);
  }
  return { engine, hosts, all: [...new Set([...engine, ...hosts])] };
}

/** Section names of an INI-style yum configuration. */
export function parseRepoSections(raw: string): string[] {
  const sections: string[] = [];
  for (const line of raw.split(/\r?\n/)) {
    const match = line.trim().match(/^\[([^\]]+)\]$/);
    if (match?.[1] && match[1] !== "main") {
      sections.push(match[1].trim());
    }
  }
  return sections;
}

export function reposForDists(sections: string[], dists: string[]): string[] {
  return sections.filter((repo) => dists.includes(repo.split("-").at(-1) ?? ""));
}

/**
 * Schedules repository sync and package builds as one batch, records source
 * revisions while the batch runs, then merges every output into the internal
 * repository of each distribution.
 */
export async function prepareRepository(
  ctx: PreparationContext,
  options: PrepareRepositoryOptions
): Promise<PreparationSummary> {
  const { toolkit, paths, metadata } = ctx;
  const dists = detectDists(ctx.environment);
  const jobs: NamedJob[] = [];
  let repoIds: string[] = [];

  if (options.rpmRepo && options.yumConfig) {
    const raw = await fs.readFile(options.yumConfig, "utf8");
    repoIds = reposForDists(parseRepoSections(raw), dists.all);

    if (!options.skipSync) {
      const { rpmRepo, yumConfig } = options;
      jobs.push({ name: "sync repository", run: () => toolkit.syncRepository(rpmRepo, yumConfig, repoIds) });
    }
  }

  const { vdsmDir, engineDir, jsonrpcJavaDir } = options;

  if (vdsmDir && dists.hosts.length > 0) {
    jobs.push({
      name: `build ${BUILD_PROJECTS.vdsm.project}`,
      run: () =>
        toolkit.buildRpms({
          name: BUILD_PROJECTS.vdsm.project,
          script: BUILD_PROJECTS.vdsm.script,
          sourceDir: vdsmDir,
          outputDir: paths.buildDir(BUILD_PROJECTS.vdsm.project),
          dists: dists.hosts
        })
    });
  }

  if (engineDir) {
    jobs.push({
      name: `build ${BUILD_PROJECTS.engine.project}`,
      run: () =>
        toolkit.buildRpms({
          name: BUILD_PROJECTS.engine.project,
          script: BUILD_PROJECTS.engine.script,
          sourceDir: engineDir,
          outputDir: paths.buildDir(BUILD_PROJECTS.engine.project),
          dists: dists.engine,
          env: { BUILD_GWT: options.engineBuildGwt ? "1" : "0" }
        })
    });
  }

  if (jsonrpcJavaDir) {
    jobs.push({
      name: `build ${BUILD_PROJECTS.jsonrpcJava.project}`,
      run: () =>
        toolkit.buildRpms({
          name: BUILD_PROJECTS.jsonrpcJava.project,
          script: BUILD_PROJECTS.jsonrpcJava.script,
          sourceDir: jsonrpcJavaDir,
          outputDir: paths.buildDir(BUILD_PROJECTS.jsonrpcJava.project),
          dists: dists.engine
        })
    });
  }

  ctx.logger.info(`preparing repository with ${jobs.length} jobs`, { jobs: jobs.map((job) => job.name) });
  const batch = runBatch(jobs, { logger: ctx.logger });

  try {
    if (engineDir) {
      metadata["ovirt-engine-revision"] = await toolkit.gitRevision(engineDir);
    }
    if (vdsmDir) {
      metadata["vdsm-revision"] = await toolkit.gitRevision(vdsmDir);
    }
  } finally {
    assertBatch(await batch);
  }

  const merged: Record<string, string[]> = {};
  for (const dist of dists.all) {
    const sources: string[] = [];
    for (const { project } of Object.values(BUILD_PROJECTS)) {
      const built = path.join(paths.buildDir(project), dist);
      if (await pathExists(built)) sources.push(built);
    }
    if (options.rpmRepo) {
      const rpmRepo = options.rpmRepo;
      sources.push(...repoIds.filter((id) => id.endsWith(dist)).map((id) => path.join(rpmRepo, id)));
    }
    await toolkit.mergeRepositories(paths.internalRepo(dist), sources);
    merged[dist] = sources;
  }

  return { dists: dists.all, repoIds, jobs: jobs.map((job) => job.name), merged };
}

import fs from "node:fs/promises";
import path from "node:path";

export const CONFIG_FILE = "envrig.yaml";
export const STATE_DIR = ".envrig";

export interface PrefixPaths {
  root: string;
  config: string;
  state: string;
  metadata: string;
  journal: string;
  transactions: string;
  logs: string;
  artifacts: string;
  internalRepos: string;
  buildDir(project: string): string;
  internalRepo(dist: string): string;
}

export function getPrefixPaths(root = process.cwd()): PrefixPaths {
  const state = path.join(root, STATE_DIR);
  const journal = path.join(state, "journal");
  const internalRepos = path.join(state, "repos", "internal");
  return {
    root,
    config: path.join(root, CONFIG_FILE),
    state,
    metadata: path.join(state, "metadata.json"),
    journal,
    transactions: path.join(journal, "transactions"),
    logs: path.join(state, "logs"),
    artifacts: path.join(state, "artifacts"),
    internalRepos,
    buildDir: (project) => path.join(state, "builds", project),
    internalRepo: (dist) => path.join(internalRepos, dist)
  };
}

export async function ensurePrefixDirs(root = process.cwd()): Promise<PrefixPaths> {
  const paths = getPrefixPaths(root);
  await fs.mkdir(paths.state, { recursive: true });
  await fs.mkdir(paths.transactions, { recursive: true });
  await fs.mkdir(paths.logs, { recursive: true });
  return paths;
}

export async function pathExists(target: string): Promise<boolean> {
  return fs
    .stat(target)
    .then(() => true)
    .catch(() => false);
}

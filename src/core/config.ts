import fs from "node:fs/promises";
import yaml from "js-yaml";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";
import { getPrefixPaths } from "./paths.js";
import { DEFAULT_REJECTION_POLICIES } from "./retry-policy.js";
import type { Timeouts } from "./types.js";

const PolicySchema = z.enum(["swallow", "requeue", "propagate"]);

const MachineSchema = z.object({
  name: z.string().min(1),
  address: z.string().min(1),
  user: z.string().min(1).default("root"),
  port: z.number().int().positive().default(22),
  identityFile: z.string().min(1).optional(),
  distro: z.string().min(1),
  deployScripts: z.array(z.string()).default([]),
  artifacts: z.array(z.string()).default([])
});

export const PrefixConfigSchema = z.object({
  name: z.string().min(1),
  engine: MachineSchema,
  hosts: z
    .array(MachineSchema)
    .min(1)
    .refine((hosts) => new Set(hosts.map((h) => h.name)).size === hosts.length, "host names must be unique"),
  api: z.object({
    url: z.string().url(),
    username: z.string().min(1),
    password: z.string(),
    insecure: z.boolean().default(false),
    timeoutMs: z.number().int().positive().default(30_000)
  }),
  services: z
    .object({
      engine: z.array(z.string().min(1)).default(["ovirt-engine"]),
      host: z.array(z.string().min(1)).default(["vdsmd", "supervdsmd"])
    })
    .default({}),
  timeouts: z
    .object({
      shortMs: z.number().int().positive().default(3 * 60 * 1000),
      longMs: z.number().int().positive().default(10 * 60 * 1000),
      pollIntervalMs: z.number().int().positive().default(3_000),
      requeueDelayMs: z.number().int().min(0).default(0),
      reachableMs: z.number().int().positive().default(10 * 60 * 1000)
    })
    .default({}),
  policies: z
    .object({
      hostActivation: PolicySchema.default(DEFAULT_REJECTION_POLICIES.hostActivation),
      hostDeactivation: PolicySchema.default(DEFAULT_REJECTION_POLICIES.hostDeactivation),
      storageDomain: PolicySchema.default(DEFAULT_REJECTION_POLICIES.storageDomain)
    })
    .default({}),
  repo: z
    .object({
      host: z.string().min(1).default("0.0.0.0"),
      port: z.number().int().min(0).default(8585),
      advertiseHost: z.string().min(1).optional()
    })
    .default({}),
  virt: z
    .object({
      uri: z.string().min(1).default("qemu:///system")
    })
    .default({})
});

export type PrefixConfig = z.infer<typeof PrefixConfigSchema>;
export type MachineConfig = z.infer<typeof MachineSchema>;

function parseEnvInt(name: string, fallback: number): number {
  const raw = (process.env[name] ?? "").trim();
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed < 0) return fallback;
  return parsed;
}

export function applyTimeoutOverrides(timeouts: Timeouts): Timeouts {
  return {
    ...timeouts,
    shortMs: parseEnvInt("ENVRIG_SHORT_TIMEOUT_MS", timeouts.shortMs),
    longMs: parseEnvInt("ENVRIG_LONG_TIMEOUT_MS", timeouts.longMs),
    pollIntervalMs: parseEnvInt("ENVRIG_POLL_INTERVAL_MS", timeouts.pollIntervalMs)
  };
}

export function parsePrefixConfig(input: unknown): PrefixConfig {
  const parsed = PrefixConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new ConfigError("Invalid prefix configuration", issues);
  }
  return { ...parsed.data, timeouts: applyTimeoutOverrides(parsed.data.timeouts) };
}

export async function loadPrefixConfig(root = process.cwd()): Promise<PrefixConfig> {
  const file = getPrefixPaths(root).config;
  let raw: string;
  try {
    raw = await fs.readFile(file, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read ${file}: ${errorMessage(error)}`);
  }

  let document: unknown;
  try {
    document = yaml.load(raw);
  } catch (error) {
    throw new ConfigError(`Cannot parse ${file}: ${errorMessage(error)}`);
  }
  return parsePrefixConfig(document);
}

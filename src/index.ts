export * from "./core/errors.js";
export * from "./core/types.js";
export { createLogger, setLogSink, resetLogSink, type Logger, type LogEntry } from "./core/logger.js";
export { loadPrefixConfig, parsePrefixConfig, type PrefixConfig } from "./core/config.js";
export { getPrefixPaths, type PrefixPaths } from "./core/paths.js";
export { waitUntil, type WaitOptions } from "./core/poll.js";
export { handleRejection, DEFAULT_REJECTION_POLICIES } from "./core/retry-policy.js";
export { runBatch, runBatchOrThrow, assertBatch, type Job, type NamedJob, type BatchResult } from "./harness/job-runner.js";
export { RollbackStack, withRollback, type UndoAction, type UnwindReport } from "./guardian/rollback.js";
export { ActivationController, splitByMaster } from "./guardian/activation.js";
export { createSnapshot, type CreateSnapshotOptions, type SnapshotResult } from "./guardian/snapshot.js";
export {
  activateEnvironment,
  deactivateEnvironment,
  startPrefix,
  stopPrefix,
  revertSnapshot
} from "./harness/lifecycle.js";
export { prepareRepository, type PrepareRepositoryOptions } from "./harness/prepare.js";
export { deployEnvironment, collectArtifacts } from "./harness/deploy.js";
export { Prefix, type PrefixCollaborators, type PrefixTestResult } from "./harness/prefix.js";
export { startRepoServer, withRepoServer, type RepoServer, type RepoServerOptions } from "./harness/repo-server.js";
export type { Environment, LifecycleContext } from "./harness/environment.js";
export type { ManagementApi } from "./adapters/management-api.js";
export { RestManagementApi } from "./adapters/rest-api.js";
export type { Machine, ServiceControl } from "./adapters/machine.js";
export { SshMachine } from "./adapters/machine.js";
export type { VirtBackend } from "./adapters/virt.js";
export { VirshBackend } from "./adapters/virt.js";
export type { BuildToolkit, RpmBuildSpec } from "./adapters/build.js";
export { ScriptBuildToolkit } from "./adapters/build.js";

export type StorageDomainState = "active" | "maintenance" | "transitioning";
export type HostState = "up" | "maintenance" | "transitioning";

export interface DataCenter {
  id: string;
  name: string;
}

export interface StorageDomain {
  id: string;
  name: string;
  dataCenterId: string;
  master: boolean;
  state: StorageDomainState;
}

export interface Host {
  id: string;
  name: string;
  state: HostState;
}

export type RejectionPolicy = "swallow" | "requeue" | "propagate";

export interface RejectionPolicies {
  hostActivation: RejectionPolicy;
  hostDeactivation: RejectionPolicy;
  storageDomain: RejectionPolicy;
}

export interface Timeouts {
  shortMs: number;
  longMs: number;
  pollIntervalMs: number;
  requeueDelayMs: number;
  reachableMs: number;
}

export interface ServiceNames {
  engine: string[];
  host: string[];
}

export type PrefixMetadata = Record<string, string>;

export type TransactionStatus = "captured" | "restored" | "aborted";

export type TransactionPhase =
  | "running"
  | "quiescing"
  | "captured"
  | "restoring";

export interface TransactionRecord {
  name: string;
  restore: boolean;
  status: TransactionStatus;
  phases: TransactionPhase[];
  startedAt: string;
  finishedAt: string;
  error: string | null;
  undoFailures: string[];
}

import { TransientRejection } from "./errors.js";
import type { RejectionPolicies, RejectionPolicy } from "./types.js";

export const DEFAULT_REJECTION_POLICIES: RejectionPolicies = {
  hostActivation: "swallow",
  hostDeactivation: "requeue",
  storageDomain: "propagate"
};

export type RejectionVerdict = "skip" | "requeue";

/**
 * Decides what a caller does with a failed per-entity request. Only a
 * TransientRejection is ever absorbed; every other error is rethrown.
 */
export function handleRejection(policy: RejectionPolicy, error: unknown): RejectionVerdict {
  if (!(error instanceof TransientRejection)) {
    throw error;
  }
  switch (policy) {
    case "swallow":
      return "skip";
    case "requeue":
      return "requeue";
    case "propagate":
      throw error;
  }
}

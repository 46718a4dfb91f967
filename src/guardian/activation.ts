import type { ManagementApi } from "../adapters/management-api.js";
import { errorMessage } from "../core/errors.js";
import { createLogger, type Logger } from "../core/logger.js";
import { sleep, waitUntil } from "../core/poll.js";
import { DEFAULT_REJECTION_POLICIES, handleRejection } from "../core/retry-policy.js";
import type { RejectionPolicies, StorageDomain, StorageDomainState, Timeouts } from "../core/types.js";

export interface ActivationControllerOptions {
  timeouts: Pick<Timeouts, "shortMs" | "longMs" | "pollIntervalMs" | "requeueDelayMs">;
  policies?: Partial<RejectionPolicies>;
  logger?: Logger;
}

export interface StorageDomainGroups {
  masters: StorageDomain[];
  others: StorageDomain[];
}

export function splitByMaster(domains: StorageDomain[]): StorageDomainGroups {
  return {
    masters: domains.filter((sd) => sd.master),
    others: domains.filter((sd) => !sd.master)
  };
}

/**
 * Drives storage domains and hosts between their active and maintenance
 * states. Group ordering (masters before the rest on activation, the reverse
 * on deactivation) belongs to the caller; the `*All*` helpers apply it.
 */
export class ActivationController {
  private readonly log: Logger;
  private readonly policies: RejectionPolicies;

  constructor(
    private readonly api: ManagementApi,
    private readonly options: ActivationControllerOptions
  ) {
    this.log = options.logger ?? createLogger("activation");
    this.policies = { ...DEFAULT_REJECTION_POLICIES, ...options.policies };
  }

  async activateStorageDomains(domains: StorageDomain[]): Promise<void> {
    await this.transitionStorageDomains(domains, "active");
  }

  async deactivateStorageDomains(domains: StorageDomain[]): Promise<void> {
    await this.transitionStorageDomains(domains, "maintenance");
  }

  async activateAllStorageDomains(): Promise<void> {
    for (const dc of await this.api.listDataCenters()) {
      const { masters, others } = splitByMaster(await this.api.listStorageDomains(dc.id));
      await this.activateStorageDomains(masters);
      await this.activateStorageDomains(others);
      this.log.info(`storage domains of ${dc.name} active`);
    }
  }

  async deactivateAllStorageDomains(): Promise<void> {
    for (const dc of await this.api.listDataCenters()) {
      const { masters, others } = splitByMaster(await this.api.listStorageDomains(dc.id));
      await this.deactivateStorageDomains(others);
      await this.deactivateStorageDomains(masters);
      this.log.info(`storage domains of ${dc.name} in maintenance`);
    }
  }

  async deactivateAllHosts(): Promise<void> {
    const queue = await this.api.listHosts();

    while (queue.length > 0) {
      const host = queue.pop();
      if (!host) break;
      try {
        await this.api.deactivateHost(host.id);
        this.log.info(`sent host ${host.name} to maintenance`);
      } catch (error) {
        const verdict = handleRejection(this.policies.hostDeactivation, error);
        this.log.warn(`host ${host.name} refused maintenance`, { error: errorMessage(error), verdict });
        if (verdict === "requeue") {
          queue.unshift(host);
          if (this.options.timeouts.requeueDelayMs > 0) {
            await sleep(this.options.timeouts.requeueDelayMs);
          }
        }
      }
    }

    for (const host of await this.api.listHosts()) {
      this.log.debug(`waiting for ${host.name} to go into maintenance`);
      await waitUntil(async () => (await this.api.getHost(host.name)).state === "maintenance", {
        timeoutMs: this.options.timeouts.shortMs,
        intervalMs: this.options.timeouts.pollIntervalMs,
        description: `host ${host.name} to reach maintenance`
      });
    }
  }

  async activateAllHosts(): Promise<void> {
    const hosts = await this.api.listHosts();
    const requeued = new Set<string>();

    // A refused host is retried once, after the rest of the list.
    for (const host of hosts) {
      try {
        await this.api.activateHost(host.id);
      } catch (error) {
        const verdict = handleRejection(this.policies.hostActivation, error);
        this.log.debug(`host ${host.name} refused activation`, { verdict });
        if (verdict === "requeue" && !requeued.has(host.id)) {
          requeued.add(host.id);
          hosts.push(host);
        }
      }
    }

    for (const name of new Set(hosts.map((host) => host.name))) {
      await waitUntil(async () => (await this.api.getHost(name)).state === "up", {
        timeoutMs: this.options.timeouts.shortMs,
        intervalMs: this.options.timeouts.pollIntervalMs,
        description: `host ${name} to come up`
      });
    }
  }

  private async transitionStorageDomains(domains: StorageDomain[], target: StorageDomainState): Promise<void> {
    if (domains.length === 0) return;

    await Promise.all(domains.map((sd) => this.request(sd, target)));

    for (const sd of domains) {
      await waitUntil(async () => (await this.api.getStorageDomain(sd.dataCenterId, sd.name)).state === target, {
        timeoutMs: this.options.timeouts.longMs,
        intervalMs: this.options.timeouts.pollIntervalMs,
        description: `storage domain ${sd.name} to reach ${target}`
      });
    }
  }

  private async request(sd: StorageDomain, target: StorageDomainState): Promise<void> {
    for (;;) {
      try {
        if (target === "active") {
          await this.api.activateStorageDomain(sd.dataCenterId, sd.id);
        } else {
          await this.api.deactivateStorageDomain(sd.dataCenterId, sd.id);
        }
        return;
      } catch (error) {
        const verdict = handleRejection(this.policies.storageDomain, error);
        this.log.warn(`storage domain ${sd.name} refused ${target}`, { error: errorMessage(error), verdict });
        if (verdict === "skip") return;
        if (this.options.timeouts.requeueDelayMs > 0) {
          await sleep(this.options.timeouts.requeueDelayMs);
        }
      }
    }
  }
}

import type { ManagementApi } from "../adapters/management-api.js";
import type { Machine } from "../adapters/machine.js";
import type { VirtBackend } from "../adapters/virt.js";
import type { Logger } from "../core/logger.js";
import type { PrefixPaths } from "../core/paths.js";
import type { ServiceNames, Timeouts } from "../core/types.js";
import type { ActivationController } from "../guardian/activation.js";

export interface Environment {
  engine: Machine;
  hosts: Machine[];
}

export function machinesOf(environment: Environment): Machine[] {
  return [environment.engine, ...environment.hosts];
}

/** Everything a lifecycle operation touches, passed explicitly. */
export interface LifecycleContext {
  environment: Environment;
  api: ManagementApi;
  controller: ActivationController;
  virt: VirtBackend;
  paths: PrefixPaths;
  timeouts: Timeouts;
  services: ServiceNames;
  logger: Logger;
}

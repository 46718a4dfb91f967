import type { DataCenter, Host, StorageDomain } from "../core/types.js";

/**
 * Narrow view of the engine's management API. Any call may reject with a
 * TransientRejection.
 */
export interface ManagementApi {
  ping(): Promise<void>;
  listDataCenters(): Promise<DataCenter[]>;
  listStorageDomains(dataCenterId: string): Promise<StorageDomain[]>;
  getStorageDomain(dataCenterId: string, name: string): Promise<StorageDomain>;
  activateStorageDomain(dataCenterId: string, storageDomainId: string): Promise<void>;
  deactivateStorageDomain(dataCenterId: string, storageDomainId: string): Promise<void>;
  listHosts(): Promise<Host[]>;
  getHost(name: string): Promise<Host>;
  activateHost(hostId: string): Promise<void>;
  deactivateHost(hostId: string): Promise<void>;
}

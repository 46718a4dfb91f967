import https from "node:https";
import axios, { isAxiosError, type AxiosInstance } from "axios";
import { z } from "zod";
import { TransientRejection } from "../core/errors.js";
import type { DataCenter, Host, HostState, StorageDomain, StorageDomainState } from "../core/types.js";
import type { ManagementApi } from "./management-api.js";

export interface RestApiOptions {
  url: string;
  username: string;
  password: string;
  insecure?: boolean;
  timeoutMs?: number;
}

const REJECTION_STATUSES = new Set([400, 409, 503]);

const IdNameSchema = z.object({ id: z.string(), name: z.string() });

const DataCentersSchema = z.object({ data_center: z.array(IdNameSchema).default([]) });

const StorageDomainSchema = IdNameSchema.extend({
  master: z.union([z.boolean(), z.string()]).optional(),
  status: z.string().optional()
});

const StorageDomainsSchema = z.object({ storage_domain: z.array(StorageDomainSchema).default([]) });

const HostSchema = IdNameSchema.extend({ status: z.string().optional() });

const HostsSchema = z.object({ host: z.array(HostSchema).default([]) });

export function toStorageDomainState(raw: string | undefined): StorageDomainState {
  if (raw === "active") return "active";
  if (raw === "maintenance") return "maintenance";
  return "transitioning";
}

export function toHostState(raw: string | undefined): HostState {
  if (raw === "up") return "up";
  if (raw === "maintenance") return "maintenance";
  return "transitioning";
}

/** JSON flavour of the engine REST API. */
export class RestManagementApi implements ManagementApi {
  private readonly http: AxiosInstance;

  constructor(options: RestApiOptions) {
    this.http = axios.create({
      baseURL: options.url.replace(/\/+$/, ""),
      timeout: options.timeoutMs ?? 30_000,
      auth: { username: options.username, password: options.password },
      headers: { Accept: "application/json", "Content-Type": "application/json" },
      httpsAgent: options.insecure ? new https.Agent({ rejectUnauthorized: false }) : undefined
    });
  }

  async ping(): Promise<void> {
    await this.http.get("/");
  }

  async listDataCenters(): Promise<DataCenter[]> {
    const { data } = await this.http.get("/datacenters");
    return DataCentersSchema.parse(data).data_center.map(({ id, name }) => ({ id, name }));
  }

  async listStorageDomains(dataCenterId: string): Promise<StorageDomain[]> {
    const { data } = await this.http.get(`/datacenters/${dataCenterId}/storagedomains`);
    return StorageDomainsSchema.parse(data).storage_domain.map((sd) => ({
      id: sd.id,
      name: sd.name,
      dataCenterId,
      master: sd.master === true || sd.master === "true",
      state: toStorageDomainState(sd.status)
    }));
  }

  async getStorageDomain(dataCenterId: string, name: string): Promise<StorageDomain> {
    const domains = await this.listStorageDomains(dataCenterId);
    const found = domains.find((sd) => sd.name === name);
    if (!found) {
      throw new Error(`Storage domain ${name} not found in data center ${dataCenterId}`);
    }
    return found;
  }

  async activateStorageDomain(dataCenterId: string, storageDomainId: string): Promise<void> {
    await this.action(`/datacenters/${dataCenterId}/storagedomains/${storageDomainId}/activate`, `storage domain ${storageDomainId}`);
  }

  async deactivateStorageDomain(dataCenterId: string, storageDomainId: string): Promise<void> {
    await this.action(`/datacenters/${dataCenterId}/storagedomains/${storageDomainId}/deactivate`, `storage domain ${storageDomainId}`);
  }

  async listHosts(): Promise<Host[]> {
    const { data } = await this.http.get("/hosts");
    return HostsSchema.parse(data).host.map((host) => ({
      id: host.id,
      name: host.name,
      state: toHostState(host.status)
    }));
  }

  async getHost(name: string): Promise<Host> {
    const hosts = await this.listHosts();
    const found = hosts.find((host) => host.name === name);
    if (!found) {
      throw new Error(`Host ${name} not found`);
    }
    return found;
  }

  async activateHost(hostId: string): Promise<void> {
    await this.action(`/hosts/${hostId}/activate`, `host ${hostId}`);
  }

  async deactivateHost(hostId: string): Promise<void> {
    await this.action(`/hosts/${hostId}/deactivate`, `host ${hostId}`);
  }

  private async action(path: string, entity: string): Promise<void> {
    try {
      await this.http.post(path, {});
    } catch (error) {
      if (isAxiosError(error) && error.response && REJECTION_STATUSES.has(error.response.status)) {
        throw new TransientRejection(entity, error.message, error.response.status);
      }
      throw error;
    }
  }
}

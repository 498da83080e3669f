import axios, { AxiosInstance } from 'axios';
import https from 'https';
import { z } from 'zod';
import { PbsApiError } from '../lib/errors';
import logger from '../lib/logger';
import {
  BackupGroup,
  DatastoreUsage,
  GcStatus,
  NodeStatus,
  Snapshot,
  TapeDrive,
  Task,
  VersionInfo,
  backupGroupSchema,
  datastoreUsageSchema,
  envelopeSchema,
  gcStatusSchema,
  nodeStatusSchema,
  snapshotSchema,
  tapeDriveSchema,
  taskSchema,
  versionInfoSchema,
} from '../types/pbs';

export const DEFAULT_TASK_LIMIT = 50;

const log = logger.child('pbs-api');

/**
 * The fetch operations the metrics collector depends on.
 * Every method rejects with a `PbsApiError` on failure.
 */
export interface PbsClient {
  getNodeStatus(): Promise<NodeStatus>;
  getDatastoreUsage(): Promise<DatastoreUsage[]>;
  getBackupGroups(datastore: string): Promise<BackupGroup[]>;
  getSnapshots(datastore: string): Promise<Snapshot[]>;
  getTasks(limit?: number): Promise<Task[]>;
  getGcStatus(datastore: string): Promise<GcStatus>;
  getTapeDrives(): Promise<TapeDrive[]>;
  getVersion(): Promise<VersionInfo>;
}

export type PbsApiOptions = {
  baseUrl: string;
  tokenId: string;
  tokenSecret: string;
  verifyTls?: boolean;
  timeoutSeconds?: number;
};

/**
 * Read-only wrapper around the Proxmox Backup Server REST API,
 * authenticated with an API token.
 */
export class PbsApi implements PbsClient {
  private readonly client: AxiosInstance;

  constructor(options: PbsApiOptions) {
    const httpsAgent = options.verifyTls
      ? undefined
      : new https.Agent({ rejectUnauthorized: false });

    this.client = axios.create({
      baseURL: options.baseUrl.replace(/\/$/, ''),
      timeout: (options.timeoutSeconds ?? 5) * 1000,
      httpsAgent,
      headers: {
        Accept: 'application/json',
        Authorization: `PBSAPIToken=${options.tokenId}:${options.tokenSecret}`,
      },
    });
  }

  private async request<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    log.debug('GET', { url });

    let body: unknown;
    try {
      const res = await this.client.get<unknown>(url);
      body = res.data;
    } catch (err) {
      throw this.classify(url, err);
    }

    const wrapped = envelopeSchema.safeParse(body);
    if (!wrapped.success) {
      throw this.parseError(url, wrapped.error);
    }
    const parsed = schema.safeParse(wrapped.data.data);
    if (!parsed.success) {
      throw this.parseError(url, parsed.error, ['data']);
    }
    return parsed.data;
  }

  private parseError(url: string, error: z.ZodError, prefix: (string | number)[] = []): PbsApiError {
    const summary = error.issues
      .slice(0, 3)
      .map((issue) => `${[...prefix, ...issue.path].join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    return new PbsApiError('parse', url, `unexpected response body (${summary})`, { cause: error });
  }

  private classify(url: string, err: unknown): PbsApiError {
    if (!axios.isAxiosError(err)) {
      return new PbsApiError('network', url, String(err), { cause: err });
    }
    if (err.response) {
      const status = err.response.status;
      log.warn('request failed', { url, status });
      return new PbsApiError('http', url, `HTTP ${status}`, { status, cause: err });
    }
    if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
      return new PbsApiError('timeout', url, err.message, { cause: err });
    }
    return new PbsApiError('network', url, err.message, { cause: err });
  }

  private datastorePath(datastore: string, resource: string): string {
    return `/api2/json/admin/datastore/${encodeURIComponent(datastore)}/${resource}`;
  }

  // ---- Node ----

  async getNodeStatus(): Promise<NodeStatus> {
    return this.request('/api2/json/nodes/localhost/status', nodeStatusSchema);
  }

  async getTasks(limit = DEFAULT_TASK_LIMIT): Promise<Task[]> {
    const search = new URLSearchParams();
    search.set('limit', String(limit));
    return this.request(`/api2/json/nodes/localhost/tasks?${search.toString()}`, z.array(taskSchema));
  }

  async getVersion(): Promise<VersionInfo> {
    return this.request('/api2/json/version', versionInfoSchema);
  }

  // ---- Datastores ----

  async getDatastoreUsage(): Promise<DatastoreUsage[]> {
    return this.request('/api2/json/status/datastore-usage', z.array(datastoreUsageSchema));
  }

  async getBackupGroups(datastore: string): Promise<BackupGroup[]> {
    return this.request(this.datastorePath(datastore, 'groups'), z.array(backupGroupSchema));
  }

  async getSnapshots(datastore: string): Promise<Snapshot[]> {
    return this.request(this.datastorePath(datastore, 'snapshots'), z.array(snapshotSchema));
  }

  async getGcStatus(datastore: string): Promise<GcStatus> {
    return this.request(this.datastorePath(datastore, 'gc'), gcStatusSchema);
  }

  // ---- Tape ----

  async getTapeDrives(): Promise<TapeDrive[]> {
    return this.request('/api2/json/tape/drive', z.array(tapeDriveSchema));
  }
}

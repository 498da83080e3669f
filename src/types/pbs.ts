import { z } from 'zod';

// Payloads of the PBS REST API (api2/json), camel-cased.
// Optional upstream fields stay `undefined` when absent or null.

export interface MemoryUsage {
  used: number;
  total: number;
  free: number;
}

export interface DiskUsage {
  used: number;
  total: number;
  avail: number;
}

export interface NodeStatus {
  cpu: number;      // fraction of 1.0
  wait: number;     // io-wait, fraction of 1.0
  loadavg: [number, number, number];
  memory: MemoryUsage;
  swap: MemoryUsage;
  root: DiskUsage;
  uptime: number;   // seconds
}

export interface DatastoreUsage {
  store: string;
  total: number;
  used: number;
  avail: number;
}

export interface BackupGroup {
  backupType: string;     // vm, ct, host
  backupId: string;
  backupCount: number;
  lastBackup: number;     // unix seconds
  comment?: string;
}

export interface VerificationStatus {
  state: string;          // ok, failed, ...
  lastVerify?: number;
}

export interface Snapshot {
  backupType: string;
  backupId: string;
  backupTime: number;
  comment?: string;
  size?: number;
  protected?: boolean;
  verification?: VerificationStatus;
}

export interface Task {
  upid: string;
  workerType: string;
  workerId?: string;      // datastore:type/id
  startTime: number;
  endTime?: number;       // absent while running
  status?: string;
  comment?: string;
}

export interface GcStatus {
  diskBytes?: number;
  removedBytes?: number;
  pendingBytes?: number;
  lastRunEndtime?: number;
  lastRunState?: string;
  duration?: number;
}

export interface TapeDrive {
  name: string;
  vendor?: string;
  model?: string;
  serial?: string;
}

export interface VersionInfo {
  version: string;
  release: string;
  repoid: string;
}

const optional = <T extends z.ZodTypeAny>(schema: T) =>
  schema.nullish().transform((value): z.output<T> | undefined => value ?? undefined);

const memorySchema = z.object({
  used: z.number(),
  total: z.number(),
  free: z.number(),
});

const diskSchema = z.object({
  used: z.number(),
  total: z.number(),
  avail: z.number(),
});

export const nodeStatusSchema: z.ZodType<NodeStatus, z.ZodTypeDef, unknown> = z.object({
  cpu: z.number(),
  wait: z.number(),
  // some releases report load averages as strings
  loadavg: z.tuple([z.coerce.number(), z.coerce.number(), z.coerce.number()]),
  memory: memorySchema,
  swap: memorySchema,
  root: diskSchema,
  uptime: z.number(),
});

export const datastoreUsageSchema: z.ZodType<DatastoreUsage, z.ZodTypeDef, unknown> = z.object({
  store: z.string(),
  total: z.number(),
  used: z.number(),
  avail: z.number(),
});

export const backupGroupSchema: z.ZodType<BackupGroup, z.ZodTypeDef, unknown> = z
  .object({
    'backup-type': z.string(),
    'backup-id': z.string(),
    'backup-count': z.number(),
    'last-backup': z.number(),
    comment: optional(z.string()),
  })
  .transform((raw) => ({
    backupType: raw['backup-type'],
    backupId: raw['backup-id'],
    backupCount: raw['backup-count'],
    lastBackup: raw['last-backup'],
    comment: raw.comment,
  }));

const verificationSchema = z
  .object({
    state: z.string(),
    'last-verify': optional(z.number()),
  })
  .transform((raw): VerificationStatus => ({
    state: raw.state,
    lastVerify: raw['last-verify'],
  }));

export const snapshotSchema: z.ZodType<Snapshot, z.ZodTypeDef, unknown> = z
  .object({
    'backup-type': z.string(),
    'backup-id': z.string(),
    'backup-time': z.number(),
    comment: optional(z.string()),
    size: optional(z.number()),
    protected: optional(z.boolean()),
    verification: optional(verificationSchema),
  })
  .transform((raw) => ({
    backupType: raw['backup-type'],
    backupId: raw['backup-id'],
    backupTime: raw['backup-time'],
    comment: raw.comment,
    size: raw.size,
    protected: raw.protected,
    verification: raw.verification,
  }));

export const taskSchema: z.ZodType<Task, z.ZodTypeDef, unknown> = z
  .object({
    upid: z.string(),
    worker_type: z.string(),
    worker_id: optional(z.string()),
    starttime: z.number(),
    endtime: optional(z.number()),
    status: optional(z.string()),
    comment: optional(z.string()),
  })
  .transform((raw) => ({
    upid: raw.upid,
    workerType: raw.worker_type,
    workerId: raw.worker_id,
    startTime: raw.starttime,
    endTime: raw.endtime,
    status: raw.status,
    comment: raw.comment,
  }));

export const gcStatusSchema: z.ZodType<GcStatus, z.ZodTypeDef, unknown> = z
  .object({
    'disk-bytes': optional(z.number()),
    'removed-bytes': optional(z.number()),
    'pending-bytes': optional(z.number()),
    'last-run-endtime': optional(z.number()),
    'last-run-state': optional(z.string()),
    duration: optional(z.number()),
  })
  .transform((raw) => ({
    diskBytes: raw['disk-bytes'],
    removedBytes: raw['removed-bytes'],
    pendingBytes: raw['pending-bytes'],
    lastRunEndtime: raw['last-run-endtime'],
    lastRunState: raw['last-run-state'],
    duration: raw.duration,
  }));

export const tapeDriveSchema: z.ZodType<TapeDrive, z.ZodTypeDef, unknown> = z.object({
  name: z.string(),
  vendor: optional(z.string()),
  model: optional(z.string()),
  serial: optional(z.string()),
});

export const versionInfoSchema: z.ZodType<VersionInfo, z.ZodTypeDef, unknown> = z.object({
  version: z.string(),
  release: z.string(),
  repoid: z.string(),
});

/** Every endpoint wraps its payload as `{ "data": ... }`. */
export const envelopeSchema = z.object({ data: z.unknown() });

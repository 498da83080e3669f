import { Gauge, Registry } from 'prom-client';
import { MetricsError, errorMessage } from '../lib/errors';

const DATASTORE = ['datastore'] as const;
const GROUP = ['datastore', 'backup_type', 'backup_id', 'comment'] as const;
const SNAPSHOT = [...GROUP, 'timestamp'] as const;
const SNAPSHOT_SIZE = [...SNAPSHOT, 'verified'] as const;

export type DatastoreLabel = (typeof DATASTORE)[number];
export type GroupLabel = (typeof GROUP)[number];
export type SnapshotLabel = (typeof SNAPSHOT)[number];
export type SnapshotSizeLabel = (typeof SNAPSHOT_SIZE)[number];

/**
 * Every gauge the exporter publishes. Created once per registry;
 * values are rewritten on each collection cycle.
 */
export interface Instruments {
  up: Gauge;

  hostCpuUsage: Gauge;
  hostIoWait: Gauge;
  hostLoad1: Gauge;
  hostLoad5: Gauge;
  hostLoad15: Gauge;
  hostMemoryUsedBytes: Gauge;
  hostMemoryTotalBytes: Gauge;
  hostMemoryFreeBytes: Gauge;
  hostSwapUsedBytes: Gauge;
  hostSwapTotalBytes: Gauge;
  hostSwapFreeBytes: Gauge;
  hostRootfsUsedBytes: Gauge;
  hostRootfsTotalBytes: Gauge;
  hostRootfsAvailBytes: Gauge;
  hostUptimeSeconds: Gauge;

  datastoreTotalBytes: Gauge<DatastoreLabel>;
  datastoreUsedBytes: Gauge<DatastoreLabel>;
  datastoreAvailableBytes: Gauge<DatastoreLabel>;

  snapshotCount: Gauge<GroupLabel>;
  snapshotLastTimestampSeconds: Gauge<GroupLabel>;

  snapshotInfo: Gauge<SnapshotLabel>;
  snapshotSizeBytes: Gauge<SnapshotSizeLabel>;
  snapshotVerified: Gauge<SnapshotLabel>;
  snapshotVerificationTimestampSeconds: Gauge<SnapshotLabel>;
  snapshotProtected: Gauge<SnapshotLabel>;

  taskTotal: Gauge<'worker_type' | 'status' | 'comment'>;
  taskDurationSeconds: Gauge<'worker_type' | 'status' | 'worker_id' | 'comment'>;
  taskLastRunTimestamp: Gauge<'worker_type'>;
  taskRunning: Gauge<'worker_type' | 'comment'>;

  gcLastRunTimestamp: Gauge<DatastoreLabel>;
  gcDurationSeconds: Gauge<DatastoreLabel>;
  gcRemovedBytes: Gauge<DatastoreLabel>;
  gcPendingBytes: Gauge<DatastoreLabel>;
  gcDiskBytes: Gauge<DatastoreLabel>;
  gcStatus: Gauge<DatastoreLabel>;

  tapeDriveInfo: Gauge<'name' | 'vendor' | 'model' | 'serial'>;
  tapeDriveAvailable: Gauge;

  version: Gauge<'version' | 'release' | 'repoid'>;
}

/**
 * Declare and register every instrument on `registry`.
 * Throws `MetricsError` on the first invalid or duplicate declaration.
 */
export function createInstruments(registry: Registry): Instruments {
  function gauge<T extends string>(name: string, help: string, labelNames: readonly T[] = []): Gauge<T> {
    try {
      return new Gauge<T>({ name, help, labelNames, registers: [registry] });
    } catch (err) {
      throw new MetricsError(`cannot register ${name}: ${errorMessage(err)}`, err);
    }
  }

  return {
    up: gauge('pbs_up', 'Whether the last scrape of PBS was successful (1 = success, 0 = failure)'),

    hostCpuUsage: gauge('pbs_host_cpu_usage', 'CPU usage of the PBS host (fraction of 1.0)'),
    hostIoWait: gauge('pbs_host_io_wait', 'CPU I/O wait proportion (fraction of 1.0)'),
    hostLoad1: gauge('pbs_host_load1', '1-minute load average'),
    hostLoad5: gauge('pbs_host_load5', '5-minute load average'),
    hostLoad15: gauge('pbs_host_load15', '15-minute load average'),
    hostMemoryUsedBytes: gauge('pbs_host_memory_used_bytes', 'Used RAM on PBS host in bytes'),
    hostMemoryTotalBytes: gauge('pbs_host_memory_total_bytes', 'Total RAM on PBS host in bytes'),
    hostMemoryFreeBytes: gauge('pbs_host_memory_free_bytes', 'Free RAM on PBS host in bytes'),
    hostSwapUsedBytes: gauge('pbs_host_swap_used_bytes', 'Used swap space in bytes'),
    hostSwapTotalBytes: gauge('pbs_host_swap_total_bytes', 'Total swap space in bytes'),
    hostSwapFreeBytes: gauge('pbs_host_swap_free_bytes', 'Free swap space in bytes'),
    hostRootfsUsedBytes: gauge('pbs_host_rootfs_used_bytes', 'Used bytes on root filesystem'),
    hostRootfsTotalBytes: gauge('pbs_host_rootfs_total_bytes', 'Total bytes on root filesystem'),
    hostRootfsAvailBytes: gauge('pbs_host_rootfs_avail_bytes', 'Available bytes on root filesystem'),
    hostUptimeSeconds: gauge('pbs_host_uptime_seconds', 'Uptime of PBS host in seconds'),

    datastoreTotalBytes: gauge('pbs_datastore_total_bytes', 'Total size of datastore in bytes', DATASTORE),
    datastoreUsedBytes: gauge('pbs_datastore_used_bytes', 'Used bytes in datastore', DATASTORE),
    datastoreAvailableBytes: gauge('pbs_datastore_available_bytes', 'Available bytes in datastore', DATASTORE),

    snapshotCount: gauge('pbs_snapshot_count', 'Number of backup snapshots', GROUP),
    snapshotLastTimestampSeconds: gauge(
      'pbs_snapshot_last_timestamp_seconds',
      'Unix timestamp of last backup',
      GROUP
    ),

    snapshotInfo: gauge(
      'pbs_snapshot_info',
      'Individual snapshot information with timestamp as value',
      SNAPSHOT
    ),
    snapshotSizeBytes: gauge('pbs_snapshot_size_bytes', 'Size of individual snapshot in bytes', SNAPSHOT_SIZE),
    snapshotVerified: gauge(
      'pbs_snapshot_verified',
      'Snapshot verification status (1=ok, 0=failed/unknown)',
      SNAPSHOT
    ),
    snapshotVerificationTimestampSeconds: gauge(
      'pbs_snapshot_verification_timestamp_seconds',
      'Timestamp of last verification in seconds',
      SNAPSHOT
    ),
    snapshotProtected: gauge(
      'pbs_snapshot_protected',
      'Snapshot protection status (1=protected, 0=not protected)',
      SNAPSHOT
    ),

    taskTotal: gauge('pbs_task_total', 'Total number of tasks (by worker type/status)', [
      'worker_type',
      'status',
      'comment',
    ]),
    taskDurationSeconds: gauge('pbs_task_duration_seconds', 'Task duration in seconds', [
      'worker_type',
      'status',
      'worker_id',
      'comment',
    ]),
    taskLastRunTimestamp: gauge('pbs_task_last_run_timestamp', 'Last run timestamp for task type', [
      'worker_type',
    ]),
    taskRunning: gauge('pbs_task_running', 'Currently running tasks', ['worker_type', 'comment']),

    gcLastRunTimestamp: gauge('pbs_gc_last_run_timestamp', 'Last GC run completion timestamp', DATASTORE),
    gcDurationSeconds: gauge('pbs_gc_duration_seconds', 'Last GC duration in seconds', DATASTORE),
    gcRemovedBytes: gauge('pbs_gc_removed_bytes', 'Bytes reclaimed in last GC', DATASTORE),
    gcPendingBytes: gauge('pbs_gc_pending_bytes', 'Bytes that can be reclaimed by GC', DATASTORE),
    gcDiskBytes: gauge('pbs_gc_disk_bytes', 'Bytes on disk counted by the last GC', DATASTORE),
    gcStatus: gauge('pbs_gc_status', 'Last GC status (1=OK, 0=ERROR)', DATASTORE),

    tapeDriveInfo: gauge('pbs_tape_drive_info', 'Tape drive information', ['name', 'vendor', 'model', 'serial']),
    tapeDriveAvailable: gauge('pbs_tape_drive_available', 'Number of available tape drives'),

    version: gauge('pbs_version', 'PBS version information', ['version', 'release', 'repoid']),
  };
}

/**
 * Drop every labelled series and zero every scalar gauge.
 *
 * All snapshot, group and GC families are shared across datastores and are
 * only ever cleared here, once per cycle. Per-datastore projections add
 * series without removing any, which is correct because `datastore` is part
 * of every one of their label sets.
 */
export function resetInstruments(instruments: Instruments): void {
  for (const instrument of Object.values(instruments)) {
    instrument.reset();
  }
}

import type { DatastoreUsage, GcStatus, NodeStatus, TapeDrive, VersionInfo } from '../types/pbs';
import type { Instruments } from './instruments';

const UNKNOWN = 'unknown';

export function projectNodeStatus(instruments: Instruments, status: NodeStatus): void {
  instruments.hostCpuUsage.set(status.cpu);
  instruments.hostIoWait.set(status.wait);
  instruments.hostLoad1.set(status.loadavg[0]);
  instruments.hostLoad5.set(status.loadavg[1]);
  instruments.hostLoad15.set(status.loadavg[2]);
  instruments.hostMemoryUsedBytes.set(status.memory.used);
  instruments.hostMemoryTotalBytes.set(status.memory.total);
  instruments.hostMemoryFreeBytes.set(status.memory.free);
  instruments.hostSwapUsedBytes.set(status.swap.used);
  instruments.hostSwapTotalBytes.set(status.swap.total);
  instruments.hostSwapFreeBytes.set(status.swap.free);
  instruments.hostRootfsUsedBytes.set(status.root.used);
  instruments.hostRootfsTotalBytes.set(status.root.total);
  instruments.hostRootfsAvailBytes.set(status.root.avail);
  instruments.hostUptimeSeconds.set(status.uptime);
}

export function projectDatastoreUsage(instruments: Instruments, datastores: readonly DatastoreUsage[]): void {
  for (const ds of datastores) {
    const labels = { datastore: ds.store };
    instruments.datastoreTotalBytes.set(labels, ds.total);
    instruments.datastoreUsedBytes.set(labels, ds.used);
    instruments.datastoreAvailableBytes.set(labels, ds.avail);
  }
}

/**
 * Only fields PBS reported are published; an absent field leaves its
 * series out rather than writing 0.
 */
export function projectGcStatus(instruments: Instruments, datastore: string, gc: GcStatus): void {
  const labels = { datastore };

  if (gc.lastRunEndtime !== undefined) instruments.gcLastRunTimestamp.set(labels, gc.lastRunEndtime);
  if (gc.duration !== undefined) instruments.gcDurationSeconds.set(labels, gc.duration);
  if (gc.removedBytes !== undefined) instruments.gcRemovedBytes.set(labels, gc.removedBytes);
  if (gc.pendingBytes !== undefined) instruments.gcPendingBytes.set(labels, gc.pendingBytes);
  if (gc.diskBytes !== undefined) instruments.gcDiskBytes.set(labels, gc.diskBytes);
  if (gc.lastRunState !== undefined) {
    instruments.gcStatus.set(labels, gc.lastRunState.toLowerCase() === 'ok' ? 1 : 0);
  }
}

export function projectTapeDrives(instruments: Instruments, drives: readonly TapeDrive[]): void {
  instruments.tapeDriveAvailable.set(drives.length);
  for (const drive of drives) {
    instruments.tapeDriveInfo.set(
      {
        name: drive.name,
        vendor: drive.vendor ?? UNKNOWN,
        model: drive.model ?? UNKNOWN,
        serial: drive.serial ?? UNKNOWN,
      },
      1
    );
  }
}

export function projectVersion(instruments: Instruments, version: VersionInfo): void {
  instruments.version.set({ version: version.version, release: version.release, repoid: version.repoid }, 1);
}

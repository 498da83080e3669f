import type { BackupGroup, Snapshot } from '../types/pbs';
import { CommentIndex, groupKey, lookupComment, truncateComment } from './comments';
import type { Instruments } from './instruments';

export type SnapshotProjection = {
  exposed: number;
  total: number;
};

function compareSnapshots(a: Snapshot, b: Snapshot): number {
  if (a.backupType !== b.backupType) return a.backupType < b.backupType ? -1 : 1;
  if (a.backupId !== b.backupId) return a.backupId < b.backupId ? -1 : 1;
  return b.backupTime - a.backupTime;
}

/**
 * Publish the per-snapshot families for one datastore.
 *
 * Snapshots are grouped by (type, id), newest first, and only the
 * `historyLimit` most recent of each group are exposed (0 = all). Every
 * snapshot carries the comment of its group's latest snapshot, so all
 * series of a group share one `comment` label.
 */
export function projectSnapshots(
  instruments: Instruments,
  datastore: string,
  snapshots: readonly Snapshot[],
  index: CommentIndex,
  historyLimit: number
): SnapshotProjection {
  const sorted = [...snapshots].sort(compareSnapshots);

  let exposed = 0;
  let currentGroup: string | undefined;
  let groupCounter = 0;

  for (const snapshot of sorted) {
    const group = groupKey(snapshot.backupType, snapshot.backupId);
    if (group !== currentGroup) {
      currentGroup = group;
      groupCounter = 0;
    }
    if (historyLimit > 0 && groupCounter >= historyLimit) continue;
    groupCounter += 1;
    exposed += 1;

    const labels = {
      datastore,
      backup_type: snapshot.backupType,
      backup_id: snapshot.backupId,
      comment: truncateComment(lookupComment(index, snapshot.backupType, snapshot.backupId)),
      timestamp: String(snapshot.backupTime),
    };

    const verification = snapshot.verification;
    const verified = verification?.state === 'ok';

    instruments.snapshotInfo.set(labels, snapshot.backupTime);
    instruments.snapshotSizeBytes.set({ ...labels, verified: verified ? 'true' : 'false' }, snapshot.size ?? 0);
    instruments.snapshotVerified.set(labels, verified ? 1 : 0);
    const lastVerify = verified ? verification?.lastVerify : undefined;
    if (lastVerify !== undefined) {
      instruments.snapshotVerificationTimestampSeconds.set(labels, lastVerify);
    }
    instruments.snapshotProtected.set(labels, snapshot.protected ? 1 : 0);
  }

  return { exposed, total: snapshots.length };
}

/**
 * Publish snapshot count and last backup time per backup group,
 * labelled with the comment of the group's latest snapshot.
 */
export function projectBackupGroups(
  instruments: Instruments,
  datastore: string,
  groups: readonly BackupGroup[],
  index: CommentIndex
): void {
  for (const group of groups) {
    const labels = {
      datastore,
      backup_type: group.backupType,
      backup_id: group.backupId,
      comment: truncateComment(lookupComment(index, group.backupType, group.backupId)),
    };
    instruments.snapshotCount.set(labels, group.backupCount);
    instruments.snapshotLastTimestampSeconds.set(labels, group.lastBackup);
  }
}

import type { Snapshot } from '../types/pbs';

const MAX_COMMENT_LENGTH = 50;
const TRUNCATED_COMMENT_LENGTH = 47;

export type CommentEntry = {
  backupType: string;
  backupId: string;
  backupTime: number;
  comment?: string;
};

/**
 * Latest snapshot time and its comment per backup group of one datastore.
 * Keyed by `groupKey(type, id)`.
 */
export type CommentIndex = Map<string, CommentEntry>;

/** Comments of backup groups across all datastores, keyed by task worker-id. */
export type TaskCommentMap = Map<string, string>;

/** NUL-joined, so a `/` inside a type or id cannot merge two groups. */
export function groupKey(backupType: string, backupId: string): string {
  return `${backupType}\u0000${backupId}`;
}

/** The worker-id PBS gives backup/verify/prune tasks of a group. */
export function workerIdFor(datastore: string, backupType: string, backupId: string): string {
  return `${datastore}:${backupType}/${backupId}`;
}

/**
 * Keep the comment of the most recent snapshot of each group.
 * A later snapshot replaces the entry only when strictly newer, so on equal
 * times the first one seen wins.
 */
export function buildCommentIndex(snapshots: readonly Snapshot[]): CommentIndex {
  const index: CommentIndex = new Map();
  for (const snapshot of snapshots) {
    const key = groupKey(snapshot.backupType, snapshot.backupId);
    const current = index.get(key);
    if (!current || snapshot.backupTime > current.backupTime) {
      index.set(key, {
        backupType: snapshot.backupType,
        backupId: snapshot.backupId,
        backupTime: snapshot.backupTime,
        comment: snapshot.comment,
      });
    }
  }
  return index;
}

export function lookupComment(index: CommentIndex, backupType: string, backupId: string): string {
  return index.get(groupKey(backupType, backupId))?.comment ?? '';
}

/**
 * Add the non-empty group comments of `datastore` to the task comment map.
 */
export function mergeTaskComments(target: TaskCommentMap, datastore: string, index: CommentIndex): void {
  for (const entry of index.values()) {
    if (entry.comment) {
      target.set(workerIdFor(datastore, entry.backupType, entry.backupId), entry.comment);
    }
  }
}

/**
 * Comments longer than 50 code points are cut to their first 47.
 */
export function truncateComment(comment: string): string {
  const chars = Array.from(comment);
  if (chars.length <= MAX_COMMENT_LENGTH) return comment;
  return chars.slice(0, TRUNCATED_COMMENT_LENGTH).join('');
}

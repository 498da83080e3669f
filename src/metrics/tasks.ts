import type { Task } from '../types/pbs';
import { TaskCommentMap, truncateComment } from './comments';
import type { Instruments } from './instruments';

const UNKNOWN = 'unknown';
const RUNNING = 'running';

type Counter<L> = Map<string, { labels: L; count: number }>;

function increment<L>(counter: Counter<L>, labels: L): void {
  const key = JSON.stringify(labels);
  const entry = counter.get(key);
  if (entry) {
    entry.count += 1;
  } else {
    counter.set(key, { labels, count: 1 });
  }
}

/**
 * The task's own comment, or else the comment of the backup group its
 * worker-id points at.
 */
export function resolveTaskComment(task: Task, comments: TaskCommentMap): string {
  if (task.comment) return task.comment;
  if (task.workerId) return comments.get(task.workerId) ?? '';
  return '';
}

export function isRunning(task: Task): boolean {
  return task.endTime === undefined || task.status === RUNNING;
}

/**
 * Publish task counts, durations, last run times and running counts.
 *
 * Durations are `endtime - starttime` as reported, negative values included.
 * The last finished task of a worker type in list order sets its last run
 * timestamp.
 */
export function projectTasks(instruments: Instruments, tasks: readonly Task[], comments: TaskCommentMap): void {
  const totals: Counter<{ worker_type: string; status: string; comment: string }> = new Map();
  const running: Counter<{ worker_type: string; comment: string }> = new Map();

  for (const task of tasks) {
    const comment = truncateComment(resolveTaskComment(task, comments));
    const status = task.status ?? UNKNOWN;

    increment(totals, { worker_type: task.workerType, status, comment });

    if (isRunning(task) || task.endTime === undefined) {
      increment(running, { worker_type: task.workerType, comment });
      continue;
    }

    instruments.taskDurationSeconds.set(
      {
        worker_type: task.workerType,
        status,
        worker_id: task.workerId ?? UNKNOWN,
        comment,
      },
      task.endTime - task.startTime
    );
    instruments.taskLastRunTimestamp.set({ worker_type: task.workerType }, task.endTime);
  }

  for (const { labels, count } of totals.values()) {
    instruments.taskTotal.set(labels, count);
  }
  for (const { labels, count } of running.values()) {
    instruments.taskRunning.set(labels, count);
  }
}

import { Registry } from 'prom-client';
import { CollectionError, FoundationalStep, MetricsError, errorMessage } from '../lib/errors';
import logger from '../lib/logger';
import { Mutex } from '../lib/mutex';
import { buildCommentIndex, mergeTaskComments, TaskCommentMap } from '../metrics/comments';
import {
  projectDatastoreUsage,
  projectGcStatus,
  projectNodeStatus,
  projectTapeDrives,
  projectVersion,
} from '../metrics/host';
import { Instruments, createInstruments, resetInstruments } from '../metrics/instruments';
import { projectBackupGroups, projectSnapshots } from '../metrics/snapshots';
import { projectTasks } from '../metrics/tasks';
import { DEFAULT_TASK_LIMIT, PbsClient } from '../services/pbs-api';

const log = logger.child('collector');

export type MetricsControllerOptions = {
  /** Snapshots exposed per backup group, newest first. 0 exposes all. */
  snapshotHistoryLimit?: number;
  taskLimit?: number;
};

export type AuxiliaryResource = 'snapshots' | 'groups' | 'tasks' | 'gc' | 'tape';

export type AuxiliaryFailure = {
  resource: AuxiliaryResource;
  datastore?: string;
  message: string;
};

export type CollectionSummary = {
  datastores: number;
  snapshotsExposed: number;
  snapshotsTotal: number;
  tasks: number;
  failures: AuxiliaryFailure[];
};

/**
 * Owns the Prometheus registry and rebuilds every series from the PBS API
 * on each `collect()`.
 *
 * `collect()` and `render()` share one lock, so a render never sees a
 * registry that is half reset and overlapping scrapes run one after another.
 */
export class MetricsController {
  private readonly registry = new Registry();
  private readonly instruments: Instruments;
  private readonly lock = new Mutex();
  private readonly snapshotHistoryLimit: number;
  private readonly taskLimit: number;

  constructor(
    private readonly client: PbsClient,
    options: MetricsControllerOptions = {}
  ) {
    const snapshotHistoryLimit = options.snapshotHistoryLimit ?? 0;
    if (!Number.isInteger(snapshotHistoryLimit) || snapshotHistoryLimit < 0) {
      throw new MetricsError(`snapshot history limit must be a non-negative integer, got ${snapshotHistoryLimit}`);
    }
    this.snapshotHistoryLimit = snapshotHistoryLimit;
    this.taskLimit = options.taskLimit ?? DEFAULT_TASK_LIMIT;
    this.instruments = createInstruments(this.registry);
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  /**
   * Run one full collection cycle. Rejects with `CollectionError` when node
   * status, datastore usage or version cannot be fetched; `pbs_up` is then 0
   * and nothing past the failed step is populated.
   */
  async collect(): Promise<CollectionSummary> {
    return this.lock.withLock(async () => {
      log.info('Collecting metrics from PBS');
      try {
        const summary = await this.collectInternal();
        this.instruments.up.set(1);
        log.info('Successfully collected metrics', {
          datastores: summary.datastores,
          snapshots: `${summary.snapshotsExposed}/${summary.snapshotsTotal}`,
          tasks: summary.tasks,
          failures: summary.failures.length,
        });
        return summary;
      } catch (err) {
        this.instruments.up.set(0);
        log.error('Failed to collect metrics', { err });
        throw err;
      }
    });
  }

  /** Prometheus text exposition of the current registry state. */
  async render(): Promise<string> {
    return this.lock.withLock(async () => {
      try {
        return await this.registry.metrics();
      } catch (err) {
        throw new MetricsError(`cannot encode metrics: ${errorMessage(err)}`, err);
      }
    });
  }

  private async foundational<T>(step: FoundationalStep, fetch: () => Promise<T>): Promise<T> {
    try {
      return await fetch();
    } catch (err) {
      throw new CollectionError(step, err);
    }
  }

  private async collectInternal(): Promise<CollectionSummary> {
    const metrics = this.instruments;
    resetInstruments(metrics);

    const failures: AuxiliaryFailure[] = [];
    // Auxiliary fetches only: a failure is recorded and the resource skipped.
    const auxiliary = async <T>(
      resource: AuxiliaryResource,
      fetch: () => Promise<T>,
      datastore?: string
    ): Promise<T | undefined> => {
      try {
        return await fetch();
      } catch (err) {
        log.error(`Failed to get ${resource}`, { datastore, err });
        failures.push({ resource, datastore, message: errorMessage(err) });
        return undefined;
      }
    };

    const nodeStatus = await this.foundational('node-status', () => this.client.getNodeStatus());
    projectNodeStatus(metrics, nodeStatus);

    const datastores = await this.foundational('datastore-usage', () => this.client.getDatastoreUsage());
    projectDatastoreUsage(metrics, datastores);

    const taskComments: TaskCommentMap = new Map();
    let snapshotsExposed = 0;
    let snapshotsTotal = 0;

    for (const ds of datastores) {
      const snapshots = (await auxiliary('snapshots', () => this.client.getSnapshots(ds.store), ds.store)) ?? [];

      const comments = buildCommentIndex(snapshots);
      mergeTaskComments(taskComments, ds.store, comments);

      const projection = projectSnapshots(metrics, ds.store, snapshots, comments, this.snapshotHistoryLimit);
      snapshotsExposed += projection.exposed;
      snapshotsTotal += projection.total;
      log.debug('Exposed snapshots', {
        datastore: ds.store,
        exposed: projection.exposed,
        total: projection.total,
        limit: this.snapshotHistoryLimit,
      });

      const groups = await auxiliary('groups', () => this.client.getBackupGroups(ds.store), ds.store);
      if (groups) {
        projectBackupGroups(metrics, ds.store, groups, comments);
      }
    }

    const tasks = await auxiliary('tasks', () => this.client.getTasks(this.taskLimit));
    if (tasks) {
      projectTasks(metrics, tasks, taskComments);
    }

    for (const ds of datastores) {
      const gc = await auxiliary('gc', () => this.client.getGcStatus(ds.store), ds.store);
      if (gc) {
        projectGcStatus(metrics, ds.store, gc);
      }
    }

    const drives = await auxiliary('tape', () => this.client.getTapeDrives());
    if (drives) {
      projectTapeDrives(metrics, drives);
    }

    const version = await this.foundational('version', () => this.client.getVersion());
    projectVersion(metrics, version);

    return {
      datastores: datastores.length,
      snapshotsExposed,
      snapshotsTotal,
      tasks: tasks?.length ?? 0,
      failures,
    };
  }
}

import { Registry } from 'prom-client';
import { beforeEach, describe, expect, it } from 'vitest';
import { nodeStatus } from '../test/fake-pbs-client';
import { projectGcStatus, projectNodeStatus, projectTapeDrives } from './host';
import { Instruments, createInstruments, resetInstruments } from './instruments';

describe('host projections', () => {
  let instruments: Instruments;

  beforeEach(() => {
    instruments = createInstruments(new Registry());
  });

  it('publishes node status as scalar gauges', async () => {
    projectNodeStatus(instruments, nodeStatus({ loadavg: [1.5, 1.25, 0.75] }));

    expect((await instruments.hostLoad1.get()).values[0]?.value).toBe(1.5);
    expect((await instruments.hostLoad15.get()).values[0]?.value).toBe(0.75);
    expect((await instruments.hostMemoryTotalBytes.get()).values[0]?.value).toBe(17179869184);
    expect((await instruments.hostUptimeSeconds.get()).values[0]?.value).toBe(86400);
  });

  it('publishes only the GC fields that are present', async () => {
    projectGcStatus(instruments, 'ds', { lastRunState: 'OK', removedBytes: 1024 });

    expect((await instruments.gcStatus.get()).values).toEqual([{ value: 1, labels: { datastore: 'ds' } }]);
    expect((await instruments.gcRemovedBytes.get()).values).toEqual([
      { value: 1024, labels: { datastore: 'ds' } },
    ]);
    expect((await instruments.gcPendingBytes.get()).values).toEqual([]);
    expect((await instruments.gcDurationSeconds.get()).values).toEqual([]);
  });

  it('reports any GC state other than ok as 0', async () => {
    projectGcStatus(instruments, 'ds', { lastRunState: 'ERROR: disk full' });

    expect((await instruments.gcStatus.get()).values[0]?.value).toBe(0);
  });

  it('counts tape drives and fills unknown identity fields', async () => {
    projectTapeDrives(instruments, [{ name: 'lto1', vendor: 'IBM' }, { name: 'lto2' }]);

    expect((await instruments.tapeDriveAvailable.get()).values[0]?.value).toBe(2);
    expect((await instruments.tapeDriveInfo.get()).values).toEqual([
      { value: 1, labels: { name: 'lto1', vendor: 'IBM', model: 'unknown', serial: 'unknown' } },
      { value: 1, labels: { name: 'lto2', vendor: 'unknown', model: 'unknown', serial: 'unknown' } },
    ]);
  });

  it('reset drops labelled series and zeroes scalars', async () => {
    projectNodeStatus(instruments, nodeStatus());
    projectTapeDrives(instruments, [{ name: 'lto1' }]);

    resetInstruments(instruments);

    expect((await instruments.tapeDriveInfo.get()).values).toEqual([]);
    expect((await instruments.hostCpuUsage.get()).values[0]?.value).toBe(0);
  });
});

import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { ConfigError } from '../lib/errors';
import { loadConfig, loadEnvFile, parseListenAddress, redactConfig } from './index';

const credentials = {
  PBS_EXPORTER__PBS__TOKEN_ID: 'test@pam!exporter',
  PBS_EXPORTER__PBS__TOKEN_SECRET: 'test-secret',
};

function configErrors(env: Record<string, string>): string[] {
  try {
    loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) return err.errors;
    throw err;
  }
  return [];
}

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig(credentials)).toEqual({
      pbs: {
        endpoint: 'https://localhost:8007',
        tokenId: 'test@pam!exporter',
        tokenSecret: 'test-secret',
        verifyTls: false,
        timeoutSeconds: 5,
        snapshotHistoryLimit: 0,
        taskLimit: 50,
      },
      exporter: {
        listenAddress: '0.0.0.0:9101',
        host: '0.0.0.0',
        port: 9101,
        logLevel: 'info',
        logJson: false,
      },
    });
  });

  it('reads overrides', () => {
    const config = loadConfig({
      ...credentials,
      PBS_EXPORTER__PBS__ENDPOINT: 'https://pbs.example.test:8007',
      PBS_EXPORTER__PBS__VERIFY_TLS: 'yes',
      PBS_EXPORTER__PBS__TIMEOUT_SECONDS: '10',
      PBS_EXPORTER__PBS__SNAPSHOT_HISTORY_LIMIT: '3',
      PBS_EXPORTER__PBS__TASK_LIMIT: '200',
      PBS_EXPORTER__EXPORTER__LISTEN_ADDRESS: '[::]:9200',
      PBS_EXPORTER__EXPORTER__LOG_LEVEL: 'DEBUG',
      PBS_EXPORTER__EXPORTER__LOG_JSON: 'true',
    });

    expect(config.pbs).toMatchObject({
      endpoint: 'https://pbs.example.test:8007',
      verifyTls: true,
      timeoutSeconds: 10,
      snapshotHistoryLimit: 3,
      taskLimit: 200,
    });
    expect(config.exporter).toEqual({
      listenAddress: '[::]:9200',
      host: '::',
      port: 9200,
      logLevel: 'debug',
      logJson: true,
    });
  });

  it('requires token credentials', () => {
    expect(configErrors({})).toEqual([
      'PBS API token credentials are required (PBS_EXPORTER__PBS__TOKEN_ID)',
      'PBS API token credentials are required (PBS_EXPORTER__PBS__TOKEN_SECRET)',
    ]);
  });

  it('treats blank values as unset', () => {
    expect(configErrors({ ...credentials, PBS_EXPORTER__PBS__TOKEN_SECRET: '  ' })).toEqual([
      'PBS API token credentials are required (PBS_EXPORTER__PBS__TOKEN_SECRET)',
    ]);
  });

  it('reports every invalid value at once', () => {
    expect(
      configErrors({
        ...credentials,
        PBS_EXPORTER__PBS__ENDPOINT: 'pbs.local:8007',
        PBS_EXPORTER__PBS__VERIFY_TLS: 'maybe',
        PBS_EXPORTER__PBS__TIMEOUT_SECONDS: 'soon',
        PBS_EXPORTER__PBS__SNAPSHOT_HISTORY_LIMIT: '-1',
        PBS_EXPORTER__PBS__TASK_LIMIT: '2.5',
        PBS_EXPORTER__EXPORTER__LISTEN_ADDRESS: '9101',
        PBS_EXPORTER__EXPORTER__LOG_LEVEL: 'verbose',
      })
    ).toEqual([
      "Invalid listen address '9101', expected host:port",
      "Unknown log level 'verbose'",
      'Env var PBS_EXPORTER__PBS__VERIFY_TLS must be boolean-like (true/false)',
      'Env var PBS_EXPORTER__PBS__TIMEOUT_SECONDS must be a number',
      'Env var PBS_EXPORTER__PBS__SNAPSHOT_HISTORY_LIMIT must be >= 0',
      'Env var PBS_EXPORTER__PBS__TASK_LIMIT must be an integer',
      "PBS endpoint must be an http(s) URL, got 'pbs.local:8007'",
    ]);
  });

  it('throws a ConfigError listing the problems', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({})).toThrow(/^Configuration error:\n/);
  });
});

describe('parseListenAddress', () => {
  it('splits host and port', () => {
    expect(parseListenAddress('127.0.0.1:9101')).toEqual({ host: '127.0.0.1', port: 9101 });
    expect(parseListenAddress('[::1]:80')).toEqual({ host: '::1', port: 80 });
  });

  it('rejects malformed addresses', () => {
    expect(parseListenAddress('localhost')).toBeNull();
    expect(parseListenAddress(':9101')).toBeNull();
    expect(parseListenAddress('0.0.0.0:70000')).toBeNull();
  });
});

describe('redactConfig', () => {
  it('hides the token secret only', () => {
    const config = loadConfig(credentials);
    const redacted = redactConfig(config);

    expect(redacted.pbs.tokenSecret).toBe('***REDACTED***');
    expect(redacted.pbs.tokenId).toBe('test@pam!exporter');
    expect(config.pbs.tokenSecret).toBe('test-secret');
  });
});

describe('loadEnvFile', () => {
  const keys = ['PBS_EXPORTER__PBS__TASK_LIMIT', 'PBS_EXPORTER__PBS__TIMEOUT_SECONDS'];
  let dir: string | undefined;

  afterEach(() => {
    for (const key of keys) delete process.env[key];
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('returns false for a missing file', () => {
    expect(loadEnvFile(path.join(os.tmpdir(), 'pbs-exporter-missing.env'))).toBe(false);
  });

  it('loads variables without overriding existing ones', () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pbs-exporter-'));
    const file = path.join(dir, 'exporter.env');
    fs.writeFileSync(file, 'PBS_EXPORTER__PBS__TASK_LIMIT=75\nPBS_EXPORTER__PBS__TIMEOUT_SECONDS=9\n');
    process.env.PBS_EXPORTER__PBS__TIMEOUT_SECONDS = '3';

    expect(loadEnvFile(file)).toBe(true);
    expect(process.env.PBS_EXPORTER__PBS__TASK_LIMIT).toBe('75');
    expect(process.env.PBS_EXPORTER__PBS__TIMEOUT_SECONDS).toBe('3');
  });
});

import dotenv from 'dotenv';
import fs from 'fs';
import { ConfigError } from '../lib/errors';
import { LevelName, isLevelName } from '../lib/logger';
import { DEFAULT_TASK_LIMIT } from '../services/pbs-api';

export type Config = {
  pbs: {
    endpoint: string;
    tokenId: string;
    tokenSecret: string;
    verifyTls: boolean;
    timeoutSeconds: number;
    snapshotHistoryLimit: number;
    taskLimit: number;
  };
  exporter: {
    listenAddress: string;
    host: string;
    port: number;
    logLevel: LevelName;
    logJson: boolean;
  };
};

type Env = Record<string, string | undefined>;

const PREFIX = 'PBS_EXPORTER__';
const REDACTED = '***REDACTED***';

/**
 * Collects every problem instead of stopping at the first one,
 * so a misconfigured deployment sees all of them at once.
 */
class EnvReader {
  readonly errors: string[] = [];

  constructor(private readonly env: Env) {}

  private raw(key: string): string | undefined {
    const value = this.env[PREFIX + key];
    if (value === undefined) return undefined;
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }

  string(key: string, fallback: string): string {
    return this.raw(key) ?? fallback;
  }

  required(key: string, message: string): string {
    const value = this.raw(key);
    if (!value) {
      this.errors.push(`${message} (${PREFIX + key})`);
      return '';
    }
    return value;
  }

  number(key: string, fallback: number, opts: { integer?: boolean; min?: number } = {}): number {
    const value = this.raw(key);
    if (value === undefined) return fallback;
    const parsed = Number(value);
    if (Number.isNaN(parsed)) {
      this.errors.push(`Env var ${PREFIX + key} must be a number`);
      return fallback;
    }
    if (opts.integer && !Number.isInteger(parsed)) {
      this.errors.push(`Env var ${PREFIX + key} must be an integer`);
      return fallback;
    }
    if (opts.min !== undefined && parsed < opts.min) {
      this.errors.push(`Env var ${PREFIX + key} must be >= ${opts.min}`);
      return fallback;
    }
    return parsed;
  }

  boolean(key: string, fallback: boolean): boolean {
    const value = this.raw(key);
    if (value === undefined) return fallback;
    const normalized = value.toLowerCase();
    if (['true', '1', 'yes', 'y'].includes(normalized)) return true;
    if (['false', '0', 'no', 'n'].includes(normalized)) return false;
    this.errors.push(`Env var ${PREFIX + key} must be boolean-like (true/false)`);
    return fallback;
  }
}

/**
 * Split `host:port` (IPv6 hosts in brackets, e.g. `[::]:9101`).
 */
export function parseListenAddress(address: string): { host: string; port: number } | null {
  const match = /^(?:\[([^\]]+)\]|([^:]+)):(\d{1,5})$/.exec(address);
  if (!match) return null;
  const host = match[1] ?? match[2];
  const port = Number(match[3]);
  if (!host || port > 65535) return null;
  return { host, port };
}

export function loadConfig(env: Env = process.env): Config {
  const reader = new EnvReader(env);

  const endpoint = reader.string('PBS__ENDPOINT', 'https://localhost:8007');
  const tokenId = reader.required('PBS__TOKEN_ID', 'PBS API token credentials are required');
  const tokenSecret = reader.required('PBS__TOKEN_SECRET', 'PBS API token credentials are required');

  const listenAddress = reader.string('EXPORTER__LISTEN_ADDRESS', '0.0.0.0:9101');
  const listen = parseListenAddress(listenAddress);
  if (!listen) {
    reader.errors.push(`Invalid listen address '${listenAddress}', expected host:port`);
  }

  const logLevelRaw = reader.string('EXPORTER__LOG_LEVEL', 'info').toLowerCase();
  if (!isLevelName(logLevelRaw)) {
    reader.errors.push(`Unknown log level '${logLevelRaw}'`);
  }

  const config: Config = {
    pbs: {
      endpoint,
      tokenId,
      tokenSecret,
      verifyTls: reader.boolean('PBS__VERIFY_TLS', false),
      timeoutSeconds: reader.number('PBS__TIMEOUT_SECONDS', 5, { min: 1 }),
      snapshotHistoryLimit: reader.number('PBS__SNAPSHOT_HISTORY_LIMIT', 0, { integer: true, min: 0 }),
      taskLimit: reader.number('PBS__TASK_LIMIT', DEFAULT_TASK_LIMIT, { integer: true, min: 1 }),
    },
    exporter: {
      listenAddress,
      host: listen?.host ?? '0.0.0.0',
      port: listen?.port ?? 9101,
      logLevel: isLevelName(logLevelRaw) ? logLevelRaw : 'info',
      logJson: reader.boolean('EXPORTER__LOG_JSON', false),
    },
  };

  if (!/^https?:\/\/\S+$/.test(config.pbs.endpoint)) {
    reader.errors.push(`PBS endpoint must be an http(s) URL, got '${config.pbs.endpoint}'`);
  }

  const errors = [...new Set(reader.errors)];
  if (errors.length > 0) {
    throw new ConfigError(errors);
  }
  return config;
}

/**
 * Load a dotenv file into `process.env` without overriding variables
 * that are already set. A missing file is not an error.
 */
export function loadEnvFile(path: string): boolean {
  if (!fs.existsSync(path)) return false;
  const result = dotenv.config({ path });
  if (result.error) {
    throw new ConfigError([`Cannot read config file ${path}: ${result.error.message}`]);
  }
  return true;
}

/** Copy of the config that is safe to log. */
export function redactConfig(config: Config): Config {
  return {
    ...config,
    pbs: { ...config.pbs, tokenSecret: REDACTED },
  };
}

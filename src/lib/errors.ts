export class ExporterError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExporterError';
    this.code = code;
  }
}

export type PbsApiErrorKind = 'http' | 'timeout' | 'network' | 'parse';

/**
 * A classified failure of one PBS API request.
 */
export class PbsApiError extends ExporterError {
  public readonly kind: PbsApiErrorKind;
  public readonly endpoint: string;
  public readonly status?: number;

  constructor(
    kind: PbsApiErrorKind,
    endpoint: string,
    message: string,
    options?: { status?: number; cause?: unknown }
  ) {
    super(`PBS API error on ${endpoint}: ${message}`, 'PBS_API_ERROR', { cause: options?.cause });
    this.name = 'PbsApiError';
    this.kind = kind;
    this.endpoint = endpoint;
    this.status = options?.status;
  }
}

export class ConfigError extends ExporterError {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Configuration error:\n${errors.join('\n')}`, 'CONFIG_ERROR');
    this.name = 'ConfigError';
    this.errors = errors;
  }
}

export class MetricsError extends ExporterError {
  constructor(message: string, cause?: unknown) {
    super(`Metrics error: ${message}`, 'METRICS_ERROR', { cause });
    this.name = 'MetricsError';
  }
}

export type FoundationalStep = 'node-status' | 'datastore-usage' | 'version';

/**
 * A foundational fetch failed, so the whole collection cycle was abandoned.
 */
export class CollectionError extends ExporterError {
  public readonly step: FoundationalStep;

  constructor(step: FoundationalStep, cause: unknown) {
    super(`Collection failed at ${step}: ${errorMessage(cause)}`, 'COLLECTION_ERROR', { cause });
    this.name = 'CollectionError';
    this.step = step;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

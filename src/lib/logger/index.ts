/**
 * Structured logger with namespaces.
 *
 * Initial settings come from the environment and can be replaced at start-up
 * with `configureLogger()` once the exporter configuration is loaded.
 *
 * Env:
 *  - LOG_ENABLED=0              -> disable logs (default: enabled)
 *  - LOG_LEVEL=debug|info|...   -> min level (default: info)
 *  - LOG_JSON=1                 -> JSON lines (default: pretty text)
 *  - LOG_SERVICE_NAME=exporter  -> service tag (default: pbs-exporter)
 */

export type LevelName = "trace" | "debug" | "info" | "warn" | "error";

export interface LogMeta {
    [key: string]: unknown;
    error?: unknown;
    err?: unknown;
}

export interface Logger {
    trace(message: unknown, meta?: LogMeta): void;
    debug(message: unknown, meta?: LogMeta): void;
    info(message: unknown, meta?: LogMeta): void;
    warn(message: unknown, meta?: LogMeta): void;
    error(message: unknown, meta?: LogMeta): void;
    child(namespace: string | string[]): Logger;
}

export interface LoggerSettings {
    enabled: boolean;
    level: LevelName;
    json: boolean;
    service: string;
}

const LEVELS: Record<LevelName, number> = {
    trace: 10,
    debug: 20,
    info: 30,
    warn: 40,
    error: 50,
};

export function isLevelName(value: string): value is LevelName {
    return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function levelFromEnv(value: string | undefined): LevelName {
    const normalized = (value || "info").toLowerCase();
    return isLevelName(normalized) ? normalized : "info";
}

const settings: LoggerSettings = {
    enabled: process.env.LOG_ENABLED !== "0",
    level: levelFromEnv(process.env.LOG_LEVEL),
    json: process.env.LOG_JSON === "1",
    service: process.env.LOG_SERVICE_NAME || "pbs-exporter",
};

/**
 * Override the settings every logger (including existing children) writes with.
 */
export function configureLogger(next: Partial<LoggerSettings>): void {
    Object.assign(settings, next);
}

export function getLoggerSettings(): Readonly<LoggerSettings> {
    return { ...settings };
}

function serializeError(err: unknown): unknown {
    if (!err) return undefined;
    if (err instanceof Error) {
        const extra: Record<string, unknown> = { ...err };
        delete extra.message;
        delete extra.name;
        delete extra.stack;
        return {
            message: err.message,
            stack: err.stack,
            name: err.name,
            ...extra,
        };
    }
    return err;
}

function safeStringify(obj: unknown): string {
    try {
        return JSON.stringify(obj, (_key, value: unknown) =>
            value instanceof Error ? serializeError(value) : value
        );
    } catch {
        return '{"_":"[unserializable]"}';
    }
}

function joinNamespace(ns?: string | string[]): string {
    if (!ns) return "";
    if (Array.isArray(ns)) return ns.join(":");
    return String(ns);
}

function baseLog({ ns }: { ns?: string | string[] }): Logger {
    const namespace = joinNamespace(ns);

    const write = (level: LevelName, msg: unknown, meta?: LogMeta) => {
        const levelValue = LEVELS[level];
        if (!settings.enabled || levelValue < LEVELS[settings.level]) return;

        const payload = {
            ts: new Date().toISOString(),
            level,
            ns: namespace || undefined,
            service: settings.service || undefined,
            pid: process.pid,
            msg: String(msg ?? ""),
            ...(meta ? { meta } : {}),
        };

        let line: string;
        if (settings.json) {
            line = safeStringify(payload);
        } else {
            const tags = [
                `[${payload.ts}]`,
                settings.service && `[${settings.service}]`,
                `[${level.toUpperCase()}]`,
                namespace && `[${namespace}]`,
            ]
                .filter(Boolean)
                .join(" ");

            const tail = payload.meta ? ` ${safeStringify(payload.meta)}` : "";
            line = `${tags} ${payload.msg}${tail}`;
        }

        if (levelValue >= LEVELS.error) {
            console.error(line);
        } else if (levelValue >= LEVELS.warn) {
            console.warn(line);
        } else {
            console.log(line);
        }
    };

    const child = (subNs: string | string[]): Logger => {
        const next = Array.isArray(subNs) ? subNs : [String(subNs)];
        const merged = namespace ? [namespace, ...next] : next;
        return baseLog({ ns: merged });
    };

    return {
        trace: (m, meta) => write("trace", m, meta),
        debug: (m, meta) => write("debug", m, meta),
        info: (m, meta) => write("info", m, meta),
        warn: (m, meta) => write("warn", m, meta),
        error: (m, meta) => write("error", m, meta),
        child,
    };
}

const logger = baseLog({ ns: "" });

export default logger;

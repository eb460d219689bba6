export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

export interface Logger {
  level: LogLevel;
  debug(msg: string, meta?: unknown): void;
  info(msg: string, meta?: unknown): void;
  warn(msg: string, meta?: unknown): void;
  error(msg: string, meta?: unknown): void;
}

const LEVEL_NUM: Record<LogLevel, number> = { silent: 0, error: 1, warn: 2, info: 3, debug: 4 };

const formatMeta = (meta: unknown) => {
  if (meta === undefined) return "";
  try {
    return " " + JSON.stringify(meta);
  } catch {
    return " [meta:unstringifiable]";
  }
};

function isLogLevel(v: string): v is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_NUM, v);
}

/**
 * Leveled console logger. Everything goes to stderr so that stdout stays free
 * for anything the CLI may print.
 */
export function createLogger(level: LogLevel, prefix = "fixtrace"): Logger {
  const threshold = LEVEL_NUM[level];
  const should = (l: LogLevel) => LEVEL_NUM[l] <= threshold;

  return {
    level,
    debug: (msg, meta) => { if (should("debug")) console.error(`[${prefix}][debug] ${msg}${formatMeta(meta)}`); },
    info: (msg, meta) => { if (should("info")) console.error(`[${prefix}] ${msg}${formatMeta(meta)}`); },
    warn: (msg, meta) => { if (should("warn")) console.error(`[${prefix}][warn] ${msg}${formatMeta(meta)}`); },
    error: (msg, meta) => { if (should("error")) console.error(`[${prefix}][error] ${msg}${formatMeta(meta)}`); },
  };
}

export function envLogLevel(env: Record<string, string | undefined>): LogLevel {
  const v = (env.FIXTRACE_LOG_LEVEL || env.LOG_LEVEL || "").toLowerCase();
  return isLogLevel(v) ? v : "info";
}

/** A logger that drops everything; handy default for library callers and tests. */
export const silentLogger: Logger = createLogger("silent");

export const logger: Logger = createLogger(envLogLevel(process.env));

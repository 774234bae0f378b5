/**
 * Define log levels
 * Can be controlled by environment variable `LOG_LEVEL` or `configureLogger()`.
 * Examples: LOG_LEVEL=DEBUG, LOG_LEVEL=INFO, LOG_LEVEL=WARN, LOG_LEVEL=ERROR
 *
 * Priority: ERROR > WARN > LOG > INFO > DEBUG
 * Only logs at or above the set level will be output
 */

export enum LogLevel {
  ERROR = "ERROR",
  WARN = "WARN",
  INFO = "INFO",
  DEBUG = "DEBUG",
  LOG = "LOG",
}

export type LogRecord = {
  tsMs: number;
  level: LogLevel;
  scope?: string;
  message: string;
  fields?: Record<string, string>;
};

export interface LogSink {
  write(record: LogRecord): void;
}

export interface Logger {
  log: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

// Define log level priority (lower number = higher priority)
const LOG_LEVEL_PRIORITY = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.LOG]: 2,
  [LogLevel.INFO]: 3,
  [LogLevel.DEBUG]: 4,
} as const;

const LEVEL_COLORS: Record<LogLevel, string | null> = {
  [LogLevel.ERROR]: "\x1b[31m", // Red
  [LogLevel.WARN]: "\x1b[33m", // Yellow
  [LogLevel.INFO]: "\x1b[36m", // Cyan
  [LogLevel.DEBUG]: "\x1b[32m", // Green
  [LogLevel.LOG]: null,
};

let configuredLevel: LogLevel | null = null;
let sink: LogSink | null = null;

export function isLogLevel(value: string): value is LogLevel {
  return Object.values<string>(LogLevel).includes(value);
}

const getCurrentLogLevel = (): LogLevel => {
  if (configuredLevel) return configuredLevel;

  const envLevel = process.env.LOG_LEVEL?.toUpperCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }

  // Default is INFO
  return LogLevel.INFO;
};

const shouldLog = (level: LogLevel): boolean => {
  return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[getCurrentLogLevel()];
};

const colorize = (message: string, level: LogLevel): string => {
  const color = LEVEL_COLORS[level];
  return color === null ? message : `${color}${message}\x1b[0m`;
};

const formatHeader = (level: LogLevel, scope: string | undefined): string => {
  const scopeTag = scope ? ` [${scope}]` : "";
  return colorize(`[${new Date().toISOString()}] [${level}]${scopeTag}`, level);
};

// ─────────────────────────────────────────────────────────────────────────────
// Record building
// ─────────────────────────────────────────────────────────────────────────────

function stringifyValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  if (value instanceof Date) return value.toISOString();
  return JSON.stringify(value, (_key, nested: unknown) => (nested instanceof Error ? nested.message : nested));
}

function isFieldsObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !(value instanceof Error) && !Array.isArray(value);
}

function toFields(args: unknown[]): Record<string, string> | undefined {
  // Common case in this codebase: logger.info("msg", { ...fields })
  const maybeFields = args[1];
  if (!isFieldsObject(maybeFields)) return undefined;

  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(maybeFields)) {
    out[k] = stringifyValue(v);
  }
  return Object.keys(out).length > 0 ? out : undefined;
}

function toMessage(args: unknown[]): string {
  if (args.length === 0) return "";
  const [first, ...rest] = args;
  const head = stringifyValue(first);

  // The fields object lives in `fields`, not in the message
  const tail = isFieldsObject(rest[0]) ? rest.slice(1) : rest;
  if (tail.length === 0) return head;

  return `${head} ${tail.map(stringifyValue).join(" ")}`.trim();
}

function emit(level: LogLevel, scope: string | undefined, args: unknown[], consoleFn: (...a: unknown[]) => void): void {
  if (!shouldLog(level)) return;

  const record: LogRecord = {
    tsMs: Date.now(),
    level,
    scope,
    message: toMessage(args),
    fields: toFields(args),
  };

  if (sink) {
    sink.write(record);
    return;
  }

  consoleFn(formatHeader(level, scope), ...args);
}

function buildLogger(scope: string | undefined): Logger {
  return {
    log: (...args: unknown[]) => {
      emit(LogLevel.LOG, scope, args, console.log);
    },
    info: (...args: unknown[]) => {
      emit(LogLevel.INFO, scope, args, console.info);
    },
    debug: (...args: unknown[]) => {
      emit(LogLevel.DEBUG, scope, args, console.log);
    },
    warn: (...args: unknown[]) => {
      emit(LogLevel.WARN, scope, args, console.warn);
    },
    error: (...args: unknown[]) => {
      emit(LogLevel.ERROR, scope, args, console.error);
    },
  };
}

/**
 * Override the level from `LOG_LEVEL` (e.g. with the validated env value)
 */
export function configureLogger(options: { level?: LogLevel | `${LogLevel}` }): void {
  configuredLevel = options.level && isLogLevel(options.level) ? options.level : null;
}

/**
 * Logger whose records carry a scope tag, e.g. `createLogger("ingest")`
 */
export function createLogger(scope: string): Logger {
  return buildLogger(scope);
}

export const logger = {
  ...buildLogger(undefined),
  /**
   * Get the currently set log level
   */
  getCurrentLevel: (): LogLevel => getCurrentLogLevel(),
  /**
   * Get list of available log levels
   */
  getLevels: () => Object.values(LogLevel),
  /**
   * Route logs to a custom sink (e.g., a test collector).
   */
  setSink: (next: LogSink) => {
    sink = next;
  },
  /**
   * Restore default console logging.
   */
  clearSink: () => {
    sink = null;
  },
};

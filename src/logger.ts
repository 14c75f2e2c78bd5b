export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

/** Parse a level name (case-insensitive). Returns undefined for anything unrecognized. */
export function parseLogLevel(raw: string | undefined): LogLevel | undefined {
  if (!raw) return undefined;
  return LEVEL_NAMES[raw.trim().toLowerCase()];
}

// TP90X_LOG_LEVEL wins over the DEBUG flag
let currentLevel =
  parseLogLevel(process.env.TP90X_LOG_LEVEL) ??
  (process.env.DEBUG ? LogLevel.DEBUG : LogLevel.INFO);

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

type Sink = (line: string) => void;

const SINKS: Record<Exclude<LogLevel, LogLevel.SILENT>, Sink> = {
  [LogLevel.DEBUG]: (line) => console.log(line),
  [LogLevel.INFO]: (line) => console.log(line),
  [LogLevel.WARN]: (line) => console.warn(line),
  [LogLevel.ERROR]: (line) => console.error(line),
};

function timestamp(): string {
  return new Date().toISOString().replace('T', ' ').replace('Z', '');
}

/** Leading newlines stay ahead of the timestamp so blank separator lines survive. */
function formatLine(prefix: string, msg: string): string {
  const nl = /^\n+/.exec(msg)?.[0] ?? '';
  return `${nl}${timestamp()} ${prefix} ${msg.slice(nl.length)}`;
}

/**
 * Logger for one component. Lines look like
 * `2024-01-02 03:04:05.678 [Session] opened`; debug lines use `[Session:debug]`.
 */
export function createLogger(scope: string): Logger {
  const emit =
    (level: Exclude<LogLevel, LogLevel.SILENT>, prefix: string) =>
    (msg: string): void => {
      if (currentLevel <= level) SINKS[level](formatLine(prefix, msg));
    };

  return {
    debug: emit(LogLevel.DEBUG, `[${scope}:debug]`),
    info: emit(LogLevel.INFO, `[${scope}]`),
    warn: emit(LogLevel.WARN, `[${scope}]`),
    error: emit(LogLevel.ERROR, `[${scope}]`),
  };
}

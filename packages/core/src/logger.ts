import pc from "picocolors";

export type LogLevel = "silent" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["silent", "warn", "info", "debug"];

export interface Logger {
  readonly level: LogLevel;
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

export interface LoggerOptions {
  level: LogLevel;
  /** Channel name shown at debug verbosity */
  name?: string;
  /** Defaults to process.stderr */
  stream?: { write(chunk: string): unknown };
}

const WEIGHT: Record<LogLevel, number> = { silent: 0, warn: 1, info: 2, debug: 3 };

type Severity = "error" | "warn" | "info" | "debug";

const THRESHOLD: Record<Severity, LogLevel> = {
  error: "warn",
  warn: "warn",
  info: "info",
  debug: "debug",
};

const TAG: Record<Severity, (text: string) => string> = {
  error: (text) => pc.red(text),
  warn: (text) => pc.yellow(text),
  info: (text) => pc.blue(text),
  debug: (text) => pc.dim(text),
};

/**
 * Map the CLI's -q / -v flags onto a level.
 * -v is warnings only, -vv is the default (info), -vvv and beyond is debug.
 */
export function verbosityToLevel(verbose: number, quiet = false): LogLevel {
  if (quiet) return "silent";
  if (verbose <= 0) return "info";
  if (verbose === 1) return "warn";
  if (verbose === 2) return "info";
  return "debug";
}

export function isLogLevelEnabled(current: LogLevel, wanted: LogLevel): boolean {
  return wanted !== "silent" && WEIGHT[current] >= WEIGHT[wanted];
}

export function createLogger(options: LoggerOptions): Logger {
  const { level, name = "keysync" } = options;
  const stream = options.stream ?? process.stderr;

  const emit = (severity: Severity, message: string) => {
    if (!isLogLevelEnabled(level, THRESHOLD[severity])) return;
    const label = TAG[severity](severity.toUpperCase());
    const line = level === "debug" ? `${label} [${name}] ${message}` : `${label}: ${message}`;
    stream.write(`${line}\n`);
  };

  return {
    level,
    error: (message) => emit("error", message),
    warn: (message) => emit("warn", message),
    info: (message) => emit("info", message),
    debug: (message) => emit("debug", message),
  };
}

/** Used by components constructed without a logger. */
export const silentLogger: Logger = createLogger({ level: "silent" });

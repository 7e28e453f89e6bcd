export type LogLevel =
  | "trace"
  | "debug"
  | "info"
  | "warn"
  | "error"
  | "fatal"
  | "silent";

export const LOG_LEVEL_NAMES = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
] as const satisfies readonly LogLevel[];

const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
  silent: Infinity,
};

export type LogStream = "stdout" | "stderr";

/**
 * Output sink. Defaults to the process streams.
 */
export type LogWriter = (stream: LogStream, data: string) => void;

export interface LoggerConfig {
  level?: LogLevel;
  name?: string;
  timestamp?: boolean;
  json?: boolean;
  write?: LogWriter;
}

export interface Logger {
  trace(msg: string, data?: Record<string, unknown>): void;
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  fatal(msg: string, data?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): Logger;
}

const writeToProcess: LogWriter = (stream, data) => {
  if (stream === "stderr") {
    process.stderr.write(data);
  } else {
    process.stdout.write(data);
  }
};

// SGR parameters
const LEVEL_SGR: Record<LogLevel, number[]> = {
  trace: [90],
  debug: [34],
  info: [32],
  warn: [33],
  error: [31],
  fatal: [35],
  silent: [],
};

function paint(codes: readonly number[], text: string): string {
  return codes.length === 0 ? text : `\x1b[${codes.join(";")}m${text}\x1b[0m`;
}

function clock(time: number): string {
  const date = new Date(time);
  const pad = (value: number, width = 2) => String(value).padStart(width, "0");
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${
    pad(date.getSeconds())
  }.${pad(date.getMilliseconds(), 3)}`;
}

interface LogEntry {
  level: LogLevel;
  time: number;
  msg: string;
  [key: string]: unknown;
}

type LogFormatter = (entry: LogEntry) => string;

/**
 * One line per entry: `[time] [name] LEVEL msg key=value ...`.
 */
function prettyFormatter(
  name: string | undefined,
  showTimestamp: boolean,
): LogFormatter {
  return ({ level, time, msg, ...fields }) => {
    const parts: string[] = [];
    if (showTimestamp) parts.push(paint([90], clock(time)));
    if (name) parts.push(paint([36, 1], `[${name}]`));
    parts.push(paint(LEVEL_SGR[level], level.toUpperCase().padEnd(5)), msg);

    for (const [key, value] of Object.entries(fields)) {
      const text = typeof value === "string" ? value : JSON.stringify(value);
      parts.push(`${paint([2], `${key}=`)}${text}`);
    }
    return `${parts.join(" ")}\n`;
  };
}

function jsonFormatter(name: string | undefined): LogFormatter {
  return (entry) =>
    `${JSON.stringify(name ? { ...entry, name } : entry)}\n`;
}

export function createLogger(
  options: LoggerConfig = {},
  bindings: Record<string, unknown> = {},
): Logger {
  const currentLevel = options.level ?? "info";
  const name = options.name;
  const format = options.json
    ? jsonFormatter(name)
    : prettyFormatter(name, options.timestamp ?? true);
  const write = options.write ?? writeToProcess;

  const shouldLog = (level: LogLevel): boolean => {
    return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
  };

  const log = (
    level: LogLevel,
    msg: string,
    data?: Record<string, unknown>,
  ): void => {
    if (!shouldLog(level)) return;

    const entry: LogEntry = {
      ...bindings,
      ...data,
      level,
      time: Date.now(),
      msg,
    };

    write(
      level === "error" || level === "fatal" ? "stderr" : "stdout",
      format(entry),
    );
  };

  return {
    trace(msg, data) {
      log("trace", msg, data);
    },
    debug(msg, data) {
      log("debug", msg, data);
    },
    info(msg, data) {
      log("info", msg, data);
    },
    warn(msg, data) {
      log("warn", msg, data);
    },
    error(msg, data) {
      log("error", msg, data);
    },
    fatal(msg, data) {
      log("fatal", msg, data);
    },
    child(childBindings) {
      const { name: childName, ...rest } = childBindings;
      const fullName = childName
        ? name ? `${name}:${String(childName)}` : String(childName)
        : name;

      return createLogger(
        { ...options, name: fullName },
        { ...bindings, ...rest },
      );
    },
  };
}

export function isLogger(value: unknown): value is Logger {
  return (
    typeof value === "object" &&
    value !== null &&
    "info" in value &&
    "error" in value &&
    "child" in value &&
    typeof value.info === "function" &&
    typeof value.error === "function" &&
    typeof value.child === "function"
  );
}

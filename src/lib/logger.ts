import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
export type LogMeta = Record<string, unknown>;

export interface LogRecord {
  level: Exclude<LogLevel, "silent">;
  time: string;
  message: string;
  meta?: LogMeta;
}

export type LogSink = (record: LogRecord) => void;

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

const LEVEL_TAG: Record<LogRecord["level"], string> = {
  debug: chalk.gray("DEBUG"),
  info: chalk.cyan("INFO "),
  warn: chalk.yellow("WARN "),
  error: chalk.red("ERROR")
};

const consoleSink: LogSink = (record) => {
  const meta = record.meta && Object.keys(record.meta).length > 0 ? ` ${chalk.dim(JSON.stringify(record.meta))}` : "";
  const line = `${chalk.dim(record.time)} ${LEVEL_TAG[record.level]} ${record.message}${meta}`;
  if (record.level === "warn" || record.level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
};

let activeLevel: LogLevel = parseLogLevel(process.env.WARDEN_LOG_LEVEL) ?? "info";
let activeSink: LogSink = consoleSink;

export function configureLogger(options: { level?: LogLevel; sink?: LogSink }): void {
  if (options.level) {
    activeLevel = options.level;
  }
  if (options.sink) {
    activeSink = options.sink;
  }
}

export function parseLogLevel(raw?: string): LogLevel | undefined {
  const value = (raw ?? "").trim().toLowerCase();
  if (value === "debug" || value === "info" || value === "warn" || value === "error" || value === "silent") {
    return value;
  }
  return undefined;
}

function emit(level: LogRecord["level"], message: string, meta?: LogMeta): void {
  if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[activeLevel]) {
    return;
  }
  activeSink({ level, time: new Date().toISOString(), message, meta });
}

export const logger = {
  debug: (message: string, meta?: LogMeta) => emit("debug", message, meta),
  info: (message: string, meta?: LogMeta) => emit("info", message, meta),
  warn: (message: string, meta?: LogMeta) => emit("warn", message, meta),
  error: (message: string, meta?: LogMeta) => emit("error", message, meta)
};

/**
 * Subsystem Logger
 *
 * Line-oriented console logger tagged with the subsystem that produced the line.
 * The level threshold comes from EGRESS_LOG_LEVEL and is read on every call so a
 * test harness or the entry point can change it after modules load.
 */

import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export type SubsystemLogger = {
  subsystem: string;
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
};

const LEVEL_ORDER: Record<LogLevel | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LEVEL_COLOR: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export function isLogLevel(value: string): value is LogLevel | "silent" {
  return Object.hasOwn(LEVEL_ORDER, value);
}

function resolveThreshold(): number {
  const raw = process.env.EGRESS_LOG_LEVEL?.trim().toLowerCase();
  if (raw && isLogLevel(raw)) {
    return LEVEL_ORDER[raw];
  }
  return LEVEL_ORDER.info;
}

function formatValue(value: unknown): string {
  if (value instanceof Error) {
    return JSON.stringify(value.message);
  }
  if (typeof value === "string") {
    return /\s/.test(value) ? JSON.stringify(value) : value;
  }
  return JSON.stringify(value) ?? String(value);
}

export function formatFields(fields?: LogFields): string {
  if (!fields) {
    return "";
  }
  const parts: string[] = [];
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) {
      continue;
    }
    parts.push(`${key}=${formatValue(value)}`);
  }
  return parts.length > 0 ? ` ${parts.join(" ")}` : "";
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  function write(level: LogLevel, message: string, fields?: LogFields) {
    if (LEVEL_ORDER[level] < resolveThreshold()) {
      return;
    }
    const ts = chalk.dim(new Date().toISOString());
    const tag = chalk.magenta(`[${subsystem}]`);
    const line = `${ts} ${tag} ${LEVEL_COLOR[level](`[${level}]`)} ${message}${formatFields(fields)}`;
    if (level === "error" || level === "warn") {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  return {
    subsystem,
    debug: (message, fields) => write("debug", message, fields),
    info: (message, fields) => write("info", message, fields),
    warn: (message, fields) => write("warn", message, fields),
    error: (message, fields) => write("error", message, fields),
  };
}

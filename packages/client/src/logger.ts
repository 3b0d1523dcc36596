/**
 * Client logging
 *
 * Calls collect DsspLogger entries while they run and hand them to winston in
 * one go when they finish. The console shows the formatted line; the optional
 * file gets one JSON record per entry.
 */
import { DsspLogger } from "@dssp-client/shared";
import { config } from "dotenv";
import winston from "winston";

import type { LogEntry, LogLevel } from "@dssp-client/shared";

config();

/** "success" and "warning" are first-class levels */
const levels: Record<LogLevel, number> = {
  error: 0,
  warning: 1,
  success: 2,
  info: 3,
  debug: 4,
};

winston.addColors({
  error: "red",
  warning: "yellow",
  success: "green",
  info: "blue",
  debug: "gray",
});

const isLogLevel = (value: string): value is LogLevel => Object.hasOwn(levels, value);

const isLogEntry = (value: unknown): value is LogEntry =>
  typeof value === "object" &&
  value !== null &&
  "message" in value &&
  "source" in value &&
  "level" in value;

export interface ClientLogSettings {
  level: LogLevel;
  /** LOG_LEVEL=silent: nothing is written */
  silent: boolean;
  /** DSSP_LOG_FILE: JSON records are appended here as well */
  file?: string;
  /** Console context as JSON instead of key:value pairs (NODE_ENV=production) */
  json: boolean;
}

export function readLogSettings(
  env: Record<string, string | undefined> = process.env,
): ClientLogSettings {
  const level = (env.LOG_LEVEL ?? "").trim().toLowerCase();
  const file = env.DSSP_LOG_FILE?.trim();
  return {
    level: isLogLevel(level) ? level : "info",
    silent: level === "silent",
    ...(file ? { file } : {}),
    json: env.NODE_ENV === "production",
  };
}

/** The JSON record written for an entry: its own timestamp, source and context */
export function toLogRecord(entry: LogEntry): Record<string, unknown> {
  return {
    timestamp: entry.timestamp,
    level: entry.level,
    source: entry.source,
    message: entry.message,
    ...(entry.context ? { context: entry.context } : {}),
  };
}

const logSettings = readLogSettings();

export const dsspClientLogger = new DsspLogger({
  level: logSettings.level,
  includeTimestamp: true,
  includeSource: true,
  formatJson: logSettings.json,
});

const consoleLine = winston.format.printf((info) => {
  if (isLogEntry(info.dsspEntry)) {
    return dsspClientLogger.formatLogEntry(info.dsspEntry);
  }
  const message = typeof info.message === "string" ? info.message : String(info.message);
  return `${new Date().toISOString()} [${info.level.toUpperCase()}] ${message}`;
});

const fileRecord = winston.format((info) => {
  if (!isLogEntry(info.dsspEntry)) return info;
  const record = toLogRecord(info.dsspEntry);
  delete info.dsspEntry;
  return Object.assign(info, record);
});

export function createClientLogger(settings: ClientLogSettings): winston.Logger {
  const consoleTransport = new winston.transports.Console({
    format: winston.format.combine(consoleLine, winston.format.colorize({ all: true })),
  });
  const fileTransports = settings.file
    ? [
        new winston.transports.File({
          filename: settings.file,
          maxsize: 5 * 1024 * 1024,
          maxFiles: 3,
          format: winston.format.combine(fileRecord(), winston.format.json()),
        }),
      ]
    : [];

  return winston.createLogger({
    levels,
    level: settings.level,
    silent: settings.silent,
    transports: [consoleTransport, ...fileTransports],
  });
}

export const logger = createClientLogger(logSettings);

/** Write one entry now; used outside a client call */
export function logDssp(entry: LogEntry): void {
  if (!dsspClientLogger.shouldLog(entry.level)) return;
  logger.log(entry.level, entry.message, { dsspEntry: entry });
}

/** Write the entries a call collected, in order */
export function flushDssp(entries: readonly LogEntry[]): void {
  entries.forEach(logDssp);
}

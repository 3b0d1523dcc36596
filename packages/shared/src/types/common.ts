/**
 * Common types used throughout the DSS-P client
 */

export type LogLevel = "debug" | "info" | "success" | "warning" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  source: "client" | "builder" | "channel" | "session" | "report" | "signer";
  message: string;
  context?: Record<string, unknown>;
}

export interface DsspErrorInfo {
  code: string;
  message: string;
  details?: Record<string, unknown>;
  timestamp: string;
}

/** The four flows a client runs against the service */
export type DsspFlow = "async-sign" | "two-step" | "seal" | "verify";

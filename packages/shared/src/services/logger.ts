/**
 * Structured logging for DSS-P protocol operations
 * Builds entries carrying flow context; transports live with the runtime package.
 * Entries are returned to the caller, never kept, so concurrent calls share nothing.
 */

import type { DsspFlow, LogEntry, LogLevel } from "../types/common";

export interface DsspLogContext {
  flow?: DsspFlow;
  step?: "build" | "exchange" | "validate" | "extract" | "sign";
  documentId?: string;
  responseId?: string;
  correlationId?: string;
  channelMode?: string;
  duration?: number;
}

export interface LoggerConfig {
  level: LogLevel;
  includeTimestamp: boolean;
  includeSource: boolean;
  formatJson?: boolean;
}

const LEVEL_ORDER: LogLevel[] = ["debug", "info", "success", "warning", "error"];

export class DsspLogger {
  private readonly config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      level: "info",
      includeTimestamp: true,
      includeSource: true,
      formatJson: false,
      ...config,
    };
  }

  /**
   * Create a log entry with DSS-P context
   */
  createLogEntry(
    level: LogLevel,
    source: LogEntry["source"],
    message: string,
    context?: DsspLogContext & Record<string, unknown>,
  ): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      source,
      message,
      context,
    };
  }

  /**
   * Log with flow context
   */
  logFlowStep(
    level: LogLevel,
    source: LogEntry["source"],
    flow: DsspFlow,
    step: DsspLogContext["step"],
    message: string,
    additionalContext?: Record<string, unknown>,
  ): LogEntry {
    return this.createLogEntry(level, source, message, {
      flow,
      step,
      ...additionalContext,
    });
  }

  /**
   * Log performance timing
   */
  logTiming(
    level: LogLevel,
    source: LogEntry["source"],
    operation: string,
    duration: number,
    additionalContext?: Record<string, unknown>,
  ): LogEntry {
    return this.createLogEntry(level, source, `${operation} completed`, {
      duration,
      ...additionalContext,
    });
  }

  /**
   * Format log entry for display
   */
  formatLogEntry(entry: LogEntry): string {
    const timestamp = this.config.includeTimestamp ? `${entry.timestamp} ` : "";
    const source = this.config.includeSource ? `[${entry.source.toUpperCase()}] ` : "";
    const level = `[${entry.level.toUpperCase()}] `;

    let contextStr = "";
    if (entry.context) {
      if (this.config.formatJson) {
        contextStr = ` ${JSON.stringify(entry.context)}`;
      } else {
        const contextParts: string[] = [];
        const { flow, step, documentId, duration } = entry.context;

        if (typeof flow === "string") contextParts.push(`flow:${flow}`);
        if (typeof step === "string") contextParts.push(`step:${step}`);
        if (typeof documentId === "string") contextParts.push(`doc:${documentId}`);
        if (typeof duration === "number") contextParts.push(`${duration.toString()}ms`);

        if (contextParts.length > 0) {
          contextStr = ` (${contextParts.join(", ")})`;
        }
      }
    }

    return `${timestamp}${source}${level}${entry.message}${contextStr}`;
  }

  /**
   * Check if a log level should be output based on current config
   */
  shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.config.level);
  }
}

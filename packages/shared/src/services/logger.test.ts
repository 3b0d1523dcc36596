import { describe, expect, it } from "vitest";

import { DsspLogger } from "./logger";

describe("DsspLogger", () => {
  it("should format an entry with its flow context", () => {
    const logger = new DsspLogger({ includeTimestamp: false });

    const entry = logger.createLogEntry("info", "client", "verify call completed", {
      flow: "verify",
      step: "exchange",
      documentId: "doc-1",
      duration: 12,
    });

    expect(logger.formatLogEntry(entry)).toBe(
      "[CLIENT] [INFO] verify call completed (flow:verify, step:exchange, doc:doc-1, 12ms)",
    );
  });

  it("should print the context as JSON when asked", () => {
    const logger = new DsspLogger({ includeTimestamp: false, includeSource: false, formatJson: true });

    const entry = logger.createLogEntry("warning", "signer", "Issuer not found", { chainLength: 1 });

    expect(logger.formatLogEntry(entry)).toBe('[WARNING] Issuer not found {"chainLength":1}');
  });

  it("should merge flow and step into the context", () => {
    const logger = new DsspLogger();

    const entry = logger.logFlowStep("info", "session", "two-step", "extract", "Document hash received", {
      correlationId: "correlation-1",
    });

    expect(entry.level).toBe("info");
    expect(entry.source).toBe("session");
    expect(entry.context).toEqual({ flow: "two-step", step: "extract", correlationId: "correlation-1" });
  });

  it("should name a timed operation", () => {
    const logger = new DsspLogger();

    const entry = logger.logTiming("success", "client", "seal call", 40, { flow: "seal" });

    expect(entry.message).toBe("seal call completed");
    expect(entry.context).toEqual({ duration: 40, flow: "seal" });
  });

  it("should only log at or above the configured level", () => {
    const logger = new DsspLogger({ level: "warning" });

    expect(logger.shouldLog("info")).toBe(false);
    expect(logger.shouldLog("warning")).toBe(true);
    expect(logger.shouldLog("error")).toBe(true);
  });
});

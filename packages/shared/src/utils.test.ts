import { describe, expect, it } from "vitest";

import { RESULT_MAJOR } from "./constants";
import { createDsspError, describeResult, isValidPEM, shortResultCode } from "./utils";

describe("describeResult", () => {
  it("should join major, minor and message", () => {
    expect(
      describeResult({
        resultMajor: "urn:test:major",
        resultMinor: "urn:test:minor",
        resultMessage: { value: "details" },
      }),
    ).toBe("urn:test:major urn:test:minor: details");
  });

  it("should leave out absent parts", () => {
    expect(describeResult({ resultMajor: "urn:test:major" })).toBe("urn:test:major");
  });
});

describe("shortResultCode", () => {
  it("should keep the last segment of a result URI", () => {
    expect(shortResultCode(RESULT_MAJOR.PENDING)).toBe("Pending");
    expect(shortResultCode("http://www.w3.org/2001/04/xmlenc#sha256")).toBe("sha256");
    expect(shortResultCode(undefined)).toBeUndefined();
  });
});

describe("createDsspError", () => {
  it("should stamp the error with a timestamp", () => {
    const info = createDsspError("PRECONDITION_FAILED", "A document is required", { argument: "document" });

    expect(info.code).toBe("PRECONDITION_FAILED");
    expect(info.details).toEqual({ argument: "document" });
    expect(Number.isNaN(Date.parse(info.timestamp))).toBe(false);
  });
});

describe("isValidPEM", () => {
  it("should accept a PEM block", () => {
    expect(isValidPEM("-----BEGIN CERTIFICATE-----\nAAAA\n-----END CERTIFICATE-----\n")).toBe(true);
    expect(isValidPEM("AAAA")).toBe(false);
  });
});

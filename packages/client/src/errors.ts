import { createDsspError, describeResult } from "@dssp-client/shared";

import type { DsspErrorInfo, DsspResult } from "@dssp-client/shared";

/**
 * Caller supplied a missing or unusable input. Raised before any network call.
 */
export class DsspPreconditionError extends Error {
  public readonly argument?: string;

  constructor(message: string, argument?: string) {
    super(message);
    this.name = "DsspPreconditionError";
    if (argument !== undefined) this.argument = argument;
  }

  toErrorInfo(): DsspErrorInfo {
    return createDsspError("PRECONDITION_FAILED", this.message, { argument: this.argument });
  }
}

/**
 * The service answered with a result code the flow does not expect.
 * Carries the service's major/minor/message verbatim.
 */
export class DsspResultError extends Error {
  public readonly resultMajor: string;
  public readonly resultMinor?: string;
  public readonly resultMessage?: string;

  constructor(result: DsspResult) {
    super(describeResult(result));
    this.name = "DsspResultError";
    this.resultMajor = result.resultMajor;
    if (result.resultMinor !== undefined) this.resultMinor = result.resultMinor;
    if (result.resultMessage !== undefined) this.resultMessage = result.resultMessage.value;
  }

  toErrorInfo(): DsspErrorInfo {
    return createDsspError("UNEXPECTED_RESULT", this.message, {
      resultMajor: this.resultMajor,
      resultMinor: this.resultMinor,
      resultMessage: this.resultMessage,
    });
  }
}

/**
 * A response with an accepted result code lacks what the flow needs
 * (no document, several documents, no token response, ...).
 */
export class DsspContractError extends Error {
  public readonly missing: string;

  constructor(message: string, missing: string) {
    super(message);
    this.name = "DsspContractError";
    this.missing = missing;
  }

  toErrorInfo(): DsspErrorInfo {
    return createDsspError("CONTRACT_VIOLATION", this.message, { missing: this.missing });
  }
}

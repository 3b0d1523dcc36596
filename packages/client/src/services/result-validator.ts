import { shortResultCode } from "@dssp-client/shared";

import { DsspResultError } from "../errors";
import { dsspClientLogger } from "../logger";

import type { LogEntry, ResponseBase } from "@dssp-client/shared";

/**
 * Check a response's result code against what the flow expects.
 *
 * The major code must match; the minor code is only checked when given.
 * Returns the response unchanged, throws DsspResultError with the service's
 * own major/minor/message otherwise.
 */
export function validateResult<TResponse extends ResponseBase>(
  response: TResponse,
  expectedMajor: string,
  expectedMinor?: string,
  logs?: LogEntry[],
): TResponse {
  const { result } = response;
  const accepted =
    result.resultMajor === expectedMajor &&
    (expectedMinor === undefined || result.resultMinor === expectedMinor);

  if (!accepted) {
    logs?.push(
      dsspClientLogger.createLogEntry("error", "session", "Unexpected result from service", {
        step: "validate",
        resultMajor: result.resultMajor,
        resultMinor: result.resultMinor,
        resultMessage: result.resultMessage?.value,
        expectedMajor: shortResultCode(expectedMajor),
        expectedMinor: shortResultCode(expectedMinor),
      }),
    );
    throw new DsspResultError(result);
  }

  logs?.push(
    dsspClientLogger.createLogEntry("debug", "session", "Service result accepted", {
      step: "validate",
      resultMajor: shortResultCode(result.resultMajor),
      resultMinor: shortResultCode(result.resultMinor),
    }),
  );

  return response;
}

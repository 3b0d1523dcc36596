/**
 * Shared utility functions
 */

import type { DsspErrorInfo } from "./types/common";
import type { DsspResult } from "./types/protocol";

/**
 * Create a standardized DSS-P error record
 */
export function createDsspError(
  code: string,
  message: string,
  details?: Record<string, unknown>,
): DsspErrorInfo {
  return {
    code,
    message,
    details,
    timestamp: new Date().toISOString(),
  };
}

/**
 * Render a service result as "major minor: message", leaving out absent parts
 */
export function describeResult(result: DsspResult): string {
  const codes = [result.resultMajor, result.resultMinor].filter(Boolean).join(" ");
  const message = result.resultMessage?.value;
  return message ? `${codes}: ${message}` : codes;
}

/**
 * Last path segment of a result code URI ("...:resultmajor:Success" → "Success")
 */
export function shortResultCode(code: string | undefined): string | undefined {
  if (!code) return undefined;
  const idx = Math.max(code.lastIndexOf(":"), code.lastIndexOf("#"), code.lastIndexOf("/"));
  return idx === -1 ? code : code.substring(idx + 1);
}

/**
 * Validate PEM certificate format
 */
export function isValidPEM(pem: string): boolean {
  if (typeof pem !== "string") {
    return false;
  }

  const pemRegex = /^-----BEGIN [A-Z\s]+-----[\s\S]*-----END [A-Z\s]+-----$/;
  return pemRegex.test(pem.trim());
}

/**
 * Verification Report Mapper
 *
 * Turns the service's verification report into SecurityInfo: one entry per
 * signature, in report order.
 */

import { RESULT_MAJOR, UNBOUNDED_TIME_MS } from "@dssp-client/shared";

import { DsspContractError, DsspResultError } from "../errors";
import { dsspClientLogger } from "../logger";

import { parseCertificate } from "./crypto-utils";
import { subjectOf } from "./distinguished-name";

import type { IndividualReport, LogEntry, VerificationReport } from "@dssp-client/shared";
import type { SecurityInfo, SignatureInfo } from "../types";

const SIGNING_TIME =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?(Z|[+-]\d{2}:?\d{2})?$/;

/**
 * Parse an xs:dateTime signing time.
 *
 * Without an offset the value is local wall-clock time; with `Z` or `±hh:mm`
 * it is that instant.
 */
export function parseSigningTime(value: string): Date {
  const match = SIGNING_TIME.exec(value.trim().replace(" ", "T"));
  if (!match) {
    throw new DsspContractError(`Signing time is not an ISO-8601 date-time: ${value}`, "signingTime");
  }

  const [, year, month, day, hour, minute, second, fraction = "", zone] = match;
  const millis = Number(fraction.padEnd(3, "0").substring(0, 3));

  let date: Date;
  if (zone === undefined) {
    date = new Date(
      Number(year),
      Number(month) - 1,
      Number(day),
      Number(hour),
      Number(minute),
      Number(second),
      millis,
    );
  } else {
    const offset = zone === "Z" ? "Z" : `${zone.substring(0, 3)}:${zone.substring(zone.length - 2)}`;
    const ms = String(millis).padStart(3, "0");
    date = new Date(`${year}-${month}-${day}T${hour}:${minute}:${second}.${ms}${offset}`);
  }

  if (Number.isNaN(date.getTime())) {
    throw new DsspContractError(`Signing time is out of range: ${value}`, "signingTime");
  }
  return date;
}

function mapIndividualReport(report: IndividualReport, index: number): SignatureInfo {
  if (report.result.resultMajor !== RESULT_MAJOR.SUCCESS) {
    throw new DsspResultError(report.result);
  }

  const properties = report.signedObjectIdentifier?.signedProperties.signedSignatureProperties;
  if (!properties) {
    throw new DsspContractError(
      `Signature ${index.toString()} has no signed signature properties`,
      "signedObjectIdentifier",
    );
  }
  const detail = report.details?.detailedSignatureReport.certificatePathValidity.pathValidityDetail;
  if (!detail) {
    throw new DsspContractError(
      `Signature ${index.toString()} has no detailed signature report`,
      "details",
    );
  }

  const [validity] = detail.certificateValidity;
  if (!validity) {
    throw new DsspContractError(
      `Signature ${index.toString()} has no certificate validity entry`,
      "certificateValidity",
    );
  }

  const signer = parseCertificate(validity.certificateValue);
  if (!signer) {
    throw new DsspContractError(
      `Signature ${index.toString()} carries a certificate that does not decode`,
      "certificateValue",
    );
  }

  const roles = properties.signerRole?.claimedRoles;

  return {
    signingTime: parseSigningTime(properties.signingTime),
    signer,
    signerSubject: validity.subject,
    signerCertificateSubject: subjectOf(signer),
    signerRole: roles ? roles.join(", ") : null,
    signatureProductionPlace: properties.location ?? null,
  };
}

/**
 * Map a verification report; null when it holds no individual reports.
 * A report whose own result is not Success fails the whole verification.
 */
export function mapVerificationReport(
  report: VerificationReport | undefined,
  renewBefore: Date | undefined,
  logs?: LogEntry[],
): SecurityInfo | null {
  const individual = report?.individualReport ?? [];
  if (individual.length === 0) {
    logs?.push(
      dsspClientLogger.logFlowStep("info", "report", "verify", "extract", "Document carries no signatures"),
    );
    return null;
  }

  const signatures = individual.map((entry, index) => mapIndividualReport(entry, index));
  const timeStampValidity = renewBefore ? new Date(renewBefore.getTime()) : new Date(UNBOUNDED_TIME_MS);

  logs?.push(
    dsspClientLogger.logFlowStep("success", "report", "verify", "extract", "Verification report mapped", {
      signatureCount: signatures.length,
      timeStampValidity: timeStampValidity.toISOString(),
    }),
  );

  return { timeStampValidity, signatures };
}

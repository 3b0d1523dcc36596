/**
 * X.500 name rendering with short attribute aliases.
 *
 * Produces the notation certificate libraries print ("SERIALNUMBER=..., G=...,
 * SN=..., CN=..., C=BE"): most specific RDN first, i.e. the reverse of the
 * encoded order. The service renders the same name with long aliases
 * (GIVENNAME, SURNAME); that string is kept verbatim and never re-parsed.
 */

import type { Certificate } from "pkijs";

type Name = Certificate["subject"];

const SHORT_ALIASES: Record<string, string> = {
  "2.5.4.3": "CN",
  "2.5.4.4": "SN",
  "2.5.4.5": "SERIALNUMBER",
  "2.5.4.6": "C",
  "2.5.4.7": "L",
  "2.5.4.8": "S",
  "2.5.4.9": "STREET",
  "2.5.4.10": "O",
  "2.5.4.11": "OU",
  "2.5.4.12": "T",
  "2.5.4.42": "G",
  "2.5.4.43": "I",
  "1.2.840.113549.1.9.1": "E",
  "0.9.2342.19200300.100.1.25": "DC",
};

/** Characters that force a value into double quotes */
const NEEDS_QUOTES = /[,+=<>#;"\n\r]/;

function quoteValue(value: string): string {
  if (value.length === 0) return '""';
  if (NEEDS_QUOTES.test(value) || value.trim() !== value) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function attributeAlias(oid: string): string {
  return SHORT_ALIASES[oid] ?? `OID.${oid}`;
}

/**
 * Render a name with short aliases, most specific attribute first
 */
export function formatName(name: Name): string {
  return name.typesAndValues
    .map((tv) => `${attributeAlias(tv.type)}=${quoteValue(tv.value.valueBlock.value)}`)
    .reverse()
    .join(", ");
}

/**
 * Order-sensitive identity of a name, used to match subjects against issuers
 */
export function nameKey(name: Name): string {
  return name.typesAndValues
    .map((tv) => `${tv.type}=${tv.value.valueBlock.value.trim().toLowerCase()}`)
    .join("/");
}

export function subjectOf(cert: Certificate): string {
  return formatName(cert.subject);
}

export function issuerOf(cert: Certificate): string {
  return formatName(cert.issuer);
}

export function isSelfIssued(cert: Certificate): boolean {
  return nameKey(cert.subject) === nameKey(cert.issuer);
}

/**
 * First value of an attribute in the subject, e.g. "2.5.4.3" for the common name
 */
export function subjectAttribute(cert: Certificate, oid: string): string | undefined {
  return cert.subject.typesAndValues.find((tv) => tv.type === oid)?.value.valueBlock.value;
}

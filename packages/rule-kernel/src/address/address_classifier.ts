// Rule Kernel - Address classifier (v1)
//
// Partitions an address field into IPv4, IPv6 and unrecognized tokens.
// Membership is decided by syntax alone: no lookups, no reachability.
// Invalid tokens are recorded, never rejected; policy lives in the
// family decision step.

import { isIP } from "node:net";

import { isSetValue } from "@dualstack/contracts";

export type AddressFieldV1 = string | ReadonlyArray<string>;

export type AddressTokenFamilyV1 = "v4" | "v6" | "other";

/**
 * Stable partition of one address field. Every input token lands in exactly one bucket.
 */
export interface AddressClassificationV1 {
  v4: string[];
  v6: string[];
  other: string[];
}

// Tokens within a string field are separated by commas and/or whitespace.
const TOKEN_SEPARATOR = /[\s,]+/;

const PREFIX_LENGTH = /^\d{1,3}$/;

/**
 * Splits an address field into tokens, preserving declaration order.
 */
export function tokenizeAddressField(field: AddressFieldV1 | undefined): string[] {
  if (field === undefined || !isSetValue(field)) {
    return [];
  }

  const parts: ReadonlyArray<string> = typeof field === "string" ? [field] : field;
  const tokens: string[] = [];
  for (const part of parts) {
    for (const token of part.split(TOKEN_SEPARATOR)) {
      if (token.length > 0) tokens.push(token);
    }
  }
  return tokens;
}

/**
 * Classifies one token: a plain address, a CIDR block or an explicit `low-high` range.
 *
 * IPv4 blocks also accept a dotted netmask (`10.0.0.0/255.0.0.0`).
 */
export function classifyAddressToken(token: string): AddressTokenFamilyV1 {
  const slash = token.indexOf("/");
  if (slash !== -1) {
    return classifyCidr(token.slice(0, slash), token.slice(slash + 1));
  }

  const dash = token.indexOf("-");
  if (dash !== -1) {
    return classifyRange(token.slice(0, dash), token.slice(dash + 1));
  }

  return familyOf(token);
}

/**
 * Classifies every token of an address field. An unset field yields three empty buckets.
 */
export function classifyAddressFieldV1(field: AddressFieldV1 | undefined): AddressClassificationV1 {
  const out: AddressClassificationV1 = { v4: [], v6: [], other: [] };
  for (const token of tokenizeAddressField(field)) {
    out[classifyAddressToken(token)].push(token);
  }
  return out;
}

function familyOf(address: string): AddressTokenFamilyV1 {
  const version = isIP(address);
  if (version === 4) return "v4";
  if (version === 6) return "v6";
  return "other";
}

function classifyCidr(base: string, prefix: string): AddressTokenFamilyV1 {
  const family = familyOf(base);
  if (family === "other") return "other";

  if (PREFIX_LENGTH.test(prefix)) {
    const bits = Number(prefix);
    if (family === "v4" && bits <= 32) return "v4";
    if (family === "v6" && bits <= 128) return "v6";
    return "other";
  }

  if (family === "v4" && isIP(prefix) === 4) return "v4";
  return "other";
}

function classifyRange(low: string, high: string): AddressTokenFamilyV1 {
  const family = familyOf(low);
  if (family === "other" || familyOf(high) !== family) return "other";
  return family;
}

// Rule Kernel - version override tags (v1)
//
// A declaration may pin itself to one family with a loose tag such as "4",
// "v6", "IPv4" or "ip6". Tags are matched case-insensitively; the "ip" and
// "v" parts are optional, the family number is not. Anything unrecognized
// falls through to UNSPECIFIED instead of failing.

import { isSetValue } from "@dualstack/contracts";

export const VERSION_OVERRIDES_V1 = Object.freeze(["UNSPECIFIED", "V4", "V6"] as const);

export type VersionOverrideV1 = (typeof VERSION_OVERRIDES_V1)[number];

const V4_TAG = /^(ip)?v?4$/i;
const V6_TAG = /^(ip)?v?6$/i;

export function parseVersionOverrideV1(version: string | number | undefined): VersionOverrideV1 {
  if (version === undefined || !isSetValue(version)) {
    return "UNSPECIFIED";
  }

  const tag = String(version).trim();
  if (V4_TAG.test(tag)) return "V4";
  if (V6_TAG.test(tag)) return "V6";
  return "UNSPECIFIED";
}

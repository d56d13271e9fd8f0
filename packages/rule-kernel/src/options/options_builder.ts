// Rule Kernel - options builder (v1)
//
// Builds both family records for a declaration, whether or not they end up
// dispatched. Routing decides what leaves the kernel; this step stays pure.

import { RULE_OPTIONS_SCHEMA_VERSION_V1, RULE_PASSTHROUGH_FIELDS_V1, isSetValue } from "@dualstack/contracts";
import type {
  RuleDeclarationV1,
  RuleFamilyV1,
  RuleOptionsV1,
  RuleOrderV1,
  RulePassthroughFieldV1
} from "@dualstack/contracts";

import type { AddressClassificationV1 } from "../address/address_classifier";

export type BuiltRuleOptionsV1 = Readonly<Record<RuleFamilyV1, RuleOptionsV1>>;

type PassthroughShapeV1 = Pick<RuleDeclarationV1, RulePassthroughFieldV1>;

/**
 * Builds the IPv4 and IPv6 option records.
 *
 * @param order - Effective order from the normalizer (never the raw priority).
 */
export function buildRuleOptionsV1(
  declaration: RuleDeclarationV1,
  order: RuleOrderV1 | undefined,
  source: AddressClassificationV1,
  destination: AddressClassificationV1
): BuiltRuleOptionsV1 {
  // Anything but an explicit false keeps strict checking on.
  const strict = declaration.strict_protocol_checking !== false;

  const build = (family: RuleFamilyV1): RuleOptionsV1 => {
    // Each record gets its own copies; nothing is shared with the declaration.
    const passthrough: Partial<PassthroughShapeV1> = {};
    for (const key of RULE_PASSTHROUGH_FIELDS_V1) {
      copySetField(declaration, passthrough, key);
    }
    return Object.freeze({
      type: "rule_options_v1" as const,
      schema_version: RULE_OPTIONS_SCHEMA_VERSION_V1,
      title: declaration.title,
      family,
      ...passthrough,
      source: [...source[family]],
      destination: [...destination[family]],
      ...(order !== undefined && isSetValue(order) ? { order } : {}),
      strict_protocol_checking: strict
    });
  };

  return Object.freeze({ v4: build("v4"), v6: build("v6") });
}

function copySetField<K extends RulePassthroughFieldV1>(
  from: PassthroughShapeV1,
  to: Partial<PassthroughShapeV1>,
  key: K
): void {
  const value = from[key];
  if (isSetValue(value)) {
    to[key] = structuredClone(value);
  }
}

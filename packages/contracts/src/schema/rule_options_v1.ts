import type { RuleDeclarationV1, RuleOrderV1, RulePassthroughFieldV1 } from "./rule_declaration_v1";

/**
 * Address families a rule can be emitted for, in dispatch order.
 */
export const RULE_FAMILIES_V1 = Object.freeze(["v4", "v6"] as const);

export type RuleFamilyV1 = (typeof RULE_FAMILIES_V1)[number];

/**
 * Family-scoped output record handed to a rule renderer.
 *
 * Carries every declaration field except `priority` (folded into `order`).
 * Fields that were not set are absent.
 */
export type RuleOptionsV1 = Pick<RuleDeclarationV1, RulePassthroughFieldV1> & {
  // Discriminator for schema identification.
  type: "rule_options_v1";

  // SemVer for output shape.
  schema_version: string;

  // Declaration title, used as the downstream rule identifier.
  title: string;

  family: RuleFamilyV1;

  // Addresses of this family only, in declaration order.
  source: string[];
  destination: string[];

  // Effective order after priority aliasing.
  order?: RuleOrderV1;

  // Always resolved; true unless the declaration turned it off.
  strict_protocol_checking: boolean;
};

export const RULE_OPTIONS_SCHEMA_VERSION_V1 = "1.0.0";

import { z } from "zod"; // zod: runtime schema for the declaration admission boundary

/**
 * Literal that upstream declaration sources use for "not set".
 * It is accepted on input and must never appear in any output record.
 */
export const UNSET_SENTINEL = "UNSET";

/**
 * True when a declaration value carries a concrete setting.
 * `undefined`, `null` and the sentinel literal all mean "apply default".
 */
export function isSetValue(value: unknown): boolean {
  return value !== undefined && value !== null && value !== UNSET_SENTINEL;
}

// Wrap a field schema so the sentinel and null collapse to an absent property.
function unsettable<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (isSetValue(value) ? value : undefined), schema.optional());
}

const TextZ = z.string().min(1); // non-empty free text (chain names, interfaces, targets)
const IntOrTextZ = z.union([z.number().int(), z.string().min(1)]); // ports, order, levels: forwarded verbatim
const AddressFieldZ = z.union([z.string(), z.array(z.string())]); // one token, a comma list, or an array of tokens

export const RuleDeclarationV1Z = z
  .object({
    title: z.string().trim().min(1), // identifier: diagnostics context and downstream rule id
    action: unsettable(TextZ),
    chain: unsettable(TextZ),
    comment: unsettable(z.string()),
    destination: unsettable(AddressFieldZ),
    destination_port: unsettable(IntOrTextZ),
    incoming_interface: unsettable(TextZ),
    outgoing_interface: unsettable(TextZ),
    log_level: unsettable(IntOrTextZ),
    log_prefix: unsettable(z.string()),
    limit: unsettable(TextZ),
    limit_burst: unsettable(IntOrTextZ),
    order: unsettable(IntOrTextZ),
    priority: unsettable(IntOrTextZ), // deprecated alias of order
    protocol: unsettable(TextZ),
    raw: unsettable(z.string()),
    raw_after: unsettable(z.string()),
    reject_with: unsettable(TextZ),
    source: unsettable(AddressFieldZ),
    source_port: unsettable(IntOrTextZ),
    state: unsettable(z.union([TextZ, z.array(TextZ).min(1)])),
    strict_protocol_checking: unsettable(z.boolean()), // interpreted by the renderer only
    table: unsettable(TextZ),
    to_port: unsettable(IntOrTextZ),
    version: unsettable(IntOrTextZ) // family override tag, parsed leniently by the kernel
  })
  .strict(); // unknown fields are a declaration error, not something to forward

export type RuleDeclarationV1 = z.infer<typeof RuleDeclarationV1Z>;

/**
 * Declaration fields a rule options record copies verbatim.
 * Addresses, order/priority and strict_protocol_checking are resolved by the kernel.
 * `version` is copied as declared; routing has already acted on it.
 */
export const RULE_PASSTHROUGH_FIELDS_V1 = Object.freeze([
  "action",
  "chain",
  "comment",
  "destination_port",
  "incoming_interface",
  "outgoing_interface",
  "log_level",
  "log_prefix",
  "limit",
  "limit_burst",
  "protocol",
  "raw",
  "raw_after",
  "reject_with",
  "source_port",
  "state",
  "table",
  "to_port",
  "version"
] as const);

export type RulePassthroughFieldV1 = (typeof RULE_PASSTHROUGH_FIELDS_V1)[number];

export type RuleOrderV1 = NonNullable<RuleDeclarationV1["order"]>;

export function parseRuleDeclarationV1(input: unknown): RuleDeclarationV1 {
  return RuleDeclarationV1Z.parse(input); // throws ZodError on malformed input
}

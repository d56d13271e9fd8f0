import { z } from "zod";

import { RuleDeclarationV1Z } from "./rule_declaration_v1";
import type { RuleDeclarationV1 } from "./rule_declaration_v1";

export const RuleCompileRequestV1Z = z
  .object({
    declarations: z.array(RuleDeclarationV1Z).min(1), // at least one rule per request
    options: z
      .object({
        stop_on_failure: z.boolean().optional() // overrides the server default for this batch
      })
      .strict()
      .optional()
  })
  .strict();

export type RuleCompileRequestV1 = z.infer<typeof RuleCompileRequestV1Z>;

export const AddressClassifyRequestV1Z = z
  .object({
    addresses: z.union([z.string(), z.array(z.string())])
  })
  .strict();

export type AddressClassifyRequestV1 = z.infer<typeof AddressClassifyRequestV1Z>;

/**
 * Returns every title that appears more than once, in first-seen order.
 */
export function findDuplicateTitlesV1(declarations: ReadonlyArray<Pick<RuleDeclarationV1, "title">>): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const d of declarations) {
    if (seen.has(d.title)) duplicates.add(d.title);
    seen.add(d.title);
  }
  return [...duplicates];
}

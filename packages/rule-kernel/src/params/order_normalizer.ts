// Rule Kernel - order/priority normalizer (v1)
//
// `priority` is the deprecated spelling of `order`. It only takes effect when
// `order` is not set, and using it that way yields a deprecation notice.

import { isSetValue } from "@dualstack/contracts";
import type { RuleDeclarationV1, RuleOrderV1 } from "@dualstack/contracts";

import type { DiagnosticV1 } from "../diagnostics";

export interface NormalizedOrderV1 {
  // Effective order; absent when neither field is set.
  order?: RuleOrderV1;

  notice?: DiagnosticV1;
}

/**
 * Resolves the effective order of a declaration. Never fails.
 */
export function normalizeOrderV1(declaration: Pick<RuleDeclarationV1, "title" | "order" | "priority">): NormalizedOrderV1 {
  const { order, priority } = declaration;

  if (order !== undefined && isSetValue(order)) {
    return { order };
  }

  if (priority !== undefined && isSetValue(priority)) {
    return {
      order: priority,
      notice: {
        level: "notice",
        code: "PRIORITY_DEPRECATED",
        title: declaration.title,
        message: `rule "${declaration.title}": parameter "priority" is deprecated, use "order" instead`
      }
    };
  }

  return {};
}

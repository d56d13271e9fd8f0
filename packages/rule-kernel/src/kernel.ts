// Rule Kernel - declaration compiler (v1)
//
// Single entrypoint that turns one RuleDeclarationV1 into dispatched rule
// options:
// 1) Normalize order/priority.
// 2) Classify source and destination addresses independently.
// 3) Decide the address families (or fail on all-invalid addresses).
// 4) Build both family records.
// 5) Route: apply the version override, activate families, emit.
//
// No IO and no retained state beyond the family registry's activation set.

import type { RuleDeclarationV1, RuleFamilyV1 } from "@dualstack/contracts";

import { classifyAddressFieldV1 } from "./address/address_classifier";
import type { DiagnosticSinkV1, DiagnosticV1 } from "./diagnostics";
import type { RuleEmitterV1 } from "./emitters/rule_emitter";
import { decideFamiliesV1 } from "./family/family_decision";
import { buildRuleOptionsV1 } from "./options/options_builder";
import { normalizeOrderV1 } from "./params/order_normalizer";
import { defaultFamilyRegistry } from "./routing/family_registry";
import type { FamilyRegistryV1 } from "./routing/family_registry";
import { parseVersionOverrideV1 } from "./routing/version_override";
import type { VersionOverrideV1 } from "./routing/version_override";
import { routeRuleOptionsV1, selectDispatchFamiliesV1 } from "./routing/version_router";

export interface RuleKernelDepsV1 {
  emitter: RuleEmitterV1;

  // Defaults to the process-wide registry.
  registry?: FamilyRegistryV1;

  diagnostics?: DiagnosticSinkV1;
}

export type RuleFailureCodeV1 = "ALL_ADDRESSES_INVALID" | "NOT_EVALUATED";

export interface RuleDeclarationFailureV1 {
  code: RuleFailureCodeV1;
  title: string;
  message: string;
  invalid_addresses: string[];
}

export type RuleCompileResultV1 =
  | {
      ok: true;
      title: string;
      override: VersionOverrideV1;
      dispatched: RuleFamilyV1[];

      // Non-fatal notices and warnings, in the order they were raised.
      diagnostics: DiagnosticV1[];
    }
  | {
      ok: false;
      title: string;
      failure: RuleDeclarationFailureV1;
      diagnostics: DiagnosticV1[];
    };

/**
 * Compiles one declaration. Failures are returned, not thrown, so that one
 * bad declaration never affects another.
 */
export function compileRuleDeclarationV1(
  declaration: RuleDeclarationV1,
  deps: RuleKernelDepsV1
): RuleCompileResultV1 {
  const title = declaration.title;
  const diagnostics: DiagnosticV1[] = [];
  const report = (d: DiagnosticV1): void => {
    diagnostics.push(d);
    deps.diagnostics?.report(d);
  };

  const normalized = normalizeOrderV1(declaration);
  if (normalized.notice) {
    report(normalized.notice);
  }

  const source = classifyAddressFieldV1(declaration.source);
  const destination = classifyAddressFieldV1(declaration.destination);

  const decision = decideFamiliesV1(source, destination);
  if (!decision.ok) {
    const failure: RuleDeclarationFailureV1 = {
      code: "ALL_ADDRESSES_INVALID",
      title,
      message: `rule "${title}": no valid IPv4 or IPv6 address in source/destination: ${decision.invalid.join(", ")}`,
      invalid_addresses: decision.invalid
    };
    deps.diagnostics?.report({
      level: "error",
      code: "ALL_ADDRESSES_INVALID",
      title,
      message: failure.message,
      tokens: failure.invalid_addresses
    });
    return { ok: false, title, failure, diagnostics };
  }

  if (decision.skipped_invalid.length > 0) {
    report({
      level: "warning",
      code: "INVALID_ADDRESSES_SKIPPED",
      title,
      message: `rule "${title}": skipped invalid addresses: ${decision.skipped_invalid.join(", ")}`,
      tokens: decision.skipped_invalid
    });
  }

  const built = buildRuleOptionsV1(declaration, normalized.order, source, destination);

  const override = parseVersionOverrideV1(declaration.version);
  const dispatched = selectDispatchFamiliesV1(override, decision);
  routeRuleOptionsV1(title, built, dispatched, {
    emitter: deps.emitter,
    registry: deps.registry ?? defaultFamilyRegistry
  });

  return { ok: true, title, override, dispatched, diagnostics };
}

// Rule Kernel - version router (v1)
//
// Turns the override tag and the family decision into the final dispatch set,
// then activates each chosen family and hands its record to the emitter.
// An explicit override always wins over the address analysis.

import type { RuleFamilyV1 } from "@dualstack/contracts";

import type { RuleEmitterV1 } from "../emitters/rule_emitter";
import type { BuiltRuleOptionsV1 } from "../options/options_builder";
import type { FamilyRegistryV1 } from "./family_registry";
import type { VersionOverrideV1 } from "./version_override";

export interface DispatchFlagsV1 {
  emit_v4: boolean;
  emit_v6: boolean;
}

export function selectDispatchFamiliesV1(override: VersionOverrideV1, flags: DispatchFlagsV1): RuleFamilyV1[] {
  if (override === "V4") return ["v4"];
  if (override === "V6") return ["v6"];
  if (override === "UNSPECIFIED") {
    const families: RuleFamilyV1[] = [];
    if (flags.emit_v4) families.push("v4");
    if (flags.emit_v6) families.push("v6");
    return families;
  }

  // Exhaustiveness guard.
  const _never: never = override;
  throw new Error(`UNREACHABLE_VERSION_OVERRIDE: ${String(_never)}`);
}

export function routeRuleOptionsV1(
  title: string,
  built: BuiltRuleOptionsV1,
  families: ReadonlyArray<RuleFamilyV1>,
  deps: { emitter: RuleEmitterV1; registry: FamilyRegistryV1 }
): void {
  for (const family of families) {
    deps.registry.ensure(family);
    deps.emitter.emit(title, family, built[family]);
  }
}

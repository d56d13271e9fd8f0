// Rule Kernel - family registry (v1)
//
// Tracks which families have their rule-file management switched on.
// `ensure` may be called any number of times; the activation hook runs once
// per family and registry.

import { RULE_FAMILIES_V1 } from "@dualstack/contracts";
import type { RuleFamilyV1 } from "@dualstack/contracts";

export interface FamilyRegistryV1 {
  ensure(family: RuleFamilyV1): void;
  isActive(family: RuleFamilyV1): boolean;
  activeFamilies(): RuleFamilyV1[];
}

export type FamilyActivationHookV1 = (family: RuleFamilyV1) => void;

export class FamilyRegistry implements FamilyRegistryV1 {
  private readonly active = new Set<RuleFamilyV1>();

  constructor(private readonly onActivate?: FamilyActivationHookV1) {}

  ensure(family: RuleFamilyV1): void {
    if (this.active.has(family)) {
      return;
    }
    // Marked before the hook runs so a failing hook is never retried.
    this.active.add(family);
    this.onActivate?.(family);
  }

  isActive(family: RuleFamilyV1): boolean {
    return this.active.has(family);
  }

  activeFamilies(): RuleFamilyV1[] {
    return RULE_FAMILIES_V1.filter((f) => this.active.has(f));
  }
}

/**
 * Process-wide registry used when a caller does not supply its own.
 */
export const defaultFamilyRegistry: FamilyRegistryV1 = new FamilyRegistry();

// Rule Kernel - emitter seam (v1)
//
// The kernel never renders or writes rules. It hands each dispatched record
// to an emitter keyed by family; emitters serialize their own appends.

import type { RuleFamilyV1, RuleOptionsV1 } from "@dualstack/contracts";

export interface RuleEmitterV1 {
  emit(title: string, family: RuleFamilyV1, options: RuleOptionsV1): void;
}

export interface EmittedRuleV1 {
  title: string;
  family: RuleFamilyV1;
  options: RuleOptionsV1;
}

/**
 * In-memory emitter that records every emission in arrival order.
 */
export class CollectingRuleEmitter implements RuleEmitterV1 {
  private readonly emitted: EmittedRuleV1[] = [];

  emit(title: string, family: RuleFamilyV1, options: RuleOptionsV1): void {
    this.emitted.push(Object.freeze({ title, family, options }));
  }

  all(): ReadonlyArray<EmittedRuleV1> {
    return this.emitted;
  }

  forFamily(family: RuleFamilyV1): RuleOptionsV1[] {
    return this.emitted.filter((e) => e.family === family).map((e) => e.options);
  }
}

// Rule Kernel - batch compilation (v1)
//
// Each declaration is compiled in isolation. Whether a failure should stop
// the rest of the batch is the caller's policy (`stop_on_failure`).

import type { RuleDeclarationV1 } from "@dualstack/contracts";

import { compileRuleDeclarationV1 } from "./kernel";
import type { RuleCompileResultV1, RuleKernelDepsV1 } from "./kernel";

export interface RuleBatchOptionsV1 {
  stop_on_failure?: boolean;
}

export interface RuleBatchResultV1 {
  // True only when every declaration compiled.
  ok: boolean;

  compiled: number;
  failed: number;
  not_evaluated: number;

  // One entry per declaration, in input order.
  results: RuleCompileResultV1[];
}

export function compileRuleBatchV1(
  declarations: ReadonlyArray<RuleDeclarationV1>,
  deps: RuleKernelDepsV1,
  options: RuleBatchOptionsV1 = {}
): RuleBatchResultV1 {
  const results: RuleCompileResultV1[] = [];
  let compiled = 0;
  let failed = 0;
  let notEvaluated = 0;
  let stopped = false;

  for (const declaration of declarations) {
    if (stopped) {
      results.push(notEvaluatedResult(declaration.title));
      notEvaluated++;
      continue;
    }

    const result = compileRuleDeclarationV1(declaration, deps);
    results.push(result);
    if (result.ok) {
      compiled++;
    } else {
      failed++;
      stopped = options.stop_on_failure === true;
    }
  }

  return { ok: failed === 0 && notEvaluated === 0, compiled, failed, not_evaluated: notEvaluated, results };
}

function notEvaluatedResult(title: string): RuleCompileResultV1 {
  return {
    ok: false,
    title,
    failure: {
      code: "NOT_EVALUATED",
      title,
      message: `rule "${title}": not evaluated, an earlier declaration failed`,
      invalid_addresses: []
    },
    diagnostics: []
  };
}

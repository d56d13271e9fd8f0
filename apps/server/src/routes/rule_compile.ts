// apps/server/src/routes/rule_compile.ts
//
// Rule compilation endpoints.
//
// - POST /api/rules/compile: admit a batch of declarations, compile each one,
//   return per-declaration results plus the emitted options per family.
// - POST /api/rules/classify: show how an address field is partitioned.

import type { FastifyInstance } from "fastify";
import type { ZodIssue } from "zod";

import {
  AddressClassifyRequestV1Z,
  RuleCompileRequestV1Z,
  findDuplicateTitlesV1
} from "@dualstack/contracts";
import {
  CollectingRuleEmitter,
  classifyAddressFieldV1,
  compileRuleBatchV1
} from "@dualstack/rule-kernel";
import type { FamilyRegistryV1 } from "@dualstack/rule-kernel";

import type { ServerConfig } from "../config";
import { createLogDiagnosticSink } from "../log_sink";

export type RequestErrorV1 = { code: string; path: string; message: string };

function toRequestErrors(issues: ReadonlyArray<ZodIssue>): RequestErrorV1[] {
  return issues.map((i) => ({ code: "INVALID_REQUEST", path: i.path.join("."), message: i.message }));
}

export function registerRuleCompileRoutes(
  app: FastifyInstance,
  deps: { config: ServerConfig; registry: FamilyRegistryV1 }
): void {
  app.post("/api/rules/compile", async (req, reply) => {
    // Step-1: admission (shape, sentinel normalization, unknown keys rejected).
    const parsed = RuleCompileRequestV1Z.safeParse(req.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({ ok: false, errors: toRequestErrors(parsed.error.issues) });
    }
    const { declarations, options } = parsed.data;

    // Step-2: batch limits and title uniqueness.
    if (declarations.length > deps.config.max_batch) {
      return reply.code(400).send({
        ok: false,
        errors: [
          {
            code: "BATCH_TOO_LARGE",
            path: "declarations",
            message: `batch of ${declarations.length} exceeds the limit of ${deps.config.max_batch}`
          }
        ]
      });
    }
    const duplicates = findDuplicateTitlesV1(declarations);
    if (duplicates.length) {
      return reply.code(400).send({
        ok: false,
        errors: duplicates.map((title) => ({
          code: "DUPLICATE_TITLE",
          path: "declarations",
          message: `duplicate declaration title: ${title}`
        }))
      });
    }

    // Step-3: compile with a per-request emitter; activation stays app-wide.
    const emitter = new CollectingRuleEmitter();
    const batch = compileRuleBatchV1(
      declarations,
      { emitter, registry: deps.registry, diagnostics: createLogDiagnosticSink(req.log) },
      { stop_on_failure: options?.stop_on_failure ?? deps.config.stop_on_failure }
    );

    return reply.code(batch.ok ? 200 : 422).send({
      ...batch,
      rules: { v4: emitter.forFamily("v4"), v6: emitter.forFamily("v6") },
      active_families: deps.registry.activeFamilies()
    });
  });

  app.post("/api/rules/classify", async (req, reply) => {
    const parsed = AddressClassifyRequestV1Z.safeParse(req.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({ ok: false, errors: toRequestErrors(parsed.error.issues) });
    }
    return reply.send({ ok: true, classification: classifyAddressFieldV1(parsed.data.addresses) });
  });
}

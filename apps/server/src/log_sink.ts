import type { FastifyBaseLogger } from "fastify";

import type { DiagnosticSinkV1, DiagnosticV1 } from "@dualstack/rule-kernel";

/**
 * Routes kernel diagnostics to a pino logger: notices at info, warnings at warn,
 * declaration failures at error.
 */
export function createLogDiagnosticSink(log: FastifyBaseLogger): DiagnosticSinkV1 {
  return {
    report(d: DiagnosticV1): void {
      const fields = { code: d.code, rule: d.title, tokens: d.tokens };
      if (d.level === "notice") log.info(fields, d.message);
      else if (d.level === "warning") log.warn(fields, d.message);
      else log.error(fields, d.message);
    }
  };
}

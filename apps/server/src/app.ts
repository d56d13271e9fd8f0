import Fastify from "fastify";
import type { FastifyInstance } from "fastify";

import { FamilyRegistry } from "@dualstack/rule-kernel";
import type { FamilyRegistryV1 } from "@dualstack/rule-kernel";

import type { ServerConfig } from "./config";
import { registerRuleCompileRoutes } from "./routes/rule_compile";

/**
 * Builds the HTTP app without listening, so tests can drive it with `inject`.
 *
 * The family registry lives as long as the app: each family is activated (and
 * logged) once, however many declarations ask for it.
 */
export function buildApp(config: ServerConfig, registry?: FamilyRegistryV1): FastifyInstance {
  const app = Fastify({ logger: { level: config.log_level } });

  const familyRegistry =
    registry ?? new FamilyRegistry((family) => app.log.info({ family }, `rule family ${family} activated`));

  app.get("/api/health", async (_req, reply) => reply.send({ ok: true }));

  registerRuleCompileRoutes(app, { config, registry: familyRegistry });

  return app;
}

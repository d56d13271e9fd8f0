import fs from "node:fs";
import path from "node:path";

import { z } from "zod";

export function loadDotEnvFile(fp: string, env: NodeJS.ProcessEnv = process.env): void {
  if (!fs.existsSync(fp)) return;
  const raw = fs.readFileSync(fp, "utf8");
  for (const line of raw.split(/\r?\n/)) {
    const s = line.trim();
    if (!s || s.startsWith("#")) continue;
    const m = s.match(/^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/);
    if (!m) continue;
    const key = m[1];
    let val = m[2] ?? "";
    // KEY="value" and KEY='value' both yield value.
    if ((val.startsWith('"') && val.endsWith('"')) || (val.startsWith("'") && val.endsWith("'"))) {
      val = val.slice(1, -1);
    }
    // First writer wins.
    if (env[key] == null) env[key] = val;
  }
}

export function loadEnv(): void {
  // Load repo root .env first, then app-local .env; neither overrides the process env.
  const repoRoot = path.resolve(__dirname, "..", "..", "..");
  loadDotEnvFile(path.join(repoRoot, ".env"));
  loadDotEnvFile(path.join(__dirname, "..", ".env"));
}

const BoolFlagZ = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const ServerEnvZ = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3110),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  DUALSTACK_STOP_ON_FAILURE: BoolFlagZ.default("false"),
  DUALSTACK_MAX_BATCH: z.coerce.number().int().positive().default(500)
});

export type ServerConfig = {
  port: number;
  host: string;
  log_level: z.infer<typeof ServerEnvZ>["LOG_LEVEL"];

  // Default batch policy when a request does not set options.stop_on_failure.
  stop_on_failure: boolean;

  max_batch: number;
};

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = ServerEnvZ.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`INVALID_SERVER_CONFIG: ${detail}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    host: e.HOST,
    log_level: e.LOG_LEVEL,
    stop_on_failure: e.DUALSTACK_STOP_ON_FAILURE,
    max_batch: e.DUALSTACK_MAX_BATCH
  };
}

import assert from "node:assert/strict";
import { afterEach, beforeEach, describe, it } from "node:test";

import type { FastifyInstance } from "fastify";

import { buildApp } from "../app";
import type { ServerConfig } from "../config";

const config: ServerConfig = {
  port: 0,
  host: "127.0.0.1",
  log_level: "silent",
  stop_on_failure: false,
  max_batch: 3
};

let app: FastifyInstance;

beforeEach(() => {
  app = buildApp(config);
});

afterEach(async () => {
  await app.close();
});

function compile(body: Record<string, unknown>) {
  return app.inject({ method: "POST", url: "/api/rules/compile", payload: body });
}

describe("GET /api/health", () => {
  it("answers ok", async () => {
    const res = await app.inject({ method: "GET", url: "/api/health" });
    assert.equal(res.statusCode, 200);
    assert.deepEqual(res.json(), { ok: true });
  });
});

describe("POST /api/rules/compile", () => {
  it("emits one rule per family for a dual-stack source", async () => {
    const res = await compile({
      declarations: [{ title: "ssh", action: "ACCEPT", protocol: "tcp", destination_port: 22, source: "10.0.0.1,2001:db8::1" }]
    });

    assert.equal(res.statusCode, 200);
    const body = res.json();
    assert.equal(body.ok, true);
    assert.deepEqual(body.results[0].dispatched, ["v4", "v6"]);
    assert.deepEqual(body.rules.v4[0].source, ["10.0.0.1"]);
    assert.deepEqual(body.rules.v6[0].source, ["2001:db8::1"]);
    assert.equal(body.rules.v6[0].destination_port, 22);
    assert.deepEqual(body.active_families, ["v4", "v6"]);
  });

  it("returns 422 and keeps compiling after an all-invalid declaration", async () => {
    const res = await compile({
      declarations: [
        { title: "bad", source: "not-an-ip" },
        { title: "dns", protocol: "udp", destination_port: 53 }
      ]
    });

    assert.equal(res.statusCode, 422);
    const body = res.json();
    assert.equal(body.ok, false);
    assert.equal(body.failed, 1);
    assert.equal(body.results[0].failure.code, "ALL_ADDRESSES_INVALID");
    assert.equal(body.results[1].ok, true);
    assert.equal(body.rules.v4.length, 1);
    assert.equal(body.rules.v6.length, 1);
  });

  it("honors stop_on_failure from the request", async () => {
    const res = await compile({
      declarations: [
        { title: "bad", source: "not-an-ip" },
        { title: "dns", protocol: "udp" }
      ],
      options: { stop_on_failure: true }
    });

    assert.equal(res.statusCode, 422);
    const body = res.json();
    assert.equal(body.not_evaluated, 1);
    assert.equal(body.results[1].failure.code, "NOT_EVALUATED");
    assert.deepEqual(body.rules, { v4: [], v6: [] });
  });

  it("normalizes sentinel fields and aliases priority", async () => {
    const res = await compile({
      declarations: [{ title: "legacy", order: "UNSET", priority: "9", comment: "UNSET", source: "192.0.2.10" }]
    });

    assert.equal(res.statusCode, 200);
    const body = res.json();
    assert.equal(body.rules.v4[0].order, "9");
    assert.equal("comment" in body.rules.v4[0], false);
    assert.equal("priority" in body.rules.v4[0], false);
    assert.deepEqual(body.rules.v6, []);
    assert.equal(body.results[0].diagnostics[0].code, "PRIORITY_DEPRECATED");
  });

  it("rejects unknown declaration fields", async () => {
    const res = await compile({ declarations: [{ title: "typo", colour: "red" }] });

    assert.equal(res.statusCode, 400);
    const body = res.json();
    assert.equal(body.ok, false);
    assert.equal(body.errors[0].code, "INVALID_REQUEST");
    assert.equal(body.errors[0].path, "declarations.0");
  });

  it("rejects duplicate titles", async () => {
    const res = await compile({ declarations: [{ title: "a" }, { title: "a" }] });

    assert.equal(res.statusCode, 400);
    assert.deepEqual(res.json().errors, [
      { code: "DUPLICATE_TITLE", path: "declarations", message: "duplicate declaration title: a" }
    ]);
  });

  it("rejects batches above the configured limit", async () => {
    const res = await compile({ declarations: ["a", "b", "c", "d"].map((title) => ({ title })) });

    assert.equal(res.statusCode, 400);
    assert.equal(res.json().errors[0].code, "BATCH_TOO_LARGE");
  });

  it("keeps family activation across requests", async () => {
    const first = await compile({ declarations: [{ title: "v4-rule", source: "10.1.1.1" }] });
    const second = await compile({ declarations: [{ title: "v6-rule", source: "2001:db8::5" }] });

    assert.deepEqual(first.json().active_families, ["v4"]);
    assert.deepEqual(second.json().active_families, ["v4", "v6"]);
  });
});

describe("POST /api/rules/classify", () => {
  it("partitions the given addresses", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/rules/classify",
      payload: { addresses: ["10.0.0.0/8", "bogus", "::1"] }
    });

    assert.equal(res.statusCode, 200);
    assert.deepEqual(res.json(), {
      ok: true,
      classification: { v4: ["10.0.0.0/8"], v6: ["::1"], other: ["bogus"] }
    });
  });

  it("rejects a missing address field", async () => {
    const res = await app.inject({ method: "POST", url: "/api/rules/classify", payload: {} });
    assert.equal(res.statusCode, 400);
  });
});

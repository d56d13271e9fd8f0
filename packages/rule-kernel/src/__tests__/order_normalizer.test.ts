import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { normalizeOrderV1 } from "../params/order_normalizer";

describe("normalizeOrderV1", () => {
  it("prefers order over priority", () => {
    assert.deepEqual(normalizeOrderV1({ title: "r1", order: "5", priority: "9" }), { order: "5" });
  });

  it("falls back to priority with a deprecation notice", () => {
    const out = normalizeOrderV1({ title: "r1", priority: "9" });
    assert.equal(out.order, "9");
    assert.deepEqual(out.notice, {
      level: "notice",
      code: "PRIORITY_DEPRECATED",
      title: "r1",
      message: 'rule "r1": parameter "priority" is deprecated, use "order" instead'
    });
  });

  it("leaves order unset when neither field is set", () => {
    assert.deepEqual(normalizeOrderV1({ title: "r1" }), {});
  });

  it("treats the sentinel as unset", () => {
    const out = normalizeOrderV1({ title: "r1", order: "UNSET", priority: 9 });
    assert.equal(out.order, 9);
    assert.equal(out.notice?.code, "PRIORITY_DEPRECATED");
    assert.deepEqual(normalizeOrderV1({ title: "r1", order: "UNSET", priority: "UNSET" }), {});
  });
});

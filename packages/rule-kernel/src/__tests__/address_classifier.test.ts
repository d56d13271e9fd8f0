import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { classifyAddressFieldV1, classifyAddressToken, tokenizeAddressField } from "../address/address_classifier";

describe("tokenizeAddressField", () => {
  it("splits on commas and whitespace, keeping order", () => {
    assert.deepEqual(tokenizeAddressField("10.0.0.1, 10.0.0.2 2001:db8::1"), ["10.0.0.1", "10.0.0.2", "2001:db8::1"]);
  });

  it("flattens array fields", () => {
    assert.deepEqual(tokenizeAddressField(["10.0.0.1,10.0.0.2", "::1"]), ["10.0.0.1", "10.0.0.2", "::1"]);
  });

  it("yields nothing for unset or empty fields", () => {
    assert.deepEqual(tokenizeAddressField(undefined), []);
    assert.deepEqual(tokenizeAddressField("UNSET"), []);
    assert.deepEqual(tokenizeAddressField(""), []);
    assert.deepEqual(tokenizeAddressField(" , "), []);
  });
});

describe("classifyAddressToken", () => {
  const cases: Array<[string, "v4" | "v6" | "other"]> = [
    ["10.0.0.1", "v4"],
    ["10.0.0.0/8", "v4"],
    ["0.0.0.0/0", "v4"],
    ["10.0.0.0/255.0.0.0", "v4"],
    ["10.0.0.1-10.0.0.20", "v4"],
    ["2001:db8::1", "v6"],
    ["2001:db8::/32", "v6"],
    ["::/0", "v6"],
    ["2001:db8::1-2001:db8::ff", "v6"],
    ["::ffff:10.0.0.1", "v6"],
    ["not-an-ip", "other"],
    ["example.com", "other"],
    ["256.0.0.1", "other"],
    ["10.0.0.0/33", "other"],
    ["10.0.0.0/abc", "other"],
    ["2001:db8::/129", "other"],
    ["2001:db8::/255.0.0.0", "other"],
    ["10.0.0.1-2001:db8::1", "other"],
    ["10.0.0.1-", "other"]
  ];

  for (const [token, family] of cases) {
    it(`${token} -> ${family}`, () => {
      assert.equal(classifyAddressToken(token), family);
    });
  }
});

describe("classifyAddressFieldV1", () => {
  it("partitions tokens stably by family", () => {
    const c = classifyAddressFieldV1("2001:db8::1,10.0.0.1,bogus,10.0.0.2,fe80::/10");
    assert.deepEqual(c, {
      v4: ["10.0.0.1", "10.0.0.2"],
      v6: ["2001:db8::1", "fe80::/10"],
      other: ["bogus"]
    });
  });

  it("puts every token in exactly one bucket", () => {
    const field = ["192.0.2.1", "x", "2001:db8::2", "192.0.2.0/24", "y-z"];
    const c = classifyAddressFieldV1(field);
    assert.equal(c.v4.length + c.v6.length + c.other.length, field.length);
  });

  it("returns three empty buckets for an unset field", () => {
    assert.deepEqual(classifyAddressFieldV1(undefined), { v4: [], v6: [], other: [] });
  });

  it("is idempotent", () => {
    const field = "10.0.0.1 bogus 2001:db8::1 10.0.0.0/8";
    assert.deepEqual(classifyAddressFieldV1(field), classifyAddressFieldV1(field));
  });
});

import { describe, it, expect } from "vitest";
import { stableStringify } from "./format.js";

describe("stableStringify", () => {
  it("should stringify with stable alphabetical key order", () => {
    const obj = { z: 1, a: 2, m: 3 };
    const result = stableStringify(obj);
    expect(result).toBe('{\n  "a": 2,\n  "m": 3,\n  "z": 1\n}\n');
  });

  it("should sort nested object keys", () => {
    const obj = { z: { b: 2, a: 1 }, a: { y: 2, x: 1 } };
    expect(stableStringify(obj, 0)).toBe('{"a":{"x":1,"y":2},"z":{"a":1,"b":2}}\n');
  });

  it("should preserve array order", () => {
    const obj = { extensions: ["txt", "asc", "log"] };
    expect(stableStringify(obj, 0)).toBe('{"extensions":["txt","asc","log"]}\n');
  });

  it("should produce the same text for records built in different key orders", () => {
    const a = { "content-type": "text/plain", registered: true, extensions: ["txt"] };
    const b = { extensions: ["txt"], registered: true, "content-type": "text/plain" };
    expect(stableStringify(a)).toBe(stableStringify(b));
  });

  it("should detect circular references", () => {
    const obj: Record<string, unknown> = { a: 1 };
    obj.self = obj;
    expect(() => stableStringify(obj)).toThrow("Circular reference");
  });

  it("should allow the same object twice when it is not circular", () => {
    const shared = { en: "Text File" };
    expect(stableStringify({ a: shared, b: shared }, 0)).toBe(
      '{"a":{"en":"Text File"},"b":{"en":"Text File"}}\n'
    );
  });

  it("should sort unicode keys using code unit order", () => {
    const obj = { ä: 1, z: 2, a: 3 };
    const parsed: unknown = JSON.parse(stableStringify(obj));
    expect(Object.keys(parsed ?? {})).toEqual(["a", "z", "ä"]);
  });
});

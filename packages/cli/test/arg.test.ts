/**
 * Unit tests for argument parsing
 */

import { describe, it, expect } from "vitest";
import { parseFilenames, parsePattern } from "../src/lib/arg.js";
import { CliError } from "../src/lib/errors.js";

describe("arg parsing", () => {
  describe("parsePattern", () => {
    it("should compile a case-insensitive pattern", () => {
      const pattern = parsePattern("^TEXT/");
      expect(pattern.test("text/plain")).toBe(true);
      expect(pattern.flags).toBe("i");
    });

    it("should reject invalid patterns", () => {
      expect(() => parsePattern("text/(")).toThrow(CliError);
      expect(() => parsePattern("text/(")).toThrow('Invalid pattern "text/("');
    });
  });

  describe("parseFilenames", () => {
    it("should trim names", () => {
      expect(parseFilenames([" a.txt", "b.xml "])).toEqual(["a.txt", "b.xml"]);
    });

    it("should reject empty names", () => {
      expect(() => parseFilenames(["a.txt", "  "])).toThrow("File name 2 is empty");
    });
  });
});

/**
 * Unit tests for environment resolution
 */

import { describe, it, expect } from "vitest";
import * as path from "node:path";
import { isVerbose, resolveCliConfig } from "../src/lib/env.js";

describe("environment resolution", () => {
  describe("resolveCliConfig", () => {
    it("should prefer CLI options over environment variables", () => {
      const config = resolveCliConfig(
        { cache: "/cli/types.cache", data: "/cli/data" },
        { TYPEREG_CACHE: "/env/types.cache", TYPEREG_DATA: "/env/data" }
      );

      expect(config.cachePath).toBe(path.resolve("/cli/types.cache"));
      expect(config.dataPath).toBe(path.resolve("/cli/data"));
    });

    it("should fall back to environment variables", () => {
      const config = resolveCliConfig({}, { TYPEREG_CACHE: "/env/types.cache", TYPEREG_DATA: "/env/data" });

      expect(config.cachePath).toBe("/env/types.cache");
      expect(config.dataPath).toBe("/env/data");
    });

    it("should leave paths unset when neither is provided", () => {
      expect(resolveCliConfig({}, {})).toEqual({ lazyLoad: true, cachePath: undefined, dataPath: undefined });
    });

    it("should resolve relative paths to absolute", () => {
      const config = resolveCliConfig({ cache: "./my-cache" }, {});
      expect(config.cachePath).toBe(path.resolve("my-cache"));
    });

    it("should ignore blank options", () => {
      expect(resolveCliConfig({ cache: " " }, { TYPEREG_CACHE: "/env/types.cache" }).cachePath).toBe(
        "/env/types.cache"
      );
    });

    it("should always open the registry lazily", () => {
      expect(resolveCliConfig({}, { TYPEREG_LAZY_LOAD: "false" }).lazyLoad).toBe(true);
    });
  });

  describe("isVerbose", () => {
    it("should follow --verbose", () => {
      expect(isVerbose({ verbose: true }, {})).toBe(true);
      expect(isVerbose({}, {})).toBe(false);
    });

    it("should follow TYPEREG_CLI_DEBUG=1", () => {
      expect(isVerbose({}, { TYPEREG_CLI_DEBUG: "1" })).toBe(true);
      expect(isVerbose({}, { TYPEREG_CLI_DEBUG: "true" })).toBe(false);
    });
  });
});

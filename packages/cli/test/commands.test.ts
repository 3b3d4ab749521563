/**
 * In-process tests for the CLI commands
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { captureConsole, createTempDir, removeDir, sampleRecords, writeDataFile } from "@typereg/testkit";
import { run } from "../src/program.js";

async function runCli(args: string[]): Promise<{ exitCode: number; stdout: string[]; stderr: string[] }> {
  const { result, output } = await captureConsole(() => run(args));
  return { exitCode: result, ...output };
}

describe("CLI", () => {
  let tmpDir: string;
  let dataPath: string;
  let cachePath: string;

  beforeEach(async () => {
    tmpDir = await createTempDir();
    dataPath = await writeDataFile(tmpDir, "types.json", sampleRecords());
    cachePath = join(tmpDir, "types.cache");
    vi.stubEnv("TYPEREG_CACHE", "");
    vi.stubEnv("TYPEREG_DATA", "");
    vi.stubEnv("TYPEREG_CLI_DEBUG", "");
    vi.stubEnv("TYPEREG_DEBUG", "");
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await removeDir(tmpDir);
  });

  describe("lookup", () => {
    it("should print matching types", async () => {
      const { exitCode, stdout } = await runCli(["--data", dataPath, "lookup", "TEXT/PLAIN"]);

      expect(exitCode).toBe(0);
      expect(stdout).toEqual(["text/plain [txt, asc] (registered)"]);
    });

    it("should print records as JSON", async () => {
      const { exitCode, stdout } = await runCli(["--data", dataPath, "lookup", "--json", "application/json"]);

      expect(exitCode).toBe(0);
      expect(JSON.parse(stdout.join("\n"))).toEqual([
        { "content-type": "application/json", encoding: "8bit", extensions: ["json"], registered: true },
      ]);
    });

    it("should match patterns with filters, most reliable first", async () => {
      const { stdout } = await runCli(["--data", dataPath, "lookup", "--pattern", "--complete", "^application/x-"]);

      expect(stdout).toEqual([
        "application/x-old [old] (unregistered; obsolete, use application/new)",
        "application/x-gone [old] (unregistered; obsolete)",
      ]);
    });

    it("should filter to registered types", async () => {
      const { stdout } = await runCli(["--data", dataPath, "lookup", "--pattern", "--registered", "xml"]);
      expect(stdout).toEqual(["application/xml [xml, xsl] (registered)"]);
    });

    it("should exit 2 when nothing matches", async () => {
      const { exitCode, stdout, stderr } = await runCli(["--data", dataPath, "lookup", "text/unknown"]);

      expect(exitCode).toBe(2);
      expect(stdout).toEqual([]);
      expect(stderr).toEqual(["Error: No types found for text/unknown"]);
    });

    it("should exit 1 for an invalid pattern", async () => {
      const { exitCode, stderr } = await runCli(["--data", dataPath, "lookup", "--pattern", "text/("]);

      expect(exitCode).toBe(1);
      expect(stderr[0]).toMatch(/^Error: Invalid pattern "text\/\("/);
    });

    it("should exit 1 when the data cannot be loaded", async () => {
      const { exitCode, stderr } = await runCli(["--data", join(tmpDir, "absent.json"), "lookup", "text/plain"]);

      expect(exitCode).toBe(1);
      expect(stderr).toEqual([
        `Error: Failed to load type data from ${join(tmpDir, "absent.json")}: file could not be read`,
      ]);
    });

    it("should read the bundled data by default", async () => {
      const { exitCode, stdout } = await runCli(["lookup", "image/jpeg"]);

      expect(exitCode).toBe(0);
      expect(stdout).toEqual(["image/jpeg [jpg, jpeg, jpe, jfif] (registered)"]);
    });
  });

  describe("for", () => {
    it("should print the types for each file", async () => {
      const { exitCode, stdout } = await runCli(["--data", dataPath, "for", "report.xml", "README", "notes.txt"]);

      expect(exitCode).toBe(0);
      expect(stdout).toEqual([
        "report.xml: application/xml, text/xml",
        "README: (unknown)",
        "notes.txt: text/plain",
      ]);
    });

    it("should print a JSON object", async () => {
      const { stdout } = await runCli(["--data", dataPath, "for", "--json", "a.XML", "b.json"]);

      expect(JSON.parse(stdout.join("\n"))).toEqual({
        "a.XML": ["application/xml", "text/xml"],
        "b.json": ["application/json"],
      });
    });

    it("should list a file named like an object prototype key", async () => {
      const { exitCode, stdout } = await runCli(["--data", dataPath, "for", "__proto__", "notes.txt"]);

      expect(exitCode).toBe(0);
      expect(stdout).toEqual(["__proto__: (unknown)", "notes.txt: text/plain"]);

      const json = await runCli(["--data", dataPath, "for", "--json", "__proto__", "notes.txt"]);
      expect(Object.keys(JSON.parse(json.stdout.join("\n")))).toEqual(["__proto__", "notes.txt"]);
    });

    it("should exit 2 when no file has a known type", async () => {
      const { exitCode, stderr } = await runCli(["--data", dataPath, "for", "a.zzz", "b.yyy"]);

      expect(exitCode).toBe(2);
      expect(stderr).toEqual(["Error: No types found for the given files"]);
    });
  });

  describe("stats", () => {
    it("should report registry statistics as JSON", async () => {
      const { exitCode, stdout } = await runCli(["--data", dataPath, "stats", "--json"]);

      expect(exitCode).toBe(0);
      expect(JSON.parse(stdout.join("\n"))).toEqual({
        variants: 7,
        extensions: 6,
        registered: 3,
        obsolete: 2,
        source: "loader",
        dataPath,
        cachePath: null,
      });
    });

    it("should report statistics as text", async () => {
      const { stdout } = await runCli(["--data", dataPath, "stats"]);

      expect(stdout).toEqual([
        "Types: 7",
        "Extensions: 6",
        "Registered: 3",
        "Obsolete: 2",
        "Loaded from: loader",
        `Data: ${dataPath}`,
        "Cache: (none)",
      ]);
    });

    it("should load from the cache once it exists", async () => {
      await runCli(["--data", dataPath, "--cache", cachePath, "lookup", "text/plain"]);
      const { stdout } = await runCli(["--data", dataPath, "--cache", cachePath, "stats", "--json"]);

      expect(JSON.parse(stdout.join("\n"))).toMatchObject({ source: "cache", cachePath });
    });

    it("should take the cache path from TYPEREG_CACHE", async () => {
      vi.stubEnv("TYPEREG_CACHE", cachePath);
      const { stdout } = await runCli(["--data", dataPath, "stats", "--json"]);

      expect(JSON.parse(stdout.join("\n"))).toMatchObject({ cachePath });
    });
  });

  describe("cache", () => {
    it("should require a cache path", async () => {
      const { exitCode, stderr } = await runCli(["--data", dataPath, "cache", "build"]);

      expect(exitCode).toBe(1);
      expect(stderr).toEqual(["Error: No cache path configured; pass --cache or set TYPEREG_CACHE"]);
    });

    it("should build a cache that verifies", async () => {
      const build = await runCli(["--data", dataPath, "--cache", cachePath, "cache", "build"]);
      expect(build.exitCode).toBe(0);
      expect(build.stdout).toEqual([`✓ Wrote 7 types to ${cachePath}`]);

      const verify = await runCli(["--cache", cachePath, "cache", "verify"]);
      expect(verify.exitCode).toBe(0);
      expect(verify.stdout).toEqual(["✓ Cache valid: 7 types (version 1.0.0)"]);
    });

    it("should report verification as JSON", async () => {
      await runCli(["--data", dataPath, "--cache", cachePath, "cache", "build"]);
      const { stdout } = await runCli(["--cache", cachePath, "cache", "verify", "--json"]);

      expect(JSON.parse(stdout.join("\n"))).toEqual({ valid: true, path: cachePath, version: "1.0.0", types: 7 });
    });

    it("should exit 2 for a missing cache", async () => {
      const { exitCode, stdout, stderr } = await runCli(["--cache", cachePath, "cache", "verify"]);

      expect(exitCode).toBe(2);
      expect(stdout).toEqual([`✗ Cache not usable (missing): File not found: ${cachePath}`]);
      expect(stderr).toEqual([`Error: Cache at ${cachePath} is not usable`]);
    });

    it("should exit 2 for a corrupt cache", async () => {
      await writeFile(cachePath, "garbage");
      const { exitCode, stdout } = await runCli(["--cache", cachePath, "cache", "verify", "--json"]);

      expect(exitCode).toBe(2);
      expect(JSON.parse(stdout.join("\n"))).toMatchObject({ valid: false, reason: "corrupt" });
    });

    it("should stay silent with --quiet", async () => {
      const { exitCode, stdout } = await runCli(["--quiet", "--data", dataPath, "--cache", cachePath, "cache", "build"]);

      expect(exitCode).toBe(0);
      expect(stdout).toEqual([]);
    });
  });

  describe("program", () => {
    it("should print the version", async () => {
      const { exitCode, stdout } = await runCli(["--version"]);

      expect(exitCode).toBe(0);
      expect(stdout).toEqual(["1.0.0"]);
    });

    it("should print help", async () => {
      const { exitCode, stdout } = await runCli(["--help"]);

      expect(exitCode).toBe(0);
      expect(stdout[0]).toMatch(/^Usage: typereg/);
    });

    it("should exit 1 for an unknown command", async () => {
      const { exitCode, stderr } = await runCli(["nope"]);

      expect(exitCode).toBe(1);
      expect(stderr.join("\n")).toContain("unknown command 'nope'");
    });

    it("should print timing metrics when verbose", async () => {
      const { stderr } = await runCli(["--verbose", "--data", dataPath, "lookup", "text/plain"]);

      expect(stderr).toHaveLength(1);
      expect(stderr[0]).toMatch(/^metric cli\.lookup duration_ms=\d+ success=true$/);
    });
  });
});

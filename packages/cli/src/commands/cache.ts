/**
 * cache build | cache verify: manage the registry cache file
 */

import type { Command } from "commander";
import { Loader, RegistryCache, type CacheInspection } from "@typereg/sdk";
import type { GlobalOptions } from "../lib/env.js";
import { isVerbose, resolveCliConfig } from "../lib/env.js";
import { CliError } from "../lib/errors.js";
import { printJson } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";

interface VerifyCommandOptions {
  json?: boolean;
}

function requireCachePath(opts: GlobalOptions): string {
  const { cachePath } = resolveCliConfig(opts);
  if (!cachePath) {
    throw new CliError("No cache path configured; pass --cache or set TYPEREG_CACHE");
  }
  return cachePath;
}

export function registerCacheCommand(program: Command): void {
  const cache = program.command("cache").description("Build or verify the registry cache");

  cache
    .command("build")
    .description("Load the type data and write the cache file")
    .action(async (_options: unknown, command: Command) => {
      const opts = command.optsWithGlobals<GlobalOptions>();

      await withTiming("cli.cache.build", isVerbose(opts), async () => {
        const cachePath = requireCachePath(opts);
        const { dataPath } = resolveCliConfig(opts);

        const registry = await new Loader(dataPath).load();
        try {
          await new RegistryCache(cachePath).save(registry);
        } finally {
          registry.dispose();
        }

        if (!opts.quiet) {
          console.log(`✓ Wrote ${registry.count} types to ${cachePath}`);
        }
      });
    });

  cache
    .command("verify")
    .description("Check that the cache file loads with this version (exit 2 if not)")
    .option("--json", "Output the result as JSON")
    .action(async (options: VerifyCommandOptions, command: Command) => {
      const opts = command.optsWithGlobals<GlobalOptions>();

      await withTiming("cli.cache.verify", isVerbose(opts), async () => {
        const cachePath = requireCachePath(opts);
        const registryCache = new RegistryCache(cachePath);
        let inspection: CacheInspection = await registryCache.inspect();

        // A well-formed file can still hold records that do not build
        if (inspection.ok) {
          const registry = await registryCache.load();
          if (registry) {
            registry.dispose();
          } else {
            inspection = { ok: false, reason: "invalid", detail: "cached records do not build valid types" };
          }
        }

        if (options.json) {
          printJson(
            inspection.ok
              ? { valid: true, path: cachePath, version: inspection.version, types: inspection.types.length }
              : { valid: false, path: cachePath, reason: inspection.reason, detail: inspection.detail }
          );
        }

        if (!inspection.ok) {
          if (!options.json && !opts.quiet) {
            console.log(`✗ Cache not usable (${inspection.reason}): ${inspection.detail}`);
          }
          throw new CliError(`Cache at ${cachePath} is not usable`, { exitCode: 2 });
        }

        if (!options.json && !opts.quiet) {
          console.log(`✓ Cache valid: ${inspection.types.length} types (version ${inspection.version})`);
        }
      });
    });
}

/**
 * stats: registry size and configuration
 */

import type { Command } from "commander";
import { DEFAULT_DATA_PATH } from "@typereg/sdk";
import type { GlobalOptions } from "../lib/env.js";
import { isVerbose, resolveCliConfig } from "../lib/env.js";
import { openCliRegistry } from "../lib/registry.js";
import { printJson } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";

interface StatsCommandOptions {
  json?: boolean;
}

export interface RegistryStats {
  variants: number;
  extensions: number;
  registered: number;
  obsolete: number;
  source: string;
  dataPath: string;
  cachePath: string | null;
}

export function registerStatsCommand(program: Command): void {
  program
    .command("stats")
    .description("Show registry statistics")
    .option("--json", "Output as JSON for machine consumption")
    .action(async (options: StatsCommandOptions, command: Command) => {
      const opts = command.optsWithGlobals<GlobalOptions>();

      await withTiming("cli.stats", isVerbose(opts), async () => {
        const config = resolveCliConfig(opts);
        const registry = await openCliRegistry(opts);
        const types = await registry.ensurePopulated();

        let registered = 0;
        let obsolete = 0;
        for (const type of types) {
          if (type.registered) registered++;
          if (type.obsolete) obsolete++;
        }

        const stats: RegistryStats = {
          variants: types.count,
          extensions: types.extensionCount,
          registered,
          obsolete,
          source: registry.source ?? "loader",
          dataPath: config.dataPath ?? DEFAULT_DATA_PATH,
          cachePath: config.cachePath ?? null,
        };

        if (options.json) {
          printJson(stats);
          return;
        }

        console.log(`Types: ${stats.variants}`);
        console.log(`Extensions: ${stats.extensions}`);
        console.log(`Registered: ${stats.registered}`);
        console.log(`Obsolete: ${stats.obsolete}`);
        console.log(`Loaded from: ${stats.source}`);
        console.log(`Data: ${stats.dataPath}`);
        console.log(`Cache: ${stats.cachePath ?? "(none)"}`);
      });
    });
}

/**
 * for <files...>: find descriptors by filename extension
 */

import type { Command } from "commander";
import type { GlobalOptions } from "../lib/env.js";
import { isVerbose } from "../lib/env.js";
import { parseFilenames } from "../lib/arg.js";
import { CliError } from "../lib/errors.js";
import { openCliRegistry } from "../lib/registry.js";
import { printJson, printLines } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";

interface ForCommandOptions {
  json?: boolean;
}

export function registerForCommand(program: Command): void {
  program
    .command("for <files...>")
    .description("Find content types for file names")
    .option("--json", "Output a JSON object of file name to content types")
    .action(async (files: string[], options: ForCommandOptions, command: Command) => {
      const opts = command.optsWithGlobals<GlobalOptions>();

      await withTiming("cli.for", isVerbose(opts), async () => {
        const names = parseFilenames(files);
        const registry = await openCliRegistry(opts);

        const results = new Map<string, string[]>();
        for (const name of names) {
          const types = await registry.typeFor(name);
          results.set(name, types.map((type) => type.contentType));
        }

        if (options.json) {
          printJson(Object.fromEntries(results));
        } else {
          printLines(
            [...results].map(([name, types]) =>
              types.length > 0 ? `${name}: ${types.join(", ")}` : `${name}: (unknown)`
            )
          );
        }

        if ([...results.values()].every((types) => types.length === 0)) {
          throw new CliError("No types found for the given files", { exitCode: 2 });
        }
      });
    });
}

/**
 * lookup <type>: find descriptors by content type or pattern
 */

import type { Command } from "commander";
import type { GlobalOptions } from "../lib/env.js";
import { isVerbose } from "../lib/env.js";
import { parsePattern } from "../lib/arg.js";
import { CliError } from "../lib/errors.js";
import { openCliRegistry } from "../lib/registry.js";
import { formatType, printJson, printLines } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";

interface LookupCommandOptions {
  complete?: boolean;
  registered?: boolean;
  pattern?: boolean;
  json?: boolean;
}

export function registerLookupCommand(program: Command): void {
  program
    .command("lookup <type>")
    .description("Find content types, most reliable first")
    .option("--complete", "Only types with known extensions")
    .option("--registered", "Only IANA-registered types")
    .option("--pattern", "Treat <type> as a regular expression")
    .option("--json", "Output records as JSON")
    .action(async (type: string, options: LookupCommandOptions, command: Command) => {
      const opts = command.optsWithGlobals<GlobalOptions>();

      await withTiming("cli.lookup", isVerbose(opts), async () => {
        const id = options.pattern ? parsePattern(type) : type;
        const registry = await openCliRegistry(opts);

        const types = await registry.lookup(id, {
          complete: options.complete,
          registered: options.registered,
        });

        if (options.json) {
          printJson(types.map((found) => found.toRecord()));
        } else {
          printLines(types.map(formatType));
        }

        if (types.length === 0) {
          throw new CliError(`No types found for ${type}`, { exitCode: 2 });
        }
      });
    });
}

/**
 * Command tree for the typereg CLI
 */

import { readFileSync } from "node:fs";
import { Command, CommanderError } from "commander";
import { logger } from "@typereg/sdk";
import { registerCacheCommand } from "./commands/cache.js";
import { registerForCommand } from "./commands/for.js";
import { registerLookupCommand } from "./commands/lookup.js";
import { registerStatsCommand } from "./commands/stats.js";
import type { GlobalOptions } from "./lib/env.js";
import { isVerbose } from "./lib/env.js";
import { formatCliError, mapSdkErrorToExitCode } from "./lib/errors.js";
import { red } from "./lib/render.js";

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

/**
 * Build the command tree; commander errors are thrown instead of exiting
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("typereg")
    .description("Content-type registry lookups by type or file name")
    .version(readVersion())
    .option("--data <path>", "Type data file or directory (default: bundled data)")
    .option("--cache <path>", "Registry cache file")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output")
    .configureOutput({
      writeOut: (str) => console.log(str.trimEnd()),
      writeErr: (str) => console.error(red(str.trimEnd(), process.stderr)),
    })
    .exitOverride()
    .hook("preAction", (_program, action) => {
      // Registry warnings are non-error output
      if (action.optsWithGlobals<GlobalOptions>().quiet) {
        logger.setEnabled(false);
      }
    });

  registerLookupCommand(program);
  registerForCommand(program);
  registerStatsCommand(program);
  registerCacheCommand(program);

  return program;
}

/**
 * Run the CLI with user arguments (no node/script prefix)
 * @returns The process exit code
 */
export async function run(argv: readonly string[]): Promise<number> {
  const program = createProgram();
  const loggerEnabled = logger.enabled;

  try {
    await program.parseAsync([...argv], { from: "user" });
    return 0;
  } catch (err) {
    // Commander has already written its own usage, help and version output
    if (err instanceof CommanderError) {
      return mapSdkErrorToExitCode(err);
    }

    const opts = program.opts<GlobalOptions>();
    console.error(`Error: ${formatCliError(err, isVerbose(opts))}`);
    return mapSdkErrorToExitCode(err);
  } finally {
    logger.setEnabled(loggerEnabled);
  }
}

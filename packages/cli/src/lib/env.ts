/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { expandTilde, resolveRegistryConfig, type RegistryConfig } from "@typereg/sdk";

/**
 * Options shared by every command
 */
export interface GlobalOptions {
  data?: string;
  cache?: string;
  verbose?: boolean;
  quiet?: boolean;
}

function resolveOption(value: string | undefined): string | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  return path.resolve(expandTilde(value.trim()));
}

/**
 * Registry configuration for a CLI run
 * Priority: CLI option > TYPEREG_* env var > bundled data / no cache
 *
 * The CLI always opens the registry lazily so that commands that never query
 * it (cache verify) do not pay for population.
 */
export function resolveCliConfig(opts: GlobalOptions, env: NodeJS.ProcessEnv = process.env): RegistryConfig {
  const config = resolveRegistryConfig(env);

  return {
    lazyLoad: true,
    cachePath: resolveOption(opts.cache) ?? config.cachePath,
    dataPath: resolveOption(opts.data) ?? config.dataPath,
  };
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(opts: GlobalOptions = {}, env: NodeJS.ProcessEnv = process.env): boolean {
  return opts.verbose === true || env.TYPEREG_CLI_DEBUG === "1";
}

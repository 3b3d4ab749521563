/**
 * Environment configuration resolution
 *
 * The registry core never reads the environment itself; callers resolve a
 * RegistryConfig here and pass it to `openRegistry`.
 *
 * - TYPEREG_LAZY_LOAD: any value other than "false" defers population to first use
 * - TYPEREG_CACHE: cache file path; unset or empty disables the cache
 * - TYPEREG_DATA: data file or directory overriding the bundled data
 */

import * as path from "node:path";
import { homedir } from "node:os";

export interface RegistryConfig {
  lazyLoad: boolean;
  cachePath?: string;
  dataPath?: string;
}

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

function resolvePath(value: string | undefined): string | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  return path.resolve(expandTilde(value.trim()));
}

/**
 * Resolve registry configuration from environment variables
 */
export function resolveRegistryConfig(env: NodeJS.ProcessEnv = process.env): RegistryConfig {
  const lazy = env.TYPEREG_LAZY_LOAD;

  return {
    lazyLoad: lazy !== undefined && lazy !== "false",
    cachePath: resolvePath(env.TYPEREG_CACHE),
    dataPath: resolvePath(env.TYPEREG_DATA),
  };
}

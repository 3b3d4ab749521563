/**
 * Registry access for CLI commands
 */

import { openRegistry, type DefaultRegistry } from "@typereg/sdk";
import { resolveCliConfig, type GlobalOptions } from "./env.js";

/**
 * Open the default registry for the given global options
 */
export async function openCliRegistry(opts: GlobalOptions): Promise<DefaultRegistry> {
  return openRegistry(resolveCliConfig(opts));
}

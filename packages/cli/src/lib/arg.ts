/**
 * Argument parsing and validation helpers
 */

import { CliError } from "./errors.js";

/**
 * Compile a type pattern; matching is case-insensitive since registry keys
 * are lowercase
 */
export function parsePattern(value: string): RegExp {
  try {
    return new RegExp(value, "i");
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new CliError(`Invalid pattern "${value}": ${err.message}`, { cause: err });
    }
    throw err;
  }
}

/**
 * Reject filenames that cannot name a file
 */
export function parseFilenames(values: readonly string[]): string[] {
  const names = values.map((value) => value.trim());

  const empty = names.findIndex((name) => name === "");
  if (empty !== -1) {
    throw new CliError(`File name ${empty + 1} is empty`);
  }

  return names;
}

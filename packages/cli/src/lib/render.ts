/**
 * Output rendering helpers
 */

import type { MimeType } from "@typereg/sdk";

/**
 * Print pretty JSON to stdout
 */
export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/**
 * Print lines to stdout (one per line)
 */
export function printLines(lines: string[]): void {
  lines.forEach((line) => console.log(line));
}

/**
 * One-line summary of a descriptor
 *
 * @example
 * formatType(plain)    // => "text/plain [txt, asc] (registered)"
 * formatType(obsolete) // => "text/x-markdown [md, mkd] (unregistered; obsolete, use text/markdown)"
 */
export function formatType(type: MimeType): string {
  const flags = [type.registered ? "registered" : "unregistered"];

  if (type.obsolete) {
    flags.push(type.useInstead ? `obsolete, use ${type.useInstead}` : "obsolete");
  }

  const extensions = type.complete ? ` [${type.extensions.join(", ")}]` : "";
  return `${type.contentType}${extensions} (${flags.join("; ")})`;
}

/**
 * Wrap text in ANSI red only if the stream is a TTY
 */
export function red(text: string, stream: Pick<NodeJS.WriteStream, "isTTY"> = process.stdout): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }
  return `\x1b[31m${text}\x1b[0m`;
}

/**
 * Sample descriptor records and registries for tests
 */

import { MimeTypes } from "@typereg/sdk";
import type { MimeTypeRecord } from "@typereg/sdk";

/**
 * A small data set with one entry per interesting ranking case:
 * - text/plain and application/json: registered, complete
 * - text/xml (unregistered) and application/xml (registered) share "xml"
 * - application/x-old: obsolete with a replacement
 * - application/x-gone: obsolete without one
 * - application/x-empty: no extensions
 */
export const SAMPLE_RECORDS: readonly MimeTypeRecord[] = [
  {
    "content-type": "text/plain",
    friendly: { en: "Text File" },
    extensions: ["txt", "asc"],
    registered: true,
  },
  {
    "content-type": "application/json",
    encoding: "8bit",
    extensions: ["json"],
    registered: true,
  },
  {
    "content-type": "text/xml",
    encoding: "8bit",
    extensions: ["xml"],
    registered: false,
  },
  {
    "content-type": "application/xml",
    encoding: "8bit",
    extensions: ["xml", "xsl"],
    registered: true,
  },
  {
    "content-type": "application/x-old",
    extensions: ["old"],
    obsolete: true,
    "use-instead": "application/new",
    registered: false,
  },
  {
    "content-type": "application/x-gone",
    extensions: ["old"],
    obsolete: true,
    registered: false,
  },
  {
    "content-type": "application/x-empty",
    registered: false,
  },
];

/**
 * Fresh copies of the sample records
 */
export function sampleRecords(): MimeTypeRecord[] {
  return structuredClone([...SAMPLE_RECORDS]);
}

/**
 * A registry holding the given records (default: the sample records)
 */
export function buildRegistry(records: readonly MimeTypeRecord[] = SAMPLE_RECORDS): MimeTypes {
  const registry = new MimeTypes();
  for (const record of records) {
    registry.addRecord(record, { quiet: true });
  }
  return registry;
}

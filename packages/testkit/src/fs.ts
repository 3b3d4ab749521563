/**
 * File system test utilities
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { atomicWrite, stableStringify } from "@typereg/sdk";
import type { MimeTypeRecord } from "@typereg/sdk";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "typereg-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "typereg-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Write records as a data file the Loader accepts
 * @returns The file path
 */
export async function writeDataFile(
  dir: string,
  name: string,
  records: readonly MimeTypeRecord[]
): Promise<string> {
  const filePath = join(dir, name);
  await atomicWrite(filePath, stableStringify(records));
  return filePath;
}

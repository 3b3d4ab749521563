/**
 * Loader for the canonical type data
 *
 * Data is a JSON file holding an array of descriptor records, or a directory
 * of such files (read in sorted filename order). The bundled data lives in
 * `data/types/`, one file per top-level media type.
 */

import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { DataLoadError, InvalidContentTypeError, InvalidEncodingError } from "./errors.js";
import { isDirectory, listFiles, readText } from "./io.js";
import { MimeTypes } from "./registry.js";
import { DataFileSchema, describeIssues, type MimeTypeRecord } from "./schemas.js";
import type { ValuePool } from "./value-pool.js";
import { logger } from "./observability/logs.js";

/**
 * Directory of the data files shipped with the package
 */
export const DEFAULT_DATA_PATH = fileURLToPath(new URL("../data/types/", import.meta.url));

export interface LoaderOptions {
  /** Log and skip records with a malformed content type or encoding instead of failing */
  skipInvalid?: boolean;
}

export interface LoadOptions {
  /** Interning table for the built registry */
  pool?: ValuePool;
}

export class Loader {
  readonly path: string;
  #skipInvalid: boolean;

  constructor(path: string = DEFAULT_DATA_PATH, options: LoaderOptions = {}) {
    this.path = path;
    this.#skipInvalid = options.skipInvalid ?? false;
  }

  /**
   * Validated records from every data file
   * @throws DataLoadError when a file cannot be read, parsed or validated
   */
  async *records(): AsyncGenerator<MimeTypeRecord> {
    for (const file of await this.#files()) {
      yield* await this.#readFile(file);
    }
  }

  /**
   * Build a registry from the data
   * @throws DataLoadError for unreadable data
   * @throws InvalidContentTypeError / InvalidEncodingError for malformed records unless skipInvalid
   */
  async load(options: LoadOptions = {}): Promise<MimeTypes> {
    const registry = new MimeTypes({ pool: options.pool });

    try {
      for await (const record of this.records()) {
        try {
          registry.addRecord(record, { quiet: true });
        } catch (err) {
          if (
            this.#skipInvalid &&
            (err instanceof InvalidContentTypeError || err instanceof InvalidEncodingError)
          ) {
            logger.warn("loader.skip", { type: record["content-type"], message: err.message });
            continue;
          }
          throw err;
        }
      }
    } catch (err) {
      registry.dispose();
      throw err;
    }

    return registry;
  }

  async #files(): Promise<string[]> {
    if (await isDirectory(this.path)) {
      const names = await listFiles(this.path, ".json");
      return names.map((name) => join(this.path, name));
    }
    return [this.path];
  }

  async #readFile(file: string): Promise<MimeTypeRecord[]> {
    let content: string;
    try {
      content = await readText(file);
    } catch (err) {
      throw new DataLoadError(file, "file could not be read", { cause: err });
    }

    let parsed: unknown;
    try {
      // Strip BOM if present
      parsed = JSON.parse(content.charCodeAt(0) === 0xfeff ? content.slice(1) : content);
    } catch (err) {
      throw new DataLoadError(file, "invalid JSON", { cause: err });
    }

    const result = DataFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new DataLoadError(file, describeIssues(result.error), { cause: result.error });
    }

    return result.data;
  }
}

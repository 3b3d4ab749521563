/**
 * Versioned on-disk snapshot of a registry
 *
 * File format: gzip-compressed JSON envelope
 *   { "version": <fingerprint>, "digest": <sha256 of canonical types>, "types": [<record>, ...] }
 *
 * Invariants:
 * - Loads are all-or-nothing: a registry is returned only when the fingerprint,
 *   schema and digest all check out, otherwise `undefined`
 * - Loads never throw
 * - Saves go through atomicWrite, so a concurrent reader sees the previous
 *   file or the new one; concurrent writers are last-writer-wins
 */

import { createHash } from "node:crypto";
import { promisify } from "node:util";
import { gunzip as gunzipCallback, gzip as gzipCallback } from "node:zlib";
import { CacheWriteError, FileNotFoundError } from "./errors.js";
import { stableStringify } from "./format.js";
import { atomicWrite, readBytes } from "./io.js";
import { MimeTypes } from "./registry.js";
import {
  CacheEnvelopeSchema,
  CacheHeaderSchema,
  describeIssues,
  type CacheEnvelope,
  type MimeTypeRecord,
} from "./schemas.js";
import type { ValuePool } from "./value-pool.js";
import { VERSION } from "./version.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";

const gzip = promisify(gzipCallback);
const gunzip = promisify(gunzipCallback);

export interface RegistryCacheOptions {
  /** Fingerprint written to and required of cache files (default: VERSION) */
  version?: string;
}

export interface CacheLoadOptions {
  /** Interning table for the rebuilt registry */
  pool?: ValuePool;
}

/**
 * Why a cache file was not used
 */
export type CacheRejection = "missing" | "unreadable" | "corrupt" | "version" | "schema" | "digest" | "invalid";

export type CacheInspection =
  | { ok: true; version: string; types: MimeTypeRecord[] }
  | { ok: false; reason: CacheRejection; detail: string };

/**
 * sha256 over the canonical JSON of the records
 */
export function digestRecords(records: readonly MimeTypeRecord[]): string {
  return createHash("sha256").update(stableStringify(records, 0)).digest("hex");
}

export class RegistryCache {
  readonly path: string;
  readonly version: string;

  constructor(path: string, options: RegistryCacheOptions = {}) {
    this.path = path;
    this.version = options.version ?? VERSION;
  }

  /**
   * Rebuild a registry from the cache file
   * @returns The registry, or undefined when the file is missing or not trusted
   */
  async load(options: CacheLoadOptions = {}): Promise<MimeTypes | undefined> {
    const start = performance.now();
    const inspection = await this.inspect();

    if (!inspection.ok) {
      this.#reject(inspection.reason, inspection.detail);
      return undefined;
    }

    const registry = new MimeTypes({ pool: options.pool });
    try {
      for (const record of inspection.types) {
        registry.addRecord(record, { quiet: true });
      }
    } catch (err) {
      registry.dispose();
      this.#reject("invalid", err instanceof Error ? err.message : String(err));
      return undefined;
    }

    const duration = performance.now() - start;
    metrics.recordCacheHit(duration);
    logger.debug("cache.load.hit", {
      type: this.path,
      details: { variants: registry.count, durationMs: duration.toFixed(2) },
    });

    return registry;
  }

  /**
   * Read and validate the cache file without building a registry
   */
  async inspect(): Promise<CacheInspection> {
    let bytes: Buffer;
    try {
      bytes = await readBytes(this.path);
    } catch (err) {
      if (err instanceof FileNotFoundError) {
        return { ok: false, reason: "missing", detail: err.message };
      }
      return { ok: false, reason: "unreadable", detail: err instanceof Error ? err.message : String(err) };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse((await gunzip(bytes)).toString("utf-8"));
    } catch (err) {
      return { ok: false, reason: "corrupt", detail: err instanceof Error ? err.message : String(err) };
    }

    // Fingerprint first: a file from another version is not worth validating
    const header = CacheHeaderSchema.safeParse(parsed);
    if (!header.success) {
      return { ok: false, reason: "schema", detail: describeIssues(header.error) };
    }
    if (header.data.version !== this.version) {
      return {
        ok: false,
        reason: "version",
        detail: `cache version ${header.data.version} does not match ${this.version}`,
      };
    }

    const envelope = CacheEnvelopeSchema.safeParse(parsed);
    if (!envelope.success) {
      return { ok: false, reason: "schema", detail: describeIssues(envelope.error) };
    }

    if (digestRecords(envelope.data.types) !== envelope.data.digest) {
      return { ok: false, reason: "digest", detail: "payload digest mismatch" };
    }

    return { ok: true, version: envelope.data.version, types: envelope.data.types };
  }

  /**
   * Write a snapshot of the registry
   * @throws CacheWriteError when the file cannot be written
   */
  async save(registry: MimeTypes): Promise<void> {
    const types = registry.records();
    const envelope: CacheEnvelope = {
      version: this.version,
      digest: digestRecords(types),
      types,
    };

    try {
      const bytes = await gzip(JSON.stringify(envelope));
      await atomicWrite(this.path, bytes);
    } catch (err) {
      metrics.recordCacheSaveFailure();
      throw new CacheWriteError(this.path, { cause: err });
    }

    metrics.recordCacheSave();
    logger.debug("cache.save", {
      type: this.path,
      details: { variants: types.length },
    });
  }

  #reject(reason: CacheRejection, detail: string): void {
    if (reason === "missing") {
      metrics.recordCacheMiss();
      logger.debug("cache.load.miss", { type: this.path, message: detail });
      return;
    }

    metrics.recordCacheRejection();
    logger.warn("cache.load.reject", {
      type: this.path,
      message: detail,
      details: { reason },
    });
  }
}

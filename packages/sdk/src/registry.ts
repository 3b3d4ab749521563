/**
 * Registry of content types indexed by simplified type and by file extension
 *
 * Invariants:
 * - A descriptor is in the extension index for each of its extensions iff it
 *   is held under its simplified key
 * - The extension index is derived and keyed by lowercase extension; it
 *   changes only through indexing and re-indexing
 * - Descriptors accumulate for the registry's lifetime (no removal)
 * - The registry observes every descriptor it holds and re-indexes it when
 *   its extensions are reassigned, until `dispose()`
 * - Each held descriptor references the registry until `dispose()`; call it
 *   on any registry discarded while its descriptors live on elsewhere
 *
 * @example
 * ```typescript
 * const types = new MimeTypes();
 * types.addRecord({ "content-type": "text/plain", extensions: ["txt"], registered: true });
 *
 * types.lookup("TEXT/PLAIN");   // [text/plain]
 * types.typeFor("notes.txt");   // [text/plain]
 * types.lookup(/^text\//, { complete: true });
 * ```
 */

import { simplify } from "./content-type.js";
import { MimeType, type MimeTypeObserver } from "./mime-type.js";
import { sortByPriority } from "./priority.js";
import type { MimeTypeRecord } from "./schemas.js";
import { ValuePool } from "./value-pool.js";
import { logger } from "./observability/logs.js";

export interface LookupOptions {
  /** Only descriptors with at least one extension */
  complete?: boolean;
  /** Only IANA-registered descriptors */
  registered?: boolean;
}

export interface AddOptions {
  /** Suppress duplicate-registration warnings */
  quiet?: boolean;
}

export interface RegistryOptions {
  /** Interning table for descriptors built by this registry (default: a fresh pool) */
  pool?: ValuePool;
}

/**
 * Lookup key for a filename: the text after the last "." of the trailing
 * path component, lowercased, or the whole component when it has no "."
 *
 * @example
 * extensionKey("reports/Q3.XML") // => "xml"
 * extensionKey("README")         // => "readme"
 */
export function extensionKey(filename: string): string {
  const segments = filename.split(/[\\/]/);
  const base = (segments[segments.length - 1] ?? "").trim().toLowerCase();
  const dot = base.lastIndexOf(".");
  return dot === -1 ? base : base.slice(dot + 1);
}

export class MimeTypes implements Iterable<MimeType>, MimeTypeObserver {
  readonly pool: ValuePool;

  #typeVariants = new Map<string, Set<MimeType>>();
  #extensionIndex = new Map<string, Set<MimeType>>();
  #subscriptions = new Map<MimeType, () => void>();
  #warned = new Set<string>();

  constructor(options: RegistryOptions = {}) {
    this.pool = options.pool ?? new ValuePool();
  }

  /**
   * Number of type variants held
   */
  get count(): number {
    let total = 0;
    for (const variants of this.#typeVariants.values()) {
      total += variants.size;
    }
    return total;
  }

  /**
   * Number of distinct extensions indexed
   */
  get extensionCount(): number {
    return this.#extensionIndex.size;
  }

  *values(): IterableIterator<MimeType> {
    for (const variants of this.#typeVariants.values()) {
      yield* variants;
    }
  }

  [Symbol.iterator](): IterableIterator<MimeType> {
    return this.values();
  }

  /**
   * Find descriptors by type, most reliable first
   *
   * A descriptor matches on its simplified key, a pattern on every simplified
   * key it matches, a string on its simplified form. Unknown or malformed
   * keys yield an empty array.
   */
  lookup(id: MimeType | RegExp | string, options: LookupOptions = {}): MimeType[] {
    let matches: MimeType[];

    if (id instanceof MimeType) {
      matches = [...(this.#typeVariants.get(id.simplified) ?? [])];
    } else if (id instanceof RegExp) {
      matches = this.#match(id);
    } else {
      const key = simplify(id);
      matches = key === undefined ? [] : [...(this.#typeVariants.get(key) ?? [])];
    }

    return sortByPriority(this.#prune(matches, options));
  }

  /**
   * Find descriptors mapped to the extension of one or more filenames
   *
   * Hits for all names are merged without duplicates, most reliable first.
   */
  typeFor(filenames: string | readonly string[]): MimeType[] {
    const names = typeof filenames === "string" ? [filenames] : filenames;
    const hits = new Set<MimeType>();

    for (const name of names) {
      for (const type of this.#extensionIndex.get(extensionKey(name)) ?? []) {
        hits.add(type);
      }
    }

    return sortByPriority(hits);
  }

  /**
   * Add one descriptor
   *
   * A descriptor with the same content type already under the same key is
   * reported once per content type (unless quiet) and kept alongside.
   */
  addType(type: MimeType, options: AddOptions = {}): void {
    const key = type.simplified;
    let variants = this.#typeVariants.get(key);

    if (!options.quiet && variants && [...variants].some((existing) => existing.eql(type))) {
      this.#warnDuplicate(type);
    }

    if (!variants) {
      variants = new Set();
      this.#typeVariants.set(key, variants);
    }
    variants.add(type);

    if (!this.#subscriptions.has(type)) {
      this.#subscriptions.set(type, type.subscribe(this));
    }

    this.#indexExtensions(type, type.extensions);
  }

  /**
   * Add several descriptors
   */
  addTypes(types: Iterable<MimeType>, options: AddOptions = {}): void {
    for (const type of types) {
      this.addType(type, options);
    }
  }

  /**
   * Add every variant held by another registry
   */
  merge(other: MimeTypes, options: AddOptions = {}): void {
    this.addTypes([...other], options);
  }

  /**
   * Build a descriptor from its mapping form with this registry's pool and add it
   * @throws InvalidContentTypeError / InvalidEncodingError for malformed records
   */
  addRecord(record: MimeTypeRecord, options: AddOptions = {}): MimeType {
    const type = MimeType.fromRecord(record, { pool: this.pool });
    this.addType(type, options);
    return type;
  }

  /**
   * Mapping form of every descriptor, in iteration order
   */
  records(): MimeTypeRecord[] {
    return [...this].map((type) => type.toRecord());
  }

  /**
   * Re-index a held descriptor whose extensions were reassigned
   */
  extensionsChanged(type: MimeType, previous: readonly string[]): void {
    if (!this.#holds(type)) {
      return;
    }

    for (const extension of previous) {
      const key = extension.toLowerCase();
      const bucket = this.#extensionIndex.get(key);
      if (!bucket) continue;

      bucket.delete(type);
      if (bucket.size === 0) {
        this.#extensionIndex.delete(key);
      }
    }

    this.#indexExtensions(type, type.extensions);
  }

  /**
   * Stop observing held descriptors; later extension changes are not re-indexed.
   * Required before dropping a registry whose descriptors outlive it.
   */
  dispose(): void {
    for (const unsubscribe of this.#subscriptions.values()) {
      unsubscribe();
    }
    this.#subscriptions.clear();
  }

  toString(): string {
    return `MimeTypes(${this.count} variants, ${this.extensionCount} extensions)`;
  }

  #holds(type: MimeType): boolean {
    return this.#typeVariants.get(type.simplified)?.has(type) ?? false;
  }

  #indexExtensions(type: MimeType, extensions: readonly string[]): void {
    if (!this.#holds(type)) {
      return;
    }

    for (const extension of extensions) {
      const key = extension.toLowerCase();
      let bucket = this.#extensionIndex.get(key);
      if (!bucket) {
        bucket = new Set();
        this.#extensionIndex.set(key, bucket);
      }
      bucket.add(type);
    }
  }

  #match(pattern: RegExp): MimeType[] {
    const matches: MimeType[] = [];
    // Stateless copy: global and sticky flags would tie matching to lastIndex
    const re = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ""));
    for (const [key, variants] of this.#typeVariants) {
      if (re.test(key)) {
        matches.push(...variants);
      }
    }
    return matches;
  }

  #prune(matches: MimeType[], options: LookupOptions): MimeType[] {
    return matches.filter(
      (type) => (!options.complete || type.complete) && (!options.registered || type.registered)
    );
  }

  #warnDuplicate(type: MimeType): void {
    if (this.#warned.has(type.contentType)) {
      return;
    }
    this.#warned.add(type.contentType);

    logger.warn("registry.duplicate", {
      type: type.contentType,
      message: `Type ${type.contentType} is already registered as a variant of ${type.simplified}`,
    });
  }
}

/**
 * The definition of one content type
 *
 * Invariants:
 * - `simplified` is the lowercase `contentType` and is the only comparison key
 * - `mediaType`/`subType` are the halves of `simplified`
 * - A malformed content type or encoding throws before any state is observable
 * - Reassigning `extensions` notifies every subscribed observer
 *
 * @example
 * ```typescript
 * const text = new MimeType("text/plain", { extensions: ["txt", "asc"], registered: true });
 * text.mediaType;          // "text"
 * text.encoding;           // "quoted-printable"
 * text.preferredExtension; // "txt"
 * text.like("text/x-plain"); // true
 * ```
 */

import { matchContentType, simplify, toI18nKey } from "./content-type.js";
import { InvalidContentTypeError, InvalidEncodingError } from "./errors.js";
import { compareStrings, priorityCompare } from "./priority.js";
import type { MimeTypeRecord } from "./schemas.js";
import type { ValuePool } from "./value-pool.js";

export const ENCODINGS = ["7bit", "8bit", "quoted-printable", "base64"] as const;

export type Encoding = (typeof ENCODINGS)[number];

const BINARY_ENCODINGS: readonly Encoding[] = ["base64", "8bit"];
const ASCII_ENCODINGS: readonly Encoding[] = ["7bit", "quoted-printable"];

/**
 * Receives extension changes of descriptors it subscribed to
 */
export interface MimeTypeObserver {
  extensionsChanged(type: MimeType, previous: readonly string[]): void;
}

/**
 * Attributes accepted at construction
 */
export interface MimeTypeInit {
  extensions?: Iterable<string>;
  preferredExtension?: string;
  /** Transfer encoding; omitted or "default" selects the media type's default */
  encoding?: string;
  registered?: boolean;
  obsolete?: boolean;
  /** Replacement content type, reported only while obsolete */
  useInstead?: string;
  signature?: boolean;
  docs?: string;
  friendly?: Record<string, string>;
  xrefs?: Record<string, Iterable<string>>;
}

export interface MimeTypeOptions {
  /** Interning table shared with other descriptors of the same registry */
  pool?: ValuePool;
}

function isEncoding(value: string): value is Encoding {
  return ENCODINGS.some((encoding) => encoding === value);
}

export class MimeType {
  readonly contentType: string;
  readonly simplified: string;
  readonly mediaType: string;
  readonly subType: string;
  readonly rawMediaType: string;
  readonly rawSubType: string;
  readonly i18nKey: string;
  readonly registered: boolean;
  readonly obsolete: boolean;
  readonly signature: boolean;
  readonly docs: string;

  #pool: ValuePool | undefined;
  #encoding: Encoding;
  #extensions: string[] = [];
  #preferredExtension: string | undefined;
  #useInstead: string | undefined;
  #friendly: Record<string, string>;
  #xrefs: Record<string, string[]>;
  #observers = new Set<MimeTypeObserver>();

  constructor(contentType: string, init: MimeTypeInit = {}, options: MimeTypeOptions = {}) {
    const parts = typeof contentType === "string" ? matchContentType(contentType) : undefined;
    if (!parts) {
      throw new InvalidContentTypeError(contentType);
    }

    this.#pool = options.pool;

    this.contentType = this.#intern(contentType);
    this.rawMediaType = this.#intern(parts.mediaType);
    this.rawSubType = this.#intern(parts.subType);
    this.simplified = this.#intern(contentType.toLowerCase());
    this.mediaType = this.#intern(parts.mediaType.toLowerCase());
    this.subType = this.#intern(parts.subType.toLowerCase());
    this.i18nKey = this.#intern(toI18nKey(parts));

    this.registered = init.registered ?? false;
    this.obsolete = init.obsolete ?? false;
    this.signature = init.signature ?? false;
    this.docs = init.docs ?? "";

    this.#encoding = this.#resolveEncoding(init.encoding);
    this.#extensions = this.#normalizeExtensions(init.extensions ?? []);
    if (init.preferredExtension) {
      this.#extensions = this.#normalizeExtensions([...this.#extensions, init.preferredExtension]);
      this.#preferredExtension = this.#intern(init.preferredExtension);
    }
    this.#useInstead = init.useInstead ? this.#intern(init.useInstead) : undefined;
    this.#friendly = { ...init.friendly };
    this.#xrefs = {};
    for (const [kind, values] of Object.entries(init.xrefs ?? {})) {
      this.#xrefs[kind] = [...new Set(values)].sort(compareStrings).map((value) => this.#intern(value));
    }
  }

  /**
   * Build a descriptor from its mapping form
   */
  static fromRecord(record: MimeTypeRecord, options: MimeTypeOptions = {}): MimeType {
    return new MimeType(
      record["content-type"],
      {
        docs: record.docs,
        friendly: record.friendly,
        encoding: record.encoding,
        extensions: record.extensions,
        preferredExtension: record["preferred-extension"],
        obsolete: record.obsolete,
        useInstead: record["use-instead"],
        xrefs: record.xrefs,
        registered: record.registered,
        signature: record.signature,
      },
      options
    );
  }

  /**
   * Known file extensions, unique, in order of first appearance
   */
  get extensions(): string[] {
    return [...this.#extensions];
  }

  set extensions(value: Iterable<string>) {
    const previous = this.#extensions;
    this.#extensions = this.#normalizeExtensions(value);

    if (this.#preferredExtension !== undefined && !this.#extensions.includes(this.#preferredExtension)) {
      this.#preferredExtension = undefined;
    }

    for (const observer of [...this.#observers]) {
      observer.extensionsChanged(this, previous);
    }
  }

  /**
   * Merge extensions into the existing list
   * @returns The resulting extension list
   */
  addExtensions(...extensions: string[]): string[] {
    this.extensions = [...this.#extensions, ...extensions];
    return this.extensions;
  }

  /**
   * The explicitly preferred extension, or the first known one
   */
  get preferredExtension(): string | undefined {
    return this.#preferredExtension ?? this.#extensions[0];
  }

  /**
   * Setting an extension that is not yet known adds it to `extensions`
   */
  set preferredExtension(value: string | undefined) {
    if (value && !this.#extensions.includes(value)) {
      this.addExtensions(value);
    }
    this.#preferredExtension = value ? this.#intern(value) : undefined;
  }

  get encoding(): Encoding {
    return this.#encoding;
  }

  /**
   * `undefined` or "default" resets to the default encoding
   * @throws InvalidEncodingError for anything but the four transfer encodings
   */
  set encoding(value: string | undefined) {
    this.#encoding = this.#resolveEncoding(value);
  }

  /**
   * quoted-printable for text, base64 for everything else
   */
  get defaultEncoding(): Encoding {
    return this.mediaType === "text" ? "quoted-printable" : "base64";
  }

  get binary(): boolean {
    return BINARY_ENCODINGS.includes(this.#encoding);
  }

  get ascii(): boolean {
    return ASCII_ENCODINGS.includes(this.#encoding);
  }

  /**
   * A descriptor is complete when it knows at least one extension
   */
  get complete(): boolean {
    return this.#extensions.length > 0;
  }

  get useInstead(): string | undefined {
    return this.obsolete ? this.#useInstead : undefined;
  }

  friendly(lang = "en"): string | undefined {
    return this.#friendly[lang];
  }

  get friendlyNames(): Record<string, string> {
    return { ...this.#friendly };
  }

  get xrefs(): Record<string, string[]> {
    return Object.fromEntries(Object.entries(this.#xrefs).map(([kind, values]) => [kind, [...values]]));
  }

  /**
   * Compare type strings with `x-` markers removed from both sides
   */
  like(other: MimeType | string): boolean {
    const theirs = simplify(other instanceof MimeType ? other.simplified : other, { removeXPrefix: true });
    return theirs !== undefined && simplify(this.simplified, { removeXPrefix: true }) === theirs;
  }

  /**
   * Order by simplified form; strings are simplified before comparing
   */
  compareTo(other: MimeType | string | undefined): number {
    if (other === undefined) {
      return -1;
    }

    const theirs = other instanceof MimeType ? other.simplified : (simplify(other) ?? other.toLowerCase());
    return compareStrings(this.simplified, theirs);
  }

  /**
   * Case-insensitive match against another descriptor or a type string
   */
  equals(other: MimeType | string | undefined): boolean {
    return this.compareTo(other) === 0;
  }

  /**
   * Identity: another descriptor with the exact same content type
   */
  eql(other: unknown): boolean {
    return other instanceof MimeType && other.contentType === this.contentType;
  }

  priorityCompare(other: MimeType): number {
    return priorityCompare(this, other);
  }

  /**
   * Register for extension changes
   * @returns A function that removes the subscription
   */
  subscribe(observer: MimeTypeObserver): () => void {
    this.#observers.add(observer);
    return () => this.unsubscribe(observer);
  }

  unsubscribe(observer: MimeTypeObserver): void {
    this.#observers.delete(observer);
  }

  hasObserver(observer: MimeTypeObserver): boolean {
    return this.#observers.has(observer);
  }

  /**
   * Mapping form; round-trips through `MimeType.fromRecord`
   */
  toRecord(): MimeTypeRecord {
    const record: MimeTypeRecord = { "content-type": this.contentType };

    if (this.docs) {
      record.docs = this.docs;
    }
    if (Object.keys(this.#friendly).length > 0) {
      record.friendly = this.friendlyNames;
    }
    record.encoding = this.#encoding;
    if (this.#extensions.length > 0) {
      record.extensions = this.extensions;
    }
    if (this.#preferredExtension !== undefined) {
      record["preferred-extension"] = this.#preferredExtension;
    }
    if (this.obsolete) {
      record.obsolete = true;
      if (this.#useInstead !== undefined) {
        record["use-instead"] = this.#useInstead;
      }
    }
    if (Object.keys(this.#xrefs).length > 0) {
      record.xrefs = this.xrefs;
    }
    record.registered = this.registered;
    if (this.signature) {
      record.signature = true;
    }

    return record;
  }

  toJSON(): MimeTypeRecord {
    return this.toRecord();
  }

  toString(): string {
    return this.contentType;
  }

  #intern(value: string): string {
    return this.#pool ? this.#pool.intern(value) : value;
  }

  #resolveEncoding(value: string | undefined): Encoding {
    if (value === undefined || value === "default") {
      return this.defaultEncoding;
    }
    if (isEncoding(value)) {
      return value;
    }
    throw new InvalidEncodingError(value);
  }

  #normalizeExtensions(values: Iterable<string>): string[] {
    const unique = new Set<string>();
    for (const value of values) {
      if (typeof value === "string" && value.length > 0) {
        unique.add(this.#intern(value));
      }
    }
    return [...unique];
  }
}

/**
 * typereg SDK
 *
 * Content-type registry with priority-ranked lookups and a versioned on-disk cache
 */

export { VERSION } from "./version.js";

// Descriptors
export { MimeType, ENCODINGS } from "./mime-type.js";
export type { Encoding, MimeTypeInit, MimeTypeOptions, MimeTypeObserver } from "./mime-type.js";
export { matchContentType, isContentType, simplify, i18nKey, toI18nKey } from "./content-type.js";
export type { ContentTypeParts, SimplifyOptions } from "./content-type.js";
export { ValuePool } from "./value-pool.js";
export { priorityCompare, sortByPriority, compareStrings } from "./priority.js";

// Registry
export { MimeTypes, extensionKey } from "./registry.js";
export type { LookupOptions, AddOptions, RegistryOptions } from "./registry.js";

// Persistence and population
export { RegistryCache, digestRecords } from "./cache.js";
export type {
  RegistryCacheOptions,
  CacheLoadOptions,
  CacheRejection,
  CacheInspection,
} from "./cache.js";
export { Loader, DEFAULT_DATA_PATH } from "./loader.js";
export type { LoaderOptions, LoadOptions } from "./loader.js";
export { DefaultRegistry, openRegistry } from "./default-registry.js";
export type { DefaultRegistryOptions, PopulationSource } from "./default-registry.js";
export { resolveRegistryConfig, expandTilde } from "./config.js";
export type { RegistryConfig } from "./config.js";

// Schemas
export {
  MimeTypeRecordSchema,
  DataFileSchema,
  CacheHeaderSchema,
  CacheEnvelopeSchema,
  describeIssues,
} from "./schemas.js";
export type { MimeTypeRecord, CacheEnvelope } from "./schemas.js";

// Utilities
export { stableStringify } from "./format.js";
export { atomicWrite, readBytes, readText, ensureDirectory, listFiles, isDirectory } from "./io.js";

// Observability
export { logger, formatEntry } from "./observability/logs.js";
export type { LogLevel, LogEntry, LogFields } from "./observability/logs.js";
export { metrics } from "./observability/metrics.js";
export type { RegistryMetrics } from "./observability/metrics.js";

// Errors
export {
  TypeRegistryError,
  InvalidContentTypeError,
  InvalidEncodingError,
  DataLoadError,
  CacheWriteError,
  FileNotFoundError,
  FileReadError,
  FileWriteError,
  DirectoryError,
  ListFilesError,
} from "./errors.js";

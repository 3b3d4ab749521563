/**
 * Error types for registry operations
 *
 * Invariants:
 * - File errors include the absolute target path in the message
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

function inspect(value: unknown): string {
  return typeof value === "string" ? JSON.stringify(value) : String(value);
}

/**
 * Base class for all registry errors
 */
export abstract class TypeRegistryError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a content type is not of the form `media/subtype`
 */
export class InvalidContentTypeError extends TypeRegistryError {
  readonly code = "E_CONTENT_TYPE";

  constructor(
    public readonly contentType: unknown,
    options?: ErrorOptions
  ) {
    super(`Invalid Content-Type ${inspect(contentType)}`, options);
  }
}

/**
 * Thrown when a transfer encoding is not one of the supported values
 */
export class InvalidEncodingError extends TypeRegistryError {
  readonly code = "E_ENCODING";

  constructor(
    public readonly encoding: unknown,
    options?: ErrorOptions
  ) {
    super(`Invalid Encoding ${inspect(encoding)}`, options);
  }
}

/**
 * Thrown when type data cannot be read or does not match the record schema
 */
export class DataLoadError extends TypeRegistryError {
  readonly code = "E_DATA_LOAD";

  constructor(filePath: string, reason: string, options?: ErrorOptions) {
    super(`Failed to load type data from ${filePath}: ${reason}`, options);
  }
}

/**
 * Thrown when a registry snapshot cannot be written
 */
export class CacheWriteError extends TypeRegistryError {
  readonly code = "E_CACHE_WRITE";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write registry cache: ${filePath}`, options);
  }
}

/**
 * Thrown when a file cannot be found
 */
export class FileNotFoundError extends TypeRegistryError {
  readonly code = "ENOENT";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`File not found: ${filePath}`, options);
  }
}

/**
 * Thrown when a file read operation fails
 */
export class FileReadError extends TypeRegistryError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read file: ${filePath}`, options);
  }
}

/**
 * Thrown when a file write operation fails
 */
export class FileWriteError extends TypeRegistryError {
  readonly code = "WRITE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write file: ${filePath}`, options);
  }
}

/**
 * Thrown when a directory operation fails
 */
export class DirectoryError extends TypeRegistryError {
  readonly code = "DIRECTORY_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Directory operation failed: ${dirPath}`, options);
  }
}

/**
 * Thrown when listing files in a directory fails
 */
export class ListFilesError extends TypeRegistryError {
  readonly code = "LIST_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Failed to list files in directory: ${dirPath}`, options);
  }
}

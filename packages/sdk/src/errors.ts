/**
 * Error types for pak operations
 *
 * Invariants:
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - Build-time failures share the `BuildError` base
 */

/**
 * Base class for all pak errors
 */
export abstract class PakError extends Error {
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
 * Thrown when building or publishing an artifact fails
 */
export class BuildError extends PakError {
  readonly code: string = "E_BUILD";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

/**
 * Thrown when a record type's encoder fails
 */
export class EncodeError extends BuildError {
  override readonly code = "E_ENCODE";

  constructor(
    public readonly typeName: string,
    options?: ErrorOptions
  ) {
    super(`Failed to encode record of type "${typeName}"`, options);
  }
}

/**
 * Thrown when a record type's index extractor fails or yields an unusable field
 */
export class IndexExtractionError extends BuildError {
  override readonly code = "E_INDEX_EXTRACTION";

  constructor(
    public readonly typeName: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Failed to extract indices from record of type "${typeName}": ${reason}`, options);
  }
}

/**
 * Thrown when an artifact is truncated, corrupt or of an unsupported version
 */
export class FormatError extends PakError {
  readonly code = "E_FORMAT";

  constructor(reason: string, options?: ErrorOptions) {
    super(`Invalid pak artifact: ${reason}`, options);
  }
}

/**
 * Thrown when an artifact file does not exist
 */
export class ArtifactNotFoundError extends PakError {
  readonly code = "ENOENT";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Pak artifact not found: ${filePath}`, options);
  }
}

/**
 * Thrown when reading an artifact file fails
 */
export class ArtifactReadError extends PakError {
  readonly code = "E_READ";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read pak artifact: ${filePath}`, options);
  }
}

/**
 * Thrown when a value kind or a pointer's type tag disagrees with what was stored
 */
export class TypeMismatchError extends PakError {
  readonly code = "E_TYPE_MISMATCH";

  constructor(
    public readonly expected: string,
    public readonly actual: string,
    context: string,
    options?: ErrorOptions
  ) {
    super(`Type mismatch for ${context}: expected ${expected}, got ${actual}`, options);
  }
}

/**
 * Thrown when a record type's decoder rejects the stored bytes
 */
export class DecodeError extends PakError {
  readonly code = "E_DECODE";

  constructor(
    public readonly typeName: string,
    options?: ErrorOptions
  ) {
    super(`Failed to decode record of type "${typeName}"`, options);
  }
}

/**
 * Thrown when a pointer addresses bytes outside the data segment
 */
export class PointerOutOfBoundsError extends PakError {
  readonly code = "E_POINTER_BOUNDS";

  constructor(offset: number, length: number, dataLength: number, options?: ErrorOptions) {
    super(
      `Pointer [${offset}, +${length}) lies outside the data segment of ${dataLength} bytes`,
      options
    );
  }
}

/**
 * Thrown when reading from a pak whose source has been closed
 */
export class PakClosedError extends PakError {
  readonly code = "E_CLOSED";

  constructor(options?: ErrorOptions) {
    super("Pak source has been closed", options);
  }
}

/**
 * Thrown when a query or filter document is malformed
 */
export class InvalidQueryError extends PakError {
  readonly code = "E_QUERY";

  constructor(reason: string, options?: ErrorOptions) {
    super(`Invalid query: ${reason}`, options);
  }
}

/**
 * docmap Error Handling Module
 *
 * All errors raised by the mapping layer extend DocmapError, which carries:
 * - Error codes for programmatic handling
 * - Context data describing where the failure happened
 * - Cause chaining (the collection manager's original failure is kept)
 * - JSON serialization
 *
 * Error Hierarchy:
 * - DocmapError (base class)
 *   - ValidationError (null/malformed caller input, bad comparator arguments)
 *   - MappingError (unmapped field, unreconcilable entity shape)
 *   - IncompleteQueryError (descriptor built without a collection)
 *   - NonUniqueResultError (singleResult matched more than one record)
 *   - DelegateError (collection manager or hook failure)
 *   - ConfigurationError (invalid configuration, unknown provider)
 *
 * @module errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for docmap operations.
 * These codes are stable and can be used for programmatic error handling.
 */
export enum ErrorCode {
  // General
  UNKNOWN = 'UNKNOWN',
  INTERNAL = 'INTERNAL',

  // Validation
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  INVALID_INPUT = 'INVALID_INPUT',
  INVALID_TYPE = 'INVALID_TYPE',
  REQUIRED_FIELD = 'REQUIRED_FIELD',
  INVALID_OPERATOR = 'INVALID_OPERATOR',

  // Mapping
  MAPPING_FAILED = 'MAPPING_FAILED',
  UNKNOWN_FIELD = 'UNKNOWN_FIELD',
  UNKNOWN_ENTITY = 'UNKNOWN_ENTITY',
  SHAPE_MISMATCH = 'SHAPE_MISMATCH',

  // Query
  INCOMPLETE_QUERY = 'INCOMPLETE_QUERY',
  NON_UNIQUE_RESULT = 'NON_UNIQUE_RESULT',

  // Delegation
  DELEGATE_FAILED = 'DELEGATE_FAILED',
  HOOK_FAILED = 'HOOK_FAILED',

  // Storage
  NOT_FOUND = 'NOT_FOUND',
  ALREADY_EXISTS = 'ALREADY_EXISTS',

  // Configuration
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  INVALID_CONFIG = 'INVALID_CONFIG',
  PROVIDER_NOT_FOUND = 'PROVIDER_NOT_FOUND',
}

// =============================================================================
// Serialized Error Format
// =============================================================================

/**
 * Serializable error format
 */
export interface SerializedError {
  /** Error class name */
  name: string
  /** Error code for programmatic handling */
  code: ErrorCode
  /** Human-readable error message */
  message: string
  /** Stack trace (omitted in production) */
  stack?: string | undefined
  /** Additional context data */
  context?: Record<string, unknown> | undefined
  /** Serialized cause (if error chaining) */
  cause?: SerializedError | undefined
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all docmap errors.
 *
 * @example
 * ```typescript
 * throw new DocmapError('Operation failed', ErrorCode.INTERNAL, {
 *   operation: 'insert',
 *   collection: 'Person'
 * })
 * ```
 */
export class DocmapError extends Error {
  override readonly name: string = 'DocmapError'
  readonly code: ErrorCode
  readonly context: Record<string, unknown>
  override readonly cause?: Error | undefined

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message)
    this.code = code
    this.context = context ?? {}
    this.cause = cause
    Object.setPrototypeOf(this, new.target.prototype)
  }

  /**
   * Serialize error for logging or transport
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      stack: process.env.NODE_ENV !== 'production' ? this.stack : undefined,
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      cause: this.cause instanceof DocmapError ? this.cause.toJSON() : undefined,
    }
  }

  /**
   * Create error from serialized format
   */
  static fromJSON(data: SerializedError): DocmapError {
    const cause = data.cause ? DocmapError.fromJSON(data.cause) : undefined
    const error = new DocmapError(data.message, data.code, data.context, cause)
    if (data.stack) {
      error.stack = data.stack
    }
    return error
  }

  /**
   * Check if error matches a specific code
   */
  is(code: ErrorCode): boolean {
    return this.code === code
  }

  /** Read a string entry from the context */
  protected contextString(key: string): string | undefined {
    const value = this.context[key]
    return typeof value === 'string' ? value : undefined
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Error thrown when caller input is null or malformed.
 *
 * Used for:
 * - Null entities or queries handed to a template
 * - Non-positive time-to-live values
 * - Malformed comparator arguments (between, in)
 * - Ordering or windowing on a delete query
 * - Identifier values that cannot be coerced to the declared id type
 */
export class ValidationError extends DocmapError {
  override readonly name = 'ValidationError'

  constructor(
    message: string,
    context?: {
      field?: string | undefined
      expectedType?: string | undefined
      actualType?: string | undefined
      operation?: string | undefined
      value?: unknown
    },
    cause?: Error
  ) {
    const code = context?.field
      ? context.expectedType
        ? ErrorCode.INVALID_TYPE
        : ErrorCode.INVALID_INPUT
      : ErrorCode.VALIDATION_FAILED

    super(message, code, context, cause)
    Object.setPrototypeOf(this, ValidationError.prototype)
  }

  /** Field that failed validation */
  get field(): string | undefined {
    return this.contextString('field')
  }

  /** Expected type */
  get expectedType(): string | undefined {
    return this.contextString('expectedType')
  }

  /** Actual type received */
  get actualType(): string | undefined {
    return this.contextString('actualType')
  }
}

// =============================================================================
// Mapping Errors
// =============================================================================

/**
 * Error thrown when an entity or field cannot be mapped.
 *
 * Raised for logical field names missing from the class metadata, for types
 * with no metadata at all, and for stored values whose shape contradicts the
 * declared column kind.
 */
export class MappingError extends DocmapError {
  override readonly name = 'MappingError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.MAPPING_FAILED,
    context?: {
      entity?: string | undefined
      field?: string | undefined
      expected?: string | undefined
      actual?: string | undefined
    },
    cause?: Error
  ) {
    super(message, code, context, cause)
    Object.setPrototypeOf(this, MappingError.prototype)
  }

  /** Entity (class) name involved */
  get entity(): string | undefined {
    return this.contextString('entity')
  }

  /** Logical field that could not be mapped */
  get field(): string | undefined {
    return this.contextString('field')
  }
}

// =============================================================================
// Query Errors
// =============================================================================

/**
 * Error thrown when a query is built before its collection name is set.
 */
export class IncompleteQueryError extends DocmapError {
  override readonly name = 'IncompleteQueryError'

  constructor(message = 'Query has no collection; call from() before build()', kind?: 'select' | 'delete') {
    super(message, ErrorCode.INCOMPLETE_QUERY, kind ? { kind } : undefined)
    Object.setPrototypeOf(this, IncompleteQueryError.prototype)
  }
}

/**
 * Error thrown when singleResult() matches more than one record.
 */
export class NonUniqueResultError extends DocmapError {
  override readonly name = 'NonUniqueResultError'

  constructor(collection: string) {
    super(
      `Expected at most one result from collection '${collection}' but found more`,
      ErrorCode.NON_UNIQUE_RESULT,
      { collection }
    )
    Object.setPrototypeOf(this, NonUniqueResultError.prototype)
  }

  get collection(): string | undefined {
    return this.contextString('collection')
  }
}

// =============================================================================
// Delegate Errors
// =============================================================================

/**
 * Error wrapping a failure surfaced by the collection manager or by a hook.
 * The original failure is preserved as `cause`.
 */
export class DelegateError extends DocmapError {
  override readonly name = 'DelegateError'

  constructor(
    message: string,
    context: {
      operation: string
      stage: string
      collection?: string | undefined
    },
    cause?: Error,
    code: ErrorCode = ErrorCode.DELEGATE_FAILED
  ) {
    super(message, code, context, cause)
    Object.setPrototypeOf(this, DelegateError.prototype)
  }

  get operation(): string | undefined {
    return this.contextString('operation')
  }

  get stage(): string | undefined {
    return this.contextString('stage')
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Error thrown for invalid configuration or an unknown template provider.
 */
export class ConfigurationError extends DocmapError {
  override readonly name = 'ConfigurationError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONFIGURATION_ERROR,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, code, context, cause)
    Object.setPrototypeOf(this, ConfigurationError.prototype)
  }
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if an error is a DocmapError
 */
export function isDocmapError(error: unknown): error is DocmapError {
  return error instanceof DocmapError
}

/**
 * Check if an error is a ValidationError
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError
}

/**
 * Check if an error is a MappingError
 */
export function isMappingError(error: unknown): error is MappingError {
  return error instanceof MappingError
}

/**
 * Check if an error is a DelegateError
 */
export function isDelegateError(error: unknown): error is DelegateError {
  return error instanceof DelegateError
}

export function isNonUniqueResultError(error: unknown): error is NonUniqueResultError {
  return error instanceof NonUniqueResultError
}

// =============================================================================
// Error Factory Functions
// =============================================================================

/**
 * Normalize an unknown thrown value into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

/**
 * Wrap an unknown error in a DocmapError
 */
export function wrapError(error: unknown, context?: Record<string, unknown>): DocmapError {
  if (error instanceof DocmapError) {
    return error
  }

  if (error instanceof Error) {
    return new DocmapError(error.message, ErrorCode.INTERNAL, context, error)
  }

  return new DocmapError(String(error), ErrorCode.UNKNOWN, context)
}

/**
 * Assert a condition, throwing a ValidationError if false
 */
export function assertValid(
  condition: boolean,
  message: string,
  context?: { field?: string; operation?: string; value?: unknown }
): asserts condition {
  if (!condition) {
    throw new ValidationError(message, context)
  }
}

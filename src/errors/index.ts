/**
 * geocell Error Handling Module
 *
 * All errors extend from GeoCellError which provides:
 * - Error codes for programmatic handling
 * - Serialization via toJSON
 * - Cause chaining for debugging
 * - Type guards for error checking
 *
 * Error Hierarchy:
 * - GeoCellError (base class)
 *   - ValidationError (coordinates, radius, levels, limits)
 *     - InvalidCellError (malformed cell keys)
 *     - CellHierarchyError (no parent / no children)
 *     - InvalidTokenError (malformed continuation tokens)
 *   - ConfigurationError (invalid configuration)
 *
 * @module errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for geocell operations.
 * These codes are stable and can be used for programmatic error handling.
 */
export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  INTERNAL = 'INTERNAL',

  // Validation errors
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  OUT_OF_RANGE = 'OUT_OF_RANGE',
  INVALID_LEVEL = 'INVALID_LEVEL',
  DATELINE_CROSSING = 'DATELINE_CROSSING',

  // Cell errors
  INVALID_CELL = 'INVALID_CELL',
  NO_PARENT = 'NO_PARENT',
  NO_CHILDREN = 'NO_CHILDREN',

  // Query errors
  INVALID_TOKEN = 'INVALID_TOKEN',

  // Configuration errors
  INVALID_CONFIG = 'INVALID_CONFIG',
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
  /** Additional context data */
  context?: Record<string, unknown>
  /** Serialized cause (if error chaining) */
  cause?: SerializedError
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all geocell errors.
 *
 * @example
 * ```typescript
 * throw new GeoCellError('Encoding failed', ErrorCode.INTERNAL, {
 *   scheme: 's2',
 *   level: 12,
 * })
 * ```
 */
export class GeoCellError extends Error {
  override readonly name: string = 'GeoCellError'
  readonly code: ErrorCode
  readonly context: Record<string, unknown>
  override readonly cause?: Error

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
   * Serialize error to a plain object
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      cause: this.cause instanceof GeoCellError ? this.cause.toJSON() : undefined,
    }
  }

  /**
   * Check if error matches a specific code
   */
  is(code: ErrorCode): boolean {
    return this.code === code
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Error thrown when an argument is outside its domain.
 *
 * Used for:
 * - Coordinates out of range or not finite
 * - Negative radii
 * - Levels outside a scheme's bounds
 * - maxCells outside 1..absoluteMaxCells
 */
export class ValidationError extends GeoCellError {
  override readonly name: string = 'ValidationError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.VALIDATION_FAILED,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, code, context, cause)
  }

  /** Name of the offending argument, when known */
  get field(): string | undefined {
    const field = this.context.field
    return typeof field === 'string' ? field : undefined
  }
}

/**
 * Error thrown when a cell key cannot be parsed by its scheme
 */
export class InvalidCellError extends ValidationError {
  override readonly name: string = 'InvalidCellError'

  constructor(scheme: string, cell: string, reason: string) {
    super(`Invalid ${scheme} cell "${cell}": ${reason}`, ErrorCode.INVALID_CELL, { scheme, cell, reason })
  }

  get cell(): string {
    return String(this.context.cell)
  }
}

/**
 * Error thrown when walking above the root or below the finest level
 */
export class CellHierarchyError extends ValidationError {
  override readonly name: string = 'CellHierarchyError'

  constructor(scheme: string, cell: string, direction: 'parent' | 'children') {
    super(
      direction === 'parent'
        ? `${scheme} cell "${cell}" is at the coarsest level and has no parent`
        : `${scheme} cell "${cell}" is at the finest level and has no children`,
      direction === 'parent' ? ErrorCode.NO_PARENT : ErrorCode.NO_CHILDREN,
      { scheme, cell }
    )
  }
}

/**
 * Error thrown when a continuation token cannot be decoded
 */
export class InvalidTokenError extends ValidationError {
  override readonly name: string = 'InvalidTokenError'

  constructor(message: string, cause?: Error) {
    super(message, ErrorCode.INVALID_TOKEN, {}, cause)
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends GeoCellError {
  override readonly name: string = 'ConfigurationError'

  constructor(message: string, context?: { key?: string; value?: unknown }, cause?: Error) {
    super(message, ErrorCode.INVALID_CONFIG, context, cause)
  }

  get key(): string | undefined {
    const key = this.context.key
    return typeof key === 'string' ? key : undefined
  }
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if an error is a GeoCellError (or any subclass)
 */
export function isGeoCellError(error: unknown): error is GeoCellError {
  return error instanceof GeoCellError
}

/**
 * Check if an error is a ValidationError (or any subclass)
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError
}

/**
 * Check if an error is an InvalidCellError
 */
export function isInvalidCellError(error: unknown): error is InvalidCellError {
  return error instanceof InvalidCellError
}

/**
 * Check if an error is a ConfigurationError
 */
export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError
}

// =============================================================================
// Utilities
// =============================================================================

/**
 * Assert a condition, throwing ValidationError when it does not hold
 */
export function assertValid(
  condition: boolean,
  message: string,
  code: ErrorCode = ErrorCode.VALIDATION_FAILED,
  context?: Record<string, unknown>
): asserts condition {
  if (!condition) {
    throw new ValidationError(message, code, context)
  }
}

/**
 * Wrap an unknown thrown value in a GeoCellError
 */
export function wrapError(error: unknown, message?: string): GeoCellError {
  if (isGeoCellError(error)) return error
  if (error instanceof Error) {
    return new GeoCellError(message ?? error.message, ErrorCode.INTERNAL, {}, error)
  }
  return new GeoCellError(message ?? String(error), ErrorCode.UNKNOWN)
}

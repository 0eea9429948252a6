/**
 * Central error classes and validation utilities for the schemawright library
 * @module utils/errors
 */

/**
 * Base error class for all schemawright errors
 */
export class SchemawrightError extends Error {
  /** Error code for programmatic error handling */
  public readonly code: string

  /** Additional error context */
  public readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'SchemawrightError'
    this.code = code
    this.context = context

    // Maintains proper stack trace (Node.js specific)
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * Error thrown when a required parameter is missing
 */
export class MissingParameterError extends SchemawrightError {
  public readonly parameterName: string

  constructor(parameterName: string, context?: Record<string, unknown>) {
    super(
      `Missing required parameter: '${parameterName}'`,
      'MISSING_PARAMETER',
      { parameterName, ...context }
    )
    this.name = 'MissingParameterError'
    this.parameterName = parameterName
  }
}

/**
 * Error thrown when a parameter value is invalid
 */
export class InvalidParameterError extends SchemawrightError {
  public readonly parameterName: string
  public readonly value: unknown
  public readonly reason: string

  constructor(
    parameterName: string,
    value: unknown,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Invalid parameter '${parameterName}': ${reason}`,
      'INVALID_PARAMETER',
      { parameterName, value, reason, ...context }
    )
    this.name = 'InvalidParameterError'
    this.parameterName = parameterName
    this.value = value
    this.reason = reason
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends SchemawrightError {
  public readonly field?: string

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', { field, ...context })
    this.name = 'ConfigurationError'
    this.field = field
  }
}

/**
 * Error thrown when a model payload is not a JSON object.
 * Callers surface this as a client error; it is never retried.
 */
export class InvalidModelError extends SchemawrightError {
  public readonly reason: string

  constructor(reason: string, context?: Record<string, unknown>) {
    super(`Invalid model payload: ${reason}`, 'INVALID_MODEL', {
      reason,
      ...context,
    })
    this.name = 'InvalidModelError'
    this.reason = reason
  }
}

/**
 * Error thrown when an ontology artifact cannot be read or is malformed
 */
export class OntologyError extends SchemawrightError {
  public readonly source?: string

  constructor(message: string, source?: string, context?: Record<string, unknown>) {
    super(message, 'ONTOLOGY_ERROR', { source, ...context })
    this.name = 'OntologyError'
    this.source = source
  }
}

/**
 * Error thrown when a looked-up record does not exist.
 * Distinct from validation failures so callers can map it to "not found".
 */
export class NotFoundError extends SchemawrightError {
  public readonly resource: string
  public readonly id: string | number

  constructor(resource: string, id: string | number, context?: Record<string, unknown>) {
    super(`${resource} ${id} was not found`, 'NOT_FOUND', {
      resource,
      id,
      ...context,
    })
    this.name = 'NotFoundError'
    this.resource = resource
    this.id = id
  }
}

export class DomainNotFoundError extends NotFoundError {
  constructor(id: string | number) {
    super('Domain', id)
    this.name = 'DomainNotFoundError'
  }
}

export class RelationshipNotFoundError extends NotFoundError {
  constructor(id: string) {
    super('Relationship', id)
    this.name = 'RelationshipNotFoundError'
  }
}

export class MappingNotFoundError extends NotFoundError {
  constructor(id: string) {
    super('Mapping', id)
    this.name = 'MappingNotFoundError'
  }
}

/**
 * Error thrown when a lifecycle status change is not allowed
 */
export class InvalidStatusTransitionError extends SchemawrightError {
  public readonly from: string
  public readonly to: string

  constructor(from: string, to: string, reason?: string) {
    const message = reason
      ? `Invalid status transition from '${from}' to '${to}': ${reason}`
      : `Invalid status transition from '${from}' to '${to}'`

    super(message, 'INVALID_STATUS_TRANSITION', { from, to, reason })
    this.name = 'InvalidStatusTransitionError'
    this.from = from
    this.to = to
  }
}

/**
 * Error thrown when a persistence collaborator fails
 */
export class StoreOperationError extends SchemawrightError {
  public readonly operation: string

  constructor(operation: string, reason: string, context?: Record<string, unknown>) {
    super(`Store operation '${operation}' failed: ${reason}`, 'STORE_OPERATION_FAILED', {
      operation,
      reason,
      ...context,
    })
    this.name = 'StoreOperationError'
    this.operation = operation
  }
}

// ==================== VALIDATION UTILITIES ====================

/**
 * Validates that a value is not null or undefined
 */
export function requireNonNull<T>(
  value: T | null | undefined,
  parameterName: string
): T {
  if (value === null || value === undefined) {
    throw new MissingParameterError(parameterName)
  }
  return value
}

/**
 * Validates that a number is a positive integer
 */
export function requirePositiveInteger(value: number, parameterName: string): number {
  if (typeof value !== 'number' || isNaN(value)) {
    throw new InvalidParameterError(parameterName, value, 'must be a number')
  }
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a positive integer'
    )
  }
  return value
}

/**
 * Validates that a number is within a specific range (inclusive)
 */
export function requireInRange(
  value: number,
  min: number,
  max: number,
  parameterName: string
): number {
  if (typeof value !== 'number' || isNaN(value)) {
    throw new InvalidParameterError(parameterName, value, 'must be a number')
  }
  if (value < min || value > max) {
    throw new InvalidParameterError(
      parameterName,
      value,
      `must be between ${min} and ${max} (inclusive)`
    )
  }
  return value
}

/**
 * Validates that a value is one of the allowed options
 */
export function requireOneOf<T extends string>(
  value: unknown,
  allowedValues: readonly T[],
  parameterName: string
): T {
  const match = allowedValues.find((allowed) => allowed === value)
  if (match === undefined) {
    throw new InvalidParameterError(
      parameterName,
      value,
      `must be one of: ${allowedValues.join(', ')}`
    )
  }
  return match
}

/**
 * Check if an error is a schemawright error
 */
export function isSchemawrightError(error: unknown): error is SchemawrightError {
  return error instanceof SchemawrightError
}

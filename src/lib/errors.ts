/**
 * Error classes for the data access layer
 *
 * Structural errors (bad paths, operators or operands) surface immediately.
 * Store-level errors share the {@link StoreError} base so transactional code
 * can decide whether to absorb them into a rollback.
 */

export interface PostgresError extends Error {
  code?: string;
  detail?: string;
  constraint?: string;
  column?: string;
}

/**
 * Base DAL error class
 */
export class DALError extends Error {
  code: string | null;

  constructor(message: string, code: string | null = null) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * A path segment does not exist on the schema it was resolved against
 */
export class UnknownAttribute extends DALError {
  schemaName: string;
  attribute: string;

  constructor(schemaName: string, attribute: string, path: string | null = null) {
    const suffix = path && path !== attribute ? ` while resolving '${path}'` : '';
    super(`${schemaName} has no attribute '${attribute}'${suffix}`, 'UNKNOWN_ATTRIBUTE');
    this.name = 'UnknownAttribute';
    this.schemaName = schemaName;
    this.attribute = attribute;
  }
}

/**
 * Filter key carries an operator suffix outside the supported set
 */
export class UnsupportedOperator extends DALError {
  operator: string;

  constructor(operator: string, field: string) {
    super(`Unsupported operator '__${operator}' for field '${field}'`, 'UNSUPPORTED_OPERATOR');
    this.name = 'UnsupportedOperator';
    this.operator = operator;
  }
}

/**
 * Operand has the wrong shape for its operator (`in`, `between`, groups)
 */
export class InvalidOperand extends TypeError {
  code: string;
  key: string;

  constructor(key: string, expectation: string) {
    super(`'${key}' expects ${expectation}`);
    this.name = 'InvalidOperand';
    this.code = 'INVALID_OPERAND';
    this.key = key;
  }
}

/**
 * Lookup target missing
 */
export class NotFound extends DALError {
  constructor(message = 'Record not found') {
    super(message, 'NOT_FOUND');
    this.name = 'NotFound';
  }
}

/**
 * A lifecycle hook vetoed the operation while an enclosing scope owns the transaction
 */
export class HookDeclined extends DALError {
  operation: string;

  constructor(operation: string) {
    super(`${operation} was declined by a lifecycle hook`, 'HOOK_DECLINED');
    this.name = 'HookDeclined';
    this.operation = operation;
  }
}

/**
 * Session, pool or schema used before it was set up
 */
export class ConfigurationError extends DALError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

/**
 * Validation error
 */
export class ValidationError extends DALError {
  field: string | null;

  constructor(message: string, field: string | null = null) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
    this.field = field;
  }
}

/**
 * Base for failures reported by the store itself
 */
export class StoreError extends DALError {
  originalError: unknown;

  constructor(message: string, code: string, originalError: unknown = null) {
    super(message, code);
    this.name = 'StoreError';
    this.originalError = originalError;
  }
}

/**
 * Uniqueness, foreign key, not-null or check constraint rejected a write
 */
export class ConstraintViolation extends StoreError {
  constraint: string | null;

  constructor(message: string, constraint: string | null = null, originalError: unknown = null) {
    super(message, 'CONSTRAINT_VIOLATION', originalError);
    this.name = 'ConstraintViolation';
    this.constraint = constraint;
  }
}

/**
 * Connection error
 */
export class ConnectionError extends StoreError {
  constructor(message = 'Database connection error', originalError: unknown = null) {
    super(message, 'CONNECTION_ERROR', originalError);
    this.name = 'ConnectionError';
  }
}

/**
 * Query error
 */
export class QueryError extends StoreError {
  constructor(message: string, originalError: unknown = null) {
    super(message, 'QUERY_ERROR', originalError);
    this.name = 'QueryError';
  }
}

/**
 * Convert PostgreSQL errors to DAL errors. Errors that already belong to the
 * DAL hierarchy pass through unchanged.
 * @param pgError - PostgreSQL error
 * @returns Converted DAL error
 */
export function convertPostgreSQLError(pgError: unknown): Error {
  if (pgError instanceof DALError || pgError instanceof InvalidOperand) {
    return pgError;
  }

  if (!pgError || typeof pgError !== 'object') {
    return new QueryError(`Unknown error: ${String(pgError)}`, pgError);
  }

  const error = pgError as PostgresError;
  const message = typeof error.message === 'string' ? error.message : 'Unknown error';

  // PostgreSQL error codes: https://www.postgresql.org/docs/current/errcodes-appendix.html
  switch (error.code) {
    case '23505': // unique_violation
      return new ConstraintViolation(
        `Unique constraint violation: ${error.detail ?? message}`,
        error.constraint ?? null,
        error
      );

    case '23503': // foreign_key_violation
      return new ConstraintViolation(
        `Foreign key constraint violation: ${error.detail ?? message}`,
        error.constraint ?? null,
        error
      );

    case '23502': // not_null_violation
      return new ConstraintViolation(
        `Not null constraint violation: ${error.column ?? message}`,
        error.column ?? null,
        error
      );

    case '23514': // check_violation
      return new ConstraintViolation(
        `Check constraint violation: ${error.detail ?? message}`,
        error.constraint ?? null,
        error
      );

    case '08000': // connection_exception
    case '08003': // connection_does_not_exist
    case '08006': // connection_failure
      return new ConnectionError(message, error);

    case '42P01': // undefined_table
      return new QueryError(`Table does not exist: ${message}`, error);

    case '42703': // undefined_column
      return new QueryError(`Column does not exist: ${message}`, error);

    default:
      if (typeof error.code === 'string') {
        return new QueryError(message, error);
      }
      // Not a store error: keep the original so callers see the real failure
      return pgError instanceof Error ? pgError : new QueryError(message, error);
  }
}

/**
 * True for errors the store reported (as opposed to programming errors).
 */
export function isStoreError(error: unknown): error is StoreError {
  return error instanceof StoreError;
}

const errors = {
  DALError,
  UnknownAttribute,
  UnsupportedOperator,
  InvalidOperand,
  NotFound,
  HookDeclined,
  ConfigurationError,
  ValidationError,
  StoreError,
  ConstraintViolation,
  ConnectionError,
  QueryError,
  convertPostgreSQLError,
  isStoreError,
} as const;

export default errors;

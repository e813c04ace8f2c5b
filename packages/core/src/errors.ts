/**
 * Custom error classes for the lineage extraction pipeline
 * These errors carry a stable code so failures can be reported without
 * leaking query text or credentials
 */

/**
 * Base application error
 */
export class AppError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid input (malformed table names, bad identifiers)
 */
export class ValidationError extends AppError {
  public readonly details: unknown;

  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * Configuration error
 * Thrown when extractor configuration fails schema validation or a
 * required collaborator was not supplied
 */
export class ConfigurationError extends AppError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * External service error (audit log service, audit table query engine)
 */
export class ExternalServiceError extends AppError {
  public readonly service: string;
  public readonly originalError: Error | undefined;

  constructor(service: string, message: string, originalError?: Error) {
    super(`${service} error: ${message}`, 'EXTERNAL_SERVICE_ERROR');
    this.name = 'ExternalServiceError';
    this.service = service;
    this.originalError = originalError;
  }
}

/**
 * SQL table parser failure
 * Thrown by SqlTableParser implementations when a statement cannot be parsed
 */
export class SqlParseError extends AppError {
  public readonly originalError: Error | undefined;

  constructor(message: string, originalError?: Error) {
    super(message, 'SQL_PARSE_ERROR');
    this.name = 'SqlParseError';
    this.originalError = originalError;
  }
}

/**
 * Normalize a thrown value into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Centralized error type definitions for the price index extractor.
 * Provides a consistent error hierarchy and error codes.
 */

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  STRUCTURAL_ERROR = 'STRUCTURAL_ERROR',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  USAGE_ERROR = 'USAGE_ERROR',
  EXTERNAL_SERVICE_ERROR = 'EXTERNAL_SERVICE_ERROR',
}

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    isOperational: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = isOperational;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Where in the index document a structural error was detected.
 */
export interface TraversalPosition {
  /** JSONPath-like location, e.g. `$.reporting_structure[4].in_network_files[2]` */
  path: string;
  /** Zero-based index of the enclosing reporting record, when inside one */
  recordIndex?: number;
  /** Field being read when the error occurred */
  field?: string;
}

/**
 * The input does not have the shape of an index document. Always fatal:
 * the run aborts and no further output is produced.
 */
export class StructuralError extends AppError {
  public readonly position: TraversalPosition;

  constructor(message: string, position: TraversalPosition, context?: Record<string, unknown>) {
    super(
      `${message} at ${position.path}`,
      ErrorCode.STRUCTURAL_ERROR,
      true,
      { ...position, ...context }
    );
    this.position = position;
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIGURATION_ERROR, true, context);
  }
}

export class UsageError extends AppError {
  constructor(message: string) {
    super(message, ErrorCode.USAGE_ERROR, true);
  }
}

export class ExternalServiceError extends AppError {
  constructor(service: string, message: string, context?: Record<string, unknown>) {
    super(
      `External service error (${service}): ${message}`,
      ErrorCode.EXTERNAL_SERVICE_ERROR,
      true,
      { service, ...context }
    );
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Message of an unknown thrown value, for log fields.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

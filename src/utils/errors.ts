/**
 * Error Utilities
 *
 * Helper functions for type-safe error handling, plus the error classes the
 * HTTP layer maps to status codes.
 */

/**
 * Extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}

/**
 * Ensure error is an Error instance
 */
export function ensureError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new Error(getErrorMessage(error));
}

/**
 * Base class: carries the HTTP status the error middleware should answer with.
 */
export class AppError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode: number) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

/** Malformed request input. */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

/** A setting an operation needs is missing. */
export class ConfigurationError extends AppError {
  readonly variable: string;

  constructor(variable: string) {
    super(`Missing required configuration: ${variable}`, 500);
    this.variable = variable;
  }
}

/**
 * A call to a hosted service (LLM, work tracking, container provisioning,
 * pipeline endpoint) failed or answered with a non-2xx status.
 */
export class ExternalServiceError extends AppError {
  readonly service: string;
  readonly upstreamStatus?: number;

  constructor(service: string, message: string, upstreamStatus?: number) {
    super(message, 502);
    this.service = service;
    this.upstreamStatus = upstreamStatus;
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

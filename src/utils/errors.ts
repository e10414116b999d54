/**
 * Error Handling Utilities
 *
 * Typed application errors shared by the collection pipeline, the planilha
 * store and the HTTP layer.
 */

import { logger } from './logger.js';

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error
 */
export class ValidationError extends AppError {
  public readonly field: string | undefined;

  constructor(message: string, field?: string) {
    super(message, 'VALIDATION_ERROR', 400);
    this.field = field;
  }
}

/**
 * Not found error
 */
export class NotFoundError extends AppError {
  public readonly resource: string;

  constructor(resource: string, identifier?: string) {
    const message = identifier
      ? `${resource} not found: ${identifier}`
      : `${resource} not found`;
    super(message, 'NOT_FOUND', 404);
    this.resource = resource;
  }
}

/**
 * Resource already exists
 */
export class ConflictError extends AppError {
  constructor(resource: string, identifier: string) {
    super(`${resource} already exists: ${identifier}`, 'ALREADY_EXISTS', 409);
  }
}

/**
 * Selected box is flagged unavailable in the catalog
 */
export class BoxUnavailableError extends AppError {
  public readonly boxName: string;

  constructor(boxName: string) {
    super(`Box is unavailable: ${boxName}`, 'BOX_UNAVAILABLE', 422);
    this.boxName = boxName;
  }
}

/**
 * Invalid catalog, rules file or environment
 */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR', 500, false);
  }
}

/**
 * Format error for API response
 */
export function formatApiError(error: unknown): {
  status: number;
  body: { error: string; code: string };
} {
  if (error instanceof AppError) {
    return {
      status: error.statusCode,
      body: {
        error: error.message,
        code: error.code,
      },
    };
  }

  // Don't expose internal error details
  return {
    status: 500,
    body: {
      error: 'Internal server error',
      code: 'INTERNAL_ERROR',
    },
  };
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Log error without exposing buyer data
 */
export function logError(
  error: unknown,
  context: Record<string, unknown> = {}
): void {
  const safeContext = { ...context };
  for (const field of ['doc', 'email', 'phone_number', 'token']) {
    if (field in safeContext) {
      safeContext[field] = '[REDACTED]';
    }
  }

  if (error instanceof AppError) {
    logger.error(
      {
        ...safeContext,
        errorCode: error.code,
        statusCode: error.statusCode,
        isOperational: error.isOperational,
        message: error.message,
      },
      'Application error'
    );
  } else if (error instanceof Error) {
    logger.error(
      {
        ...safeContext,
        message: error.message,
        name: error.name,
      },
      'Unexpected error'
    );
  } else {
    logger.error({ ...safeContext, error: String(error) }, 'Unknown error');
  }
}

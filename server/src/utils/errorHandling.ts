/**
 * Centralized error handling utilities
 * Provides consistent error logging and response formatting
 */

import { apiLogger } from './logger.js';

/**
 * Standard API error response format
 */
export interface ApiErrorResponse {
  error: string;
  details?: unknown;
  code?: string;
}

/**
 * Error types for classification
 */
export enum ErrorType {
  VALIDATION = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  UNAUTHORIZED = 'UNAUTHORIZED',
  RATE_LIMIT = 'RATE_LIMIT_EXCEEDED',
  SERVER = 'SERVER_ERROR',
  EXTERNAL_SERVICE = 'EXTERNAL_SERVICE_ERROR',
}

/**
 * Standard error class with metadata
 */
export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public type: ErrorType = ErrorType.SERVER,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Raised when a value object is built from out-of-range input
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, ErrorType.VALIDATION, details);
    this.name = 'ValidationError';
  }
}

/**
 * Formats error for API response
 */
export function formatErrorResponse(error: unknown): ApiErrorResponse {
  if (error instanceof AppError) {
    return {
      error: error.message,
      code: error.type,
      ...(process.env.NODE_ENV === 'development' && { details: error.details }),
    };
  }

  if (error instanceof Error) {
    return {
      error: error.message,
      ...(process.env.NODE_ENV === 'development' && { details: error.stack }),
    };
  }

  return {
    error: 'Произошла неизвестная ошибка',
  };
}

/**
 * Logs error with context
 */
export function logError(error: unknown, context?: Record<string, unknown>): void {
  if (error instanceof AppError) {
    // Client errors are not worth an error-level entry
    if (error.type === ErrorType.VALIDATION || error.type === ErrorType.NOT_FOUND) {
      apiLogger.warn({ ...context, error: error.message, type: error.type }, 'Client error');
      return;
    }
  }

  apiLogger.error({ ...context, error }, 'Unhandled error');
}

/**
 * Short error description safe to put into analytics events and logs
 */
export function describeError(error: unknown): { type: string; message: string } {
  if (error instanceof Error) {
    return { type: error.name, message: error.message };
  }
  return { type: typeof error, message: String(error) };
}

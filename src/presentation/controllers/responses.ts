import { Response } from 'express';
import { CatalogError, ConstraintViolationError, NotFoundError } from '../../domain/errors';
import config from '../../config';
import { logError, logWarn } from '../../utils/logger';

// ==========================================
// Response Helpers
// ==========================================

export interface SuccessResponse<T> {
  success: true;
  data: T;
  meta?: Record<string, unknown>;
}

export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

export const successResponse = <T>(data: T, meta?: Record<string, unknown>): SuccessResponse<T> => {
  const response: SuccessResponse<T> = { success: true, data };
  if (meta) {
    response.meta = meta;
  }
  return response;
};

export const errorResponse = (code: string, message: string, details?: unknown): ErrorResponse => {
  const response: ErrorResponse = { success: false, error: { code, message } };
  if (details) {
    response.error.details = details;
  }
  return response;
};

export const notFound = (res: Response, entity: string, id: string): void => {
  const error = new NotFoundError(entity, id);
  res.status(error.statusCode).json(errorResponse(error.code, error.message));
};

/**
 * Writes the error reply. Domain errors carry their own status and code;
 * a storage backstop firing means an application check was bypassed, so it
 * is logged at error level like any unexpected failure.
 */
export const handleError = (res: Response, error: unknown, context: string): void => {
  if (error instanceof CatalogError) {
    if (error instanceof ConstraintViolationError) {
      logError(context, error, { code: error.code, details: error.details });
    } else {
      logWarn(context, { code: error.code, message: error.message, details: error.details });
    }

    res.status(error.statusCode).json(errorResponse(error.code, error.message, error.details));
    return;
  }

  logError(context, error);

  const isDevelopment = config.server.env === 'development';
  res.status(500).json(errorResponse(
    'INTERNAL_ERROR',
    isDevelopment && error instanceof Error ? error.message : 'An unexpected error occurred'
  ));
};

// ==========================================
// Query Helpers
// ==========================================

// Query values reach the controllers already converted by the joi schemas;
// these only narrow them back from Express's string-typed query object.

export const queryString = (value: unknown): string | undefined =>
  typeof value === 'string' && value.length > 0 ? value : undefined;

export const queryNumber = (value: unknown): number | undefined => {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isNaN(parsed) ? undefined : parsed;
  }
  return undefined;
};

export const queryBoolean = (value: unknown): boolean | undefined => {
  if (typeof value === 'boolean') {
    return value;
  }
  if (value === 'true') {
    return true;
  }
  if (value === 'false') {
    return false;
  }
  return undefined;
};

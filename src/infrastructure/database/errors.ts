import { QueryFailedError } from 'typeorm';
import { ConstraintViolationError } from '../../domain/errors';

// PostgreSQL SQLSTATE codes for integrity constraint violations.
const UNIQUE_VIOLATION = '23505';
const FOREIGN_KEY_VIOLATION = '23503';
const CHECK_VIOLATION = '23514';

const INTEGRITY_CODES = new Set([UNIQUE_VIOLATION, FOREIGN_KEY_VIOLATION, CHECK_VIOLATION]);

interface PostgresDriverError {
  code: string;
  constraint?: string;
  detail?: string;
}

const isPostgresDriverError = (value: unknown): value is PostgresDriverError =>
  typeof value === 'object' &&
  value !== null &&
  'code' in value &&
  typeof value.code === 'string';

/**
 * Maps an integrity violation reported by PostgreSQL to a
 * ConstraintViolationError. Anything else is returned untouched.
 */
export const translateDriverError = (error: unknown): unknown => {
  if (!(error instanceof QueryFailedError)) {
    return error;
  }

  const driverError: unknown = error.driverError;
  if (!isPostgresDriverError(driverError) || !INTEGRITY_CODES.has(driverError.code)) {
    return error;
  }

  const constraint = driverError.constraint ?? 'unknown';
  return new ConstraintViolationError(constraint, driverError.detail ?? `Constraint ${constraint} violated`);
};

export const guardConstraints = async <T>(work: () => Promise<T>): Promise<T> => {
  try {
    return await work();
  } catch (error) {
    throw translateDriverError(error);
  }
};

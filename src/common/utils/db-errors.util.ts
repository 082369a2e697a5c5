import { QueryFailedError } from 'typeorm';

const PG_UNIQUE_VIOLATION = '23505';

interface DriverErrorShape {
  code?: unknown;
  message?: unknown;
}

function asDriverError(value: unknown): DriverErrorShape {
  return typeof value === 'object' && value !== null ? value : {};
}

/**
 * True when a query failed on a unique constraint (Postgres in production,
 * SQLite in the test harness).
 */
export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) return false;
  const driverError = asDriverError(error.driverError);
  if (driverError.code === PG_UNIQUE_VIOLATION) return true;
  const message = typeof driverError.message === 'string' ? driverError.message : error.message;
  return message.includes('UNIQUE constraint failed');
}

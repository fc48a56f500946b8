import { QueryFailedError } from 'typeorm';

// postgres, better-sqlite3
const UNIQUE_VIOLATION_CODES = ['23505', 'SQLITE_CONSTRAINT_UNIQUE'];

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const isFileNotFoundError = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

export const isUniqueViolation = (error: unknown): boolean =>
  error instanceof QueryFailedError &&
  'code' in error.driverError &&
  UNIQUE_VIOLATION_CODES.includes(String(error.driverError.code));

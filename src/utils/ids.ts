import { AppError } from '../middleware/error/errorHandler';

const POSITIVE_INTEGER = /^[1-9]\d*$/;

/**
 * Reads a record id from a path segment. Anything that is not a positive
 * integer cannot name a stored record, so it is reported as not found.
 */
export function parseId(value: string | undefined, label: 'User' | 'Message'): number {
  if (value === undefined || !POSITIVE_INTEGER.test(value)) {
    throw AppError.notFound(`${label} not found`);
  }
  const id = Number(value);
  if (!Number.isSafeInteger(id)) {
    throw AppError.notFound(`${label} not found`);
  }
  return id;
}

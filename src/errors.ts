import type { z } from 'zod';

export type ErrorCode = 'VALIDATION' | 'NOT_FOUND' | 'UNAUTHORIZED' | 'STORAGE';

/**
 * Base class for failures the HTTP layer knows how to report.
 * `status` is the response code the error maps to.
 */
export abstract class AppError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly status: number;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad counts, empty batches, unknown locale/script/skill, period out of range. Nothing was written. */
export class ValidationError extends AppError {
  readonly code = 'VALIDATION';
  readonly status = 400;
}

/** A direct lookup by id found nothing. */
export class NotFoundError extends AppError {
  readonly code = 'NOT_FOUND';
  readonly status = 404;
}

export class UnauthorizedError extends AppError {
  readonly code = 'UNAUTHORIZED';
  readonly status = 401;
}

/** The store failed or rejected a write. Never retried here. */
export class StorageError extends AppError {
  readonly code = 'STORAGE';
  readonly status = 503;
}

/**
 * Runs a store call and rethrows any driver failure as a StorageError.
 * Errors that are already AppErrors pass through untouched.
 */
export async function withStorage<T>(operation: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    if (error instanceof AppError) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new StorageError(`${operation} failed: ${reason}`, { cause: error });
  }
}

/**
 * Parses `value` with a zod schema, turning a failure into a ValidationError
 * with the given message (or zod's first issue when none is given).
 */
export function ensure<T>(schema: z.ZodType<T>, value: unknown, message?: string): T {
  const parsed = schema.safeParse(value);
  if (parsed.success) return parsed.data;
  throw new ValidationError(message ?? parsed.error.issues[0]?.message ?? 'invalid value');
}

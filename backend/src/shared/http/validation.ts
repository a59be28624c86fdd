/**
 * backend/src/shared/http/validation.ts
 *
 * WHY:
 * - Every controller turns Zod issues into the same client-facing details.
 */

import type { ZodError } from 'zod';
import { AppError, type AppErrorDetail } from './errors';

export function zodIssuesToDetails(error: ZodError): AppErrorDetail[] {
  return error.issues.map((issue) =>
    issue.path.length > 0
      ? { field: issue.path.join('.'), message: issue.message }
      : { message: issue.message },
  );
}

export function invalidBody(error: ZodError): AppError {
  return AppError.validationError('Invalid request body', zodIssuesToDetails(error));
}

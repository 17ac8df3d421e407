import { ZodError, ZodIssue } from 'zod';
import { ValidationError } from '../utils/errors/app-error';

export interface FieldError {
  field: string;
  message: string;
  code: string;
}

const fieldOf = (issue: ZodIssue, root: string): string =>
  issue.path.length > 0 ? issue.path.join('.') : root;

export const formatZodError = (error: ZodError, root: string = 'body'): FieldError[] =>
  error.issues.map((issue) => ({
    field: fieldOf(issue, root),
    message: issue.message,
    code: issue.code,
  }));

/**
 * Converts a zod failure into a 400 carrying one entry per invalid field
 */
export const handleZodError = (error: ZodError, root?: string): ValidationError => {
  const fieldErrors = formatZodError(error, root);
  const message = fieldErrors.map((fieldError) => `${fieldError.field}: ${fieldError.message}`).join(', ');

  return new ValidationError(message, { validationErrors: fieldErrors });
};

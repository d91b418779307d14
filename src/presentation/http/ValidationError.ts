import { z } from 'zod';

export interface FieldIssue {
  location: string;
  field: string;
  message: string;
}

/**
 * Request failed schema validation at the HTTP boundary
 */
export class ValidationError extends Error {
  constructor(public readonly issues: FieldIssue[]) {
    super(issues.map((issue) => `${issue.field}: ${issue.message}`).join('; ') || 'Invalid request');
    this.name = 'ValidationError';
  }
}

/**
 * Parse one part of a request (params, query or body) against a schema.
 */
export function parseRequest<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  location: 'params' | 'query' | 'body'
): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(
      result.error.issues.map((issue) => ({
        location,
        field: issue.path.join('.') || location,
        message: issue.message,
      }))
    );
  }
  return result.data;
}

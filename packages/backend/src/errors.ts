import { ZodError, type ZodType, type ZodTypeDef } from 'zod';

/**
 * Errors raised by the submission services. Each carries the HTTP status the
 * error handler responds with.
 */
export abstract class AppError extends Error {
  abstract readonly statusCode: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Missing or malformed input. No mutation has happened. */
export class ValidationError extends AppError {
  readonly statusCode = 400;

  constructor(readonly details: string[]) {
    super(`Validation error: ${details.join('; ')}`);
  }
}

/** The access evaluator denied the action. */
export class PermissionError extends AppError {
  readonly statusCode = 403;
}

export class NotFoundError extends AppError {
  readonly statusCode = 404;

  constructor(entity: string, id: string) {
    super(`${entity} not found: ${id}`);
  }
}

/**
 * The submission changed underneath the caller (lost a concurrent transition,
 * or is no longer in a state the transition starts from). Re-fetch and retry.
 */
export class ConflictError extends AppError {
  readonly statusCode = 409;
}

export function zodIssues(err: ZodError): string[] {
  return err.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/** Parse `data` with `schema`, converting failures into a ValidationError. */
export function parseInput<Output, Input>(
  schema: ZodType<Output, ZodTypeDef, Input>,
  data: unknown
): Output {
  const result = schema.safeParse(data);
  if (!result.success) throw new ValidationError(zodIssues(result.error));
  return result.data;
}

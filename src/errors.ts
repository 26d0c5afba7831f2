import { z } from "zod/v4";

export type ApiErrorStatus = 400 | 404 | 422 | 503;

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Base class for failures that map onto an HTTP response. Anything thrown
 * from a handler that is not an ApiError becomes a 500.
 */
export class ApiError extends Error {
  constructor(
    readonly status: ApiErrorStatus,
    readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }

  toBody(): Record<string, unknown> {
    return { error: this.message, code: this.code };
  }
}

/** The document store handle is absent for this process. */
export class ServiceUnavailableError extends ApiError {
  constructor(message = "Database not available") {
    super(503, "service_unavailable", message);
  }
}

export class InvalidArgumentError extends ApiError {
  constructor(message: string) {
    super(400, "invalid_argument", message);
  }
}

export class NotFoundError extends ApiError {
  constructor(message: string) {
    super(404, "not_found", message);
  }
}

export class ValidationError extends ApiError {
  constructor(
    message: string,
    readonly issues: ValidationIssue[],
  ) {
    super(422, "validation_error", message);
  }

  static fromZod(error: z.ZodError, message = "Request validation failed"): ValidationError {
    const issues = error.issues.map((issue) => ({
      path: issue.path.map((segment) => String(segment)).join("."),
      message: issue.message,
    }));
    return new ValidationError(message, issues);
  }

  override toBody(): Record<string, unknown> {
    return { ...super.toBody(), issues: this.issues };
  }
}

/** Trim an arbitrary thrown value to a short single-line summary. */
export function summarizeError(err: unknown, maxLength = 80): string {
  const message = err instanceof Error ? err.message : String(err);
  return message.replace(/\s+/g, " ").trim().slice(0, maxLength);
}

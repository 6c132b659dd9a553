export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details?: unknown;

  constructor(code: string, message: string, statusCode = 400, details?: unknown) {
    super(message);
    this.name = "AppError";
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super("VALIDATION_ERROR", message, 400, details);
    this.name = "ValidationError";
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = "Unauthorized") {
    super("UNAUTHORIZED", message, 401);
    this.name = "UnauthorizedError";
  }
}

export class ForbiddenError extends AppError {
  constructor(message = "Forbidden") {
    super("FORBIDDEN", message, 403);
    this.name = "ForbiddenError";
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, id?: string) {
    super("NOT_FOUND", id ? `${entity} ${id} not found` : `${entity} not found`, 404);
    this.name = "NotFoundError";
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super("CONFLICT", message, 409);
    this.name = "ConflictError";
  }
}

/**
 * Failure talking to the billing gateway. Kept apart from local errors so
 * callers can decide to queue the work instead of failing the request.
 */
export class GatewayError extends AppError {
  readonly retryable: boolean;
  readonly upstreamStatus: number | null;

  constructor(
    code: string,
    message: string,
    options: { retryable: boolean; upstreamStatus?: number | null; cause?: unknown },
  ) {
    super(code, message, 502);
    this.name = "GatewayError";
    this.retryable = options.retryable;
    this.upstreamStatus = options.upstreamStatus ?? null;
    if (options.cause !== undefined) this.cause = options.cause;
  }
}

/** Network failure, timeout, 5xx, 429 or missing credentials. */
export class GatewayUnavailableError extends GatewayError {
  constructor(
    message: string,
    options: { retryable?: boolean; upstreamStatus?: number | null; cause?: unknown } = {},
  ) {
    super("GATEWAY_UNAVAILABLE", message, {
      retryable: options.retryable ?? true,
      upstreamStatus: options.upstreamStatus,
      cause: options.cause,
    });
    this.name = "GatewayUnavailableError";
  }
}

/** The gateway answered and refused the request (4xx other than 429). */
export class GatewayRejectedError extends GatewayError {
  constructor(message: string, upstreamStatus: number | null, cause?: unknown) {
    super("GATEWAY_REJECTED", message, {
      retryable: false,
      upstreamStatus,
      cause,
    });
    this.name = "GatewayRejectedError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

import type { ErrorRequestHandler, RequestHandler, Response } from "express";
import type { ApiError } from "@shared/api";
import { AppError } from "../lib/errors";

export function respondError(
  res: Response,
  status: number,
  message: string,
  details?: unknown,
) {
  const body: ApiError = details === undefined ? { error: message } : { error: message, details };
  res.status(status).json(body);
}

export function handleError(res: Response, error: unknown, context: string) {
  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      // eslint-disable-next-line no-console
      console.error(`[${context}] ${error.name}: ${error.message}`);
    }
    respondError(res, error.statusCode, error.message, error.details);
    return;
  }
  // eslint-disable-next-line no-console
  console.error(`[${context}] unexpected error`, error);
  respondError(res, 500, "Internal server error");
}

/** Runs an async handler and routes anything it throws through `handleError`. */
export function route(
  context: string,
  handler: (...args: Parameters<RequestHandler>) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch((error: unknown) => handleError(res, error, context));
  };
}

function isBodyParserError(error: unknown): error is Error & { type: string; status?: number } {
  return error instanceof Error && "type" in error && typeof error.type === "string";
}

export const errorMiddleware: ErrorRequestHandler = (error, _req, res, next) => {
  if (res.headersSent) {
    next(error);
    return;
  }
  if (isBodyParserError(error) && error.type === "entity.parse.failed") {
    respondError(res, 400, "Invalid JSON payload");
    return;
  }
  if (isBodyParserError(error) && error.type === "entity.too.large") {
    respondError(res, 413, "Payload too large");
    return;
  }
  handleError(res, error, "http");
};

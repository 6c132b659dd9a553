import type { z } from "zod";
import { ValidationError } from "../lib/errors";

function safeParse(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    throw new ValidationError("Invalid JSON payload");
  }
}

function normalizeBody(input: unknown): unknown {
  if (input == null) {
    return {};
  }
  if (typeof input === "string") {
    return safeParse(input);
  }
  if (Buffer.isBuffer(input)) {
    return safeParse(input.toString("utf8"));
  }
  return input;
}

/**
 * Reads a request body (already-parsed object, raw string or Buffer) and
 * validates it against `schema`.
 */
export function parseBody<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(normalizeBody(input));
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    throw new ValidationError(
      issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join("; "),
      issues,
    );
  }
  return result.data;
}

/**
 * Zod validation for JSON request bodies.
 *
 * Guards the write routes (POST /amendments, /ingest, /admin/reset) so
 * that handlers only see parsed DTOs. A body that is not JSON, or that
 * fails its schema, is answered here with 400 VALIDATION_ERROR; the
 * issues list names each rejected field by its dotted path
 * (e.g. "timestamp", "content").
 *
 * Query strings and path parameters are parsed in the handlers; their
 * ZodError reaches the error handler, which formats it the same way.
 */

import type { MiddlewareHandler } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import { createErrorEnvelope } from "../types/error.js";

/**
 * Validate JSON request body against a Zod schema.
 *
 * On success, sets `validatedBody` in context variables, typed by the
 * schema's output for the handlers that follow.
 * On failure, returns 400 with structured validation errors.
 */
export function validateBody<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
): MiddlewareHandler<{ Variables: { validatedBody: T } }> {
  return async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"),
        400,
      );
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request body validation failed", {
          issues: formatZodErrors(result.error),
        }),
        400,
      );
    }

    c.set("validatedBody", result.data);
    return next();
  };
}

/**
 * One `{path, message}` entry per issue; the root path is "".
 */
export function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

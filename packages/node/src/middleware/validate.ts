/**
 * Zod validation middleware.
 *
 * Validates request bodies, query strings and path parameters against
 * Zod schemas. Returns 400 with an error envelope on failure.
 */

import type { MiddlewareHandler } from "hono";
import type { ZodError, ZodTypeAny, output } from "zod";
import { ApiError, createErrorEnvelope } from "../types/error.js";

/**
 * Validate JSON request body against a Zod schema.
 *
 * On success, sets `validatedBody` in context variables.
 * On failure, returns 400 with structured validation errors.
 */
export function validateBody<S extends ZodTypeAny>(
  schema: S,
): MiddlewareHandler<{ Variables: { validatedBody: output<S> } }> {
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
          details: { issues: formatZodErrors(result.error) },
        }),
        400,
      );
    }

    c.set("validatedBody", result.data);
    await next();
  };
}

/**
 * Parse a path parameter or query string.
 *
 * @throws {ApiError} VALIDATION_ERROR naming `what`
 */
export function parseInput<S extends ZodTypeAny>(
  schema: S,
  value: unknown,
  what: string,
): output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ApiError(400, "VALIDATION_ERROR", `Invalid ${what}`, {
      issues: formatZodErrors(result.error),
    });
  }
  return result.data;
}

function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

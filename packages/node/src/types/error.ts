/**
 * Error envelope types for API responses.
 *
 * All error responses follow the shape:
 * { error: { code, message, category?, details? } }
 */

import type { ErrorCategory } from "@poolvault/types";
import type { ContentfulStatusCode } from "hono/utils/http-status";

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes raised by the HTTP layer itself. Domain errors keep the
 * code they were thrown with.
 */
export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "MISSING_CALLER"
  | "NOT_FOUND"
  | "INTERNAL_ERROR";

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ApiErrorCode | string;
  readonly message: string;
  readonly category?: ErrorCategory;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

// =============================================================================
// Factory
// =============================================================================

export function createErrorEnvelope(
  code: ApiErrorCode | string,
  message: string,
  extra?: { category?: ErrorCategory; details?: Record<string, unknown> },
): ErrorEnvelope {
  return { error: { code, message, ...extra } };
}

/**
 * Request-level failure detected by the HTTP layer (bad path parameter,
 * missing caller). Rendered by the error handler with its own status.
 */
export class ApiError extends Error {
  constructor(
    public readonly status: ContentfulStatusCode,
    public readonly code: ApiErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "ApiError";
  }
}

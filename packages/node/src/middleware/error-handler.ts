/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Domain errors from the vault packages carry a category; the category
 * decides the HTTP status and the code is passed through unchanged.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { ErrorCategory } from "@poolvault/types";
import { LedgerError } from "@poolvault/ledger";
import { EventStoreError } from "@poolvault/event-store";
import { VaultError } from "@poolvault/vault";
import { ApiError, createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Category → HTTP Status Mapping
// =============================================================================

const STATUS_BY_CATEGORY: Readonly<Record<ErrorCategory, ContentfulStatusCode>> = {
  InvalidInput: 400,
  Unauthorized: 403,
  NotFound: 404,
  InvariantViolation: 409,
  ReentrancyBlocked: 409,
  InsufficientFunds: 422,
  ExternalCallFailed: 502,
};

type DomainError = VaultError | LedgerError | EventStoreError;

function isDomainError(err: Error): err is DomainError {
  return err instanceof VaultError || err instanceof LedgerError || err instanceof EventStoreError;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (err instanceof ApiError) {
    return c.json(
      createErrorEnvelope(err.code, err.message, err.details !== undefined ? { details: err.details } : undefined),
      err.status,
    );
  }

  if (isDomainError(err)) {
    return c.json(
      createErrorEnvelope(err.code, err.message, { category: err.category }),
      STATUS_BY_CATEGORY[err.category],
    );
  }

  // Don't leak internal details
  return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
}

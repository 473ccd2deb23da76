/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps reconciler errors to client statuses; anything unrecognised is a
 * 500 whose message never leaves the process.
 */

import type { Context } from "hono";
import { ZodError } from "zod";
import { ReconcilerError } from "@treerecon/reconciler";
import type { ReconcilerErrorCode } from "@treerecon/reconciler";
import { createErrorEnvelope } from "../types/error.js";
import { formatZodErrors } from "./validate.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Record<ReconcilerErrorCode, 400 | 422> = {
  INVALID_TABLE: 400,
  INVALID_MAPPING: 400,
  MALFORMED_LEVEL: 422,
};

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (err instanceof ReconcilerError) {
    return c.json(createErrorEnvelope(err.code, err.message), STATUS_MAP[err.code]);
  }

  if (err instanceof ZodError) {
    return c.json(
      createErrorEnvelope("VALIDATION_ERROR", "Request validation failed", {
        issues: formatZodErrors(err),
      }),
      400,
    );
  }

  // Don't leak internal details
  return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
}

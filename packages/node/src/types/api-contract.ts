/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { ReconciliationService } from "../services/reconciliation-service.js";

/** Response header carrying the SHA-256 digest of the differences */
export const DIGEST_HEADER = "X-Diff-Digest";

/**
 * Hono environment type for the reconciliation app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Shared reconciliation service (set for every /api/* request) */
    service: ReconciliationService;
  };
}

/**
 * Environment of a handler behind `validateBody`.
 */
export interface ValidatedEnv<T> {
  Variables: AppEnv["Variables"] & {
    /** Parsed request body (set by validate middleware) */
    validatedBody: T;
  };
}

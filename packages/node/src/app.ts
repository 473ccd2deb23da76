/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import { bodyLimit } from "hono/body-limit";
import pino from "pino";
import type { Logger } from "pino";
import type { ReconcilerConfig } from "@treerecon/reconciler";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { ReconciliationService } from "./services/reconciliation-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createReconcileRoutes } from "./routes/reconcile.js";

// =============================================================================
// App Config
// =============================================================================

export const DEFAULT_MAX_BODY_BYTES = 10 * 1024 * 1024;

export interface CreateAppOptions {
  /** Column mapping and row handling applied when a request brings none */
  readonly reconciler?: ReconcilerConfig;
  /** Service logger. Default: a disabled pino logger */
  readonly logger?: Logger;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Largest accepted request body. Default: 10 MiB */
  readonly maxBodyBytes?: number;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: ReconciliationService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions = {}): AppInstance {
  const service = new ReconciliationService({
    ...(options.reconciler !== undefined ? { reconciler: options.reconciler } : {}),
    logger: options.logger ?? pino({ enabled: false }),
  });
  const maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(handleError);
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use(
    "/api/*",
    bodyLimit({
      maxSize: maxBodyBytes,
      onError: (c) =>
        c.json(
          createErrorEnvelope("PAYLOAD_TOO_LARGE", `Request body exceeds ${maxBodyBytes} bytes`),
          413,
        ),
    }),
  );
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1", createReconcileRoutes());

  return { app, service };
}

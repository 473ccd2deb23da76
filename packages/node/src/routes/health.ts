/**
 * Health check routes.
 *
 * GET /health: Liveness probe (always 200 if server is running)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { ReconciliationService } from "../services/reconciliation-service.js";

export function createHealthRoutes(service: ReconciliationService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      mapping: service.getMapping(),
      timestamp: new Date().toISOString(),
    });
  });

  return routes;
}

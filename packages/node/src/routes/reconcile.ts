/**
 * Reconciliation routes.
 *
 * POST /api/v1/reconcile: Reconcile two datasets, full result
 * POST /api/v1/report   : Reconcile and lay the result out as a workbook
 *
 * Both answer with the difference digest in the X-Diff-Digest header.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { DIGEST_HEADER } from "../types/api-contract.js";
import { ReconcileSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createReconcileRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/reconcile
  routes.post("/reconcile", validateBody(ReconcileSchema), (c) => {
    const service = c.get("service");
    const result = service.reconcile(c.get("validatedBody"));

    c.header(DIGEST_HEADER, result.digest);
    return c.json({ data: result }, 200);
  });

  // POST /api/v1/report
  routes.post("/report", validateBody(ReconcileSchema), (c) => {
    const service = c.get("service");
    const report = service.report(c.get("validatedBody"));

    c.header(DIGEST_HEADER, report.digest);
    return c.json({ data: report }, 200);
  });

  return routes;
}

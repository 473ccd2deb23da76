/**
 * Request logging middleware.
 *
 * One entry per request, handed to a sink that main.ts wires to pino. A
 * reconciliation response also carries the digest of its differences, so
 * a log line can be tied to the exact result the client received.
 */

import type { Context, MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { DIGEST_HEADER } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly requestId: string;
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  /** Difference digest of a reconcile or report response, else null */
  readonly digest: string | null;
}

function toLogEntry(c: Context<AppEnv>, startedAt: number): RequestLogEntry {
  return {
    requestId: c.get("requestId"),
    method: c.req.method,
    path: c.req.path,
    status: c.res.status,
    durationMs: Date.now() - startedAt,
    digest: c.res.headers.get(DIGEST_HEADER),
  };
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const startedAt = Date.now();
    await next();
    log(toLogEntry(c, startedAt));
  };
}

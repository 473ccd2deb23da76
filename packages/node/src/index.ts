/**
 * @treerecon/node: HTTP surface for sheet reconciliation.
 *
 * Package public API; main.ts is the executable entry point.
 */

export { ReconciliationService } from "./services/reconciliation-service.js";
export type {
  ReconciliationServiceConfig,
  ReconcileRequest,
  ReportResponse,
} from "./services/reconciliation-service.js";
export { loadConfig, parseColumnList, toReconcilerConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp, DEFAULT_MAX_BODY_BYTES } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";

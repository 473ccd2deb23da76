/**
 * Type barrel: re-exports all public types from @treerecon/node.
 */

// DTOs
export {
  CellSchema,
  RawTableSchema,
  DatasetSchema,
  ColumnMappingSchema,
  ReconcileSchema,
} from "./dto.js";
export type { RawTableDto, ColumnMappingDto, ReconcileDto } from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export { DIGEST_HEADER } from "./api-contract.js";
export type { AppEnv, ValidatedEnv } from "./api-contract.js";

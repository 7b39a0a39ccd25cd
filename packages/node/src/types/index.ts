/**
 * Type barrel: re-exports all public types from @hindsight/node.
 */

// DTOs
export {
  PaginationQuerySchema,
  HistoryQuerySchema,
  HistoryTextQuerySchema,
  SetActiveSchema,
  PublishEventSchema,
  DefineTypeSchema,
  toEventRecordDto,
} from "./dto.js";
export type {
  HistoryQuery,
  HistoryTextQuery,
  SetActiveDto,
  PublishEventDto,
  DefineTypeDto,
  EventRecordDto,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// App env
export type { AppEnv } from "./api-contract.js";

/**
 * Type barrel — re-exports all public types from @allotment/node.
 */

// DTOs
export {
  AmountSchema,
  PaginationQuerySchema,
  InitializeBudgetSchema,
  AddSubDivisionSchema,
  SpendSchema,
  StrictModeSchema,
  ListEventsQuerySchema,
} from "./dto.js";
export type {
  InitializeBudgetDto,
  AddSubDivisionDto,
  SpendDto,
  StrictModeDto,
  ListEventsQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// App env
export type { AppEnv } from "./api-contract.js";

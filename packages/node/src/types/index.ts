/**
 * Type barrel — re-exports all public types from @allotment/node.
 */

// DTOs
export {
  AddressSchema,
  AmountSchema,
  TimestampSchema,
  PoolLabelSchema,
  PaginationQuerySchema,
  PlanIdParamSchema,
  CreatePlanSchema,
  SetTriggerTimeSchema,
  IssueGrantSchema,
  RevokeSchema,
  WriteOffDebtSchema,
  SwapSchema,
  LiquiditySchema,
  ListEventsQuerySchema,
} from "./dto.js";
export type {
  CreatePlanDto,
  SetTriggerTimeDto,
  IssueGrantDto,
  RevokeDto,
  WriteOffDebtDto,
  SwapDto,
  LiquidityDto,
  ListEventsQuery,
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

// Auth
export type { CallerSource, AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";

/**
 * Type barrel — re-exports all public types from @mintgate/node.
 */

// DTOs
export {
  UintStringSchema,
  PaginationQuerySchema,
  RequestIdParamSchema,
  PoolIdParamSchema,
  TokenSpecSchema,
  SubmitRequestSchema,
  ListRequestsQuerySchema,
  LiquidityChangeSchema,
  ListEventsQuerySchema,
  ListStreamEventsQuerySchema,
  toRequestView,
  toSignResultView,
  toUnsignResultView,
  toPoolView,
} from "./dto.js";
export type {
  SubmitRequestDto,
  ListRequestsQuery,
  LiquidityChangeDto,
  ListEventsQuery,
  ListStreamEventsQuery,
  TokenSpecView,
  RequestView,
  SignResultView,
  UnsignResultView,
  PoolView,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type {
  ApiErrorCode,
  DomainErrorCode,
  ErrorCode,
  ErrorDetail,
  ErrorDetails,
  ErrorEnvelope,
  ValidationIssue,
} from "./error.js";

// Pagination
export {
  encodeCursor,
  decodeCursor,
  paginate,
  REQUEST_ID_KEY,
  GLOBAL_POSITION_KEY,
  STREAM_VERSION_KEY,
} from "./pagination.js";
export type {
  PageKey,
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// Auth
export { ROLE_PERMISSIONS, hasPermission, isRole } from "./auth.js";
export type {
  Role,
  Permission,
  AuthContext,
  ApiKeyRecord,
} from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";

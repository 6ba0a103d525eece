/**
 * Type barrel — re-exports all public types from @strata/node.
 */

// DTOs
export {
  AmountSchema,
  IdentitySchema,
  IdParamSchema,
  BlockHeightSchema,
  PaginationQuerySchema,
  AmountBodySchema,
  BorrowSchema,
  OraclePriceSchema,
  CreatePoolSchema,
  AddLiquiditySchema,
  RemoveLiquiditySchema,
  SwapSchema,
  SwapQuoteQuerySchema,
  FeeRateSchema,
  CreateFarmSchema,
  FundSchema,
  ListEventsQuerySchema,
  ListStreamEventsQuerySchema,
} from "./dto.js";
export type {
  AmountBodyDto,
  BorrowDto,
  OraclePriceDto,
  CreatePoolDto,
  AddLiquidityDto,
  RemoveLiquidityDto,
  SwapDto,
  CreateFarmDto,
  FundDto,
  ListEventsQuery,
  ListStreamEventsQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope, ApiError } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// JSON
export { toJson, respond } from "./json.js";

// App env
export type { AppEnv } from "./api-contract.js";

/**
 * Request DTOs with Zod validation schemas.
 *
 * Amounts cross the wire as decimal strings and are parsed to bigint
 * here; block heights and ids are plain integers.
 */

import { z } from "zod";
import { isAmountString, parseAmount } from "@strata/math";
import { isAccountId, isBlockHeight } from "@strata/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AmountSchema = z
  .string()
  .refine(isAmountString, { message: "Expected a non-negative integer string" })
  .transform((v) => parseAmount(v));

export const IdentitySchema = z
  .string()
  .max(128)
  .refine(isAccountId, { message: "Expected a non-empty identity without surrounding whitespace" });

export const IdParamSchema = z
  .string()
  .regex(/^[1-9]\d*$/, { message: "Expected a positive integer" })
  .transform(Number)
  .refine(Number.isSafeInteger, { message: "Id is too large" });

export const BlockHeightSchema = z
  .number()
  .refine(isBlockHeight, { message: "Expected a non-negative integer block height" });

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Lending DTOs
// =============================================================================

export const AmountBodySchema = z.object({
  amount: AmountSchema,
});

export type AmountBodyDto = z.infer<typeof AmountBodySchema>;

export const BorrowSchema = z.object({
  amount: AmountSchema,
  collateral: AmountSchema,
});

export type BorrowDto = z.infer<typeof BorrowSchema>;

export const OraclePriceSchema = z.object({
  asset: IdentitySchema,
  price: AmountSchema,
});

export type OraclePriceDto = z.infer<typeof OraclePriceSchema>;

// =============================================================================
// AMM DTOs
// =============================================================================

export const CreatePoolSchema = z.object({
  assetA: IdentitySchema,
  assetB: IdentitySchema,
  amountA: AmountSchema,
  amountB: AmountSchema,
});

export type CreatePoolDto = z.infer<typeof CreatePoolSchema>;

export const AddLiquiditySchema = z.object({
  amountA: AmountSchema,
  amountB: AmountSchema,
  minLiquidity: AmountSchema.default("0"),
});

export type AddLiquidityDto = z.infer<typeof AddLiquiditySchema>;

export const RemoveLiquiditySchema = z.object({
  liquidity: AmountSchema,
  minAmountA: AmountSchema.default("0"),
  minAmountB: AmountSchema.default("0"),
});

export type RemoveLiquidityDto = z.infer<typeof RemoveLiquiditySchema>;

export const SwapSchema = z.object({
  assetIn: IdentitySchema,
  amountIn: AmountSchema,
  minAmountOut: AmountSchema.default("0"),
});

export type SwapDto = z.infer<typeof SwapSchema>;

export const SwapQuoteQuerySchema = z.object({
  assetIn: IdentitySchema,
  amountIn: AmountSchema,
});

export const FeeRateSchema = z.object({
  feeRate: AmountSchema,
});

export const CreateFarmSchema = z.object({
  rewardPerBlock: AmountSchema,
  startBlock: BlockHeightSchema,
  endBlock: BlockHeightSchema,
});

export type CreateFarmDto = z.infer<typeof CreateFarmSchema>;

// =============================================================================
// Custody DTOs
// =============================================================================

export const FundSchema = z.object({
  account: IdentitySchema,
  asset: IdentitySchema,
  amount: AmountSchema,
});

export type FundDto = z.infer<typeof FundSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

export const ListStreamEventsQuerySchema = PaginationQuerySchema.extend({
  afterVersion: z.coerce.number().int().min(0).optional(),
});

export type ListStreamEventsQuery = z.infer<typeof ListStreamEventsQuerySchema>;

/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps domain error codes (LendingError, AmmError, etc.)
 * to HTTP status codes.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { ApiError, createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Shared
  UNAUTHORIZED: 403,
  INVALID_AMOUNT: 422,
  TRANSFER_FAILED: 422,
  ALREADY_EXISTS: 409,

  // Lending errors
  INSUFFICIENT_BALANCE: 422,
  LOAN_NOT_FOUND: 404,
  INVALID_COLLATERAL_RATIO: 422,

  // AMM errors
  INSUFFICIENT_FUNDS: 422,
  POOL_NOT_FOUND: 404,
  POOL_INACTIVE: 409,
  INVALID_ASSET: 422,
  SLIPPAGE_EXCEEDED: 422,
  INSUFFICIENT_LIQUIDITY: 422,

  // Event store errors
  INVALID_STREAM_ID: 400,
  INVALID_IDENTITY: 400,
  EMPTY_APPEND: 400,

  // Math errors surfacing from malformed input
  INVALID_FORMAT: 400,
};

function getErrorCode(err: Error): string | undefined {
  if ("code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (err instanceof HTTPException) {
    return err.getResponse();
  }

  if (err instanceof ApiError) {
    return c.json(createErrorEnvelope(err.code, err.message), err.status);
  }

  const code = getErrorCode(err);
  const status = code !== undefined ? (STATUS_MAP[code] ?? 500) : 500;

  // Don't leak internal details
  const message = status === 500 ? "Internal server error" : err.message;

  return c.json(
    createErrorEnvelope(status === 500 ? "INTERNAL_ERROR" : (code ?? "INTERNAL_ERROR"), message),
    status,
  );
}

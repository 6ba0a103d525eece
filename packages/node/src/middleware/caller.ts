/**
 * Caller identity middleware.
 *
 * Mutations act on behalf of the account named in X-Account-Id. Reads
 * need no identity.
 */

import type { MiddlewareHandler } from "hono";
import { isAccountId } from "@strata/types";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const ACCOUNT_ID_HEADER = "X-Account-Id";

const READ_METHODS = new Set(["GET", "HEAD", "OPTIONS"]);

export function callerMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    if (READ_METHODS.has(c.req.method)) {
      return next();
    }

    const caller = c.req.header(ACCOUNT_ID_HEADER)?.trim();
    if (!isAccountId(caller)) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", `Missing ${ACCOUNT_ID_HEADER} header`),
        401,
      );
    }

    c.set("caller", caller);
    return next();
  };
}

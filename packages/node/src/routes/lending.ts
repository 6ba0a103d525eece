/**
 * Lending routes.
 *
 * POST /api/v1/lending/deposit                 — Deposit into the pool
 * POST /api/v1/lending/withdraw                — Withdraw a deposit
 * POST /api/v1/lending/borrow                  — Open a collateralized loan
 * POST /api/v1/lending/loans/:id/repay         — Repay part or all of a loan
 * POST /api/v1/lending/loans/:id/liquidate     — Liquidate an unhealthy loan
 * POST /api/v1/lending/oracle                  — Record an oracle price (owner)
 * GET  /api/v1/lending/accounts/:account       — Deposit/borrow/collateral position
 * GET  /api/v1/lending/accounts/:account/loans — Live loans of a borrower
 * GET  /api/v1/lending/loans/:id               — Loan with amount owed
 * GET  /api/v1/lending/loans/:id/health        — Health check
 * GET  /api/v1/lending/stats                   — Protocol stats and utilization
 * GET  /api/v1/lending/oracle/:asset           — Recorded oracle price
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AmountBodySchema, BorrowSchema, OraclePriceSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { respond } from "../types/json.js";
import { found, parseId } from "./params.js";

export function createLendingRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // ─── Mutations ──────────────────────────────────────────────────

  routes.post("/deposit", validateBody(AmountBodySchema), (c) => {
    const { amount } = c.get("validatedBody");
    return respond(c, c.get("service").lending.deposit(c.get("caller"), amount));
  });

  routes.post("/withdraw", validateBody(AmountBodySchema), (c) => {
    const { amount } = c.get("validatedBody");
    return respond(c, c.get("service").lending.withdraw(c.get("caller"), amount));
  });

  routes.post("/borrow", validateBody(BorrowSchema), (c) => {
    const body = c.get("validatedBody");
    const loan = c.get("service").lending.borrow(c.get("caller"), body.amount, body.collateral);
    return respond(c, loan, 201);
  });

  routes.post("/loans/:id/repay", validateBody(AmountBodySchema), (c) => {
    const loanId = parseId(c.req.param("id"), "loan id");
    const { amount } = c.get("validatedBody");
    return respond(c, c.get("service").lending.repay(c.get("caller"), loanId, amount));
  });

  routes.post("/loans/:id/liquidate", (c) => {
    const loanId = parseId(c.req.param("id"), "loan id");
    return respond(c, c.get("service").lending.liquidate(c.get("caller"), loanId));
  });

  routes.post("/oracle", validateBody(OraclePriceSchema), (c) => {
    const body = c.get("validatedBody");
    const record = c.get("service").lending.setOraclePrice(c.get("caller"), body.asset, body.price);
    return respond(c, record);
  });

  // ─── Queries ────────────────────────────────────────────────────

  routes.get("/accounts/:account", (c) => {
    return respond(c, c.get("service").lending.getPosition(c.req.param("account")));
  });

  routes.get("/accounts/:account/loans", (c) => {
    return respond(c, c.get("service").lending.getLoansByBorrower(c.req.param("account")));
  });

  routes.get("/loans/:id", (c) => {
    const lending = c.get("service").lending;
    const loanId = parseId(c.req.param("id"), "loan id");
    const loan = found(lending.getLoan(loanId), `Loan ${loanId}`);
    return respond(c, {
      ...loan,
      interestOwed: lending.getInterestOwed(loanId),
      totalOwed: lending.getTotalOwed(loanId),
    });
  });

  routes.get("/loans/:id/health", (c) => {
    const loanId = parseId(c.req.param("id"), "loan id");
    return respond(c, { loanId, healthy: c.get("service").lending.isHealthy(loanId) });
  });

  routes.get("/stats", (c) => {
    const lending = c.get("service").lending;
    return respond(c, {
      ...lending.getProtocolStats(),
      utilizationRate: lending.getUtilizationRate(),
    });
  });

  routes.get("/oracle/:asset", (c) => {
    const asset = c.req.param("asset");
    return respond(c, found(c.get("service").lending.getOraclePrice(asset), `Price for ${asset}`));
  });

  return routes;
}

/**
 * Test helpers for @strata/node.
 *
 * Builds the Hono app with every middleware and route on a manual
 * block clock, without an HTTP server.
 */

import { createApp } from "../src/app.js";
import type { AppInstance } from "../src/app.js";
import type { RequestLogEntry } from "../src/middleware/logger.js";
import { ManualBlockClock } from "../src/services/block-clock.js";

export const OWNER = "owner";
export const LENDING_CUSTODIAN = "lending-custodian";
export const AMM_CUSTODIAN = "amm-custodian";

export interface TestApp extends AppInstance {
  readonly clock: ManualBlockClock;
}

export interface TestAppOptions {
  readonly faucetEnabled?: boolean;
  readonly logFn?: (entry: RequestLogEntry) => void;
}

/**
 * Create a test app. The faucet is on unless turned off.
 */
export function createTestApp(options: TestAppOptions = {}): TestApp {
  const clock = new ManualBlockClock();
  const instance = createApp({
    serviceConfig: {
      ownerId: OWNER,
      lendingCustodianId: LENDING_CUSTODIAN,
      ammCustodianId: AMM_CUSTODIAN,
      settlementAsset: "STX",
      clock,
    },
    faucetEnabled: options.faucetEnabled ?? true,
    ...(options.logFn !== undefined ? { logFn: options.logFn } : {}),
  });
  return { ...instance, clock };
}

/**
 * JSON request helper.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

/**
 * POST a JSON body as `caller`.
 */
export function postAs(caller: string, path: string, body?: unknown): Request {
  return jsonRequest(path, "POST", body ?? {}, { "X-Account-Id": caller });
}

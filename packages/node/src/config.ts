/**
 * @strata/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

const BooleanFlag = z
  .enum(["true", "false"])
  .default("false")
  .transform((v) => v === "true");

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Identities
  OWNER_ID: z.string().min(1).default("owner"),
  LENDING_CUSTODIAN_ID: z.string().min(1).default("lending-custodian"),
  AMM_CUSTODIAN_ID: z.string().min(1).default("amm-custodian"),

  // Lending
  SETTLEMENT_ASSET: z.string().min(1).default("STX"),
  INTEREST_RATE_PER_BLOCK: z.coerce.bigint().nonnegative().default(5n),

  // Clock
  BLOCK_TIME_MS: z.coerce.number().int().min(1).default(10_000),

  // Custody faucet
  FAUCET_ENABLED: BooleanFlag,
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

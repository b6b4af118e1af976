/**
 * @splitvault/host — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { VaultConfig } from "@splitvault/vault";

// =============================================================================
// Schema
// =============================================================================

const positiveInteger = z
  .string()
  .trim()
  .regex(/^[1-9]\d*$/, "Expected a positive integer")
  .transform((v) => BigInt(v));

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Vault
  VAULT_ADDRESS: z.string().trim().min(1).default("vault"),
  ORACLE_CONDITION: z.string().trim().min(1),
  DISPUTE_DURATION_SECONDS: z.coerce.number().int().min(1).default(604_800),
  INITIATION_AMOUNT_DENOMINATOR: positiveInteger.default("4"),
  FEE_DENOMINATOR: positiveInteger.default("100"),
  ZERO_VOTE_POLICY: z.enum(["refund", "reject"]).default("refund"),

  // Collaborator assets
  BASE_SYMBOL: z.string().trim().min(1).default("TKN"),
  GOVERNANCE_SYMBOL: z.string().trim().min(1).default("GOV"),
});

export type HostConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): HostConfig {
  return ConfigSchema.parse(env);
}

/**
 * The vault's own configuration, taken from the host configuration.
 */
export function toVaultConfig(config: HostConfig): VaultConfig {
  return {
    address: config.VAULT_ADDRESS,
    oracleCondition: config.ORACLE_CONDITION,
    disputeDurationSeconds: config.DISPUTE_DURATION_SECONDS,
    initiationAmountDenominator: config.INITIATION_AMOUNT_DENOMINATOR,
    feeDenominator: config.FEE_DENOMINATOR,
    zeroVotePolicy: config.ZERO_VOTE_POLICY,
  };
}

/**
 * Vault configuration — defaults and validation.
 */

import { isAccountId } from "@splitvault/types";
import type {
  ResolvedVaultConfig,
  SerializedVaultConfig,
  VaultConfig,
  ZeroVotePolicy,
} from "./types.js";
import { VaultError } from "./types.js";

export const VAULT_DEFAULTS = {
  disputeDurationSeconds: 604_800,
  initiationAmountDenominator: 4n,
  feeDenominator: 100n,
  zeroVotePolicy: "refund",
} as const satisfies {
  disputeDurationSeconds: number;
  initiationAmountDenominator: bigint;
  feeDenominator: bigint;
  zeroVotePolicy: ZeroVotePolicy;
};

const ZERO_VOTE_POLICIES = new Set<string>(["refund", "reject"]);

export function isZeroVotePolicy(value: unknown): value is ZeroVotePolicy {
  return typeof value === "string" && ZERO_VOTE_POLICIES.has(value);
}

/**
 * Apply defaults and validate. Claim-token symbols default to the
 * base asset's symbol prefixed with "c" and "i".
 */
export function resolveVaultConfig(config: VaultConfig, baseSymbol: string): ResolvedVaultConfig {
  const resolved: ResolvedVaultConfig = {
    address: config.address,
    oracleCondition: config.oracleCondition,
    disputeDurationSeconds: config.disputeDurationSeconds ?? VAULT_DEFAULTS.disputeDurationSeconds,
    initiationAmountDenominator:
      config.initiationAmountDenominator ?? VAULT_DEFAULTS.initiationAmountDenominator,
    feeDenominator: config.feeDenominator ?? VAULT_DEFAULTS.feeDenominator,
    zeroVotePolicy: config.zeroVotePolicy ?? VAULT_DEFAULTS.zeroVotePolicy,
    cTokenSymbol: config.cTokenSymbol ?? `c${baseSymbol}`,
    iTokenSymbol: config.iTokenSymbol ?? `i${baseSymbol}`,
  };
  validateVaultConfig(resolved);
  return resolved;
}

export function validateVaultConfig(config: ResolvedVaultConfig): void {
  if (!isAccountId(config.address)) {
    throw new VaultError("INVALID_CONFIG", `Invalid vault address: "${String(config.address)}"`);
  }
  if (typeof config.oracleCondition !== "string") {
    throw new VaultError("INVALID_CONFIG", "oracleCondition must be a string");
  }
  if (!Number.isSafeInteger(config.disputeDurationSeconds) || config.disputeDurationSeconds <= 0) {
    throw new VaultError(
      "INVALID_CONFIG",
      `disputeDurationSeconds must be a positive integer, got ${config.disputeDurationSeconds}`,
    );
  }
  if (config.initiationAmountDenominator <= 0n) {
    throw new VaultError(
      "INVALID_CONFIG",
      `initiationAmountDenominator must be positive, got ${config.initiationAmountDenominator.toString()}`,
    );
  }
  if (config.feeDenominator <= 0n) {
    throw new VaultError(
      "INVALID_CONFIG",
      `feeDenominator must be positive, got ${config.feeDenominator.toString()}`,
    );
  }
  if (!isZeroVotePolicy(config.zeroVotePolicy)) {
    throw new VaultError("INVALID_CONFIG", `Unknown zeroVotePolicy: "${String(config.zeroVotePolicy)}"`);
  }
  if (config.cTokenSymbol.trim() === "" || config.iTokenSymbol.trim() === "") {
    throw new VaultError("INVALID_CONFIG", "Claim token symbols must be non-empty");
  }
  if (config.cTokenSymbol === config.iTokenSymbol) {
    throw new VaultError("INVALID_CONFIG", `cToken and iToken share the symbol "${config.cTokenSymbol}"`);
  }
}

export function serializeVaultConfig(config: ResolvedVaultConfig): SerializedVaultConfig {
  return {
    ...config,
    initiationAmountDenominator: config.initiationAmountDenominator.toString(),
    feeDenominator: config.feeDenominator.toString(),
  };
}

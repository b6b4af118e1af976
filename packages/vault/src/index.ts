/**
 * @splitvault/vault — Split vault.
 *
 * Converts a base asset into a pair of claim tokens (cToken, iToken)
 * whose redemption rules depend on a dispute-governed lock.
 *
 * Three engines over one state:
 * - Conversion: deposit, mint, burn, redeem
 * - Disputes: collateralized initiation, stake-weighted voting, slashing
 * - Fees & rewards: pro-rata fee shares for governance holders
 *
 * Design rules:
 * - All arithmetic uses bigint with floor division
 * - An operation either commits completely or changes nothing
 * - Reentrant calls are refused
 * - All state is snapshot-able and restorable
 */

// Top-level vault
export { Vault } from "./vault.js";

// Engines
export { FeeLedger } from "./fee-ledger.js";
export type { FeeLedgerState } from "./fee-ledger.js";
export { DisputeEngine, computeResolution } from "./dispute-engine.js";
export type { DisputeState } from "./dispute-engine.js";
export { quoteConversion, planRedemption, assertCanRedeem } from "./conversion.js";
export type { BurnPlan } from "./conversion.js";
export { OperationGuard } from "./operation-guard.js";
export type { UnitOfWork } from "./operation-guard.js";

// Configuration & persistence
export { VAULT_DEFAULTS, resolveVaultConfig, validateVaultConfig, isZeroVotePolicy } from "./config.js";
export { assertVaultSnapshot } from "./snapshot.js";

// Types
export type {
  VoteSide,
  ZeroVotePolicy,
  ResolutionOutcome,
  VaultPhase,
  Dispute,
  Vote,
  RewardCredit,
  Resolution,
  ConversionResult,
  RedemptionResult,
  FeeTotals,
  PendingRewards,
  RewardCurrency,
  HoldingsReport,
  SolvencyReport,
  VaultConfig,
  ResolvedVaultConfig,
  VaultCollaborators,
  VaultOptions,
  EventFailure,
  VaultEventType,
  SerializedVaultConfig,
  SerializedDispute,
  SerializedVote,
  SerializedRewards,
  VaultSnapshot,
  VaultErrorCode,
} from "./types.js";
export { VaultError } from "./types.js";

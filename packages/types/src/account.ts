/**
 * Account Types
 *
 * Accounts are opaque identifiers. The vault never interprets them:
 * a wallet address, a user id and a contract address look the same.
 *
 * Rules:
 * - Account ids are non-empty strings
 * - Amounts are bigint in memory, base-10 strings when serialized
 */

/** Opaque account identifier (wallet, contract, user). */
export type AccountId = string;

/**
 * A token amount as it appears in serialized form (snapshots, events).
 * Non-negative base-10 integer string, e.g. "990".
 */
export type AmountString = string;

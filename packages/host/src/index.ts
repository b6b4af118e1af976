/**
 * @splitvault/host — Runs a vault in-process.
 *
 * Loads configuration from the environment, creates the collaborator
 * assets, the vault and its event store, and logs and audits every
 * operation.
 */

export { VaultHost } from "./vault-host.js";
export type { VaultHostOptions, HostSnapshot, HostStatus } from "./vault-host.js";
export { AuditLog } from "./audit-log.js";
export type { AuditFields, AuditLogEntry, AuditLogQuery, HostOperation } from "./audit-log.js";
export { ConfigSchema, loadConfig, toVaultConfig } from "./config.js";
export type { HostConfig } from "./config.js";
export { createLogger } from "./logger.js";

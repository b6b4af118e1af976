/**
 * Audit trail of committed vault operations: who did what, when, with
 * which amounts. In-memory; lives as long as the host.
 */

export type HostOperation =
  | "convert"
  | "redeem"
  | "initiateDispute"
  | "vote"
  | "resolveDispute"
  | "withdrawOwedFees"
  | "withdrawGovernanceTokenReward"
  | "withdrawBaseTokenReward";

export type AuditFields = Readonly<Record<string, string | number | boolean>>;

export interface AuditLogEntry {
  /** 1-based, in commit order */
  readonly seq: number;
  readonly timestamp: string;
  readonly vault: string;
  readonly action: HostOperation;
  readonly actor: string;
  readonly fields: AuditFields;
}

export interface AuditLogQuery {
  readonly vault?: string | undefined;
  readonly action?: HostOperation | undefined;
  readonly actor?: string | undefined;
  readonly limit?: number | undefined;
}

export class AuditLog {
  private readonly entries: AuditLogEntry[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  record(vault: string, action: HostOperation, actor: string, fields: AuditFields = {}): AuditLogEntry {
    const entry: AuditLogEntry = {
      seq: this.entries.length + 1,
      timestamp: this.now().toISOString(),
      vault,
      action,
      actor,
      fields: { ...fields },
    };
    this.entries.push(entry);
    return entry;
  }

  /** Matching entries, newest first. */
  query(filter: AuditLogQuery = {}): readonly AuditLogEntry[] {
    const matches = this.entries.filter(
      (e) =>
        (filter.vault === undefined || e.vault === filter.vault) &&
        (filter.action === undefined || e.action === filter.action) &&
        (filter.actor === undefined || e.actor === filter.actor),
    );
    matches.reverse();
    return filter.limit !== undefined && filter.limit > 0 ? matches.slice(0, filter.limit) : matches;
  }

  get size(): number {
    return this.entries.length;
  }
}

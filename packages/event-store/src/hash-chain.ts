/**
 * Hash chain over stored events.
 *
 *   hash(n) = sha256(JCS({ ...link(n), previousHash: hash(n-1) }))
 *
 * JCS is RFC 8785 canonical JSON, so the hash does not depend on key
 * order. Editing, dropping or reordering any event breaks every link
 * after it.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { ChainLink, IntegrityReport, StoredEvent } from "./types.js";

export const GENESIS_HASH = "genesis";

export function hashLink(link: ChainLink): string {
  const content = canonicalize({
    event: link.event,
    streamId: link.streamId,
    version: link.version,
    position: link.position,
    appendedAt: link.appendedAt,
    previousHash: link.previousHash,
  });
  return createHash("sha256").update(content).digest("hex");
}

export function sealLink(link: ChainLink): StoredEvent {
  return { ...link, hash: hashLink(link) };
}

/**
 * Walk a log in global order and stop at the first event that does
 * not verify.
 */
export function verifyChain(log: readonly StoredEvent[]): IntegrityReport {
  let previousHash = GENESIS_HASH;
  const versions = new Map<string, number>();

  for (const [index, stored] of log.entries()) {
    const broken = (reason: string): IntegrityReport => ({
      valid: false,
      checked: index,
      brokenAt: stored.position,
      reason,
    });

    if (stored.position !== index + 1) {
      return broken(`Expected position ${index + 1}, found ${stored.position}`);
    }
    const expectedVersion = (versions.get(stored.streamId) ?? 0) + 1;
    if (stored.version !== expectedVersion) {
      return broken(
        `Stream "${stored.streamId}" expected version ${expectedVersion}, found ${stored.version}`,
      );
    }
    if (stored.previousHash !== previousHash) {
      return broken(`Event at position ${stored.position} does not link to its predecessor`);
    }
    if (stored.hash !== hashLink(stored)) {
      return broken(`Event at position ${stored.position} was modified`);
    }

    versions.set(stored.streamId, stored.version);
    previousHash = stored.hash;
  }

  return { valid: true, checked: log.length };
}

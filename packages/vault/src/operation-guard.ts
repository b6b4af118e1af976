/**
 * Operation Guard — one vault operation at a time, all or nothing.
 *
 * Each operation runs inside a unit of work:
 * 1. the guard refuses to start while another operation is in flight
 * 2. an image of internal state is captured
 * 3. every completed collaborator call may register a compensation
 * 4. on failure the image is restored and compensations run newest first
 *
 * Rules:
 * - A reentrant call fails with REENTRANT_CALL and touches nothing
 * - The original error is rethrown after a clean rollback
 * - A compensation that throws yields ROLLBACK_FAILED; the remaining
 *   compensations still run
 */

import { VaultError } from "./types.js";

export interface UnitOfWork {
  /**
   * Run a collaborator call. When it succeeds and `compensate` is given,
   * the compensation is journaled for rollback.
   */
  step<T>(label: string, action: () => T, compensate?: (result: T) => void): T;
}

interface Compensation {
  readonly label: string;
  readonly undo: () => void;
}

class Journal implements UnitOfWork {
  readonly entries: Compensation[] = [];

  step<T>(label: string, action: () => T, compensate?: (result: T) => void): T {
    const result = action();
    if (compensate !== undefined) {
      this.entries.push({ label, undo: () => compensate(result) });
    }
    return result;
  }
}

export class OperationGuard<TImage> {
  private active: string | null = null;

  constructor(
    private readonly capture: () => TImage,
    private readonly restore: (image: TImage) => void,
  ) {}

  /** Name of the operation in flight, if any. */
  activeOperation(): string | null {
    return this.active;
  }

  run<T>(operation: string, body: (work: UnitOfWork) => T): T {
    if (this.active !== null) {
      throw new VaultError(
        "REENTRANT_CALL",
        `Cannot start "${operation}" while "${this.active}" is in progress`,
      );
    }

    this.active = operation;
    const image = this.capture();
    const journal = new Journal();
    try {
      return body(journal);
    } catch (error) {
      this.restore(image);
      unwind(operation, journal.entries, error);
      throw error;
    } finally {
      this.active = null;
    }
  }
}

function unwind(operation: string, entries: readonly Compensation[], original: unknown): void {
  const failed: string[] = [];
  let firstFailure: unknown;
  for (const entry of [...entries].reverse()) {
    try {
      entry.undo();
    } catch (error) {
      if (failed.length === 0) firstFailure = error;
      failed.push(entry.label);
    }
  }

  if (failed.length > 0) {
    const reason = original instanceof Error ? original.message : String(original);
    throw new VaultError(
      "ROLLBACK_FAILED",
      `"${operation}" failed (${reason}) and could not undo: ${failed.join(", ")}`,
      { cause: firstFailure },
    );
  }
}

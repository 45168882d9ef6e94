import { ConflictError } from "../errors.js";

/** Read side of the ledger, handed to the interpolator. */
export interface OutcomeReader {
  get(actionId: string, key: string): string | undefined;
  has(actionId: string, key: string): boolean;
}

export type OutcomeSnapshot = Record<string, Record<string, string>>;

/**
 * Write-once store of outcomes keyed by (action id, outcome key).
 * Only the engine writes, and only for actions that ended in SUCCESS.
 */
export class OutcomeLedger implements OutcomeReader {
  private entries = new Map<string, Map<string, string>>();

  put(actionId: string, key: string, value: string): void {
    let outcomes = this.entries.get(actionId);
    if (!outcomes) {
      outcomes = new Map();
      this.entries.set(actionId, outcomes);
    }
    if (outcomes.has(key)) {
      throw new ConflictError(actionId, key);
    }
    outcomes.set(key, value);
  }

  get(actionId: string, key: string): string | undefined {
    return this.entries.get(actionId)?.get(key);
  }

  has(actionId: string, key: string): boolean {
    return this.entries.get(actionId)?.has(key) ?? false;
  }

  outcomesOf(actionId: string): Record<string, string> {
    return Object.fromEntries(this.entries.get(actionId) ?? []);
  }

  snapshot(): OutcomeSnapshot {
    const out: OutcomeSnapshot = {};
    for (const [actionId, outcomes] of this.entries) {
      out[actionId] = Object.fromEntries(outcomes);
    }
    return out;
  }
}

import { InternalError } from "../errors.js";

/**
 * Counting semaphore for dispatch slots.
 * Non-blocking: the scheduling loop is the only caller, so a failed
 * `tryAcquire` simply defers the action to the next pass.
 */
export class Semaphore {
  private inUse = 0;
  private readonly limit: number;

  /** `limit` of `Infinity` means unbounded. */
  constructor(limit: number = Number.POSITIVE_INFINITY) {
    if (!(limit >= 1)) {
      throw new InternalError(`Semaphore limit must be at least 1 (got ${limit})`);
    }
    this.limit = limit;
  }

  tryAcquire(): boolean {
    if (this.inUse >= this.limit) return false;
    this.inUse++;
    return true;
  }

  release(): void {
    if (this.inUse === 0) {
      throw new InternalError("Semaphore released more times than acquired");
    }
    this.inUse--;
  }
}

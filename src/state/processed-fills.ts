/**
 * Processed Fill Registry
 *
 * Remembers which fill hashes have already been forwarded to the session.
 * The venue returns overlapping windows on every poll, so without this the
 * same execution would be booked once per poll. Entries are keyed by hash
 * and expire by fill time.
 */

export class ProcessedFillRegistry {
  private readonly seen = new Map<string, number>();

  has(hash: string): boolean {
    return this.seen.has(hash);
  }

  /**
   * Returns true if this hash has NOT been seen before (i.e. should be
   * processed). Returns false if it's a duplicate.
   */
  markProcessed(hash: string, fillTime: number): boolean {
    if (this.seen.has(hash)) return false;
    this.seen.set(hash, fillTime);
    return true;
  }

  /** Forget fills older than `cutoff` (epoch ms). Returns how many were dropped. */
  prune(cutoff: number): number {
    let removed = 0;
    for (const [hash, fillTime] of this.seen) {
      if (fillTime < cutoff) {
        this.seen.delete(hash);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.seen.size;
  }
}

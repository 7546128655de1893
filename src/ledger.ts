/**
 * Authoritative runtime state: actor id → cooldown expiry (epoch ms).
 *
 * Entries are only proven expired lazily, on read or by a sweep, so a present
 * entry may already be in the past.
 */
export class CooldownLedger {
  private readonly entries = new Map<string, number>();

  get size(): number {
    return this.entries.size;
  }

  get(actorId: string): number | undefined {
    return this.entries.get(actorId);
  }

  set(actorId: string, expiresAt: number): void {
    this.entries.set(actorId, expiresAt);
  }

  delete(actorId: string): boolean {
    return this.entries.delete(actorId);
  }

  remaining(actorId: string, now: number): number {
    const expiresAt = this.entries.get(actorId);
    if (expiresAt === undefined) {
      return 0;
    }
    return Math.max(0, expiresAt - now);
  }

  /** Copy of the current entries; safe to iterate while the ledger changes. */
  snapshot(): Array<[string, number]> {
    return [...this.entries];
  }

  /**
   * Removes every entry expired at `now` and returns the evicted ids. Each id
   * is re-checked before removal so an entry replaced after the snapshot was
   * taken is left alone unless the replacement is also expired.
   */
  evictExpired(now: number): string[] {
    const evicted: string[] = [];
    for (const [actorId] of this.snapshot()) {
      const current = this.entries.get(actorId);
      if (current !== undefined && current <= now) {
        this.entries.delete(actorId);
        evicted.push(actorId);
      }
    }
    return evicted;
  }
}

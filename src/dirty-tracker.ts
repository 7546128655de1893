export interface DirtySnapshot {
  readonly ids: ReadonlyMap<string, number>;
}

/**
 * Actor ids whose ledger entry changed since the last successful flush.
 *
 * Every mark bumps a version. A flush works from a snapshot and acknowledges
 * it only after its write succeeds; acknowledgement clears an id only if it
 * was not marked again in the meantime.
 */
export class DirtyTracker {
  private readonly versions = new Map<string, number>();
  private clock = 0;

  get size(): number {
    return this.versions.size;
  }

  mark(actorId: string): void {
    this.clock += 1;
    this.versions.set(actorId, this.clock);
  }

  has(actorId: string): boolean {
    return this.versions.has(actorId);
  }

  snapshot(): DirtySnapshot {
    return { ids: new Map(this.versions) };
  }

  acknowledge(snapshot: DirtySnapshot): void {
    for (const [actorId, version] of snapshot.ids) {
      if (this.versions.get(actorId) === version) {
        this.versions.delete(actorId);
      }
    }
  }
}

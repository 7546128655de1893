import type { BaseLogger } from 'pino';
import { z } from 'zod';
import { PinoAuditLogger, type CooldownAuditEvent, type CooldownAuditLogger } from './audit.js';
import type { CooldownStore } from './cooldown-store.js';
import { DirtyTracker } from './dirty-tracker.js';
import { CooldownError } from './errors.js';
import { CooldownLedger } from './ledger.js';
import { PeriodicTask } from './periodic-task.js';
import { cleanupIntervalMs, type CooldownSettings, type SettingsSource } from './settings.js';

export type ReservationResult = { allowed: true } | { allowed: false; remainingMs: number };

export type CooldownStatus = { state: 'available' } | { state: 'cooldown'; remainingMs: number; expiresAt: number };

export type FlushResult =
  | { status: 'idle' }
  | { status: 'written'; saved: number; removed: number }
  | { status: 'failed'; error: unknown };

export interface CooldownEngineOptions {
  store: CooldownStore;
  settings: SettingsSource;
  logger: BaseLogger;
  auditLogger?: CooldownAuditLogger;
  nowProvider?: () => number; // epoch ms
}

/** UUID actor id in canonical lower-case form. */
export const ActorIdSchema = z
  .string()
  .uuid()
  .transform((id) => id.toLowerCase());
const ExpirySchema = z.number().finite().transform(Math.floor);

const canonical = (actorId: string) => actorId.toLowerCase();

const toEpochSeconds = (ms: number) => Math.floor(ms / 1000);

type EngineState = 'idle' | 'running' | 'stopped';

/**
 * Per-actor cooldown state with batched persistence.
 *
 * Reservation, reset and the sweep's eviction are synchronous, so each runs to
 * completion before any other engine operation starts. Only flushes touch the
 * store, and they are queued on a single chain.
 */
export class CooldownEngine {
  private readonly ledger = new CooldownLedger();
  private readonly dirty = new DirtyTracker();
  private readonly store: CooldownStore;
  private readonly settings: SettingsSource;
  private readonly logger: BaseLogger;
  private readonly audit: CooldownAuditLogger;
  private readonly now: () => number;

  // last written document, including entries the ledger never holds
  private records = new Map<string, unknown>();
  private writeChain: Promise<void> = Promise.resolve();
  private cleanupTask: PeriodicTask | null = null;
  private saveTask: PeriodicTask | null = null;
  private state: EngineState = 'idle';
  private shutdownPromise: Promise<void> | null = null;

  private constructor(options: CooldownEngineOptions) {
    this.store = options.store;
    this.settings = options.settings;
    this.logger = options.logger;
    this.audit = options.auditLogger ?? new PinoAuditLogger(options.logger);
    this.now = options.nowProvider ?? Date.now;
  }

  /** Prepares the store and seeds the ledger from it. Store failures reject. */
  static async create(options: CooldownEngineOptions): Promise<CooldownEngine> {
    const engine = new CooldownEngine(options);
    await engine.store.init();
    await engine.load();
    return engine;
  }

  get cooldownSeconds(): number {
    return this.settings.current.cooldownSeconds;
  }

  get dirtyCount(): number {
    return this.dirty.size;
  }

  start(): void {
    if (this.state !== 'idle') {
      return;
    }
    this.state = 'running';
    this.schedule();
  }

  tryReserve(rawActorId: string, bypass: boolean, cooldownDurationMs = this.durationMs()): ReservationResult {
    this.assertOpen();
    const actorId = canonical(rawActorId);
    const now = this.now();

    if (bypass) {
      this.record({ actorId, outcome: 'bypassed', timestamp: now });
      return { allowed: true };
    }

    const remainingMs = this.ledger.remaining(actorId, now);
    if (remainingMs > 0) {
      this.record({ actorId, outcome: 'denied', remainingMs, timestamp: now });
      return { allowed: false, remainingMs };
    }

    if (cooldownDurationMs <= 0) {
      return { allowed: true };
    }

    const expiresAt = now + cooldownDurationMs;
    this.ledger.set(actorId, expiresAt);
    this.dirty.mark(actorId);
    this.record({ actorId, outcome: 'reserved', expiresAt, timestamp: now });
    return { allowed: true };
  }

  attemptTrigger(actorId: string, bypass: boolean): boolean {
    return this.tryReserve(actorId, bypass).allowed;
  }

  remaining(actorId: string): number {
    return this.ledger.remaining(canonical(actorId), this.now());
  }

  queryStatus(actorId: string): CooldownStatus {
    const now = this.now();
    const remainingMs = this.ledger.remaining(canonical(actorId), now);
    if (remainingMs <= 0) {
      return { state: 'available' };
    }
    return { state: 'cooldown', remainingMs, expiresAt: now + remainingMs };
  }

  clearCooldown(rawActorId: string): void {
    this.assertOpen();
    const actorId = canonical(rawActorId);
    const removed = this.ledger.delete(actorId);
    this.dirty.mark(actorId);
    if (removed) {
      this.record({ actorId, outcome: 'reset', timestamp: this.now() });
    }
  }

  reset(actorId: string): void {
    this.clearCooldown(actorId);
  }

  /** Entries currently in the ledger, including expired ones not yet swept. */
  activeCount(): number {
    return this.ledger.size;
  }

  activeCooldowns(): Map<string, number> {
    const now = this.now();
    const result = new Map<string, number>();
    for (const [actorId, expiresAt] of this.ledger.snapshot()) {
      if (expiresAt > now) {
        result.set(actorId, expiresAt - now);
      }
    }
    return result;
  }

  /** Evicts expired entries and, if any went, flushes right away. */
  async sweep(): Promise<number> {
    const evicted = this.ledger.evictExpired(this.now());
    for (const actorId of evicted) {
      this.dirty.mark(actorId);
    }

    if (evicted.length > 0) {
      this.logger.info({ count: evicted.length }, 'cleaned up expired cooldowns');
      await this.flush();
    }
    return evicted.length;
  }

  /** Writes every dirty entry in one store write. Queued behind earlier writes. */
  flush(): Promise<FlushResult> {
    const result = this.writeChain.then(() => this.flushDirty());
    // the caller of flush() sees any rejection; the chain only orders writes
    this.writeChain = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  /**
   * Re-reads settings without touching the ledger, then reschedules the
   * periodic tasks if their intervals changed. On failure the previous
   * settings remain in effect and the error is rethrown.
   */
  async reload(): Promise<CooldownSettings> {
    if (this.settings.load) {
      await this.settings.load();
    }
    await this.reschedule();
    this.logger.info({ cooldownSeconds: this.settings.current.cooldownSeconds }, 'configuration reloaded');
    return this.settings.current;
  }

  async shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.stop();
    }
    return this.shutdownPromise;
  }

  private async stop(): Promise<void> {
    this.state = 'stopped';
    await Promise.all([this.cleanupTask?.cancel(), this.saveTask?.cancel()]);
    this.cleanupTask = null;
    this.saveTask = null;

    const result = await this.flush();
    if (result.status === 'failed') {
      throw new CooldownError('flush_failed', 'final cooldown flush failed', {
        pending: this.dirty.size,
        cause: result.error instanceof Error ? result.error.message : String(result.error),
      });
    }
    this.logger.info('cooldown engine shut down');
  }

  private async load(): Promise<void> {
    const raw = await this.store.read();
    const now = this.now();
    let loaded = 0;
    let expired = 0;

    for (const [key, value] of raw) {
      const actorId = ActorIdSchema.safeParse(key);
      if (!actorId.success) {
        this.logger.warn({ key }, 'invalid actor id in cooldown data');
        this.records.set(key, value);
        continue;
      }
      const expiry = ExpirySchema.safeParse(value);
      if (!expiry.success) {
        this.logger.warn({ key, value }, 'invalid expiry in cooldown data');
        continue;
      }

      this.records.set(actorId.data, expiry.data);
      const expiresAt = expiry.data * 1000;
      if (expiresAt > now) {
        this.ledger.set(actorId.data, expiresAt);
        loaded += 1;
      } else {
        this.dirty.mark(actorId.data);
        expired += 1;
      }
    }

    if (expired > 0) {
      await this.flush();
    }
    this.logger.info({ loaded, expired }, `loaded ${loaded} active cooldowns, cleaned up ${expired} expired cooldowns`);
  }

  private async flushDirty(): Promise<FlushResult> {
    const snapshot = this.dirty.snapshot();
    if (snapshot.ids.size === 0) {
      return { status: 'idle' };
    }

    const next = new Map(this.records);
    let saved = 0;
    let removed = 0;
    for (const actorId of snapshot.ids.keys()) {
      const expiresAt = this.ledger.get(actorId);
      if (expiresAt === undefined) {
        next.delete(actorId);
        removed += 1;
      } else {
        next.set(actorId, toEpochSeconds(expiresAt));
        saved += 1;
      }
    }

    try {
      await this.store.write(next);
    } catch (error) {
      this.logger.error({ err: error, pending: snapshot.ids.size }, 'failed to persist cooldowns, will retry on next flush');
      return { status: 'failed', error };
    }

    this.records = next;
    this.dirty.acknowledge(snapshot);
    if (this.settings.current.logCooldownActions) {
      this.logger.debug({ saved, removed }, 'batch saved cooldowns');
    }
    return { status: 'written', saved, removed };
  }

  private schedule(): void {
    const current = this.settings.current;
    if (!this.cleanupTask) {
      this.cleanupTask = new PeriodicTask({
        name: 'cooldown-cleanup',
        intervalMs: cleanupIntervalMs(current),
        run: async () => {
          await this.sweep();
        },
        logger: this.logger,
      });
      this.cleanupTask.start();
    }
    if (!this.saveTask) {
      this.saveTask = new PeriodicTask({
        name: 'cooldown-save',
        intervalMs: current.saveIntervalSeconds * 1000,
        run: async () => {
          await this.flush();
        },
        logger: this.logger,
      });
      this.saveTask.start();
    }
  }

  private async reschedule(): Promise<void> {
    if (this.state !== 'running') {
      return;
    }
    const current = this.settings.current;
    const stale: PeriodicTask[] = [];
    if (this.cleanupTask && this.cleanupTask.intervalMs !== cleanupIntervalMs(current)) {
      stale.push(this.cleanupTask);
      this.cleanupTask = null;
    }
    if (this.saveTask && this.saveTask.intervalMs !== current.saveIntervalSeconds * 1000) {
      stale.push(this.saveTask);
      this.saveTask = null;
    }
    if (stale.length === 0) {
      return;
    }
    await Promise.all(stale.map((task) => task.cancel()));
    // shutdown may have begun while the old tasks drained
    if (this.state === 'running') {
      this.schedule();
    }
  }

  private durationMs(): number {
    return this.settings.current.cooldownSeconds * 1000;
  }

  private record(event: CooldownAuditEvent): void {
    if (this.settings.current.logCooldownActions) {
      this.audit.record(event);
    }
  }

  private assertOpen(): void {
    if (this.state === 'stopped') {
      throw new CooldownError('engine_stopped', 'cooldown engine has been shut down');
    }
  }
}

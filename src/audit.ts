import type { BaseLogger } from 'pino';

export interface CooldownAuditEvent {
  actorId: string;
  outcome: 'reserved' | 'denied' | 'bypassed' | 'reset';
  expiresAt?: number;
  remainingMs?: number;
  timestamp: number;
}

export interface CooldownAuditLogger {
  record(event: CooldownAuditEvent): void;
}

export class PinoAuditLogger implements CooldownAuditLogger {
  constructor(private readonly logger: BaseLogger) {}

  record(event: CooldownAuditEvent): void {
    const { outcome, actorId } = event;
    switch (outcome) {
      case 'reserved':
        this.logger.info(
          { audit: true, ...event, expiresAt: new Date(event.expiresAt ?? event.timestamp).toISOString() },
          `cooldown set for ${actorId}`,
        );
        return;
      case 'reset':
        this.logger.info({ audit: true, ...event }, `cooldown removed for ${actorId}`);
        return;
      default:
        this.logger.debug({ audit: true, ...event }, `trigger ${outcome} for ${actorId}`);
    }
  }
}

import { readFile } from 'node:fs/promises';
import type { BaseLogger } from 'pino';
import { z } from 'zod';
import { CooldownError, hasErrorCode } from './errors.js';

const SEVEN_DAYS_SECONDS = 604_800;

export const SettingsSchema = z.object({
  cooldownSeconds: z.number().int().min(0).default(86_400),
  autoCleanup: z.boolean().default(true),
  cleanupIntervalMinutes: z.number().int().min(0).default(10),
  saveIntervalSeconds: z.number().int().min(1).default(30),
  logCooldownActions: z.boolean().default(true),
});

export type CooldownSettings = z.infer<typeof SettingsSchema>;

export const DEFAULT_SETTINGS: CooldownSettings = SettingsSchema.parse({});

/**
 * Settings the engine consumes. The engine reads `current` on every operation,
 * so a reload takes effect immediately. `load` is present on sources that can
 * be re-read at runtime and must leave `current` untouched when it throws.
 */
export interface SettingsSource {
  readonly current: CooldownSettings;
  load?(): Promise<CooldownSettings>;
}

export class StaticSettings implements SettingsSource {
  readonly current: CooldownSettings;

  constructor(overrides: Partial<CooldownSettings> = {}) {
    this.current = { ...DEFAULT_SETTINGS, ...overrides };
  }
}

export function collectWarnings(settings: CooldownSettings): string[] {
  const warnings: string[] = [];
  if (settings.cooldownSeconds > SEVEN_DAYS_SECONDS) {
    const days = Math.floor(settings.cooldownSeconds / 86_400);
    warnings.push(`cooldownSeconds is very high (${settings.cooldownSeconds}s = ${days} days)`);
  }
  if (settings.autoCleanup && settings.cleanupIntervalMinutes === 0) {
    warnings.push('autoCleanup is enabled but cleanupIntervalMinutes is 0; cleanup is disabled');
  } else if (settings.autoCleanup && settings.cleanupIntervalMinutes < 5) {
    warnings.push(`cleanupIntervalMinutes is very low (${settings.cleanupIntervalMinutes} minutes)`);
  }
  return warnings;
}

/** Milliseconds between sweeps, or 0 when sweeping is off. */
export function cleanupIntervalMs(settings: CooldownSettings): number {
  if (!settings.autoCleanup) {
    return 0;
  }
  return settings.cleanupIntervalMinutes * 60_000;
}

/**
 * Settings backed by a JSON file. A missing file means defaults; a file that
 * does not parse or validate is rejected and the cached values stay.
 */
export class FileSettingsSource implements SettingsSource {
  private cached: CooldownSettings = DEFAULT_SETTINGS;
  private warnings: string[] = [];

  constructor(private readonly path: string, private readonly logger: BaseLogger) {}

  get current(): CooldownSettings {
    return this.cached;
  }

  get configValid(): boolean {
    return this.warnings.length === 0;
  }

  async load(): Promise<CooldownSettings> {
    const raw = await this.readRaw();
    const parsed = SettingsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CooldownError('config_invalid', 'settings file failed validation', {
        path: this.path,
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      });
    }

    this.cached = parsed.data;
    this.warnings = collectWarnings(parsed.data);
    for (const warning of this.warnings) {
      this.logger.warn({ path: this.path }, warning);
    }
    if (this.warnings.length === 0) {
      this.logger.info({ path: this.path }, 'settings validated');
    }
    return this.cached;
  }

  private async readRaw(): Promise<unknown> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) {
        return {};
      }
      throw new CooldownError('config_invalid', 'settings file could not be read', {
        path: this.path,
        cause: err instanceof Error ? err.message : String(err),
      });
    }

    try {
      return JSON.parse(text);
    } catch (err) {
      throw new CooldownError('config_invalid', 'settings file is not valid JSON', {
        path: this.path,
        cause: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

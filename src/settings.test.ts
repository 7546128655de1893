import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { pino } from 'pino';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { cleanupIntervalMs, collectWarnings, DEFAULT_SETTINGS, FileSettingsSource } from './settings.js';

const logger = pino({ level: 'silent' });

describe('FileSettingsSource', () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cooldown-settings-'));
    path = join(dir, 'settings.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('uses defaults when the file is missing', async () => {
    const source = new FileSettingsSource(path, logger);

    expect(await source.load()).toEqual({
      cooldownSeconds: 86_400,
      autoCleanup: true,
      cleanupIntervalMinutes: 10,
      saveIntervalSeconds: 30,
      logCooldownActions: true,
    });
    expect(source.configValid).toBe(true);
  });

  test('merges file values over defaults and reports warnings', async () => {
    await writeFile(path, JSON.stringify({ cooldownSeconds: 60, cleanupIntervalMinutes: 2 }));
    const source = new FileSettingsSource(path, logger);

    await source.load();

    expect(source.current.cooldownSeconds).toBe(60);
    expect(source.current.saveIntervalSeconds).toBe(30);
    expect(source.configValid).toBe(false);
  });

  test('a failed load keeps the previous values', async () => {
    await writeFile(path, JSON.stringify({ cooldownSeconds: 60 }));
    const source = new FileSettingsSource(path, logger);
    await source.load();

    await writeFile(path, JSON.stringify({ cooldownSeconds: -1 }));
    await expect(source.load()).rejects.toMatchObject({ code: 'config_invalid' });
    expect(source.current.cooldownSeconds).toBe(60);

    await writeFile(path, '{ not json');
    await expect(source.load()).rejects.toMatchObject({ code: 'config_invalid' });
    expect(source.current.cooldownSeconds).toBe(60);
  });
});

describe('settings helpers', () => {
  test('warns about very long cooldowns and disabled cleanup', () => {
    expect(collectWarnings({ ...DEFAULT_SETTINGS, cooldownSeconds: 700_000 })).toEqual([
      'cooldownSeconds is very high (700000s = 8 days)',
    ]);
    expect(collectWarnings({ ...DEFAULT_SETTINGS, cleanupIntervalMinutes: 0 })).toEqual([
      'autoCleanup is enabled but cleanupIntervalMinutes is 0; cleanup is disabled',
    ]);
    expect(collectWarnings(DEFAULT_SETTINGS)).toEqual([]);
  });

  test('cleanup interval is zero when auto cleanup is off', () => {
    expect(cleanupIntervalMs(DEFAULT_SETTINGS)).toBe(600_000);
    expect(cleanupIntervalMs({ ...DEFAULT_SETTINGS, autoCleanup: false })).toBe(0);
    expect(cleanupIntervalMs({ ...DEFAULT_SETTINGS, cleanupIntervalMinutes: 0 })).toBe(0);
  });
});

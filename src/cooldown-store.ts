import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { CooldownError, hasErrorCode } from './errors.js';

/**
 * actor id → expiry in epoch seconds, exactly as it sits on disk. Keys that
 * are not actor ids are written back unchanged.
 */
export type RecordSet = ReadonlyMap<string, unknown>;

/** Raw document entries; values are unchecked until the engine parses them. */
export type RawRecords = ReadonlyMap<string, unknown>;

export interface CooldownStore {
  /** Prepare the backing storage. Failures here are fatal to startup. */
  init(): Promise<void>;
  read(): Promise<RawRecords>;
  /** Replace the whole record set in one write. */
  write(records: RecordSet): Promise<void>;
}

const DocumentSchema = z.record(z.string(), z.unknown());

export class FileCooldownStore implements CooldownStore {
  constructor(private readonly path: string) {}

  async init(): Promise<void> {
    try {
      await mkdir(dirname(this.path), { recursive: true });
    } catch (err) {
      throw new CooldownError('store_init_failed', 'could not create cooldown data directory', {
        path: this.path,
        cause: describe(err),
      });
    }

    try {
      await writeFile(this.path, '{}\n', { flag: 'wx' });
    } catch (err) {
      if (hasErrorCode(err, 'EEXIST')) {
        return;
      }
      throw new CooldownError('store_init_failed', 'could not create cooldown data file', {
        path: this.path,
        cause: describe(err),
      });
    }
  }

  async read(): Promise<RawRecords> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) {
        return new Map();
      }
      throw new CooldownError('store_init_failed', 'could not read cooldown data file', {
        path: this.path,
        cause: describe(err),
      });
    }

    if (text.trim() === '') {
      return new Map();
    }

    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch (err) {
      throw new CooldownError('store_init_failed', 'cooldown data file is not valid JSON', {
        path: this.path,
        cause: describe(err),
      });
    }

    const parsed = DocumentSchema.safeParse(document);
    if (!parsed.success) {
      throw new CooldownError('store_init_failed', 'cooldown data file must hold a JSON object', { path: this.path });
    }
    return new Map(Object.entries(parsed.data));
  }

  async write(records: RecordSet): Promise<void> {
    const body = `${JSON.stringify(Object.fromEntries(records), null, 2)}\n`;
    const tmp = `${this.path}.tmp`;
    await writeFile(tmp, body, 'utf8');
    await rename(tmp, this.path);
  }
}

export class InMemoryCooldownStore implements CooldownStore {
  private records = new Map<string, unknown>();
  writes: Array<Map<string, unknown>> = [];
  failWrites = false;

  constructor(initial: Record<string, unknown> = {}) {
    this.records = new Map(Object.entries(initial));
  }

  async init(): Promise<void> {}

  async read(): Promise<RawRecords> {
    return new Map(this.records);
  }

  async write(records: RecordSet): Promise<void> {
    if (this.failWrites) {
      throw new Error('simulated write failure');
    }
    const copy = new Map(records);
    this.writes.push(copy);
    this.records = new Map(copy);
  }

  get snapshot(): Record<string, unknown> {
    return Object.fromEntries(this.records);
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

import { describe, expect, test } from 'vitest';
import { CooldownLedger } from './ledger.js';

describe('CooldownLedger', () => {
  test('remaining is zero for unknown and expired actors', () => {
    const ledger = new CooldownLedger();
    ledger.set('a', 1_000);

    expect(ledger.remaining('a', 400)).toBe(600);
    expect(ledger.remaining('a', 1_000)).toBe(0);
    expect(ledger.remaining('a', 5_000)).toBe(0);
    expect(ledger.remaining('missing', 0)).toBe(0);
  });

  test('evictExpired removes entries at or before now and keeps the rest', () => {
    const ledger = new CooldownLedger();
    ledger.set('past', 900);
    ledger.set('edge', 1_000);
    ledger.set('future', 1_001);

    const evicted = ledger.evictExpired(1_000);

    expect(evicted.sort()).toEqual(['edge', 'past']);
    expect(ledger.size).toBe(1);
    expect(ledger.get('future')).toBe(1_001);
  });

  test('snapshot is detached from later mutations', () => {
    const ledger = new CooldownLedger();
    ledger.set('a', 10);
    const snapshot = ledger.snapshot();
    ledger.delete('a');
    ledger.set('b', 20);

    expect(snapshot).toEqual([['a', 10]]);
  });
});

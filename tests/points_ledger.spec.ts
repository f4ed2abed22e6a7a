import { describe, it, expect, beforeEach } from 'vitest';
import { clearEvents, getEvents } from '../src/engine/events.js';
import { errorOf, makeCore, seedBasics, valueOf, type Harness } from './helpers.js';

let h: Harness;

beforeEach(async () => {
  clearEvents();
  h = makeCore();
  await seedBasics(h.db);
});

describe('points ledger', () => {
  it('credits a balance and records the entry', async () => {
    const entry = valueOf(await h.core.credit('vol_1', 30, 'bonus:welcome'));
    expect(entry).toMatchObject({ user_id: 'vol_1', kind: 'CREDIT', amount: 30, source_key: 'bonus:welcome', balance_after: 30 });
    expect(entry.created_at).toBe('2030-01-10T12:00:00.000Z');
    expect(valueOf(await h.core.balance('vol_1'))).toBe(30);
    expect(getEvents({ type: 'ledger.credited' }).map(e => e.payload)).toEqual([
      { user_id: 'vol_1', amount: 30, source_key: 'bonus:welcome', balance: 30 }
    ]);
  });

  it('refuses a second posting for the same source', async () => {
    valueOf(await h.core.credit('vol_1', 30, 'bonus:welcome'));
    const err = errorOf(await h.core.credit('vol_1', 30, 'bonus:welcome'));
    expect(err.code).toBe('AlreadyCredited');
    expect(valueOf(await h.core.balance('vol_1'))).toBe(30);
  });

  it('only moves positive whole amounts', async () => {
    for (const amount of [0, -5, 1.5]) {
      const err = errorOf(await h.core.credit('vol_1', amount, `bad:${amount}`));
      expect(err.code).toBe('InvalidAmount');
      expect(err.details).toEqual({ amount });
    }
    expect(errorOf(await h.core.debit('vol_1', 0, 'bad:debit')).code).toBe('InvalidAmount');
  });

  it('refuses a debit larger than the balance', async () => {
    valueOf(await h.core.credit('vol_1', 30, 'seed'));
    const err = errorOf(await h.core.debit('vol_1', 40, 'spend:1'));
    expect(err.code).toBe('InsufficientPoints');
    expect(err.details).toEqual({ balance: 30, required: 40 });
    expect(valueOf(await h.core.balance('vol_1'))).toBe(30);
    expect(valueOf(await h.core.history('vol_1'))).toHaveLength(1);
  });

  it('lets exactly one of two concurrent full-balance debits through', async () => {
    valueOf(await h.core.credit('vol_1', 50, 'seed'));
    const results = await Promise.all([h.core.debit('vol_1', 50, 'spend:a'), h.core.debit('vol_1', 50, 'spend:b')]);
    expect(results.filter(r => r.ok)).toHaveLength(1);
    expect(results.filter(r => !r.ok && r.error.code === 'InsufficientPoints')).toHaveLength(1);
    expect(valueOf(await h.core.balance('vol_1'))).toBe(0);
  });

  it('never goes negative under a burst of debits', async () => {
    valueOf(await h.core.credit('vol_1', 100, 'seed'));
    const results = await Promise.all(Array.from({ length: 12 }, (_, i) => h.core.debit('vol_1', 30, `spend:${i}`)));
    expect(results.filter(r => r.ok)).toHaveLength(3);
    expect(valueOf(await h.core.balance('vol_1'))).toBe(10);
  });

  it('returns history newest first', async () => {
    valueOf(await h.core.credit('vol_1', 10, 'a'));
    valueOf(await h.core.credit('vol_1', 5, 'b'));
    valueOf(await h.core.debit('vol_1', 12, 'c'));
    const history = valueOf(await h.core.history('vol_1'));
    expect(history.map(e => [e.source_key, e.kind, e.balance_after])).toEqual([
      ['c', 'DEBIT', 3],
      ['b', 'CREDIT', 15],
      ['a', 'CREDIT', 10]
    ]);
  });

  it('reports unknown users', async () => {
    expect(errorOf(await h.core.balance('ghost')).code).toBe('NotFound');
    expect(errorOf(await h.core.credit('ghost', 5, 'x')).code).toBe('NotFound');
  });
});

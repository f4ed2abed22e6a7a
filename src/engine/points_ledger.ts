import { UniqueViolation, type Db } from '../adapters/db.js';
import type { PointEntry, PointEntryKind } from '../models/types.js';
import { type CoreContext, requireUser } from './context.js';
import { abort, attempt, type Outcome } from './errors.js';
import { logEvent } from './events.js';
import { lockKey, withLock } from './locks.js';

// The only module allowed to move a balance. Every movement is tied to a
// unique source key, so replaying the same source event is refused.

function assertAmount(op: string, amount: number) {
  if (!Number.isInteger(amount) || amount <= 0) {
    throw abort('InvalidAmount', op, 'amount must be a positive integer', { amount });
  }
}

async function post(db: Db, op: string, kind: PointEntryKind, userId: string, amount: number, sourceKey: string, at: string): Promise<PointEntry> {
  assertAmount(op, amount);
  await requireUser(db, op, userId);
  const prior = await db.findPointEntry(sourceKey);
  if (prior) throw abort('AlreadyCredited', op, `source ${sourceKey} already posted`, { source_key: sourceKey, entry_id: prior.id });

  const update = await db.adjustPoints(userId, kind === 'CREDIT' ? amount : -amount);
  if (!update.applied) {
    throw abort('InsufficientPoints', op, `balance ${update.balance} is below ${amount}`, { balance: update.balance, required: amount });
  }

  try {
    return await db.insertPointEntry({ user_id: userId, kind, amount, source_key: sourceKey, balance_after: update.balance, created_at: at });
  } catch (e) {
    if (e instanceof UniqueViolation) throw abort('AlreadyCredited', op, `source ${sourceKey} already posted`, { source_key: sourceKey });
    throw e;
  }
}

/** Emits the ledger event for an entry; called once the unit that wrote it has committed. */
export function logPosted(entry: PointEntry) {
  logEvent(entry.kind === 'CREDIT' ? 'ledger.credited' : 'ledger.debited', {
    user_id: entry.user_id, amount: entry.amount, source_key: entry.source_key, balance: entry.balance_after
  });
}

/**
 * Credit inside a caller's unit of work. The caller holds the user's lock (or
 * runs inside a transaction that will roll back on failure) and logs the
 * entry with logPosted after commit.
 */
export function creditPoints(db: Db, userId: string, amount: number, sourceKey: string, at: string) {
  return post(db, 'credit', 'CREDIT', userId, amount, sourceKey, at);
}

export function debitPoints(db: Db, userId: string, amount: number, sourceKey: string, at: string) {
  return post(db, 'debit', 'DEBIT', userId, amount, sourceKey, at);
}

function postLocked(ctx: CoreContext, write: typeof creditPoints, userId: string, amount: number, sourceKey: string) {
  return attempt(async () => {
    const entry = await withLock(lockKey(ctx.db, 'user', userId), () =>
      ctx.db.transaction(tx => write(tx, userId, amount, sourceKey, ctx.now().toISOString())));
    logPosted(entry);
    return entry;
  });
}

export function credit(ctx: CoreContext, userId: string, amount: number, sourceKey: string): Promise<Outcome<PointEntry>> {
  return postLocked(ctx, creditPoints, userId, amount, sourceKey);
}

export function debit(ctx: CoreContext, userId: string, amount: number, sourceKey: string): Promise<Outcome<PointEntry>> {
  return postLocked(ctx, debitPoints, userId, amount, sourceKey);
}

// Reads wait for the user's lock so they never observe a unit that may still
// roll back.
export function balance(ctx: CoreContext, userId: string): Promise<Outcome<number>> {
  return attempt(() => withLock(lockKey(ctx.db, 'user', userId), async () => (await requireUser(ctx.db, 'balance', userId)).points));
}

export function history(ctx: CoreContext, userId: string): Promise<Outcome<PointEntry[]>> {
  return attempt(() => withLock(lockKey(ctx.db, 'user', userId), async () => {
    await requireUser(ctx.db, 'history', userId);
    return ctx.db.listPointEntries(userId);
  }));
}

import type { Opportunity, PointEntry, SweepCredit, SweepReport } from '../models/types.js';
import type { CoreContext } from './context.js';
import { CoreAbort } from './errors.js';
import { logEvent } from './events.js';
import { completionCreditKey } from './idempotency.js';
import { computeTransition } from './lifecycle.js';
import { lockKey, runExclusive, withLock, withLocks } from './locks.js';
import { writeOpportunity } from './opportunity_manager.js';
import { creditPoints, logPosted } from './points_ledger.js';

// Time-driven transitions. Each opportunity is its own unit of work: a unit
// that throws is rolled back, logged and picked up again on the next tick.

function emptyReport(skipped: boolean): SweepReport {
  return { skipped, advanced: [], completed: [], credited: [], closed_pending: [], failed: [] };
}

function describe(e: unknown) {
  if (e instanceof CoreAbort) return `${e.error.code}: ${e.error.reason}`;
  return e instanceof Error ? e.message : String(e);
}

async function advance(ctx: CoreContext, opportunityId: string, now: Date, report: SweepReport) {
  const moved = await withLock(lockKey(ctx.db, 'opportunity', opportunityId), () => ctx.db.transaction(async tx => {
    const opp = await tx.getOpportunity(opportunityId);
    // Re-read under the lock: a concurrent cancel or an earlier run may have moved it.
    if (!opp || computeTransition(opp, now) !== 'IN_PROGRESS') return undefined;
    return writeOpportunity(tx, 'runSweep', opp, { status: 'IN_PROGRESS' }, now.toISOString());
  }));
  if (moved) {
    report.advanced.push(moved.id);
    logEvent('opportunity.status_changed', { opportunity_id: moved.id, to: 'IN_PROGRESS', by: 'sweep' });
  }
}

interface Completion { opp: Opportunity; entries: PointEntry[]; credits: SweepCredit[]; closed: string[] }

async function complete(ctx: CoreContext, opportunityId: string, now: Date, report: SweepReport) {
  const at = now.toISOString();
  const done = await withLock(lockKey(ctx.db, 'opportunity', opportunityId), async () => {
    const approved = await ctx.db.listApplications({ opportunity_id: opportunityId, status: 'APPROVED' });
    // Credits touch balances, so the volunteers' ledgers are held for the whole unit.
    const userKeys = approved.map(a => lockKey(ctx.db, 'user', a.volunteer_id));
    return withLocks(userKeys, () => ctx.db.transaction(async (tx): Promise<Completion | undefined> => {
      const opp = await tx.getOpportunity(opportunityId);
      if (!opp || computeTransition(opp, now) !== 'COMPLETED') return undefined;
      const completed = await writeOpportunity(tx, 'runSweep', opp, { status: 'COMPLETED' }, at);

      const result: Completion = { opp: completed, entries: [], credits: [], closed: [] };
      for (const app of approved) {
        // The APPROVED -> COMPLETED write gates the credit: an application already moved is never paid again.
        const moved = await tx.transitionApplication(app.id, ['APPROVED'], 'COMPLETED', { completed_at: at });
        if (!moved || opp.points_reward <= 0) continue;
        result.entries.push(await creditPoints(tx, app.volunteer_id, opp.points_reward, completionCreditKey(app.id), at));
        result.credits.push({ application_id: app.id, volunteer_id: app.volunteer_id, opportunity_id: opp.id, amount: opp.points_reward });
      }

      if (ctx.config.pendingOnCompletion === 'reject') {
        for (const app of await tx.listApplications({ opportunity_id: opp.id, status: 'PENDING' })) {
          if (await tx.transitionApplication(app.id, ['PENDING'], 'REJECTED', { reviewed_at: at })) result.closed.push(app.id);
        }
      }
      return result;
    }));
  });
  if (!done) return;

  report.completed.push(done.opp.id);
  report.credited.push(...done.credits);
  report.closed_pending.push(...done.closed);
  done.entries.forEach(logPosted);
  logEvent('opportunity.status_changed', { opportunity_id: done.opp.id, to: 'COMPLETED', by: 'sweep', credited: done.credits.length });
}

async function guarded(opportunityId: string, report: SweepReport, unit: () => Promise<void>) {
  try {
    await unit();
  } catch (e) {
    const reason = describe(e);
    report.failed.push({ opportunity_id: opportunityId, reason });
    logEvent('sweep.opportunity_failed', { opportunity_id: opportunityId, reason });
  }
}

async function sweepOnce(ctx: CoreContext, now: Date): Promise<SweepReport> {
  const report = emptyReport(false);
  const iso = now.toISOString();
  logEvent('sweep.started', { now: iso });

  const toStart = await ctx.db.listOpportunitiesToStart(iso);
  await Promise.all(toStart.map(o => guarded(o.id, report, () => advance(ctx, o.id, now, report))));

  // Runs after the first phase so an opportunity whose whole window has passed completes in one sweep.
  const toComplete = await ctx.db.listOpportunitiesToComplete(iso);
  await Promise.all(toComplete.map(o => guarded(o.id, report, () => complete(ctx, o.id, now, report))));

  logEvent('sweep.completed', {
    now: iso,
    advanced: report.advanced.length,
    completed: report.completed.length,
    credited: report.credited.length,
    failed: report.failed.length
  });
  return report;
}

/**
 * One pass of the scheduler. A call made while another pass is still running
 * returns `skipped: true` and changes nothing.
 */
export async function runSweep(ctx: CoreContext, now: Date): Promise<SweepReport> {
  const report = await runExclusive(lockKey(ctx.db, 'sweep', 'all'), () => sweepOnce(ctx, now));
  if (report) return report;
  logEvent('sweep.skipped', { now: now.toISOString() });
  return emptyReport(true);
}

export interface SweepSchedulerOptions {
  intervalMs?: number;
  /** Fired after every tick; handy for tests and for surfacing the report. */
  onTick?: (report: SweepReport) => void;
}

export interface SweepScheduler { stop(): void }

// Runs a sweep right away and then on every interval. A failing tick is
// logged; the timer keeps going.
export function startSweepScheduler(ctx: CoreContext, opts: SweepSchedulerOptions = {}): SweepScheduler {
  const intervalMs = opts.intervalMs ?? ctx.config.sweepIntervalMs;
  const tick = async () => {
    try {
      const report = await runSweep(ctx, ctx.now());
      opts.onTick?.(report);
    } catch (err) {
      logEvent('sweep.tick_failed', { error: describe(err) });
    }
  };
  void tick();
  const timer = setInterval(() => { void tick(); }, intervalMs);
  return {
    stop() { clearInterval(timer); }
  };
}

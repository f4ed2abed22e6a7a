import type { Db, OpportunityChanges } from '../adapters/db.js';
import type { Opportunity, OpportunityStatus, User } from '../models/types.js';
import { formatIssues, opportunityDraftSchema, opportunityPatchSchema } from '../models/schemas.js';
import { can } from './capabilities.js';
import { type CoreContext, requireOpportunity, requireUser } from './context.js';
import { abort, attempt, type Outcome } from './errors.js';
import { logEvent } from './events.js';
import { assertTransition, capacityStatus, isEditable, validDateRange } from './lifecycle.js';
import { lockKey, withLock } from './locks.js';

function assertOwner(op: string, actor: User, opp: Opportunity) {
  if (!can('manage_opportunity', actor.role, actor.id, opp.promoter_id)) {
    throw abort('NotOwner', op, `${actor.id} does not manage opportunity ${opp.id}`, { opportunity_id: opp.id, actor_id: actor.id });
  }
}

async function assertSkillsExist(db: Db, op: string, skillIds: string[]) {
  const missing: string[] = [];
  for (const id of skillIds) if (!(await db.getSkill(id))) missing.push(id);
  if (missing.length) throw abort('ValidationFailed', op, `unknown skills: ${missing.join(', ')}`, { missing });
}

/**
 * Writes `changes` against the version read earlier in the same unit. Under
 * the opportunity lock the version cannot move; a mismatch means a writer
 * bypassed the lock, and the unit fails with the row's current status.
 */
export async function writeOpportunity(db: Db, op: string, opp: Opportunity, changes: OpportunityChanges, at: string): Promise<Opportunity> {
  const next = await db.updateOpportunity(opp.id, opp.version, changes, at);
  if (next) return next;
  const current = await db.getOpportunity(opp.id);
  throw abort('InvalidStateTransition', op, `opportunity ${opp.id} changed concurrently`, { status: current?.status ?? opp.status });
}

/**
 * Re-derives OPEN/FULL from the approved count after an enrollment change.
 * Statuses outside OPEN/FULL are left alone. Returns the (possibly updated)
 * row; must run inside the caller's opportunity lock.
 */
export async function syncCapacity(db: Db, op: string, opportunityId: string, at: string): Promise<Opportunity> {
  const opp = await requireOpportunity(db, op, opportunityId);
  const approved = await db.countApplications(opp.id, 'APPROVED');
  const status = capacityStatus(opp.status, approved, opp.max_volunteers);
  if (status === opp.status) return opp;
  const next = await writeOpportunity(db, op, opp, { status }, at);
  logEvent('opportunity.status_changed', { opportunity_id: opp.id, from: opp.status, to: status, approved_count: approved });
  return next;
}

export function createOpportunity(ctx: CoreContext, promoterId: string, draft: unknown): Promise<Outcome<Opportunity>> {
  const op = 'createOpportunity';
  return attempt(async () => {
    const parsed = opportunityDraftSchema.safeParse(draft);
    if (!parsed.success) throw abort('ValidationFailed', op, 'invalid opportunity draft', { issues: formatIssues(parsed.error) });
    const d = parsed.data;
    if (!validDateRange(d.start_date, d.end_date)) {
      throw abort('InvalidDateRange', op, 'end_date must be after start_date', { start_date: d.start_date, end_date: d.end_date });
    }
    const promoter = await requireUser(ctx.db, op, promoterId);
    await assertSkillsExist(ctx.db, op, d.required_skill_ids);

    const opp = await ctx.db.insertOpportunity({
      ...d,
      required_skill_ids: [...new Set(d.required_skill_ids)],
      status: 'DRAFT',
      promoter_id: promoter.id
    }, ctx.now().toISOString());
    logEvent('opportunity.created', { opportunity_id: opp.id, promoter_id: promoter.id });
    return opp;
  });
}

// Shared frame for owner-only changes: lock, load, authorize, then mutate in one unit.
function ownerUnit(
  ctx: CoreContext,
  op: string,
  opportunityId: string,
  actorId: string,
  body: (tx: Db, opp: Opportunity, at: string) => Promise<Opportunity>
): Promise<Outcome<Opportunity>> {
  return attempt(() => withLock(lockKey(ctx.db, 'opportunity', opportunityId), () => ctx.db.transaction(async tx => {
    const opp = await requireOpportunity(tx, op, opportunityId);
    const actor = await requireUser(tx, op, actorId);
    assertOwner(op, actor, opp);
    return body(tx, opp, ctx.now().toISOString());
  })));
}

function transition(ctx: CoreContext, op: string, opportunityId: string, actorId: string, to: OpportunityStatus, event: string) {
  return ownerUnit(ctx, op, opportunityId, actorId, async (tx, opp, at) => {
    assertTransition(op, opp.status, to);
    const next = await writeOpportunity(tx, op, opp, { status: to }, at);
    logEvent(event, { opportunity_id: opp.id, from: opp.status, actor_id: actorId });
    return next;
  });
}

export function publish(ctx: CoreContext, opportunityId: string, actorId: string) {
  return transition(ctx, 'publish', opportunityId, actorId, 'OPEN', 'opportunity.published');
}

// Applications are left as they are; an opportunity that never runs is never swept.
export function cancelOpportunity(ctx: CoreContext, opportunityId: string, actorId: string) {
  return transition(ctx, 'cancelOpportunity', opportunityId, actorId, 'CANCELLED', 'opportunity.cancelled');
}

export function editOpportunity(ctx: CoreContext, opportunityId: string, actorId: string, patch: unknown) {
  const op = 'editOpportunity';
  return ownerUnit(ctx, op, opportunityId, actorId, async (tx, opp, at) => {
    const parsed = opportunityPatchSchema.safeParse(patch);
    if (!parsed.success) throw abort('ValidationFailed', op, 'invalid opportunity patch', { issues: formatIssues(parsed.error) });
    if (!isEditable(opp.status)) {
      throw abort('InvalidStateTransition', op, `opportunity in ${opp.status} cannot be edited`, { status: opp.status });
    }

    const p = parsed.data;
    const start = p.start_date ?? opp.start_date;
    const end = p.end_date ?? opp.end_date;
    if (!validDateRange(start, end)) {
      throw abort('InvalidDateRange', op, 'end_date must be after start_date', { start_date: start, end_date: end });
    }
    if (p.required_skill_ids) await assertSkillsExist(tx, op, p.required_skill_ids);

    const approved = await tx.countApplications(opp.id, 'APPROVED');
    const max = p.max_volunteers ?? opp.max_volunteers;
    if (max < approved) {
      throw abort('InvalidCapacityReduction', op, `${approved} volunteers are already approved`, {
        approved_count: approved, requested: max, status: opp.status
      });
    }

    const changes: OpportunityChanges = { ...p, status: capacityStatus(opp.status, approved, max) };
    if (p.required_skill_ids) changes.required_skill_ids = [...new Set(p.required_skill_ids)];
    const next = await writeOpportunity(tx, op, opp, changes, at);
    logEvent('opportunity.edited', { opportunity_id: opp.id, fields: Object.keys(p), actor_id: actorId });
    if (next.status !== opp.status) {
      logEvent('opportunity.status_changed', { opportunity_id: opp.id, from: opp.status, to: next.status, approved_count: approved });
    }
    return next;
  });
}

export function getOpportunity(ctx: CoreContext, opportunityId: string): Promise<Outcome<Opportunity>> {
  return attempt(() => withLock(lockKey(ctx.db, 'opportunity', opportunityId), () =>
    requireOpportunity(ctx.db, 'getOpportunity', opportunityId)));
}

export function approvedCount(ctx: CoreContext, opportunityId: string): Promise<Outcome<number>> {
  return attempt(() => withLock(lockKey(ctx.db, 'opportunity', opportunityId), async () => {
    const opp = await requireOpportunity(ctx.db, 'approvedCount', opportunityId);
    return ctx.db.countApplications(opp.id, 'APPROVED');
  }));
}

export function listPromoterOpportunities(ctx: CoreContext, promoterId: string): Promise<Outcome<Opportunity[]>> {
  return attempt(async () => {
    await requireUser(ctx.db, 'listPromoterOpportunities', promoterId);
    return ctx.db.listOpportunitiesByPromoter(promoterId);
  });
}

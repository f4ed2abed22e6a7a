import { UniqueViolation, type Db } from '../adapters/db.js';
import type { Application, Decision } from '../models/types.js';
import { applicationMessageSchema, formatIssues } from '../models/schemas.js';
import { can } from './capabilities.js';
import { type CoreContext, requireOpportunity, requireUser } from './context.js';
import { abort, attempt, type Outcome } from './errors.js';
import { logEvent } from './events.js';
import { ENROLLING } from './lifecycle.js';
import { lockKey, withLock } from './locks.js';
import { syncCapacity } from './opportunity_manager.js';

// Every capacity-affecting change runs under the opportunity's lock, and the
// approve write itself re-counts approvals in the same store call.

export function apply(ctx: CoreContext, volunteerId: string, opportunityId: string, message?: string): Promise<Outcome<Application>> {
  const op = 'apply';
  return attempt(async () => {
    const parsed = applicationMessageSchema.safeParse(message);
    if (!parsed.success) throw abort('ValidationFailed', op, 'invalid application message', { issues: formatIssues(parsed.error) });

    return withLock(lockKey(ctx.db, 'opportunity', opportunityId), () => ctx.db.transaction(async tx => {
      const volunteer = await requireUser(tx, op, volunteerId);
      const opp = await requireOpportunity(tx, op, opportunityId);

      const prior = await tx.findApplication(volunteer.id, opp.id);
      if (prior) throw abort('AlreadyApplied', op, 'volunteer already applied', { application_id: prior.id, status: prior.status });
      if (opp.status !== 'OPEN') throw abort('OpportunityNotOpen', op, `opportunity is ${opp.status}`, { status: opp.status });
      const approved = await tx.countApplications(opp.id, 'APPROVED');
      if (approved >= opp.max_volunteers) {
        throw abort('NoSpotsAvailable', op, 'no spots left', { approved_count: approved, max_volunteers: opp.max_volunteers, status: opp.status });
      }

      let created: Application;
      try {
        created = await tx.insertApplication({
          volunteer_id: volunteer.id,
          opportunity_id: opp.id,
          status: 'PENDING',
          message: parsed.data,
          applied_at: ctx.now().toISOString()
        });
      } catch (e) {
        if (e instanceof UniqueViolation) throw abort('AlreadyApplied', op, 'volunteer already applied', { status: 'PENDING' });
        throw e;
      }
      logEvent('application.created', { application_id: created.id, opportunity_id: opp.id, volunteer_id: volunteer.id });
      return created;
    }));
  });
}

async function requireApplication(db: Db, op: string, applicationId: string) {
  const app = await db.getApplication(applicationId);
  if (!app) throw abort('NotFound', op, `application ${applicationId} not found`, { application_id: applicationId });
  return app;
}

export function decideApplication(ctx: CoreContext, applicationId: string, actorId: string, decision: Decision): Promise<Outcome<Application>> {
  const op = 'decideApplication';
  return attempt(async () => {
    const { opportunity_id } = await requireApplication(ctx.db, op, applicationId);
    return withLock(lockKey(ctx.db, 'opportunity', opportunity_id), () => ctx.db.transaction(async tx => {
      const app = await requireApplication(tx, op, applicationId);
      const opp = await requireOpportunity(tx, op, app.opportunity_id);
      const actor = await requireUser(tx, op, actorId);
      if (!can('review_applications', actor.role, actor.id, opp.promoter_id)) {
        throw abort('NotOwner', op, `${actor.id} cannot review applications for ${opp.id}`, { opportunity_id: opp.id, actor_id: actor.id });
      }
      if (app.status !== 'PENDING') throw abort('NotPending', op, `application is ${app.status}`, { status: app.status });

      const at = ctx.now().toISOString();
      if (decision === 'reject') {
        const rejected = await tx.transitionApplication(app.id, ['PENDING'], 'REJECTED', { reviewed_at: at });
        if (!rejected) throw abort('NotPending', op, 'application is no longer pending', { status: app.status });
        await syncCapacity(tx, op, opp.id, at);
        logEvent('application.rejected', { application_id: app.id, opportunity_id: opp.id, actor_id: actor.id });
        return rejected;
      }

      if (!ENROLLING.includes(opp.status)) {
        throw abort('InvalidStateTransition', op, `cannot approve while opportunity is ${opp.status}`, { status: opp.status });
      }
      const result = await tx.approveWithinCapacity(app.id, opp.max_volunteers, at);
      if (result.kind === 'stale') throw abort('NotPending', op, `application is ${result.status}`, { status: result.status });
      if (result.kind === 'full') {
        logEvent('application.approve_lost', { application_id: app.id, opportunity_id: opp.id, approved_count: result.approved_count });
        throw abort('NoSpotsAvailable', op, 'no spots left', {
          approved_count: result.approved_count, max_volunteers: opp.max_volunteers, status: app.status
        });
      }
      await syncCapacity(tx, op, opp.id, at);
      logEvent('application.approved', { application_id: app.id, opportunity_id: opp.id, approved_count: result.approved_count });
      return result.application;
    }));
  });
}

/** The volunteer steps back from a PENDING or APPROVED application before the opportunity starts. */
export function withdrawApplication(ctx: CoreContext, applicationId: string, volunteerId: string): Promise<Outcome<Application>> {
  const op = 'withdrawApplication';
  return attempt(async () => {
    const { opportunity_id } = await requireApplication(ctx.db, op, applicationId);
    return withLock(lockKey(ctx.db, 'opportunity', opportunity_id), () => ctx.db.transaction(async tx => {
      const app = await requireApplication(tx, op, applicationId);
      if (app.volunteer_id !== volunteerId) {
        throw abort('NotOwner', op, `${volunteerId} did not submit application ${app.id}`, { application_id: app.id, actor_id: volunteerId });
      }
      const opp = await requireOpportunity(tx, op, app.opportunity_id);
      if (!ENROLLING.includes(opp.status)) {
        throw abort('InvalidStateTransition', op, `cannot withdraw while opportunity is ${opp.status}`, { status: opp.status });
      }
      const withdrawn = await tx.transitionApplication(app.id, ['PENDING', 'APPROVED'], 'CANCELLED', { reviewed_at: ctx.now().toISOString() });
      if (!withdrawn) throw abort('InvalidStateTransition', op, `application is ${app.status}`, { status: app.status });
      await syncCapacity(tx, op, opp.id, ctx.now().toISOString());
      logEvent('application.withdrawn', { application_id: app.id, opportunity_id: opp.id, was: app.status });
      return withdrawn;
    }));
  });
}

export function listApplications(ctx: CoreContext, opportunityId: string, actorId: string): Promise<Outcome<Application[]>> {
  const op = 'listApplications';
  return attempt(async () => {
    const opp = await requireOpportunity(ctx.db, op, opportunityId);
    const actor = await requireUser(ctx.db, op, actorId);
    if (!can('review_applications', actor.role, actor.id, opp.promoter_id)) {
      throw abort('NotOwner', op, `${actor.id} cannot review applications for ${opp.id}`, { opportunity_id: opp.id, actor_id: actor.id });
    }
    return ctx.db.listApplications({ opportunity_id: opp.id });
  });
}

export function listVolunteerApplications(ctx: CoreContext, volunteerId: string): Promise<Outcome<Application[]>> {
  return attempt(async () => {
    await requireUser(ctx.db, 'listVolunteerApplications', volunteerId);
    return ctx.db.listApplications({ volunteer_id: volunteerId });
  });
}

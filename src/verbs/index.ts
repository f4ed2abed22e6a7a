// Verb registry: every core operation under a stable name with a zod
// argument schema, so any transport can drive the core with raw JSON.
import type { z } from 'zod';
import type { Marketplace } from '../engine/marketplace.js';
import { fail, makeCoreError, ok, type Outcome } from '../engine/errors.js';
import { formatIssues } from '../models/schemas.js';
import {
  applySchema, createOpportunitySchema, decideApplicationSchema, editOpportunitySchema, markRedemptionUsedSchema,
  opportunityActionSchema, opportunityRefSchema, promoterRefSchema, redeemSchema, runSweepSchema, userRefSchema,
  volunteerRefSchema, withdrawApplicationSchema
} from './schemas.js';

export interface VerbContext {
  core: Marketplace;
}

export interface Verb<S extends z.ZodTypeAny> {
  name: string;
  schema: S;
  run: (args: z.output<S>, ctx: VerbContext) => Promise<Outcome<unknown>>;
}

interface Registered {
  name: string;
  invoke: (raw: unknown, ctx: VerbContext) => Promise<Outcome<unknown>>;
}

const registry = new Map<string, Registered>();

export function register<S extends z.ZodTypeAny>(v: Verb<S>) {
  if (registry.has(v.name)) throw new Error(`Verb already registered: ${v.name}`);
  registry.set(v.name, {
    name: v.name,
    async invoke(raw, ctx) {
      const parsed = v.schema.safeParse(raw ?? {});
      if (!parsed.success) {
        return fail(makeCoreError('ValidationFailed', v.name, 'invalid arguments', { issues: formatIssues(parsed.error) }));
      }
      return v.run(parsed.data, ctx);
    }
  });
}

export function hasVerb(name: string) {
  return registry.has(name);
}

export function listVerbs() {
  return [...registry.keys()];
}

/** Validates `raw` against the verb's schema and runs it. Unknown names throw. */
export function dispatch(name: string, raw: unknown, ctx: VerbContext): Promise<Outcome<unknown>> {
  const v = registry.get(name);
  if (!v) throw new Error(`Unknown verb ${name}`);
  return v.invoke(raw, ctx);
}

register({
  name: 'create_opportunity',
  schema: createOpportunitySchema,
  run: (a, { core }) => core.createOpportunity(a.promoter_id, a.draft)
});

register({
  name: 'publish_opportunity',
  schema: opportunityActionSchema,
  run: (a, { core }) => core.publish(a.opportunity_id, a.actor_id)
});

register({
  name: 'edit_opportunity',
  schema: editOpportunitySchema,
  run: (a, { core }) => core.editOpportunity(a.opportunity_id, a.actor_id, a.patch)
});

register({
  name: 'cancel_opportunity',
  schema: opportunityActionSchema,
  run: (a, { core }) => core.cancelOpportunity(a.opportunity_id, a.actor_id)
});

register({
  name: 'get_opportunity',
  schema: opportunityRefSchema,
  run: (a, { core }) => core.getOpportunity(a.opportunity_id)
});

register({
  name: 'approved_count',
  schema: opportunityRefSchema,
  run: (a, { core }) => core.approvedCount(a.opportunity_id)
});

register({
  name: 'list_promoter_opportunities',
  schema: promoterRefSchema,
  run: (a, { core }) => core.listPromoterOpportunities(a.promoter_id)
});

register({
  name: 'apply',
  schema: applySchema,
  run: (a, { core }) => core.apply(a.volunteer_id, a.opportunity_id, a.message)
});

register({
  name: 'decide_application',
  schema: decideApplicationSchema,
  run: (a, { core }) => core.decideApplication(a.application_id, a.actor_id, a.decision)
});

register({
  name: 'withdraw_application',
  schema: withdrawApplicationSchema,
  run: (a, { core }) => core.withdrawApplication(a.application_id, a.volunteer_id)
});

register({
  name: 'list_applications',
  schema: opportunityActionSchema,
  run: (a, { core }) => core.listApplications(a.opportunity_id, a.actor_id)
});

register({
  name: 'list_volunteer_applications',
  schema: volunteerRefSchema,
  run: (a, { core }) => core.listVolunteerApplications(a.volunteer_id)
});

register({
  name: 'run_sweep',
  schema: runSweepSchema,
  run: async (a, { core }) => ok(await core.runSweep(a.now ? new Date(a.now) : undefined))
});

register({
  name: 'redeem',
  schema: redeemSchema,
  run: (a, { core }) => core.redeem(a.user_id, a.reward_id)
});

register({
  name: 'mark_redemption_used',
  schema: markRedemptionUsedSchema,
  run: (a, { core }) => core.markRedemptionUsed(a.redemption_id, a.actor_id, a.at ? new Date(a.at) : undefined)
});

register({
  name: 'list_redemptions',
  schema: userRefSchema,
  run: (a, { core }) => core.listRedemptions(a.user_id)
});

register({
  name: 'total_points_spent',
  schema: userRefSchema,
  run: (a, { core }) => core.totalPointsSpent(a.user_id)
});

register({
  name: 'points_balance',
  schema: userRefSchema,
  run: (a, { core }) => core.balance(a.user_id)
});

register({
  name: 'points_history',
  schema: userRefSchema,
  run: (a, { core }) => core.history(a.user_id)
});

import type { Db } from '../src/adapters/db.js';
import type { MarketplaceConfig } from '../src/config.js';
import type { CodeGenerator } from '../src/engine/context.js';
import type { CoreError, Outcome } from '../src/engine/errors.js';
import { createMarketplace, type Marketplace } from '../src/engine/marketplace.js';
import type { Application, Opportunity, OpportunityDraft } from '../src/models/types.js';

export const T0 = new Date('2030-01-10T12:00:00.000Z');

export interface Harness {
  core: Marketplace;
  db: Db;
  clock: { now: Date };
}

export function makeCore(opts: { config?: Partial<MarketplaceConfig>; generateCode?: CodeGenerator } = {}): Harness {
  const clock = { now: T0 };
  const core = createMarketplace({ ...opts, now: () => clock.now });
  return { core, db: core.ctx.db, clock };
}

export async function seedBasics(db: Db) {
  await db.putSkill({ id: 'sk_1', name: 'First aid', category: 'SOCIAL' });
  await db.putSkill({ id: 'sk_2', name: 'Logistics', category: 'ADMINISTRATIVE' });
  await db.putUser({ id: 'admin', name: 'Admin', role: 'ADMIN', points: 0 });
  await db.putUser({ id: 'promoter', name: 'Promoter', role: 'PROMOTER', points: 0 });
  await db.putUser({ id: 'other_promoter', name: 'Other promoter', role: 'PROMOTER', points: 0 });
  await db.putUser({ id: 'partner', name: 'Partner', role: 'PARTNER', points: 0 });
  for (let i = 1; i <= 5; i++) await db.putUser({ id: `vol_${i}`, name: `Volunteer ${i}`, role: 'VOLUNTEER', points: 0 });
}

export function draft(overrides: Partial<OpportunityDraft> = {}): OpportunityDraft {
  return {
    title: 'Beach cleanup',
    description: 'Pick up litter along the shore',
    points_reward: 50,
    start_date: '2030-01-20T09:00:00.000Z',
    end_date: '2030-01-20T12:00:00.000Z',
    max_volunteers: 2,
    required_skill_ids: ['sk_1'],
    ...overrides
  };
}

export function valueOf<T>(o: Outcome<T>): T {
  if (!o.ok) throw new Error(`expected success, got ${o.error.code}: ${o.error.reason}`);
  return o.value;
}

export function errorOf<T>(o: Outcome<T>): CoreError {
  if (o.ok) throw new Error(`expected failure, got ${JSON.stringify(o.value)}`);
  return o.error;
}

export async function openOpportunity(core: Marketplace, overrides: Partial<OpportunityDraft> = {}): Promise<Opportunity> {
  const opp = valueOf(await core.createOpportunity('promoter', draft(overrides)));
  return valueOf(await core.publish(opp.id, 'promoter'));
}

/** Applies and approves each volunteer in turn. */
export async function enroll(core: Marketplace, opportunityId: string, volunteerIds: string[]) {
  const out: Application[] = [];
  for (const v of volunteerIds) {
    const app = valueOf(await core.apply(v, opportunityId));
    out.push(valueOf(await core.decideApplication(app.id, 'promoter', 'approve')));
  }
  return out;
}

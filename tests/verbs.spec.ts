import { describe, it, expect, beforeEach } from 'vitest';
import { dispatch, hasVerb, listVerbs, type VerbContext } from '../src/verbs/index.js';
import { draft, errorOf, makeCore, seedBasics, valueOf, type Harness } from './helpers.js';

let h: Harness;
let ctx: VerbContext;

beforeEach(async () => {
  h = makeCore();
  ctx = { core: h.core };
  await seedBasics(h.db);
});

function idOf(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'id' in value && typeof value.id === 'string') return value.id;
  throw new Error(`no id in ${JSON.stringify(value)}`);
}

describe('verb registry', () => {
  it('registers every core operation', () => {
    expect(listVerbs().sort()).toEqual([
      'apply', 'approved_count', 'cancel_opportunity', 'create_opportunity', 'decide_application', 'edit_opportunity',
      'get_opportunity', 'list_applications', 'list_promoter_opportunities', 'list_redemptions', 'list_volunteer_applications',
      'mark_redemption_used', 'points_balance', 'points_history', 'publish_opportunity', 'redeem', 'run_sweep',
      'total_points_spent', 'withdraw_application'
    ]);
    expect(hasVerb('assign')).toBe(false);
  });

  it('drives the core from raw arguments', async () => {
    const oppId = idOf(valueOf(await dispatch('create_opportunity', { promoter_id: 'promoter', draft: draft() }, ctx)));
    valueOf(await dispatch('publish_opportunity', { opportunity_id: oppId, actor_id: 'promoter' }, ctx));
    const appId = idOf(valueOf(await dispatch('apply', { volunteer_id: 'vol_1', opportunity_id: oppId }, ctx)));
    valueOf(await dispatch('decide_application', { application_id: appId, actor_id: 'promoter', decision: 'approve' }, ctx));
    expect(valueOf(await dispatch('approved_count', { opportunity_id: oppId }, ctx))).toBe(1);

    const report = valueOf(await dispatch('run_sweep', { now: '2030-01-20T12:30:00Z' }, ctx));
    expect(report).toMatchObject({ skipped: false, advanced: [oppId], completed: [oppId] });
    expect(valueOf(await dispatch('points_balance', { user_id: 'vol_1' }, ctx))).toBe(50);
  });

  it('fails validation before touching the core', async () => {
    const err = errorOf(await dispatch('decide_application', { application_id: 'app_1', actor_id: 'promoter', decision: 'maybe' }, ctx));
    expect(err.code).toBe('ValidationFailed');
    expect(err.op).toBe('decide_application');
    expect(err.details).toEqual({ issues: [expect.stringMatching(/^decision: /)] });
  });

  it('treats missing arguments as an empty object', async () => {
    expect(errorOf(await dispatch('points_balance', undefined, ctx)).details).toEqual({ issues: ['user_id: Required'] });
  });

  it('passes core failures through unchanged', async () => {
    const err = errorOf(await dispatch('redeem', { user_id: 'vol_1', reward_id: 'nope' }, ctx));
    expect(err).toEqual({ code: 'NotFound', op: 'redeem', reason: 'reward nope not found', details: { reward_id: 'nope' } });
  });

  it('throws on unknown verbs', () => {
    expect(() => dispatch('make_offers', {}, ctx)).toThrow('Unknown verb make_offers');
  });
});

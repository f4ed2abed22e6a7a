import './env_bootstrap.js';
import { createMarketplace } from './engine/marketplace.js';
import { unwrap } from './engine/errors.js';
import { getEvents } from './engine/events.js';

// In-memory walkthrough: publish, fill, sweep, redeem.
async function main() {
  let clock = new Date('2030-03-01T09:00:00Z');
  const core = createMarketplace({ now: () => clock });
  const { db } = core.ctx;

  await db.putSkill({ id: 'sk_logistics', name: 'Logistics', category: 'ADMINISTRATIVE' });
  await db.putUser({ id: 'promoter', name: 'Harbor Food Bank', role: 'PROMOTER', points: 0 });
  for (const id of ['vol_a', 'vol_b', 'vol_c']) await db.putUser({ id, name: id, role: 'VOLUNTEER', points: 0 });
  await db.putReward({ id: 'rw_coffee', title: 'Free coffee', description: 'One drink', points_cost: 40, type: 'PARTNER_VOUCHER', quantity: 1, active: true });

  const opp = unwrap(await core.createOpportunity('promoter', {
    title: 'Sort donations',
    description: 'Weekend sorting shift',
    points_reward: 50,
    start_date: '2030-03-02T08:00:00Z',
    end_date: '2030-03-02T12:00:00Z',
    max_volunteers: 2,
    required_skill_ids: ['sk_logistics']
  }));
  unwrap(await core.publish(opp.id, 'promoter'));

  const apps = await Promise.all(['vol_a', 'vol_b', 'vol_c'].map(v => core.apply(v, opp.id)));
  for (const a of apps) {
    if (!a.ok) continue;
    const decided = await core.decideApplication(a.value.id, 'promoter', 'approve');
    console.log(`approve ${a.value.volunteer_id}:`, decided.ok ? decided.value.status : decided.error.code);
  }
  console.log('status after approvals:', unwrap(await core.getOpportunity(opp.id)).status);

  clock = new Date('2030-03-02T13:00:00Z');
  const report = await core.runSweep();
  console.log('sweep:', JSON.stringify({ advanced: report.advanced, completed: report.completed, credited: report.credited }));

  const first = await core.redeem('vol_a', 'rw_coffee');
  const second = await core.redeem('vol_b', 'rw_coffee');
  console.log('redeem vol_a:', first.ok ? first.value.code : first.error.code);
  console.log('redeem vol_b:', second.ok ? second.value.code : second.error.code);
  console.log('balances:', unwrap(await core.balance('vol_a')), unwrap(await core.balance('vol_b')));
  console.log(`${getEvents().length} events recorded`);
}

main().catch(e => { console.error(e); process.exit(1); });

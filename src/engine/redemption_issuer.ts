import { randomInt } from 'node:crypto';
import { UniqueViolation, type Db } from '../adapters/db.js';
import type { Redemption, Reward } from '../models/types.js';
import { can } from './capabilities.js';
import { type CoreContext, requireUser } from './context.js';
import { abort, attempt, type Outcome } from './errors.js';
import { logEvent } from './events.js';
import { redemptionDebitKey } from './idempotency.js';
import { lockKey, withLocks } from './locks.js';
import { debitPoints, logPosted } from './points_ledger.js';

// No 0/O or 1/I/L, so codes survive being read aloud or retyped.
export const CODE_ALPHABET = 'ABCDEFGHJKMNPQRSTUVWXYZ23456789';

export function generateRedemptionCode(length: number): string {
  let code = '';
  for (let i = 0; i < length; i++) code += CODE_ALPHABET[randomInt(CODE_ALPHABET.length)];
  return code;
}

/** Why `reward` cannot be redeemed at `now`, or undefined when it can. */
export function unavailableReason(reward: Reward, now: Date): string | undefined {
  if (!reward.active) return 'reward is inactive';
  const t = now.getTime();
  if (reward.available_from && t < Date.parse(reward.available_from)) return 'reward is not available yet';
  if (reward.available_until && t > Date.parse(reward.available_until)) return 'reward is no longer available';
  if (reward.quantity !== undefined && reward.quantity <= 0) return 'reward is out of stock';
  return undefined;
}

async function requireReward(db: Db, op: string, rewardId: string) {
  const reward = await db.getReward(rewardId);
  if (!reward) throw abort('NotFound', op, `reward ${rewardId} not found`, { reward_id: rewardId });
  return reward;
}

/**
 * Debit, stock take, code and record in one unit under the user and reward
 * locks. Any failure rolls the whole unit back.
 */
export function redeem(ctx: CoreContext, userId: string, rewardId: string): Promise<Outcome<Redemption>> {
  const op = 'redeem';
  return attempt(async () => {
    const { redemption, entry } = await withLocks([lockKey(ctx.db, 'user', userId), lockKey(ctx.db, 'reward', rewardId)], () =>
      ctx.db.transaction(async tx => {
        const now = ctx.now();
        const at = now.toISOString();
        const user = await requireUser(tx, op, userId);
        const reward = await requireReward(tx, op, rewardId);
        const reason = unavailableReason(reward, now);
        if (reason) throw abort('RewardUnavailable', op, reason, { reward_id: reward.id, quantity: reward.quantity, active: reward.active });

        const id = await tx.allocateId('redemption');
        const entry = await debitPoints(tx, user.id, reward.points_cost, redemptionDebitKey(id), at);
        if (!(await tx.takeRewardStock(reward.id))) {
          throw abort('RewardUnavailable', op, 'reward is out of stock', { reward_id: reward.id, quantity: 0 });
        }

        const attempts = ctx.config.redemptionCodeAttempts;
        for (let i = 1; i <= attempts; i++) {
          const code = ctx.generateCode(ctx.config.redemptionCodeLength);
          try {
            const redemption = await tx.insertRedemption({
              id, user_id: user.id, reward_id: reward.id, code, points_spent: reward.points_cost, redeemed_at: at
            });
            return { redemption, entry };
          } catch (e) {
            if (!(e instanceof UniqueViolation) || e.constraint !== 'redemptions_code') throw e;
            logEvent('redemption.code_collision', { redemption_id: id, attempt: i });
          }
        }
        throw abort('CodeGenerationFailed', op, `no unique code after ${attempts} attempts`, { attempts });
      }));
    logPosted(entry);
    logEvent('redemption.issued', {
      redemption_id: redemption.id, user_id: redemption.user_id, reward_id: redemption.reward_id, points_spent: redemption.points_spent
    });
    return redemption;
  });
}

/** A partner (or admin) confirms the code was used; only the first confirmation counts. */
export function markRedemptionUsed(ctx: CoreContext, redemptionId: string, actorId: string, at?: Date): Promise<Outcome<Redemption>> {
  const op = 'markRedemptionUsed';
  return attempt(async () => {
    const found = await ctx.db.getRedemption(redemptionId);
    if (!found) throw abort('NotFound', op, `redemption ${redemptionId} not found`, { redemption_id: redemptionId });
    const reward = await requireReward(ctx.db, op, found.reward_id);
    const actor = await requireUser(ctx.db, op, actorId);
    if (!can('confirm_redemption', actor.role, actor.id, reward.partner_id)) {
      throw abort('NotOwner', op, `${actor.id} cannot confirm redemptions of ${reward.id}`, { reward_id: reward.id, actor_id: actor.id });
    }
    const used = await ctx.db.markRedemptionUsed(found.id, (at ?? ctx.now()).toISOString());
    if (!used) {
      const current = await ctx.db.getRedemption(found.id);
      throw abort('InvalidStateTransition', op, 'redemption already used', { status: 'USED', used_at: current?.used_at });
    }
    logEvent('redemption.used', { redemption_id: used.id, actor_id: actor.id });
    return used;
  });
}

export function listRedemptions(ctx: CoreContext, userId: string): Promise<Outcome<Redemption[]>> {
  return attempt(async () => {
    await requireUser(ctx.db, 'listRedemptions', userId);
    return ctx.db.listRedemptions(userId);
  });
}

export function totalPointsSpent(ctx: CoreContext, userId: string): Promise<Outcome<number>> {
  return attempt(async () => {
    await requireUser(ctx.db, 'totalPointsSpent', userId);
    const redemptions = await ctx.db.listRedemptions(userId);
    return redemptions.reduce((sum, r) => sum + r.points_spent, 0);
  });
}

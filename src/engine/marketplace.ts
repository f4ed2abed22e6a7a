import { createDb, type Db } from '../adapters/db.js';
import { DEFAULT_CONFIG, type MarketplaceConfig } from '../config.js';
import type { Decision } from '../models/types.js';
import type { CodeGenerator, CoreContext } from './context.js';
import * as enrollment from './enrollment.js';
import * as ledger from './points_ledger.js';
import * as opportunities from './opportunity_manager.js';
import * as redemptions from './redemption_issuer.js';
import * as sweep from './sweep.js';

export interface MarketplaceOptions {
  db?: Db;
  config?: Partial<MarketplaceConfig>;
  now?: () => Date;
  generateCode?: CodeGenerator;
}

/** Binds every core operation to one store, config and clock. */
export function createMarketplace(opts: MarketplaceOptions = {}) {
  const ctx: CoreContext = {
    db: opts.db ?? createDb(),
    config: { ...DEFAULT_CONFIG, ...opts.config },
    now: opts.now ?? (() => new Date()),
    generateCode: opts.generateCode ?? redemptions.generateRedemptionCode
  };

  return {
    ctx,

    createOpportunity: (promoterId: string, draft: unknown) => opportunities.createOpportunity(ctx, promoterId, draft),
    publish: (opportunityId: string, actorId: string) => opportunities.publish(ctx, opportunityId, actorId),
    editOpportunity: (opportunityId: string, actorId: string, patch: unknown) => opportunities.editOpportunity(ctx, opportunityId, actorId, patch),
    cancelOpportunity: (opportunityId: string, actorId: string) => opportunities.cancelOpportunity(ctx, opportunityId, actorId),
    getOpportunity: (opportunityId: string) => opportunities.getOpportunity(ctx, opportunityId),
    approvedCount: (opportunityId: string) => opportunities.approvedCount(ctx, opportunityId),
    listPromoterOpportunities: (promoterId: string) => opportunities.listPromoterOpportunities(ctx, promoterId),

    apply: (volunteerId: string, opportunityId: string, message?: string) => enrollment.apply(ctx, volunteerId, opportunityId, message),
    decideApplication: (applicationId: string, actorId: string, decision: Decision) =>
      enrollment.decideApplication(ctx, applicationId, actorId, decision),
    withdrawApplication: (applicationId: string, volunteerId: string) => enrollment.withdrawApplication(ctx, applicationId, volunteerId),
    listApplications: (opportunityId: string, actorId: string) => enrollment.listApplications(ctx, opportunityId, actorId),
    listVolunteerApplications: (volunteerId: string) => enrollment.listVolunteerApplications(ctx, volunteerId),

    runSweep: (now: Date = ctx.now()) => sweep.runSweep(ctx, now),
    startSweepScheduler: (schedulerOpts?: sweep.SweepSchedulerOptions) => sweep.startSweepScheduler(ctx, schedulerOpts),

    credit: (userId: string, amount: number, sourceKey: string) => ledger.credit(ctx, userId, amount, sourceKey),
    debit: (userId: string, amount: number, sourceKey: string) => ledger.debit(ctx, userId, amount, sourceKey),
    balance: (userId: string) => ledger.balance(ctx, userId),
    history: (userId: string) => ledger.history(ctx, userId),

    redeem: (userId: string, rewardId: string) => redemptions.redeem(ctx, userId, rewardId),
    markRedemptionUsed: (redemptionId: string, actorId: string, at?: Date) => redemptions.markRedemptionUsed(ctx, redemptionId, actorId, at),
    listRedemptions: (userId: string) => redemptions.listRedemptions(ctx, userId),
    totalPointsSpent: (userId: string) => redemptions.totalPointsSpent(ctx, userId)
  };
}

export type Marketplace = ReturnType<typeof createMarketplace>;

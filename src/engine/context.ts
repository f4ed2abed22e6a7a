import type { Db } from '../adapters/db.js';
import type { MarketplaceConfig } from '../config.js';
import type { Opportunity, User } from '../models/types.js';
import { abort } from './errors.js';

export type CodeGenerator = (length: number) => string;

export interface CoreContext {
  db: Db;
  config: MarketplaceConfig;
  now: () => Date;
  generateCode: CodeGenerator;
}

export async function requireUser(db: Db, op: string, userId: string): Promise<User> {
  const user = await db.getUser(userId);
  if (!user) throw abort('NotFound', op, `user ${userId} not found`, { user_id: userId });
  return user;
}

export async function requireOpportunity(db: Db, op: string, opportunityId: string): Promise<Opportunity> {
  const opp = await db.getOpportunity(opportunityId);
  if (!opp) throw abort('NotFound', op, `opportunity ${opportunityId} not found`, { opportunity_id: opportunityId });
  return opp;
}

import { z } from 'zod';
import {
  applicationMessageSchema, decisionSchema, entityId, isoDateTime, opportunityDraftSchema, opportunityPatchSchema
} from '../models/schemas.js';

// Verb argument schemas. Field names match the wire (snake_case).

export const createOpportunitySchema = z.object({
  promoter_id: entityId,
  draft: opportunityDraftSchema
});

export const opportunityActionSchema = z.object({
  opportunity_id: entityId,
  actor_id: entityId
});

export const editOpportunitySchema = opportunityActionSchema.extend({
  patch: opportunityPatchSchema
});

export const opportunityRefSchema = z.object({
  opportunity_id: entityId
});

export const promoterRefSchema = z.object({
  promoter_id: entityId
});

export const applySchema = z.object({
  volunteer_id: entityId,
  opportunity_id: entityId,
  message: applicationMessageSchema
});

export const decideApplicationSchema = z.object({
  application_id: entityId,
  actor_id: entityId,
  decision: decisionSchema
});

export const withdrawApplicationSchema = z.object({
  application_id: entityId,
  volunteer_id: entityId
});

export const volunteerRefSchema = z.object({
  volunteer_id: entityId
});

export const runSweepSchema = z.object({
  now: isoDateTime.optional()
});

export const redeemSchema = z.object({
  user_id: entityId,
  reward_id: entityId
});

export const markRedemptionUsedSchema = z.object({
  redemption_id: entityId,
  actor_id: entityId,
  at: isoDateTime.optional()
});

export const userRefSchema = z.object({
  user_id: entityId
});

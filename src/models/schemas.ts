import { z } from 'zod';

// Accepts any ISO-8601 timestamp with an offset and stores it normalized to UTC.
export const isoDateTime = z.string().datetime({ offset: true }).transform(s => new Date(s).toISOString());

export const entityId = z.string().min(1).max(64);

export const opportunityStatusSchema = z.enum(['DRAFT', 'OPEN', 'FULL', 'IN_PROGRESS', 'COMPLETED', 'CANCELLED']);
export const applicationStatusSchema = z.enum(['PENDING', 'APPROVED', 'REJECTED', 'COMPLETED', 'CANCELLED']);
export const userRoleSchema = z.enum(['VOLUNTEER', 'PROMOTER', 'PARTNER', 'ADMIN']);
export const rewardTypeSchema = z.enum(['UA_SERVICE', 'PARTNER_VOUCHER', 'MERCHANDISE', 'CERTIFICATE', 'OTHER']);
export const skillCategorySchema = z.enum(['TECHNICAL', 'COMMUNICATION', 'LEADERSHIP', 'CREATIVE', 'ADMINISTRATIVE', 'SOCIAL', 'LANGUAGE', 'OTHER']);

export const opportunityDraftSchema = z.object({
  title: z.string().trim().min(1).max(255),
  description: z.string().trim().min(1).max(2000),
  points_reward: z.number().int().min(0),
  start_date: isoDateTime,
  end_date: isoDateTime,
  max_volunteers: z.number().int().min(1),
  location: z.string().trim().max(255).optional(),
  required_skill_ids: z.array(entityId).min(1, 'at least one skill is required')
}).strict();

export const opportunityPatchSchema = opportunityDraftSchema.partial().strict();

export const applicationMessageSchema = z.string().max(500).optional();

export const decisionSchema = z.enum(['approve', 'reject']);

// Persisted rows, used when a snapshot is read back from disk.

export const skillSchema = z.object({ id: entityId, name: z.string().min(1), category: skillCategorySchema });

export const userSchema = z.object({
  id: entityId,
  name: z.string().min(1),
  role: userRoleSchema,
  points: z.number().int().min(0)
});

export const opportunitySchema = z.object({
  id: entityId,
  title: z.string(),
  description: z.string(),
  points_reward: z.number().int().min(0),
  start_date: isoDateTime,
  end_date: isoDateTime,
  max_volunteers: z.number().int().min(1),
  status: opportunityStatusSchema,
  location: z.string().optional(),
  promoter_id: entityId,
  required_skill_ids: z.array(entityId),
  version: z.number().int().min(1),
  created_at: isoDateTime,
  updated_at: isoDateTime
});

export const applicationSchema = z.object({
  id: entityId,
  volunteer_id: entityId,
  opportunity_id: entityId,
  status: applicationStatusSchema,
  message: z.string().optional(),
  applied_at: isoDateTime,
  reviewed_at: isoDateTime.optional(),
  completed_at: isoDateTime.optional()
});

export const rewardSchema = z.object({
  id: entityId,
  title: z.string().min(1),
  description: z.string(),
  points_cost: z.number().int().min(1),
  type: rewardTypeSchema,
  partner_id: entityId.optional(),
  quantity: z.number().int().min(0).optional(),
  active: z.boolean(),
  available_from: isoDateTime.optional(),
  available_until: isoDateTime.optional()
});

export const redemptionSchema = z.object({
  id: entityId,
  user_id: entityId,
  reward_id: entityId,
  code: z.string().min(1),
  points_spent: z.number().int().min(0),
  redeemed_at: isoDateTime,
  used_at: isoDateTime.optional()
});

export const pointEntrySchema = z.object({
  id: entityId,
  user_id: entityId,
  kind: z.enum(['CREDIT', 'DEBIT']),
  amount: z.number().int().min(1),
  source_key: z.string().min(1),
  balance_after: z.number().int().min(0),
  created_at: isoDateTime
});

export const snapshotSchema = z.object({
  version: z.literal(1),
  seq: z.object({
    opportunity: z.number().int().min(0),
    application: z.number().int().min(0),
    redemption: z.number().int().min(0),
    point_entry: z.number().int().min(0)
  }),
  skills: z.array(skillSchema),
  users: z.array(userSchema),
  opportunities: z.array(opportunitySchema),
  applications: z.array(applicationSchema),
  rewards: z.array(rewardSchema),
  redemptions: z.array(redemptionSchema),
  point_entries: z.array(pointEntrySchema)
});

export const seedSchema = z.object({
  skills: z.array(skillSchema).default([]),
  users: z.array(userSchema).default([]),
  rewards: z.array(rewardSchema).default([])
});

export function formatIssues(error: z.ZodError) {
  return error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
}

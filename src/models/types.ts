export type OpportunityStatus =
  | "DRAFT"
  | "OPEN"
  | "FULL"
  | "IN_PROGRESS"
  | "COMPLETED"
  | "CANCELLED";

export type ApplicationStatus =
  | "PENDING"
  | "APPROVED"
  | "REJECTED"
  | "COMPLETED"
  | "CANCELLED";

export type UserRole = "VOLUNTEER" | "PROMOTER" | "PARTNER" | "ADMIN";

export type RewardType = "UA_SERVICE" | "PARTNER_VOUCHER" | "MERCHANDISE" | "CERTIFICATE" | "OTHER";

export type SkillCategory =
  | "TECHNICAL"
  | "COMMUNICATION"
  | "LEADERSHIP"
  | "CREATIVE"
  | "ADMINISTRATIVE"
  | "SOCIAL"
  | "LANGUAGE"
  | "OTHER";

// All timestamps are ISO-8601 strings.
export type ISODateTime = string;

export interface Skill {
  id: string;
  name: string;
  category: SkillCategory;
}

export interface User {
  id: string;
  name: string;
  role: UserRole;
  points: number; // >= 0, written only by the points ledger
}

export interface Opportunity {
  id: string;
  title: string;
  description: string;
  points_reward: number;
  start_date: ISODateTime;
  end_date: ISODateTime;
  max_volunteers: number;
  status: OpportunityStatus;
  location?: string;
  promoter_id: string;
  required_skill_ids: string[];
  version: number; // bumped on every write, used for compare-and-set
  created_at: ISODateTime;
  updated_at: ISODateTime;
}

export interface Application {
  id: string;
  volunteer_id: string;
  opportunity_id: string;
  status: ApplicationStatus;
  message?: string;
  applied_at: ISODateTime;
  reviewed_at?: ISODateTime;
  completed_at?: ISODateTime;
}

export interface Reward {
  id: string;
  title: string;
  description: string;
  points_cost: number;
  type: RewardType;
  partner_id?: string;
  quantity?: number; // remaining stock; undefined = unlimited
  active: boolean;
  available_from?: ISODateTime;
  available_until?: ISODateTime;
}

export interface Redemption {
  id: string;
  user_id: string;
  reward_id: string;
  code: string;
  points_spent: number;
  redeemed_at: ISODateTime;
  used_at?: ISODateTime;
}

export type PointEntryKind = "CREDIT" | "DEBIT";

export interface PointEntry {
  id: string;
  user_id: string;
  kind: PointEntryKind;
  amount: number; // always positive; kind carries the sign
  source_key: string; // unique: one entry per source event
  balance_after: number;
  created_at: ISODateTime;
}

export interface OpportunityDraft {
  title: string;
  description: string;
  points_reward: number;
  start_date: ISODateTime;
  end_date: ISODateTime;
  max_volunteers: number;
  location?: string;
  required_skill_ids: string[];
}

export type OpportunityPatch = Partial<OpportunityDraft>;

export type Decision = "approve" | "reject";

export interface SweepCredit {
  application_id: string;
  volunteer_id: string;
  opportunity_id: string;
  amount: number;
}

export interface SweepFailure {
  opportunity_id: string;
  reason: string;
}

export interface SweepReport {
  skipped: boolean;
  advanced: string[]; // opportunity ids moved to IN_PROGRESS
  completed: string[]; // opportunity ids moved to COMPLETED
  credited: SweepCredit[];
  closed_pending: string[]; // PENDING application ids rejected on completion
  failed: SweepFailure[];
}

export interface EventLogEntry {
  id: string;
  ts: ISODateTime;
  type: string;
  payload: Record<string, unknown>;
}

import type {
  Application, ApplicationStatus, ISODateTime, Opportunity, OpportunityStatus, PointEntry,
  Redemption, Reward, Skill, User
} from '../models/types.js';

// In-memory store. Each method body runs without yielding, so a single call is
// atomic; callers compose calls with transaction(), which undoes every write of
// the unit when the callback throws.
// Reads are read-uncommitted: a unit's writes are visible before it commits.
// Callers that must not see them take the row's lock first.

export class UniqueViolation extends Error {
  readonly constraint: string;
  readonly value: string;

  constructor(constraint: string, value: string) {
    super(`unique constraint ${constraint} violated by ${value}`);
    this.name = 'UniqueViolation';
    this.constraint = constraint;
    this.value = value;
  }
}

export type IdKind = 'opportunity' | 'application' | 'redemption' | 'point_entry';

const ID_PREFIX: Record<IdKind, string> = { opportunity: 'opp', application: 'app', redemption: 'red', point_entry: 'pe' };

export type NewOpportunity = Omit<Opportunity, 'id' | 'version' | 'created_at' | 'updated_at'>;
export type OpportunityChanges = Partial<Omit<Opportunity, 'id' | 'version' | 'promoter_id' | 'created_at' | 'updated_at'>>;
export type NewApplication = Omit<Application, 'id' | 'reviewed_at' | 'completed_at'>;
export type ApplicationStamp = Partial<Pick<Application, 'reviewed_at' | 'completed_at'>>;

export interface BalanceUpdate { applied: boolean; balance: number }

export type ApproveResult =
  | { kind: 'approved'; application: Application; approved_count: number }
  | { kind: 'full'; approved_count: number }
  | { kind: 'stale'; status: ApplicationStatus };

export interface ApplicationFilter { opportunity_id?: string; volunteer_id?: string; status?: ApplicationStatus }

export interface Snapshot {
  version: 1;
  seq: Record<IdKind, number>;
  skills: Skill[];
  users: User[];
  opportunities: Opportunity[];
  applications: Application[];
  rewards: Reward[];
  redemptions: Redemption[];
  point_entries: PointEntry[];
}

export interface Db {
  transaction<T>(fn: (tx: Db) => Promise<T>): Promise<T>;
  allocateId(kind: IdKind): Promise<string>;

  getSkill(id: string): Promise<Skill | undefined>;
  putSkill(skill: Skill): Promise<Skill>;

  getUser(id: string): Promise<User | undefined>;
  /** Directory upsert. An existing user's balance is left untouched. */
  putUser(user: User): Promise<User>;
  /** Adds `delta` unless the result would be negative. */
  adjustPoints(userId: string, delta: number): Promise<BalanceUpdate>;

  getOpportunity(id: string): Promise<Opportunity | undefined>;
  insertOpportunity(input: NewOpportunity, at: ISODateTime): Promise<Opportunity>;
  /** Compare-and-set on `version`; undefined when the row moved on. */
  updateOpportunity(id: string, expectedVersion: number, changes: OpportunityChanges, at: ISODateTime): Promise<Opportunity | undefined>;
  listOpportunitiesToStart(now: ISODateTime): Promise<Opportunity[]>;
  listOpportunitiesToComplete(now: ISODateTime): Promise<Opportunity[]>;
  listOpportunitiesByPromoter(promoterId: string): Promise<Opportunity[]>;

  getApplication(id: string): Promise<Application | undefined>;
  findApplication(volunteerId: string, opportunityId: string): Promise<Application | undefined>;
  insertApplication(input: NewApplication): Promise<Application>;
  listApplications(filter: ApplicationFilter): Promise<Application[]>;
  countApplications(opportunityId: string, status: ApplicationStatus): Promise<number>;
  /** Compare-and-set on status; undefined when the row is not in one of `from`. */
  transitionApplication(id: string, from: ApplicationStatus[], to: ApplicationStatus, stamp: ApplicationStamp): Promise<Application | undefined>;
  /** PENDING -> APPROVED guarded by the opportunity's current approved count. */
  approveWithinCapacity(id: string, maxVolunteers: number, at: ISODateTime): Promise<ApproveResult>;

  getReward(id: string): Promise<Reward | undefined>;
  putReward(reward: Reward): Promise<Reward>;
  /** Decrements tracked stock; false when none is left. Unlimited rewards always succeed. */
  takeRewardStock(id: string): Promise<boolean>;

  getRedemption(id: string): Promise<Redemption | undefined>;
  findRedemptionByCode(code: string): Promise<Redemption | undefined>;
  insertRedemption(redemption: Redemption): Promise<Redemption>;
  listRedemptions(userId: string): Promise<Redemption[]>;
  markRedemptionUsed(id: string, at: ISODateTime): Promise<Redemption | undefined>;

  findPointEntry(sourceKey: string): Promise<PointEntry | undefined>;
  insertPointEntry(entry: Omit<PointEntry, 'id'>): Promise<PointEntry>;
  listPointEntries(userId: string): Promise<PointEntry[]>;

  snapshot(): Snapshot;
}

interface Tables {
  seq: Record<IdKind, number>;
  skills: Map<string, Skill>;
  users: Map<string, User>;
  opportunities: Map<string, Opportunity>;
  applications: Map<string, Application>;
  applicationByPair: Map<string, string>;
  rewards: Map<string, Reward>;
  redemptions: Map<string, Redemption>;
  redemptionByCode: Map<string, string>;
  pointEntries: Map<string, PointEntry>;
  pointEntryBySource: Map<string, string>;
}

function pairKey(volunteerId: string, opportunityId: string) { return `${volunteerId}|${opportunityId}`; }

function copy<T>(row: T): T { return structuredClone(row); }

function ts(iso: ISODateTime) { return Date.parse(iso); }

function emptyTables(): Tables {
  return {
    seq: { opportunity: 0, application: 0, redemption: 0, point_entry: 0 },
    skills: new Map(), users: new Map(), opportunities: new Map(), applications: new Map(),
    applicationByPair: new Map(), rewards: new Map(), redemptions: new Map(), redemptionByCode: new Map(),
    pointEntries: new Map(), pointEntryBySource: new Map()
  };
}

const STARTABLE: OpportunityStatus[] = ['OPEN', 'FULL'];

class MemoryDb implements Db {
  constructor(private readonly t: Tables, private readonly journal?: Array<() => void>) {}

  private record(undo: () => void) { this.journal?.push(undo); }

  private restoreOnUndo<K, V>(map: Map<K, V>, key: K) {
    const prev = map.get(key);
    this.record(() => { if (prev === undefined) map.delete(key); else map.set(key, prev); });
  }

  async transaction<T>(fn: (tx: Db) => Promise<T>): Promise<T> {
    if (this.journal) return fn(this);
    const journal: Array<() => void> = [];
    const tx = new MemoryDb(this.t, journal);
    try {
      return await fn(tx);
    } catch (e) {
      for (let i = journal.length - 1; i >= 0; i--) journal[i]();
      throw e;
    }
  }

  private nextId(kind: IdKind) {
    this.t.seq[kind] += 1;
    return `${ID_PREFIX[kind]}_${this.t.seq[kind]}`;
  }

  private count(opportunityId: string, status: ApplicationStatus) {
    let n = 0;
    for (const a of this.t.applications.values()) if (a.opportunity_id === opportunityId && a.status === status) n++;
    return n;
  }

  async allocateId(kind: IdKind) { return this.nextId(kind); }

  async getSkill(id: string) { const s = this.t.skills.get(id); return s && copy(s); }

  async putSkill(skill: Skill) {
    this.restoreOnUndo(this.t.skills, skill.id);
    this.t.skills.set(skill.id, copy(skill));
    return copy(skill);
  }

  async getUser(id: string) { const u = this.t.users.get(id); return u && copy(u); }

  async putUser(user: User) {
    const existing = this.t.users.get(user.id);
    if (!existing && (!Number.isInteger(user.points) || user.points < 0)) throw new Error(`invalid opening balance for ${user.id}`);
    const next: User = existing ? { ...user, points: existing.points } : copy(user);
    this.restoreOnUndo(this.t.users, user.id);
    this.t.users.set(user.id, next);
    return copy(next);
  }

  async adjustPoints(userId: string, delta: number): Promise<BalanceUpdate> {
    const u = this.t.users.get(userId);
    if (!u) throw new Error(`USER_NOT_FOUND ${userId}`);
    const balance = u.points + delta;
    if (balance < 0) return { applied: false, balance: u.points };
    // Undo by inverse delta so a rollback never erases another unit's movement.
    this.record(() => {
      const cur = this.t.users.get(userId);
      if (cur) this.t.users.set(userId, { ...cur, points: cur.points - delta });
    });
    this.t.users.set(userId, { ...u, points: balance });
    return { applied: true, balance };
  }

  async getOpportunity(id: string) { const o = this.t.opportunities.get(id); return o && copy(o); }

  async insertOpportunity(input: NewOpportunity, at: ISODateTime) {
    const id = this.nextId('opportunity');
    const row: Opportunity = { ...copy(input), id, version: 1, created_at: at, updated_at: at };
    this.restoreOnUndo(this.t.opportunities, id);
    this.t.opportunities.set(id, row);
    return copy(row);
  }

  async updateOpportunity(id: string, expectedVersion: number, changes: OpportunityChanges, at: ISODateTime) {
    const cur = this.t.opportunities.get(id);
    if (!cur || cur.version !== expectedVersion) return undefined;
    const next: Opportunity = { ...cur, ...copy(changes), version: cur.version + 1, updated_at: at };
    this.restoreOnUndo(this.t.opportunities, id);
    this.t.opportunities.set(id, next);
    return copy(next);
  }

  async listOpportunitiesToStart(now: ISODateTime) {
    return [...this.t.opportunities.values()]
      .filter(o => STARTABLE.includes(o.status) && ts(o.start_date) <= ts(now))
      .map(copy);
  }

  async listOpportunitiesToComplete(now: ISODateTime) {
    return [...this.t.opportunities.values()]
      .filter(o => o.status === 'IN_PROGRESS' && ts(o.end_date) <= ts(now))
      .map(copy);
  }

  async listOpportunitiesByPromoter(promoterId: string) {
    return [...this.t.opportunities.values()].filter(o => o.promoter_id === promoterId).map(copy);
  }

  async getApplication(id: string) { const a = this.t.applications.get(id); return a && copy(a); }

  async findApplication(volunteerId: string, opportunityId: string) {
    const id = this.t.applicationByPair.get(pairKey(volunteerId, opportunityId));
    return id ? this.getApplication(id) : undefined;
  }

  async insertApplication(input: NewApplication) {
    const pk = pairKey(input.volunteer_id, input.opportunity_id);
    if (this.t.applicationByPair.has(pk)) throw new UniqueViolation('applications_volunteer_opportunity', pk);
    const id = this.nextId('application');
    const row: Application = { ...copy(input), id };
    this.restoreOnUndo(this.t.applications, id);
    this.restoreOnUndo(this.t.applicationByPair, pk);
    this.t.applications.set(id, row);
    this.t.applicationByPair.set(pk, id);
    return copy(row);
  }

  async listApplications(filter: ApplicationFilter) {
    return [...this.t.applications.values()]
      .filter(a =>
        (filter.opportunity_id === undefined || a.opportunity_id === filter.opportunity_id) &&
        (filter.volunteer_id === undefined || a.volunteer_id === filter.volunteer_id) &&
        (filter.status === undefined || a.status === filter.status))
      .map(copy);
  }

  async countApplications(opportunityId: string, status: ApplicationStatus) { return this.count(opportunityId, status); }

  async transitionApplication(id: string, from: ApplicationStatus[], to: ApplicationStatus, stamp: ApplicationStamp) {
    const cur = this.t.applications.get(id);
    if (!cur || !from.includes(cur.status)) return undefined;
    const next: Application = { ...cur, ...stamp, status: to };
    this.restoreOnUndo(this.t.applications, id);
    this.t.applications.set(id, next);
    return copy(next);
  }

  async approveWithinCapacity(id: string, maxVolunteers: number, at: ISODateTime): Promise<ApproveResult> {
    const cur = this.t.applications.get(id);
    if (!cur) throw new Error(`APPLICATION_NOT_FOUND ${id}`);
    if (cur.status !== 'PENDING') return { kind: 'stale', status: cur.status };
    const approved = this.count(cur.opportunity_id, 'APPROVED');
    if (approved >= maxVolunteers) return { kind: 'full', approved_count: approved };
    const next: Application = { ...cur, status: 'APPROVED', reviewed_at: at };
    this.restoreOnUndo(this.t.applications, id);
    this.t.applications.set(id, next);
    return { kind: 'approved', application: copy(next), approved_count: approved + 1 };
  }

  async getReward(id: string) { const r = this.t.rewards.get(id); return r && copy(r); }

  async putReward(reward: Reward) {
    if (reward.quantity !== undefined && reward.quantity < 0) throw new Error(`negative stock for ${reward.id}`);
    this.restoreOnUndo(this.t.rewards, reward.id);
    this.t.rewards.set(reward.id, copy(reward));
    return copy(reward);
  }

  async takeRewardStock(id: string) {
    const r = this.t.rewards.get(id);
    if (!r) throw new Error(`REWARD_NOT_FOUND ${id}`);
    if (r.quantity === undefined) return true;
    if (r.quantity <= 0) return false;
    this.record(() => {
      const cur = this.t.rewards.get(id);
      if (cur && cur.quantity !== undefined) this.t.rewards.set(id, { ...cur, quantity: cur.quantity + 1 });
    });
    this.t.rewards.set(id, { ...r, quantity: r.quantity - 1 });
    return true;
  }

  async getRedemption(id: string) { const r = this.t.redemptions.get(id); return r && copy(r); }

  async findRedemptionByCode(code: string) {
    const id = this.t.redemptionByCode.get(code);
    return id ? this.getRedemption(id) : undefined;
  }

  async insertRedemption(redemption: Redemption) {
    if (this.t.redemptionByCode.has(redemption.code)) throw new UniqueViolation('redemptions_code', redemption.code);
    if (this.t.redemptions.has(redemption.id)) throw new UniqueViolation('redemptions_pkey', redemption.id);
    this.restoreOnUndo(this.t.redemptions, redemption.id);
    this.restoreOnUndo(this.t.redemptionByCode, redemption.code);
    this.t.redemptions.set(redemption.id, copy(redemption));
    this.t.redemptionByCode.set(redemption.code, redemption.id);
    return copy(redemption);
  }

  async listRedemptions(userId: string) {
    return [...this.t.redemptions.values()]
      .filter(r => r.user_id === userId)
      .sort((a, b) => ts(b.redeemed_at) - ts(a.redeemed_at))
      .map(copy);
  }

  async markRedemptionUsed(id: string, at: ISODateTime) {
    const cur = this.t.redemptions.get(id);
    if (!cur || cur.used_at) return undefined;
    const next: Redemption = { ...cur, used_at: at };
    this.restoreOnUndo(this.t.redemptions, id);
    this.t.redemptions.set(id, next);
    return copy(next);
  }

  async findPointEntry(sourceKey: string) {
    const id = this.t.pointEntryBySource.get(sourceKey);
    const e = id ? this.t.pointEntries.get(id) : undefined;
    return e && copy(e);
  }

  async insertPointEntry(entry: Omit<PointEntry, 'id'>) {
    if (this.t.pointEntryBySource.has(entry.source_key)) throw new UniqueViolation('point_entries_source_key', entry.source_key);
    const id = this.nextId('point_entry');
    const row: PointEntry = { ...entry, id };
    this.restoreOnUndo(this.t.pointEntries, id);
    this.restoreOnUndo(this.t.pointEntryBySource, entry.source_key);
    this.t.pointEntries.set(id, row);
    this.t.pointEntryBySource.set(entry.source_key, id);
    return copy(row);
  }

  async listPointEntries(userId: string) {
    // Newest first; ids are monotonic so they break timestamp ties.
    return [...this.t.pointEntries.values()]
      .filter(e => e.user_id === userId)
      .sort((a, b) => ts(b.created_at) - ts(a.created_at) || idSeq(b.id) - idSeq(a.id))
      .map(copy);
  }

  snapshot(): Snapshot {
    return {
      version: 1,
      seq: { ...this.t.seq },
      skills: [...this.t.skills.values()].map(copy),
      users: [...this.t.users.values()].map(copy),
      opportunities: [...this.t.opportunities.values()].map(copy),
      applications: [...this.t.applications.values()].map(copy),
      rewards: [...this.t.rewards.values()].map(copy),
      redemptions: [...this.t.redemptions.values()].map(copy),
      point_entries: [...this.t.pointEntries.values()].map(copy)
    };
  }
}

function idSeq(id: string) { return Number(id.slice(id.lastIndexOf('_') + 1)) || 0; }

export function createDb(snapshot?: Snapshot): Db {
  const t = emptyTables();
  if (snapshot) {
    t.seq = { ...snapshot.seq };
    for (const s of snapshot.skills) t.skills.set(s.id, copy(s));
    for (const u of snapshot.users) t.users.set(u.id, copy(u));
    for (const o of snapshot.opportunities) t.opportunities.set(o.id, copy(o));
    for (const a of snapshot.applications) {
      t.applications.set(a.id, copy(a));
      t.applicationByPair.set(pairKey(a.volunteer_id, a.opportunity_id), a.id);
    }
    for (const r of snapshot.rewards) t.rewards.set(r.id, copy(r));
    for (const r of snapshot.redemptions) {
      t.redemptions.set(r.id, copy(r));
      t.redemptionByCode.set(r.code, r.id);
    }
    for (const e of snapshot.point_entries) {
      t.pointEntries.set(e.id, copy(e));
      t.pointEntryBySource.set(e.source_key, e.id);
    }
  }
  return new MemoryDb(t);
}

import type { ISODateTime, Opportunity, OpportunityStatus } from '../models/types.js';
import { abort } from './errors.js';

// Moves a promoter may ask for. OPEN <-> FULL follows the approved count
// (capacityStatus) and the clock drives the rest (computeTransition); neither
// goes through this table.
export const TRANSITIONS: Record<OpportunityStatus, readonly OpportunityStatus[]> = {
  DRAFT: ['OPEN', 'CANCELLED'],
  OPEN: ['CANCELLED'],
  FULL: ['CANCELLED'],
  IN_PROGRESS: [],
  COMPLETED: [],
  CANCELLED: []
};

// FULL is editable like OPEN: nothing has started yet.
export const EDITABLE: readonly OpportunityStatus[] = ['DRAFT', 'OPEN', 'FULL'];
export const ENROLLING: readonly OpportunityStatus[] = ['OPEN', 'FULL'];

export function canTransition(from: OpportunityStatus, to: OpportunityStatus) {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(op: string, from: OpportunityStatus, to: OpportunityStatus) {
  if (to === 'CANCELLED' && from === 'CANCELLED') {
    throw abort('AlreadyCancelled', op, 'opportunity is already cancelled', { status: from });
  }
  if (!canTransition(from, to)) {
    throw abort('InvalidStateTransition', op, `cannot move opportunity from ${from} to ${to}`, { status: from, target: to });
  }
}

export function isEditable(status: OpportunityStatus) {
  return EDITABLE.includes(status);
}

/**
 * Next time-driven status for `opp` at `now`, or undefined when the clock
 * does not move it. One step at a time: an OPEN opportunity whose end date
 * has also passed goes to IN_PROGRESS here and to COMPLETED on the next call.
 */
export function computeTransition(opp: Pick<Opportunity, 'status' | 'start_date' | 'end_date'>, now: Date): OpportunityStatus | undefined {
  const t = now.getTime();
  switch (opp.status) {
    case 'OPEN':
    case 'FULL':
      return t >= Date.parse(opp.start_date) ? 'IN_PROGRESS' : undefined;
    case 'IN_PROGRESS':
      return t >= Date.parse(opp.end_date) ? 'COMPLETED' : undefined;
    default:
      return undefined;
  }
}

/** OPEN/FULL as dictated by the approved count; other statuses are left alone. */
export function capacityStatus(status: OpportunityStatus, approvedCount: number, maxVolunteers: number): OpportunityStatus {
  if (!ENROLLING.includes(status)) return status;
  return approvedCount >= maxVolunteers ? 'FULL' : 'OPEN';
}

export function validDateRange(start: ISODateTime, end: ISODateTime) {
  return Date.parse(end) > Date.parse(start);
}

import { describe, it, expect } from 'vitest';
import {
  assertTransition, canTransition, capacityStatus, computeTransition, isEditable, validDateRange
} from '../src/engine/lifecycle.js';
import { can } from '../src/engine/capabilities.js';
import { CoreAbort } from '../src/engine/errors.js';
import type { OpportunityStatus } from '../src/models/types.js';

const span = { start_date: '2030-01-20T09:00:00.000Z', end_date: '2030-01-20T12:00:00.000Z' };

function at(iso: string) { return new Date(iso); }

function thrown(fn: () => void): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  return undefined;
}

describe('computeTransition', () => {
  it('starts OPEN and FULL opportunities once the start date is reached', () => {
    expect(computeTransition({ ...span, status: 'OPEN' }, at('2030-01-20T08:59:59.999Z'))).toBeUndefined();
    expect(computeTransition({ ...span, status: 'OPEN' }, at('2030-01-20T09:00:00.000Z'))).toBe('IN_PROGRESS');
    expect(computeTransition({ ...span, status: 'FULL' }, at('2030-01-20T10:00:00.000Z'))).toBe('IN_PROGRESS');
  });

  it('completes IN_PROGRESS opportunities once the end date is reached', () => {
    expect(computeTransition({ ...span, status: 'IN_PROGRESS' }, at('2030-01-20T11:00:00.000Z'))).toBeUndefined();
    expect(computeTransition({ ...span, status: 'IN_PROGRESS' }, at('2030-01-20T12:00:00.000Z'))).toBe('COMPLETED');
  });

  it('moves one step at a time', () => {
    expect(computeTransition({ ...span, status: 'OPEN' }, at('2030-02-01T00:00:00.000Z'))).toBe('IN_PROGRESS');
  });

  it('never moves DRAFT, COMPLETED or CANCELLED', () => {
    const late = at('2031-01-01T00:00:00.000Z');
    for (const status of ['DRAFT', 'COMPLETED', 'CANCELLED'] as const) {
      expect(computeTransition({ ...span, status }, late)).toBeUndefined();
    }
  });
});

describe('transition table', () => {
  const all: OpportunityStatus[] = ['DRAFT', 'OPEN', 'FULL', 'IN_PROGRESS', 'COMPLETED', 'CANCELLED'];

  it('has no way out of terminal states', () => {
    for (const to of all) {
      expect(canTransition('COMPLETED', to)).toBe(false);
      expect(canTransition('CANCELLED', to)).toBe(false);
    }
  });

  it('leaves OPEN and FULL to the approved count and the clock', () => {
    expect(canTransition('FULL', 'OPEN')).toBe(false);
    expect(canTransition('OPEN', 'FULL')).toBe(false);
    expect(canTransition('OPEN', 'IN_PROGRESS')).toBe(false);
    expect(canTransition('IN_PROGRESS', 'COMPLETED')).toBe(false);
    expect(canTransition('DRAFT', 'OPEN')).toBe(true);
  });

  it('cannot cancel once started', () => {
    expect(canTransition('IN_PROGRESS', 'CANCELLED')).toBe(false);
    expect(canTransition('FULL', 'CANCELLED')).toBe(true);
  });

  it('reports AlreadyCancelled separately from other illegal moves', () => {
    const again = thrown(() => assertTransition('cancelOpportunity', 'CANCELLED', 'CANCELLED'));
    expect(again).toBeInstanceOf(CoreAbort);
    if (again instanceof CoreAbort) expect(again.error.code).toBe('AlreadyCancelled');

    const late = thrown(() => assertTransition('cancelOpportunity', 'COMPLETED', 'CANCELLED'));
    expect(late).toBeInstanceOf(CoreAbort);
    if (late instanceof CoreAbort) {
      expect(late.error).toEqual({
        code: 'InvalidStateTransition',
        op: 'cancelOpportunity',
        reason: 'cannot move opportunity from COMPLETED to CANCELLED',
        details: { status: 'COMPLETED', target: 'CANCELLED' }
      });
    }
  });

  it('treats FULL as editable and IN_PROGRESS as not', () => {
    expect(isEditable('DRAFT')).toBe(true);
    expect(isEditable('FULL')).toBe(true);
    expect(isEditable('IN_PROGRESS')).toBe(false);
  });
});

describe('capacityStatus', () => {
  it('derives OPEN/FULL from the approved count', () => {
    expect(capacityStatus('OPEN', 2, 2)).toBe('FULL');
    expect(capacityStatus('FULL', 1, 2)).toBe('OPEN');
    expect(capacityStatus('OPEN', 1, 2)).toBe('OPEN');
  });

  it('leaves other statuses alone', () => {
    expect(capacityStatus('DRAFT', 5, 2)).toBe('DRAFT');
    expect(capacityStatus('IN_PROGRESS', 0, 2)).toBe('IN_PROGRESS');
  });
});

describe('validDateRange', () => {
  it('requires end strictly after start', () => {
    expect(validDateRange(span.start_date, span.end_date)).toBe(true);
    expect(validDateRange(span.start_date, span.start_date)).toBe(false);
  });
});

describe('capabilities', () => {
  it('lets admins do everything', () => {
    expect(can('manage_opportunity', 'ADMIN', 'root', 'promoter')).toBe(true);
    expect(can('confirm_redemption', 'ADMIN', 'root', undefined)).toBe(true);
  });

  it('limits opportunity management to the owner', () => {
    expect(can('manage_opportunity', 'PROMOTER', 'promoter', 'promoter')).toBe(true);
    expect(can('review_applications', 'PROMOTER', 'other', 'promoter')).toBe(false);
  });

  it('limits redemption confirmation to the reward partner', () => {
    expect(can('confirm_redemption', 'PARTNER', 'partner', 'partner')).toBe(true);
    expect(can('confirm_redemption', 'PARTNER', 'partner', 'someone_else')).toBe(false);
    expect(can('confirm_redemption', 'VOLUNTEER', 'vol', 'vol')).toBe(false);
    expect(can('confirm_redemption', 'PARTNER', 'partner', undefined)).toBe(false);
  });
});

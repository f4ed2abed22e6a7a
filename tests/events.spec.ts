import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { clearEvents, getEvents, logEvent, setEventMirror } from '../src/engine/events.js';

beforeEach(() => {
  clearEvents();
});

afterEach(() => {
  setEventMirror(false);
  vi.restoreAllMocks();
});

describe('event log', () => {
  it('records events and filters them by type', () => {
    logEvent('ledger.credited', { user_id: 'vol_1' });
    logEvent('ledger.debited', { user_id: 'vol_1' });
    expect(getEvents().map(e => e.type)).toEqual(['ledger.credited', 'ledger.debited']);
    expect(getEvents({ type: 'ledger.debited' }).map(e => e.payload)).toEqual([{ user_id: 'vol_1' }]);
  });

  it('stays off the console unless mirroring is switched on', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    logEvent('sweep.started', { now: 'x' });
    expect(debug).not.toHaveBeenCalled();

    setEventMirror(true);
    logEvent('sweep.started', { now: 'x' });
    logEvent('sweep.opportunity_failed', { opportunity_id: 'opp_1' });
    expect(debug).toHaveBeenCalledWith('[event] sweep.started {"now":"x"}');
    expect(warn).toHaveBeenCalledWith('[event] sweep.opportunity_failed {"opportunity_id":"opp_1"}');
  });
});

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import {
  clearEvents,
  getEventCount,
  getEvents,
  getTodayStats,
  isActivityType,
  logEvent,
} from '../api/activity-log.js';

describe('activity log', () => {
  beforeEach(() => {
    clearEvents();
  });

  it('returns the newest events first', () => {
    logEvent('inbound', 'command "ping"', { interactionId: '1', route: 'ping' });
    logEvent('deferred', 'Deferred command "ping"', { interactionId: '1', route: 'ping' });
    const events = getEvents();
    assert.deepStrictEqual(
      events.map((e) => e.type),
      ['deferred', 'inbound']
    );
  });

  it('filters by type and search text', () => {
    logEvent('inbound', 'command "ping"', { interactionId: '111', route: 'ping' });
    logEvent('inbound', 'component "vote:1"', { interactionId: '222', route: 'vote:1' });
    logEvent('security', 'Rejected interaction request (invalid_signature)');

    assert.strictEqual(getEvents({ type: 'security' }).length, 1);
    assert.deepStrictEqual(
      getEvents({ search: 'VOTE' }).map((e) => e.details.interactionId),
      ['222']
    );
    assert.deepStrictEqual(
      getEvents({ search: '111' }).map((e) => e.details.route),
      ['ping']
    );
  });

  it('limits results', () => {
    for (let i = 0; i < 5; i++) logEvent('inbound', `event ${i}`);
    assert.deepStrictEqual(
      getEvents({ limit: 2 }).map((e) => e.summary),
      ['event 4', 'event 3']
    );
  });

  it('keeps at most 500 events', () => {
    for (let i = 0; i < 510; i++) logEvent('inbound', `event ${i}`);
    assert.strictEqual(getEventCount(), 500);
    assert.strictEqual(getEvents({ limit: 500 }).at(-1)?.summary, 'event 10');
  });

  it('counts today by type', () => {
    logEvent('inbound', 'a');
    logEvent('inbound', 'b');
    logEvent('followup', 'c');
    logEvent('error', 'd');
    assert.deepStrictEqual(getTodayStats(), {
      inbound: 2,
      deferred: 0,
      followups: 1,
      errors: 1,
      security: 0,
      total: 4,
    });
  });

  it('recognises activity types', () => {
    assert.strictEqual(isActivityType('followup'), true);
    assert.strictEqual(isActivityType('message'), false);
    assert.strictEqual(isActivityType(undefined), false);
  });
});

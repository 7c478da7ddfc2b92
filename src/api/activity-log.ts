/**
 * In-memory activity log (ring buffer)
 *
 * Tracks interaction events for the management API.
 * Not persisted - resets on restart.
 */

import crypto from 'crypto';

export type ActivityType = 'inbound' | 'deferred' | 'followup' | 'error' | 'security';

export interface ActivityEvent {
  id: string;
  timestamp: string;
  type: ActivityType;
  summary: string;
  details: {
    interactionId?: string;
    kind?: string;
    route?: string;
    state?: string;
    attempts?: number;
    status?: number;
    elapsedMs?: number;
    reason?: string;
    error?: string;
  };
}

const MAX_EVENTS = 500;
const events: ActivityEvent[] = [];

export function logEvent(
  type: ActivityType,
  summary: string,
  details: ActivityEvent['details'] = {}
): ActivityEvent {
  const event: ActivityEvent = {
    id: crypto.randomUUID(),
    timestamp: new Date().toISOString(),
    type,
    summary,
    details,
  };

  events.push(event);

  if (events.length > MAX_EVENTS) {
    events.shift();
  }

  return event;
}

export function getEvents(options: {
  limit?: number;
  type?: ActivityType;
  search?: string;
} = {}): ActivityEvent[] {
  let filtered = events;

  if (options.type) {
    filtered = filtered.filter(e => e.type === options.type);
  }

  if (options.search) {
    const q = options.search.toLowerCase();
    filtered = filtered.filter(e =>
      e.summary.toLowerCase().includes(q) ||
      e.details.interactionId?.toLowerCase().includes(q) ||
      e.details.route?.toLowerCase().includes(q)
    );
  }

  const limit = options.limit || 100;
  return filtered.slice(-limit).reverse();
}

export function getTodayStats(): {
  inbound: number;
  deferred: number;
  followups: number;
  errors: number;
  security: number;
  total: number;
} {
  const today = new Date().toISOString().slice(0, 10);
  const counts = { inbound: 0, deferred: 0, followups: 0, errors: 0, security: 0, total: 0 };
  for (const e of events) {
    if (e.timestamp < today) continue;
    counts.total++;
    if (e.type === 'inbound') counts.inbound++;
    else if (e.type === 'deferred') counts.deferred++;
    else if (e.type === 'followup') counts.followups++;
    else if (e.type === 'error') counts.errors++;
    else if (e.type === 'security') counts.security++;
  }
  return counts;
}

export function getEventCount(): number {
  return events.length;
}

export function isActivityType(value: unknown): value is ActivityType {
  return (
    value === 'inbound' ||
    value === 'deferred' ||
    value === 'followup' ||
    value === 'error' ||
    value === 'security'
  );
}

/** Drop all events. Used by tests. */
export function clearEvents(): void {
  events.length = 0;
}

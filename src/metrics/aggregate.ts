import type {
  AggregateResult,
  CalendarAttendance,
  InsufficientReason,
  Lead,
  MatchedConversion,
} from '../types/lead.js';

function insufficient(reason: InsufficientReason): AggregateResult {
  return { kind: 'insufficient', reason, sampleCount: 0, records: [] };
}

/**
 * Joins leads to calendar attendances on exact email equality and keeps,
 * per email, the pair with the earliest event. Ties go to the first pair in
 * lead order, then event order. A pick whose event predates its lead is
 * discarded afterwards; no later event stands in for it.
 */
export function aggregate(leads: readonly Lead[], attendances: readonly CalendarAttendance[]): AggregateResult {
  if (!leads.length) return insufficient('no_leads');
  if (!attendances.length) return insufficient('no_events');

  const eventsByEmail = new Map<string, Date[]>();
  for (const a of attendances) {
    const list = eventsByEmail.get(a.attendeeEmail);
    if (list) list.push(a.eventCreatedAt);
    else eventsByEmail.set(a.attendeeEmail, [a.eventCreatedAt]);
  }

  let joined = 0;
  const earliest = new Map<string, MatchedConversion>();
  for (const lead of leads) {
    const events = eventsByEmail.get(lead.email);
    if (!events) continue;
    for (const eventCreatedAt of events) {
      joined++;
      const current = earliest.get(lead.email);
      if (current && current.eventCreatedAt.getTime() <= eventCreatedAt.getTime()) continue;
      earliest.set(lead.email, {
        email: lead.email,
        leadCreatedAt: new Date(lead.createdAt.getTime()),
        eventCreatedAt: new Date(eventCreatedAt.getTime()),
        durationMs: eventCreatedAt.getTime() - lead.createdAt.getTime(),
      });
    }
  }

  if (!joined) return insufficient('no_matches');
  const valid = [...earliest.values()].filter((r) => r.durationMs >= 0);
  if (!valid.length) return insufficient('no_valid_conversions');

  const records = valid.sort(
    (a, b) => a.eventCreatedAt.getTime() - b.eventCreatedAt.getTime() || (a.email < b.email ? -1 : a.email > b.email ? 1 : 0)
  );
  const total = records.reduce((sum, r) => sum + r.durationMs, 0);
  return {
    kind: 'ok',
    meanDurationMs: total / records.length,
    sampleCount: records.length,
    records,
  };
}

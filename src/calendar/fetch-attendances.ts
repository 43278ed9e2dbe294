import { LOOKBACK_DAYS, MAX_EVENTS_PER_CALENDAR } from '../config.js';
import type { CalendarAttendance, FetchResult } from '../types/lead.js';
import { errorMessage } from '../utils/errors.js';
import { logError, logMsg } from '../utils/logger.js';
import { parseTimestamp, subtractDays } from '../utils/time.js';
import type { CredentialProvider } from './credentials.js';
import type { CalendarEventRecord, CalendarService } from './google-calendar.js';
import { createGoogleCalendarService } from './google-calendar.js';

export interface AttendanceFetchOptions {
  now?: Date;
  lookbackDays?: number;
  maxResults?: number;
}

/**
 * One record per (event, attendee), skipping the calendar owner, rooms and
 * other resources, attendees without an email, and events without a
 * creation timestamp.
 */
export function extractAttendances(events: CalendarEventRecord[]): CalendarAttendance[] {
  const out: CalendarAttendance[] = [];
  for (const event of events) {
    const eventCreatedAt = parseTimestamp(event.created);
    if (!eventCreatedAt) continue;
    for (const attendee of event.attendees ?? []) {
      if (attendee.self || attendee.resource || !attendee.email) continue;
      out.push({ attendeeEmail: attendee.email, eventCreatedAt });
    }
  }
  return out;
}

export async function fetchCalendarAttendances(
  service: CalendarService,
  opts: AttendanceFetchOptions = {}
): Promise<FetchResult<CalendarAttendance>> {
  const now = opts.now ?? new Date();
  const timeMin = subtractDays(now, opts.lookbackDays ?? LOOKBACK_DAYS);
  const maxResults = opts.maxResults ?? MAX_EVENTS_PER_CALENDAR;

  logMsg('Fetching events from Google Calendar');
  try {
    const calendars = await service.listCalendars();
    const allEvents: CalendarEventRecord[] = [];
    for (const cal of calendars) {
      logMsg(`Fetching events for calendar ${cal.summary ?? ''} (${cal.id})`);
      const events = await service.listEvents(cal.id, { timeMin, maxResults });
      allEvents.push(...events);
    }
    if (!allEvents.length) {
      logMsg('No events found in any calendar');
      return { records: [] };
    }
    const attendances = extractAttendances(allEvents);
    logMsg(`Found ${attendances.length} attendee records across ${allEvents.length} events`, {
      calendars: calendars.length,
    });
    return { records: attendances };
  } catch (e) {
    logError(e, { stage: 'calendar' });
    return {
      records: [],
      diagnostic: { stage: 'calendar', message: `Google Calendar API error: ${errorMessage(e)}` },
    };
  }
}

/** Obtains a credential, then fetches. A credential failure is a calendar-stage failure. */
export async function fetchAttendancesWithCredentials(
  credentials: CredentialProvider,
  opts: AttendanceFetchOptions = {},
  makeService: typeof createGoogleCalendarService = createGoogleCalendarService
): Promise<FetchResult<CalendarAttendance>> {
  let service: CalendarService;
  try {
    service = makeService(await credentials.getClient());
  } catch (e) {
    logError(e, { stage: 'calendar' });
    return {
      records: [],
      diagnostic: { stage: 'calendar', message: `Google credentials unavailable: ${errorMessage(e)}` },
    };
  }
  return fetchCalendarAttendances(service, opts);
}

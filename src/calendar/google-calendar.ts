import { google } from 'googleapis';
import type { Auth } from 'googleapis';

export interface CalendarSummary {
  id: string;
  summary?: string | null;
}

export interface AttendeeRecord {
  email?: string | null;
  self?: boolean | null;
  resource?: boolean | null;
}

export interface CalendarEventRecord {
  id?: string | null;
  created?: string | null;
  attendees?: AttendeeRecord[] | null;
}

export interface EventQuery {
  timeMin: Date;
  maxResults: number;
}

/** The two calendar operations the attendance fetch needs. */
export interface CalendarService {
  listCalendars(): Promise<CalendarSummary[]>;
  listEvents(calendarId: string, query: EventQuery): Promise<CalendarEventRecord[]>;
}

export interface EventsListParams {
  calendarId: string;
  timeMin: string;
  maxResults: number;
  singleEvents: boolean;
  orderBy: 'startTime';
}

/** The slice of the Calendar v3 client the adapter calls. */
export interface CalendarApi {
  calendarList: {
    list(): Promise<{ data: { items?: Array<{ id?: string | null; summary?: string | null }> | null } }>;
  };
  events: {
    list(params: EventsListParams): Promise<{ data: { items?: CalendarEventRecord[] | null } }>;
  };
}

export function googleCalendarApi(auth: Auth.OAuth2Client): CalendarApi {
  const calendar = google.calendar({ version: 'v3', auth });
  return {
    calendarList: { list: () => calendar.calendarList.list() },
    events: { list: (params) => calendar.events.list(params) },
  };
}

export function createGoogleCalendarService(
  auth: Auth.OAuth2Client,
  makeApi: (auth: Auth.OAuth2Client) => CalendarApi = googleCalendarApi
): CalendarService {
  const calendar = makeApi(auth);
  return {
    async listCalendars() {
      const res = await calendar.calendarList.list();
      const items = res.data.items ?? [];
      const calendars: CalendarSummary[] = [];
      for (const item of items) {
        if (item.id) calendars.push({ id: item.id, summary: item.summary });
      }
      return calendars;
    },
    async listEvents(calendarId, query) {
      const res = await calendar.events.list({
        calendarId,
        timeMin: query.timeMin.toISOString(),
        maxResults: query.maxResults,
        singleEvents: true,
        orderBy: 'startTime',
      });
      return res.data.items ?? [];
    },
  };
}

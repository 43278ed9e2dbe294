import { describe, it, expect } from 'vitest';
import { google } from 'googleapis';
import type { Auth } from 'googleapis';
import type { CredentialProvider } from '../calendar/credentials.js';
import {
  extractAttendances,
  fetchAttendancesWithCredentials,
  fetchCalendarAttendances,
} from '../calendar/fetch-attendances.js';
import { createGoogleCalendarService } from '../calendar/google-calendar.js';
import type {
  CalendarApi,
  CalendarEventRecord,
  CalendarService,
  EventQuery,
  EventsListParams,
} from '../calendar/google-calendar.js';

class FakeCalendarService implements CalendarService {
  readonly queries: Array<{ calendarId: string; query: EventQuery }> = [];

  constructor(private readonly eventsByCalendar: Record<string, CalendarEventRecord[]>, private readonly failOn?: string) {}

  async listCalendars() {
    return Object.keys(this.eventsByCalendar).map((id) => ({ id, summary: `Calendar ${id}` }));
  }

  async listEvents(calendarId: string, query: EventQuery) {
    this.queries.push({ calendarId, query });
    if (calendarId === this.failOn) throw new Error('Quota exceeded');
    return this.eventsByCalendar[calendarId] ?? [];
  }
}

function fakeCalendarApi(
  calendars: Array<{ id?: string | null; summary?: string | null }> | undefined,
  events: CalendarEventRecord[] | undefined
) {
  const eventRequests: EventsListParams[] = [];
  const api: CalendarApi = {
    calendarList: { list: async () => ({ data: { items: calendars } }) },
    events: {
      list: async (params) => {
        eventRequests.push(params);
        return { data: { items: events } };
      },
    },
  };
  return { api, eventRequests };
}

describe('createGoogleCalendarService', () => {
  const auth = new google.auth.OAuth2('test-client', 'test-secret', 'http://localhost');

  it('skips calendar list entries without an id', async () => {
    const { api } = fakeCalendarApi(
      [{ id: 'primary', summary: 'Main' }, { summary: 'no id' }, { id: null, summary: 'null id' }, { id: 'team' }],
      []
    );
    const service = createGoogleCalendarService(auth, () => api);
    await expect(service.listCalendars()).resolves.toEqual([
      { id: 'primary', summary: 'Main' },
      { id: 'team', summary: undefined },
    ]);
  });

  it('asks for expanded events ordered by start time from the window start', async () => {
    const events = [{ id: 'e1', created: '2024-03-01T00:00:00Z', attendees: [{ email: 'a@x.com' }] }];
    const { api, eventRequests } = fakeCalendarApi([], events);
    const service = createGoogleCalendarService(auth, () => api);
    const result = await service.listEvents('primary', { timeMin: new Date('2024-01-02T00:00:00Z'), maxResults: 500 });
    expect(eventRequests).toEqual([
      {
        calendarId: 'primary',
        timeMin: '2024-01-02T00:00:00.000Z',
        maxResults: 500,
        singleEvents: true,
        orderBy: 'startTime',
      },
    ]);
    expect(result).toEqual(events);
  });

  it('treats missing items as empty lists', async () => {
    const { api } = fakeCalendarApi(undefined, undefined);
    const service = createGoogleCalendarService(auth, () => api);
    await expect(service.listCalendars()).resolves.toEqual([]);
    await expect(service.listEvents('primary', { timeMin: new Date(0), maxResults: 10 })).resolves.toEqual([]);
  });

  it('hands the auth client to the api factory', () => {
    const seen: Auth.OAuth2Client[] = [];
    createGoogleCalendarService(auth, (a) => {
      seen.push(a);
      return fakeCalendarApi([], []).api;
    });
    expect(seen).toEqual([auth]);
  });
});

describe('extractAttendances', () => {
  it('emits one record per qualifying attendee', () => {
    const records = extractAttendances([
      {
        created: '2024-01-03T12:00:00.000Z',
        attendees: [
          { email: 'me@company.com', self: true },
          { email: 'room-1@resource.calendar.google.com', resource: true },
          { email: 'a@x.com' },
          { email: 'b@x.com', self: false, resource: false },
          { email: null },
        ],
      },
    ]);
    expect(records).toEqual([
      { attendeeEmail: 'a@x.com', eventCreatedAt: new Date('2024-01-03T12:00:00Z') },
      { attendeeEmail: 'b@x.com', eventCreatedAt: new Date('2024-01-03T12:00:00Z') },
    ]);
  });

  it('skips events without a creation timestamp or attendees', () => {
    expect(
      extractAttendances([
        { attendees: [{ email: 'a@x.com' }] },
        { created: null, attendees: [{ email: 'a@x.com' }] },
        { created: '2024-01-01T00:00:00Z' },
        { created: '2024-01-01T00:00:00Z', attendees: null },
      ])
    ).toEqual([]);
  });
});

describe('fetchCalendarAttendances', () => {
  const now = new Date('2024-04-01T00:00:00Z');

  it('queries every calendar with a 90 day lower bound and a 500 event cap', async () => {
    const service = new FakeCalendarService({
      primary: [{ created: '2024-03-01T00:00:00Z', attendees: [{ email: 'a@x.com' }] }],
      team: [{ created: '2024-03-02T00:00:00Z', attendees: [{ email: 'b@x.com' }, { email: 'c@x.com' }] }],
    });
    const result = await fetchCalendarAttendances(service, { now });
    expect(service.queries).toEqual([
      { calendarId: 'primary', query: { timeMin: new Date('2024-01-02T00:00:00Z'), maxResults: 500 } },
      { calendarId: 'team', query: { timeMin: new Date('2024-01-02T00:00:00Z'), maxResults: 500 } },
    ]);
    expect(result.diagnostic).toBeUndefined();
    expect(result.records.map((r) => r.attendeeEmail)).toEqual(['a@x.com', 'b@x.com', 'c@x.com']);
  });

  it('returns an empty result without a diagnostic when no calendar has events', async () => {
    const result = await fetchCalendarAttendances(new FakeCalendarService({ primary: [] }), { now });
    expect(result).toEqual({ records: [] });
  });

  it('aborts the whole fetch when one calendar fails', async () => {
    const service = new FakeCalendarService(
      {
        primary: [{ created: '2024-03-01T00:00:00Z', attendees: [{ email: 'a@x.com' }] }],
        shared: [],
      },
      'shared'
    );
    const result = await fetchCalendarAttendances(service, { now });
    expect(result).toEqual({
      records: [],
      diagnostic: { stage: 'calendar', message: 'Google Calendar API error: Quota exceeded' },
    });
  });
});

describe('fetchAttendancesWithCredentials', () => {
  it('turns a credential failure into a calendar diagnostic', async () => {
    const credentials: CredentialProvider = {
      getClient: async () => {
        throw new Error('no token');
      },
      persist: async () => {},
    };
    const result = await fetchAttendancesWithCredentials(credentials);
    expect(result).toEqual({
      records: [],
      diagnostic: { stage: 'calendar', message: 'Google credentials unavailable: no token' },
    });
  });

  it('builds the service from the provided client', async () => {
    const client = new google.auth.OAuth2('test-client', 'test-secret', 'http://localhost');
    const seen: Auth.OAuth2Client[] = [];
    const credentials: CredentialProvider = { getClient: async () => client, persist: async () => {} };
    const result = await fetchAttendancesWithCredentials(credentials, { now: new Date('2024-04-01T00:00:00Z') }, (auth) => {
      seen.push(auth);
      return new FakeCalendarService({
        primary: [{ created: '2024-03-01T00:00:00Z', attendees: [{ email: 'a@x.com' }] }],
      });
    });
    expect(seen).toEqual([client]);
    expect(result.records).toEqual([{ attendeeEmail: 'a@x.com', eventCreatedAt: new Date('2024-03-01T00:00:00Z') }]);
  });
});

export interface Lead {
  readonly email: string; // join key, exactly as stored
  readonly createdAt: Date;
}

export interface CalendarAttendance {
  readonly attendeeEmail: string;
  readonly eventCreatedAt: Date;
}

export interface MatchedConversion {
  readonly email: string;
  readonly leadCreatedAt: Date;
  readonly eventCreatedAt: Date;
  readonly durationMs: number; // always >= 0
}

export type FetchStage = 'leads' | 'calendar';

export interface FetchDiagnostic {
  stage: FetchStage;
  message: string;
}

export interface FetchResult<T> {
  records: T[];
  diagnostic?: FetchDiagnostic;
}

export type InsufficientReason = 'no_leads' | 'no_events' | 'no_matches' | 'no_valid_conversions';

export type AggregateResult =
  | {
      kind: 'ok';
      meanDurationMs: number;
      sampleCount: number;
      records: MatchedConversion[]; // ordered by eventCreatedAt, then email
    }
  | {
      kind: 'insufficient';
      reason: InsufficientReason;
      sampleCount: 0;
      records: [];
    };

import { aggregate } from './metrics/aggregate.js';
import type { AggregateResult, CalendarAttendance, FetchDiagnostic, FetchResult, Lead } from './types/lead.js';

export interface PipelineDeps {
  fetchLeads(): Promise<FetchResult<Lead>>;
  fetchAttendances(): Promise<FetchResult<CalendarAttendance>>;
}

export interface PipelineRun {
  leadCount: number;
  attendanceCount: number;
  result: AggregateResult;
  diagnostics: FetchDiagnostic[];
}

/** One fetch + aggregate cycle. The two fetches share nothing and run side by side. */
export async function runPipeline(deps: PipelineDeps): Promise<PipelineRun> {
  const [leads, attendances] = await Promise.all([deps.fetchLeads(), deps.fetchAttendances()]);
  const diagnostics: FetchDiagnostic[] = [];
  if (leads.diagnostic) diagnostics.push(leads.diagnostic);
  if (attendances.diagnostic) diagnostics.push(attendances.diagnostic);
  return {
    leadCount: leads.records.length,
    attendanceCount: attendances.records.length,
    result: aggregate(leads.records, attendances.records),
    diagnostics,
  };
}

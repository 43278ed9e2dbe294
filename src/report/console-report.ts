import type { AggregateResult, FetchDiagnostic, InsufficientReason } from '../types/lead.js';

const INSUFFICIENT_NOTICES: Record<InsufficientReason, string> = {
  no_leads: 'Not enough data to compute the metric: no leads were found.',
  no_events: 'Not enough data to compute the metric: no calendar attendees were found.',
  no_matches: 'No lead has a scheduled call.',
  no_valid_conversions: 'No lead has a valid booking (event created after the lead).',
};

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** Timedelta-style rendering, e.g. `2 days 12:00:00` or `0 days 03:15:42.500`. */
export function formatTimedelta(ms: number): string {
  const wholeMs = Math.floor(ms);
  const days = Math.floor(wholeMs / 86_400_000);
  const rest = wholeMs - days * 86_400_000;
  const hours = Math.floor(rest / 3_600_000);
  const minutes = Math.floor((rest % 3_600_000) / 60_000);
  const seconds = Math.floor((rest % 60_000) / 1000);
  const millis = rest % 1000;
  const clock = `${pad2(hours)}:${pad2(minutes)}:${pad2(seconds)}`;
  return `${days} days ${clock}${millis ? `.${String(millis).padStart(3, '0')}` : ''}`;
}

/** Whole days, remaining hours and remaining minutes of a mean duration. */
export function formatMeanDuration(ms: number): string {
  const totalSeconds = ms / 1000;
  const days = Math.floor(totalSeconds / 86400);
  const hours = Math.floor((totalSeconds % 86400) / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  return `${days} days, ${hours} hours and ${minutes} minutes`;
}

export function formatConsoleReport(result: AggregateResult, diagnostics: FetchDiagnostic[] = []): string[] {
  const lines = diagnostics.map((d) => `[${d.stage}] ${d.message}`);
  if (result.kind === 'insufficient') {
    lines.push(INSUFFICIENT_NOTICES[result.reason]);
    return lines;
  }
  lines.push(
    '',
    '--- RESULT: Lead to Opportunity Speed ---',
    `Based on ${result.sampleCount} leads with a scheduled call.`,
    '',
    'Average time between lead creation and booking of the first call:',
    `--> ${formatTimedelta(result.meanDurationMs)}`,
    `--> In friendlier terms: ${formatMeanDuration(result.meanDurationMs)}.`
  );
  return lines;
}

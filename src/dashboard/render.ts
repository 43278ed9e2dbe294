import type { AggregateResult, FetchDiagnostic, MatchedConversion } from '../types/lead.js';

export const SORT_COLUMNS = ['email', 'lead_created_at', 'event_created_at', 'speed'] as const;
export type SortColumn = (typeof SORT_COLUMNS)[number];
export type SortDirection = 'asc' | 'desc';

export interface SortState {
  column: SortColumn;
  direction: SortDirection;
}

export const DEFAULT_SORT: SortState = { column: 'event_created_at', direction: 'asc' };

const COLUMN_LABELS: Record<SortColumn, string> = {
  email: 'Lead email',
  lead_created_at: 'Lead created at',
  event_created_at: 'Call booked at',
  speed: 'Conversion time',
};

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/** Metric card value: whole days and the remaining whole hours. */
export function formatDashboardDuration(ms: number): string {
  const totalSeconds = ms / 1000;
  const days = Math.floor(totalSeconds / 86400);
  const hours = Math.floor((totalSeconds % 86400) / 3600);
  return `${days} days and ${hours} hours`;
}

/** Table cell value, from whole seconds: days, then hours of the remaining seconds-of-day. */
export function formatDetailDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const days = Math.floor(totalSeconds / 86400);
  const secondsOfDay = totalSeconds - days * 86400;
  return `${days} days, ${Math.floor(secondsOfDay / 3600)} hours`;
}

export function formatTimestamp(d: Date): string {
  return d.toISOString().replace('T', ' ').slice(0, 19);
}

export function parseSort(column: unknown, direction: unknown): SortState {
  const col = SORT_COLUMNS.find((c) => c === column);
  if (!col) return DEFAULT_SORT;
  return { column: col, direction: direction === 'desc' ? 'desc' : 'asc' };
}

function sortValue(r: MatchedConversion, column: SortColumn): number | string {
  switch (column) {
    case 'email':
      return r.email;
    case 'lead_created_at':
      return r.leadCreatedAt.getTime();
    case 'event_created_at':
      return r.eventCreatedAt.getTime();
    case 'speed':
      return r.durationMs;
  }
}

export function sortRecords(records: readonly MatchedConversion[], sort: SortState): MatchedConversion[] {
  const sign = sort.direction === 'asc' ? 1 : -1;
  return [...records].sort((a, b) => {
    const va = sortValue(a, sort.column);
    const vb = sortValue(b, sort.column);
    if (va < vb) return -sign;
    if (va > vb) return sign;
    return 0;
  });
}

function page(body: string): string {
  return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>Leads vs. Bookings</title>
<style>
body { font-family: system-ui, sans-serif; margin: 2rem auto; max-width: 72rem; padding: 0 1rem; }
.metrics { display: flex; gap: 2rem; }
.metric { border: 1px solid #ddd; border-radius: 8px; padding: 1rem 1.5rem; flex: 1; }
.metric .value { font-size: 1.8rem; font-weight: 600; }
.warning { background: #fff4e5; border-left: 4px solid #f0a020; padding: .75rem 1rem; margin: 1rem 0; }
.error { background: #fdecea; border-left: 4px solid #d93025; padding: .75rem 1rem; margin: 1rem 0; }
.success { background: #e6f4ea; border-left: 4px solid #1e8e3e; padding: .75rem 1rem; margin: 1rem 0; }
table { border-collapse: collapse; width: 100%; }
th, td { text-align: left; padding: .4rem .6rem; border-bottom: 1px solid #eee; }
.button { display: inline-block; background: #1a73e8; color: #fff; padding: .5rem 1rem; border-radius: 6px; text-decoration: none; }
</style>
</head>
<body>
<h1>Performance dashboard: leads vs. bookings</h1>
<p>Average time between a lead's creation and the booking of its first call.</p>
${body}
</body>
</html>
`;
}

export function renderLanding(): string {
  return page('<p><a class="button" href="/report">Analyze now</a></p>');
}

function headerCell(column: SortColumn, sort: SortState): string {
  const active = sort.column === column;
  const nextDir: SortDirection = active && sort.direction === 'asc' ? 'desc' : 'asc';
  const marker = active ? (sort.direction === 'asc' ? ' ▲' : ' ▼') : '';
  return `<th><a href="/report?sort=${column}&amp;dir=${nextDir}">${COLUMN_LABELS[column]}${marker}</a></th>`;
}

export function renderDetailTable(records: readonly MatchedConversion[], sort: SortState): string {
  const rows = sortRecords(records, sort)
    .map(
      (r) =>
        `<tr><td>${escapeHtml(r.email)}</td><td>${formatTimestamp(r.leadCreatedAt)}</td>` +
        `<td>${formatTimestamp(r.eventCreatedAt)}</td><td>${formatDetailDuration(r.durationMs)}</td></tr>`
    )
    .join('\n');
  const header = SORT_COLUMNS.map((c) => headerCell(c, sort)).join('');
  return `<table>\n<thead><tr>${header}</tr></thead>\n<tbody>\n${rows}\n</tbody>\n</table>`;
}

export function renderReport(result: AggregateResult, diagnostics: FetchDiagnostic[], sort: SortState = DEFAULT_SORT): string {
  const parts = diagnostics.map((d) => `<div class="error">${escapeHtml(d.message)}</div>`);
  if (result.kind === 'insufficient') {
    switch (result.reason) {
      case 'no_leads':
        parts.push('<div class="warning">Not enough data was found for the analysis: no leads were found.</div>');
        break;
      case 'no_events':
        parts.push(
          '<div class="warning">Not enough data was found for the analysis: no calendar attendees were found.</div>'
        );
        break;
      case 'no_matches':
        parts.push('<div class="success">Data loaded.</div>');
        parts.push('<div class="warning">No lead has a scheduled call.</div>');
        break;
      case 'no_valid_conversions':
        parts.push('<div class="success">Data loaded.</div>');
        parts.push('<div class="warning">No lead has a valid booking.</div>');
        break;
    }
  } else {
    parts.push(
      '<div class="success">Data loaded.</div>',
      '<h2>Key results</h2>',
      '<div class="metrics">',
      `<div class="metric"><div>Lead to Opportunity Speed</div><div class="value">${formatDashboardDuration(result.meanDurationMs)}</div></div>`,
      `<div class="metric"><div>Converted leads</div><div class="value">${result.sampleCount} leads</div></div>`,
      '</div>',
      '<h2>Converted lead details</h2>',
      '<p>Click a column header to sort.</p>',
      renderDetailTable(result.records, sort)
    );
  }
  parts.push('<p><a class="button" href="/report?refresh=1">Analyze again</a></p>');
  return page(parts.join('\n'));
}

import { z } from 'zod';
import type { LeadSource } from '../database/queries/leads.js';
import type { FetchResult, Lead } from '../types/lead.js';
import { errorMessage, FetchFailure } from '../utils/errors.js';
import { logError, logMsg, logWarn } from '../utils/logger.js';
import { parseTimestamp } from '../utils/time.js';

const leadRowSchema = z.object({
  email: z.string().min(1),
  created_at: z.union([z.string(), z.date()]),
});

/**
 * Turns raw rows into leads. Rows without an email or with a missing or
 * unparseable created_at are dropped and counted.
 */
export function normalizeLeadRows(rows: unknown[]): { leads: Lead[]; dropped: number } {
  const leads: Lead[] = [];
  let dropped = 0;
  for (const row of rows) {
    const parsed = leadRowSchema.safeParse(row);
    const createdAt = parsed.success ? parseTimestamp(parsed.data.created_at) : null;
    if (!parsed.success || !createdAt) {
      dropped++;
      continue;
    }
    leads.push({ email: parsed.data.email, createdAt });
  }
  return { leads, dropped };
}

export async function fetchLeads(source: LeadSource): Promise<FetchResult<Lead>> {
  logMsg('Fetching leads from the lead store');
  try {
    const rows = await source.selectLeadRows();
    if (!Array.isArray(rows)) {
      throw new FetchFailure('leads', 'Lead store returned a malformed response');
    }
    const { leads, dropped } = normalizeLeadRows(rows);
    if (dropped) logWarn(`Dropped ${dropped} lead rows without a usable email or created_at`);
    if (!leads.length) logMsg('No leads found in the lead store');
    else logMsg(`Found ${leads.length} leads`);
    return { records: leads };
  } catch (e) {
    logError(e, { stage: 'leads' });
    return {
      records: [],
      diagnostic: { stage: 'leads', message: `Error fetching leads: ${errorMessage(e)}` },
    };
  }
}

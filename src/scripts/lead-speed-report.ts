#!/usr/bin/env tsx
/**
 * Batch run: fetch leads and calendar attendees, aggregate, print the
 * Lead to Opportunity Speed to stdout.
 *
 * Usage: tsx src/scripts/lead-speed-report.ts
 */
import 'dotenv/config';
import { createAppContext } from '../app.js';
import { loadConfig } from '../config.js';
import { runPipeline } from '../pipeline.js';
import { formatConsoleReport } from '../report/console-report.js';
import { logError, logMsg, logVar } from '../utils/logger.js';

async function main() {
  const config = loadConfig();
  logVar('config.ready', { leadsTable: config.database.leadsTable, tokenPath: config.google.tokenPath });
  const ctx = createAppContext(config);
  try {
    const run = await runPipeline(ctx.deps);
    logMsg('Report computed', { leads: run.leadCount, attendances: run.attendanceCount, result: run.result.kind });
    for (const line of formatConsoleReport(run.result, run.diagnostics)) console.log(line);
  } finally {
    await ctx.close();
  }
}

try {
  await main();
} catch (e) {
  logError(e);
  process.exitCode = 1;
}

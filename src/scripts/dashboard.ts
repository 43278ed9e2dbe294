#!/usr/bin/env tsx
/**
 * Interactive dashboard. Each "Analyze now" runs one fetch + aggregate +
 * render cycle; fetch results are cached for CACHE_TTL_SECONDS.
 *
 * Usage: tsx src/scripts/dashboard.ts
 */
import 'dotenv/config';
import { createAppContext } from '../app.js';
import type { AppContext } from '../app.js';
import { loadConfig } from '../config.js';
import { createDashboardApp, listenDashboard } from '../dashboard/server.js';
import { logError, logMsg } from '../utils/logger.js';

let ctx: AppContext | undefined;
try {
  const config = loadConfig();
  const context = createAppContext(config);
  ctx = context;
  const app = createDashboardApp(context.deps, { cacheTtlSeconds: config.dashboard.cacheTtlSeconds });
  const server = await listenDashboard(app, config.dashboard.port);
  logMsg(`Dashboard on http://localhost:${config.dashboard.port}`);
  server.on('error', (e) => logError(e));
  process.once('SIGINT', () => {
    server.close();
    context.close().catch((e: unknown) => logError(e));
  });
} catch (e) {
  logError(e);
  process.exitCode = 1;
  await ctx?.close().catch((err: unknown) => logError(err));
}

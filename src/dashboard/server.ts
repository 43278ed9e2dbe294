import type { Server } from 'http';
import express from 'express';
import type { Express, Request, Response } from 'express';
import type { PipelineDeps } from '../pipeline.js';
import { runPipeline } from '../pipeline.js';
import type { CalendarAttendance, FetchResult, Lead } from '../types/lead.js';
import { logError, logMsg } from '../utils/logger.js';
import { cachedFetch, TtlCache } from './cache.js';
import { parseSort, renderLanding, renderReport } from './render.js';

export interface DashboardOptions {
  cacheTtlSeconds: number;
  now?: () => number;
}

export function createDashboardApp(deps: PipelineDeps, opts: DashboardOptions): Express {
  const ttlMs = opts.cacheTtlSeconds * 1000;
  const leadCache = new TtlCache<FetchResult<Lead>>(ttlMs, opts.now);
  const attendanceCache = new TtlCache<FetchResult<CalendarAttendance>>(ttlMs, opts.now);
  const cachedDeps: PipelineDeps = {
    fetchLeads: cachedFetch(deps.fetchLeads, leadCache),
    fetchAttendances: cachedFetch(deps.fetchAttendances, attendanceCache),
  };

  const app = express();

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.get('/', (_req: Request, res: Response) => {
    res.type('html').send(renderLanding());
  });

  app.get('/report', async (req: Request, res: Response) => {
    if (req.query.refresh === '1') {
      leadCache.clear();
      attendanceCache.clear();
    }
    try {
      const run = await runPipeline(cachedDeps);
      logMsg('Dashboard report rendered', { result: run.result.kind, sampleCount: run.result.sampleCount });
      res.type('html').send(renderReport(run.result, run.diagnostics, parseSort(req.query.sort, req.query.dir)));
    } catch (e) {
      logError(e, { route: '/report' });
      res.status(500).type('text').send('Report failed');
    }
  });

  return app;
}

/** Resolves once the app is listening; rejects on a listen error such as EADDRINUSE. */
export function listenDashboard(app: Express, port: number, host?: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = host ? app.listen(port, host) : app.listen(port);
    server.once('error', reject);
    server.once('listening', () => {
      server.off('error', reject);
      resolve(server);
    });
  });
}

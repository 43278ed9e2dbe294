import type { Pool } from 'pg';
import { fetchAttendancesWithCredentials } from './calendar/fetch-attendances.js';
import { FileCredentialProvider } from './calendar/credentials.js';
import type { AppConfig } from './config.js';
import { createLeadSource } from './database/queries/leads.js';
import { closePool, createPool, createQuery } from './database/utils/connection.js';
import { fetchLeads } from './leads/fetch-leads.js';
import type { PipelineDeps } from './pipeline.js';

export interface AppContext {
  deps: PipelineDeps;
  close(): Promise<void>;
}

/** Wires the Postgres lead store and the token-file Google credentials into pipeline deps. */
export function createAppContext(config: AppConfig): AppContext {
  const pool: Pool = createPool(config.database);
  const source = createLeadSource(createQuery(pool), config.database.leadsTable);
  const credentials = new FileCredentialProvider(config.google);
  return {
    deps: {
      fetchLeads: () => fetchLeads(source),
      fetchAttendances: () => fetchAttendancesWithCredentials(credentials),
    },
    close: () => closePool(pool),
  };
}

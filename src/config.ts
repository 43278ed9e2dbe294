import { ConfigError } from './utils/errors.js';

export const LOOKBACK_DAYS = 90;
export const MAX_EVENTS_PER_CALENDAR = 500;
export const CALENDAR_SCOPES = ['https://www.googleapis.com/auth/calendar.readonly'];

export interface AppConfig {
  database: {
    connectionString: string;
    ssl: boolean;
    leadsTable: string;
  };
  google: {
    clientId: string;
    clientSecret: string;
    redirectUri: string;
    tokenPath: string;
  };
  dashboard: {
    port: number;
    cacheTtlSeconds: number;
  };
}

type EnvRecord = Record<string, string | undefined>;

function flag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return value.toLowerCase() === 'true';
}

function required(env: EnvRecord, key: string, missing: string[]): string {
  const value = env[key] || '';
  if (!value) missing.push(key);
  return value;
}

/**
 * Builds the configuration handed to the fetchers and surfaces. Reads from
 * `process.env` unless another record is given; `.env` is loaded by the
 * scripts through `dotenv/config`.
 */
export function loadConfig(env: EnvRecord = process.env): AppConfig {
  const missing: string[] = [];
  const connectionString = required(env, 'DATABASE_URL', missing);
  const clientId = required(env, 'GOOGLE_CLIENT_ID', missing);
  const clientSecret = required(env, 'GOOGLE_CLIENT_SECRET', missing);
  if (missing.length) {
    throw new ConfigError(`Missing required environment variables: ${missing.join(', ')}`);
  }

  const port = Number(env.DASHBOARD_PORT || 8501);
  const cacheTtlSeconds = Number(env.CACHE_TTL_SECONDS || 3600);
  if (!Number.isInteger(port) || port < 0) throw new ConfigError(`Invalid DASHBOARD_PORT: ${env.DASHBOARD_PORT}`);
  if (!Number.isFinite(cacheTtlSeconds) || cacheTtlSeconds < 0) {
    throw new ConfigError(`Invalid CACHE_TTL_SECONDS: ${env.CACHE_TTL_SECONDS}`);
  }

  return {
    database: {
      connectionString,
      ssl: flag(env.DATABASE_SSL, true),
      leadsTable: env.LEADS_TABLE || 'leads_data',
    },
    google: {
      clientId,
      clientSecret,
      redirectUri: env.GOOGLE_REDIRECT_URI || 'http://localhost',
      tokenPath: env.GOOGLE_TOKEN_PATH || 'token.json',
    },
    dashboard: {
      port,
      cacheTtlSeconds,
    },
  };
}

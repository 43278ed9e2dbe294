import fs from 'fs/promises';
import path from 'path';
import { google } from 'googleapis';
import type { Auth } from 'googleapis';
import { z } from 'zod';
import type { AppConfig } from '../config.js';
import { CredentialError, errorMessage } from '../utils/errors.js';
import { logMsg } from '../utils/logger.js';

/** Hands out a ready-to-use OAuth2 client and stores refreshed tokens. */
export interface CredentialProvider {
  getClient(): Promise<Auth.OAuth2Client>;
  persist(tokens: Auth.Credentials): Promise<void>;
}

const storedTokenSchema = z.object({
  access_token: z.string().nullish(),
  refresh_token: z.string().nullish(),
  expiry_date: z.number().nullish(),
  token_type: z.string().nullish(),
  scope: z.string().optional(),
  id_token: z.string().nullish(),
});

export type StoredToken = z.infer<typeof storedTokenSchema>;

const EXPIRY_SKEW_MS = 60_000;

export function createOAuthClient(config: AppConfig['google']): Auth.OAuth2Client {
  return new google.auth.OAuth2(config.clientId, config.clientSecret, config.redirectUri);
}

export function isExpired(token: StoredToken, now: Date = new Date()): boolean {
  if (!token.access_token) return true;
  if (token.expiry_date == null) return false;
  return token.expiry_date - EXPIRY_SKEW_MS <= now.getTime();
}

export interface FileCredentialOptions {
  now?: () => Date;
  createClient?: (config: AppConfig['google']) => Auth.OAuth2Client;
}

/**
 * Token-file backed provider. The file holds the JSON credentials written by
 * `npm run authorize`; an expired access token is refreshed with the stored
 * refresh token and written back.
 */
export class FileCredentialProvider implements CredentialProvider {
  private readonly config: AppConfig['google'];
  private readonly now: () => Date;
  private readonly createClient: (config: AppConfig['google']) => Auth.OAuth2Client;

  constructor(config: AppConfig['google'], opts: FileCredentialOptions = {}) {
    this.config = config;
    this.now = opts.now ?? (() => new Date());
    this.createClient = opts.createClient ?? createOAuthClient;
  }

  get tokenPath(): string {
    return path.resolve(process.cwd(), this.config.tokenPath);
  }

  async readToken(): Promise<StoredToken | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.tokenPath, 'utf8');
    } catch (e) {
      if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return null;
      throw e;
    }
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (e) {
      throw new CredentialError(`Token file ${this.tokenPath} is not valid JSON: ${errorMessage(e)}`);
    }
    const parsed = storedTokenSchema.safeParse(json);
    if (!parsed.success) {
      throw new CredentialError(`Token file ${this.tokenPath} has an unexpected shape`);
    }
    return parsed.data;
  }

  async getClient(): Promise<Auth.OAuth2Client> {
    const token = await this.readToken();
    if (!token) {
      throw new CredentialError(`No Google token at ${this.tokenPath}. Run \`npm run authorize\` first.`);
    }
    const client = this.createClient(this.config);
    client.setCredentials(token);
    if (!isExpired(token, this.now())) return client;

    if (!token.refresh_token) {
      throw new CredentialError('Google token expired and has no refresh token. Run `npm run authorize` again.');
    }
    try {
      await client.getAccessToken();
    } catch (e) {
      throw new CredentialError(`Could not refresh the Google token: ${errorMessage(e)}`);
    }
    // Google omits the refresh token on refresh responses
    await this.persist({ ...client.credentials, refresh_token: client.credentials.refresh_token ?? token.refresh_token });
    logMsg('Refreshed Google access token');
    return client;
  }

  async persist(tokens: Auth.Credentials): Promise<void> {
    await fs.mkdir(path.dirname(this.tokenPath), { recursive: true });
    await fs.writeFile(this.tokenPath, JSON.stringify(tokens, null, 2), { mode: 0o600 });
  }
}

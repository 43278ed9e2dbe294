#!/usr/bin/env tsx
/**
 * One-time Google consent: prints the consent URL, reads the code that
 * Google appends to the redirect URL and stores the token file used by
 * the report and the dashboard.
 *
 * Usage: tsx src/scripts/authorize.ts
 */
import 'dotenv/config';
import { stdin as input, stdout as output } from 'process';
import readline from 'readline/promises';
import { createOAuthClient, FileCredentialProvider } from '../calendar/credentials.js';
import { CALENDAR_SCOPES, loadConfig } from '../config.js';
import { logError } from '../utils/logger.js';

async function main() {
  const config = loadConfig();
  const client = createOAuthClient(config.google);
  const provider = new FileCredentialProvider(config.google);

  const url = client.generateAuthUrl({ access_type: 'offline', prompt: 'consent', scope: CALENDAR_SCOPES });
  console.log('Open this URL in a browser and approve read-only calendar access:\n');
  console.log(url);
  console.log(`\nAfter approving, copy the "code" parameter from the ${config.google.redirectUri} redirect.`);

  const rl = readline.createInterface({ input, output });
  const code = (await rl.question('Authorization code: ').finally(() => rl.close())).trim();
  if (!code) throw new Error('No authorization code entered');

  const { tokens } = await client.getToken(code);
  await provider.persist(tokens);
  console.log(`✅ Token saved to ${provider.tokenPath}`);
}

try {
  await main();
} catch (e) {
  logError(e);
  process.exitCode = 1;
}

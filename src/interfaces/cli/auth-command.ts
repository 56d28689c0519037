import { randomUUID } from 'node:crypto';
import { ConfigError } from '../../domain/index.js';
import { GoogleOAuthClient, loadConfig, saveConfig } from '../../infrastructure/index.js';
import type { GoogleClientCredentials } from '../../infrastructure/index.js';
import type { CliDeps } from './deps.js';

export interface AuthGoogleOptions {
  clientId?: string;
  clientSecret?: string;
}

/**
 * Runs the Google OAuth flow: prints the consent URL, waits for the
 * redirect on localhost, exchanges the code and stores client + token.
 */
export async function runAuthGoogle(options: AuthGoogleOptions, deps: CliDeps): Promise<void> {
  const config = loadConfig(deps.configPath) ?? {};

  const clientId = options.clientId ?? config.google_client?.client_id;
  const clientSecret = options.clientSecret ?? config.google_client?.client_secret;
  if (!clientId || !clientSecret) {
    throw new ConfigError('Google OAuth client is not configured: pass --client-id and --client-secret');
  }
  const client: GoogleClientCredentials = { client_id: clientId, client_secret: clientSecret };

  const oauth = new GoogleOAuthClient({
    client,
    fetchFn: deps.fetchFn,
    now: () => deps.now().getTime(),
  });

  const state = randomUUID();
  deps.write('Open this URL in your browser to authorize calendar access:');
  deps.write(oauth.authorizeUrl(state));

  const code = await deps.waitForAuthorizationCode(state);
  const token = await oauth.exchangeCode(code);

  saveConfig(deps.configPath, { ...config, google_client: client, google_token: token });
  deps.log.info({ expires_at: token.expires_at }, 'Google token stored');
  deps.write('Google Calendar authorized. Pick a calendar with `standup calendars` and `standup config --calendar <id>`.');
}

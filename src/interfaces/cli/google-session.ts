import {
  GoogleOAuthClient,
  GoogleSession,
  saveConfig,
} from '../../infrastructure/index.js';
import type { StandupConfig } from '../../infrastructure/index.js';
import type { CliDeps } from './deps.js';

/**
 * Session over the stored Google token, or null when Google has not
 * been authorized yet. Refreshed tokens are written back to the config file.
 */
export function createGoogleSession(config: StandupConfig, deps: CliDeps): GoogleSession | null {
  const client = config.google_client;
  const token = config.google_token;
  if (client === undefined || token === undefined) return null;

  const oauth = new GoogleOAuthClient({
    client,
    fetchFn: deps.fetchFn,
    now: () => deps.now().getTime(),
  });

  return new GoogleSession(oauth, token, (refreshed) => {
    saveConfig(deps.configPath, { ...config, google_token: refreshed });
    deps.log.debug('Google token refreshed');
  });
}

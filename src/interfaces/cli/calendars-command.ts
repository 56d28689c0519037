import { ConfigError } from '../../domain/index.js';
import { GoogleCalendarSource, loadConfig, resolveTimeZone } from '../../infrastructure/index.js';
import type { CliDeps } from './deps.js';
import { createGoogleSession } from './google-session.js';

/** Prints `id<TAB>summary` per calendar, the primary one marked with `*`. */
export async function runListCalendars(deps: CliDeps): Promise<void> {
  const config = loadConfig(deps.configPath);
  const session = config === null ? null : createGoogleSession(config, deps);
  if (config === null || session === null) {
    throw new ConfigError('Google is not authorized: run `standup auth google` first');
  }

  const source = new GoogleCalendarSource({
    calendarId: config.gcal?.id ?? 'primary',
    tokens: session,
    zone: resolveTimeZone(config),
    log: deps.log,
    fetchFn: deps.fetchFn,
  });

  for (const calendar of await source.listCalendars()) {
    deps.write(`${calendar.primary ? '*' : ' '} ${calendar.id}\t${calendar.summary}`);
  }
}

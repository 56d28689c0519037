import type { EventSource } from '../../domain/index.js';
import {
  assertValidWindow,
  buildReport,
  collectRawEvents,
  renderJson,
  renderText,
  resolveWindow,
} from '../../application/index.js';
import {
  GithubEventSource,
  GoogleCalendarSource,
  loadConfig,
  resolveGithubCredentials,
  resolveTimeZone,
} from '../../infrastructure/index.js';
import type { StandupConfig } from '../../infrastructure/index.js';
import type { CliDeps } from './deps.js';
import { createGoogleSession } from './google-session.js';

export interface ReportCommandOptions {
  since?: string;
  until?: string;
  issueComments?: boolean;
  json?: boolean;
  user?: string;
  token?: string;
}

function calendarSource(config: StandupConfig, zone: string, deps: CliDeps): EventSource | null {
  if (config.gcal === undefined) return null;

  const session = createGoogleSession(config, deps);
  if (session === null) {
    deps.log.warn(
      { calendar: config.gcal.id },
      'Calendar configured but Google is not authorized, run `standup auth google`',
    );
    return null;
  }

  return new GoogleCalendarSource({
    calendarId: config.gcal.id,
    tokens: session,
    zone,
    log: deps.log,
    fetchFn: deps.fetchFn,
  });
}

/**
 * Default command: resolve window and credentials, fetch every source,
 * build the report and print it.
 *
 * The window is validated before anything is fetched; a failing source
 * aborts the run before the report engine is invoked.
 */
export async function runReport(options: ReportCommandOptions, deps: CliDeps): Promise<void> {
  const config = loadConfig(deps.configPath);
  const github = resolveGithubCredentials(config, deps.env, { user: options.user, token: options.token });
  const zone = resolveTimeZone(config);

  const window = resolveWindow({ since: options.since, until: options.until }, { now: deps.now(), zone });
  assertValidWindow(window);

  const sources: EventSource[] = [
    new GithubEventSource({
      username: github.username,
      token: github.token,
      log: deps.log,
      fetchFn: deps.fetchFn,
    }),
  ];

  const calendar = config === null ? null : calendarSource(config, zone, deps);
  if (calendar !== null) sources.push(calendar);

  deps.log.info(
    { since: window.since.toISOString(), until: window.until.toISOString(), sources: sources.map((s) => s.name) },
    'Collecting events',
  );

  const rawEvents = await collectRawEvents(sources, window, deps.log);

  const model = buildReport(
    rawEvents,
    window,
    {
      includeIssueComments: options.issueComments ?? config?.include_issue_comments ?? false,
      viewer: github.username,
    },
    deps.log,
  );

  deps.write(options.json === true ? renderJson(model) : renderText(model));
}

export { createLogger } from './logger.js';
export {
  loadConfig,
  saveConfig,
  resolveConfigPath,
  resolveGithubCredentials,
  resolveTimeZone,
  configFileSchema,
} from './config/index.js';
export type { StandupConfig, GoogleToken, GoogleClientCredentials, GithubCredentials } from './config/index.js';
export { fetchJson } from './http/index.js';
export type { FetchFn } from './http/index.js';
export { GithubEventSource } from './github/index.js';
export {
  GoogleOAuthClient,
  GoogleSession,
  GoogleCalendarSource,
  OAUTH_CALLBACK_PORT,
  OAUTH_REDIRECT_URI,
} from './google/index.js';
export type { CalendarSummary } from './google/index.js';

export { GoogleOAuthClient, GoogleSession, OAUTH_CALLBACK_PORT, OAUTH_REDIRECT_URI } from './google-oauth.js';
export type { GoogleOAuthOptions } from './google-oauth.js';
export { GoogleCalendarSource } from './calendar-source.js';
export type { AccessTokenProvider, CalendarSourceOptions, CalendarSummary } from './calendar-source.js';

export { default as oauthCallbackRoutes } from './oauth-callback-routes.js';
export type { OAuthCallbackOptions } from './oauth-callback-routes.js';
export { buildOAuthCallbackApp, waitForAuthorizationCode } from './oauth-callback-server.js';
export type { WaitForCodeOptions } from './oauth-callback-server.js';

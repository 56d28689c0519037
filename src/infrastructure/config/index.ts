export { configFileSchema } from './config-schema.js';
export type { StandupConfig, GoogleToken, GoogleClientCredentials } from './config-schema.js';
export { loadConfig, saveConfig, resolveConfigPath } from './config-store.js';
export { resolveGithubCredentials, resolveTimeZone } from './settings.js';
export type { GithubCredentials, CredentialOverrides } from './settings.js';

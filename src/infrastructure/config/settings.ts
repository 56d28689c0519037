import { IANAZone } from 'luxon';
import { ConfigError } from '../../domain/index.js';
import type { StandupConfig } from './config-schema.js';

export interface GithubCredentials {
  readonly username: string;
  readonly token: string;
}

export interface CredentialOverrides {
  readonly user?: string | undefined;
  readonly token?: string | undefined;
}

/**
 * GitHub credentials: CLI flags win over `STANDUP_USER` /
 * `STANDUP_GITHUB_TOKEN`, which win over the config file.
 */
export function resolveGithubCredentials(
  config: StandupConfig | null,
  env: NodeJS.ProcessEnv,
  overrides: CredentialOverrides = {},
): GithubCredentials {
  const username = overrides.user ?? env['STANDUP_USER'] ?? config?.github?.username;
  const token = overrides.token ?? env['STANDUP_GITHUB_TOKEN'] ?? config?.github?.token;

  if (!username) {
    throw new ConfigError('GitHub user is not configured: run `standup config` or set STANDUP_USER');
  }
  if (!token) {
    throw new ConfigError('GitHub token is not configured: run `standup config` or set STANDUP_GITHUB_TOKEN');
  }

  return { username, token };
}

/** Configured time zone, or the host's. */
export function resolveTimeZone(config: StandupConfig | null): string {
  const zone = config?.time_zone ?? Intl.DateTimeFormat().resolvedOptions().timeZone;
  if (!IANAZone.isValidZone(zone)) {
    throw new ConfigError(`Unknown time zone "${zone}"`);
  }
  return zone;
}

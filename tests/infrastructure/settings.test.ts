import { describe, it, expect } from 'vitest';
import { resolveGithubCredentials, resolveTimeZone } from '../../src/infrastructure/config/settings.js';
import { ConfigError } from '../../src/domain/index.js';
import type { StandupConfig } from '../../src/infrastructure/config/index.js';

const fileConfig: StandupConfig = { github: { username: 'file-user', token: 'file-token' } };

describe('resolveGithubCredentials', () => {
  it('reads the config file', () => {
    expect(resolveGithubCredentials(fileConfig, {})).toEqual({ username: 'file-user', token: 'file-token' });
  });

  it('lets the environment override the file', () => {
    const env = { STANDUP_USER: 'env-user', STANDUP_GITHUB_TOKEN: 'env-token' };
    expect(resolveGithubCredentials(fileConfig, env)).toEqual({ username: 'env-user', token: 'env-token' });
  });

  it('lets flags override the environment', () => {
    const env = { STANDUP_USER: 'env-user', STANDUP_GITHUB_TOKEN: 'env-token' };
    expect(resolveGithubCredentials(fileConfig, env, { user: 'flag-user' }))
      .toEqual({ username: 'flag-user', token: 'env-token' });
  });

  it('fails when nothing provides a user', () => {
    expect(() => resolveGithubCredentials(null, {})).toThrow(ConfigError);
    expect(() => resolveGithubCredentials(null, {})).toThrow(/GitHub user is not configured/);
  });

  it('fails when nothing provides a token', () => {
    expect(() => resolveGithubCredentials(null, { STANDUP_USER: 'octo' }))
      .toThrow(/GitHub token is not configured/);
  });
});

describe('resolveTimeZone', () => {
  it('uses the configured zone', () => {
    expect(resolveTimeZone({ time_zone: 'Europe/Berlin' })).toBe('Europe/Berlin');
  });

  it('rejects an unknown zone', () => {
    expect(() => resolveTimeZone({ time_zone: 'Mars/Olympus' })).toThrow('Unknown time zone "Mars/Olympus"');
  });

  it('falls back to the host zone', () => {
    expect(resolveTimeZone(null)).toBe(Intl.DateTimeFormat().resolvedOptions().timeZone);
  });
});

import { IANAZone } from 'luxon';
import { ConfigError } from '../../domain/index.js';
import { loadConfig, saveConfig } from '../../infrastructure/index.js';
import type { StandupConfig } from '../../infrastructure/index.js';
import type { CliDeps } from './deps.js';

export interface ConfigCommandOptions {
  githubUser?: string;
  githubToken?: string;
  calendar?: string;
  timeZone?: string;
  issueComments?: boolean;
}

/**
 * Updates the config file with whatever was passed; other keys are kept.
 * GitHub user and token must be set together on a fresh file.
 */
export function runConfig(options: ConfigCommandOptions, deps: CliDeps): void {
  const current = loadConfig(deps.configPath) ?? {};
  const next: StandupConfig = { ...current };

  const username = options.githubUser ?? current.github?.username;
  const token = options.githubToken ?? current.github?.token;
  if (options.githubUser !== undefined || options.githubToken !== undefined) {
    if (!username || !token) {
      throw new ConfigError('Both --github-user and --github-token are required on first setup');
    }
    next.github = { username, token };
  }

  if (options.calendar !== undefined) {
    next.gcal = { id: options.calendar };
  }

  if (options.timeZone !== undefined) {
    if (!IANAZone.isValidZone(options.timeZone)) {
      throw new ConfigError(`Unknown time zone "${options.timeZone}"`);
    }
    next.time_zone = options.timeZone;
  }

  if (options.issueComments !== undefined) {
    next.include_issue_comments = options.issueComments;
  }

  saveConfig(deps.configPath, next);
  deps.log.debug({ path: deps.configPath }, 'Config saved');
  deps.write(`Configuration saved to ${deps.configPath}`);
}

import { chmodSync, existsSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import type { ZodIssue } from 'zod';
import { ConfigError } from '../../domain/index.js';
import { configFileSchema } from './config-schema.js';
import type { StandupConfig } from './config-schema.js';

/** `STANDUP_CONFIG` overrides the default `~/.standup` location. */
export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env['STANDUP_CONFIG'] ?? join(homedir(), '.standup');
}

function formatIssues(issues: readonly ZodIssue[]): string {
  return issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Loads the configuration file.
 *
 * Returns null when the file does not exist (not configured yet).
 * An unreadable, non-JSON or schema-violating file is a ConfigError.
 */
export function loadConfig(filePath: string): StandupConfig | null {
  if (!existsSync(filePath)) return null;

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err: unknown) {
    throw new ConfigError(`Cannot read config file ${filePath}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (err: unknown) {
    throw new ConfigError(`Config file ${filePath} is not valid JSON`, { cause: err });
  }

  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`Config file ${filePath} is invalid: ${formatIssues(parsed.error.issues)}`);
  }

  return parsed.data;
}

/** Writes the configuration, readable by the owner only (it holds tokens). */
export function saveConfig(filePath: string, config: StandupConfig): void {
  try {
    writeFileSync(filePath, `${JSON.stringify(config, null, 2)}\n`, { encoding: 'utf-8', mode: 0o600 });
    // `mode` only applies when the file is created.
    chmodSync(filePath, 0o600);
  } catch (err: unknown) {
    throw new ConfigError(`Cannot write config file ${filePath}`, { cause: err });
  }
}

#!/usr/bin/env node
import { createLogger, resolveConfigPath, OAUTH_CALLBACK_PORT } from './infrastructure/index.js';
import { waitForAuthorizationCode } from './interfaces/http/index.js';
import { createProgram } from './interfaces/cli/index.js';

/**
 * `standup` entry point.
 *
 * Wires the real environment (process env, global fetch, wall clock,
 * stdout, the localhost OAuth listener) into the command tree.
 */
const log = createLogger();

async function main(): Promise<void> {
  const program = createProgram({
    log,
    env: process.env,
    configPath: resolveConfigPath(),
    fetchFn: fetch,
    now: () => new Date(),
    write: (line) => {
      process.stdout.write(`${line}\n`);
    },
    waitForAuthorizationCode: (state) =>
      waitForAuthorizationCode({ expectedState: state, port: OAUTH_CALLBACK_PORT, log }),
  });

  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  log.debug({ err }, 'Command failed');
  const message = err instanceof Error ? err.message : String(err);
  console.error(`standup: ${message}`);
  process.exit(1);
});

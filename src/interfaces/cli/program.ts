import { Command } from 'commander';
import type { CliDeps } from './deps.js';
import { runReport } from './report-command.js';
import type { ReportCommandOptions } from './report-command.js';
import { runConfig } from './config-command.js';
import type { ConfigCommandOptions } from './config-command.js';
import { runAuthGoogle } from './auth-command.js';
import type { AuthGoogleOptions } from './auth-command.js';
import { runListCalendars } from './calendars-command.js';

/**
 * Builds the `standup` command tree.
 *
 * - `standup [report]`: print the digest (default command)
 * - `standup config`: write credentials and preferences
 * - `standup auth google`: authorize Google Calendar access
 * - `standup calendars`: list calendars available to the account
 */
export function createProgram(deps: CliDeps): Command {
  const program = new Command();

  program
    .name('standup')
    .description('Generate a report for the morning standup from GitHub and Google Calendar.');

  program
    .command('report', { isDefault: true })
    .description('print activity since a day (default: yesterday)')
    .option('-s, --since <day>', 'start of the report: today, yesterday, a weekday or YYYY-MM-DD')
    .option('-u, --until <day>', 'end of the report (exclusive), same forms as --since; default: now')
    .option('--issue-comments', 'include issues you only commented on')
    .option('--no-issue-comments', 'leave issue comments out for this run')
    .option('--json', 'print the report as JSON')
    .option('--user <login>', 'GitHub login (overrides STANDUP_USER and the config file)')
    .option('--token <token>', 'GitHub token (overrides STANDUP_GITHUB_TOKEN and the config file)')
    .action(async (options: ReportCommandOptions) => {
      await runReport(options, deps);
    });

  program
    .command('config')
    .description('store credentials and preferences in the config file')
    .option('--github-user <login>', 'GitHub login')
    .option('--github-token <token>', 'GitHub personal access token')
    .option('--calendar <id>', 'Google Calendar id to read meetings from')
    .option('--time-zone <zone>', 'IANA time zone used for day boundaries')
    .option('--issue-comments', 'include issue comments by default')
    .option('--no-issue-comments', 'leave issue comments out by default')
    .action((options: ConfigCommandOptions) => {
      runConfig(options, deps);
    });

  const auth = program
    .command('auth')
    .description('authorize external accounts');

  auth
    .command('google')
    .description('authorize read-only Google Calendar access')
    .option('--client-id <id>', 'OAuth client id')
    .option('--client-secret <secret>', 'OAuth client secret')
    .action(async (options: AuthGoogleOptions) => {
      await runAuthGoogle(options, deps);
    });

  program
    .command('calendars')
    .description('list calendars of the authorized Google account')
    .action(async () => {
      await runListCalendars(deps);
    });

  return program;
}

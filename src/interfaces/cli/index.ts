export { createProgram } from './program.js';
export type { CliDeps } from './deps.js';
export { runReport } from './report-command.js';
export type { ReportCommandOptions } from './report-command.js';
export { runConfig } from './config-command.js';
export type { ConfigCommandOptions } from './config-command.js';
export { runAuthGoogle } from './auth-command.js';
export type { AuthGoogleOptions } from './auth-command.js';
export { runListCalendars } from './calendars-command.js';

export type {
  RawEvent,
  EventSourceName,
  Event,
  EventKind,
  Action,
  ReportWindow,
  ReportConfig,
} from './event.js';
export { ACTION_PRIORITY } from './event.js';
export type { ReportItem, ReportGroup, ReportModel } from './report.js';
export { MEETINGS_ORIGIN } from './report.js';
export type { EventSource } from './event-source.js';
export { ValidationError, ConfigError, SourceError } from './errors.js';

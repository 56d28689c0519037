export { assertValidWindow, isWithinWindow } from './report-window.js';
export { normalize, normalizeBatch } from './normalizer.js';
export type { NormalizeResult, NormalizeStats } from './normalizer.js';
export { merge, mergeItems } from './merger.js';
export { group } from './grouper.js';
export { sort } from './sorter.js';
export { buildReport } from './report-engine.js';
export { renderText, renderJson, EMPTY_REPORT_TEXT } from './render.js';
export { resolveDay, resolveWindow } from './date-shortcuts.js';
export type { ResolveOptions } from './date-shortcuts.js';
export { collectRawEvents } from './collect-events.js';

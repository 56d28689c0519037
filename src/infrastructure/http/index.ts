export { fetchJson } from './fetch-json.js';
export type { FetchFn, JsonResponse } from './fetch-json.js';

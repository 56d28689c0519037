export { GithubEventSource, toRawEvent } from './github-source.js';
export type { GithubSourceOptions } from './github-source.js';
export { githubEventSchema } from './github-schema.js';
export type { GithubEvent } from './github-schema.js';
export { parseLinkHeader } from './link-header.js';

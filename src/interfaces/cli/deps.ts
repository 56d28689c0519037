import type { Logger } from 'pino';
import type { FetchFn } from '../../infrastructure/index.js';

/** Everything the commands touch outside their own arguments. */
export interface CliDeps {
  readonly log: Logger;
  readonly env: NodeJS.ProcessEnv;
  readonly configPath: string;
  readonly fetchFn: FetchFn;
  readonly now: () => Date;
  /** Prints one line of user-facing output. */
  readonly write: (line: string) => void;
  /** Blocks until the OAuth redirect delivers a code for `state`. */
  readonly waitForAuthorizationCode: (state: string) => Promise<string>;
}

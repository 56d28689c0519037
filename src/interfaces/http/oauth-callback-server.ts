import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import { SourceError } from '../../domain/index.js';
import oauthCallbackRoutes from './oauth-callback-routes.js';
import type { OAuthCallbackOptions } from './oauth-callback-routes.js';

const DEFAULT_HOST = '127.0.0.1';
const DEFAULT_TIMEOUT_MS = 5 * 60_000;

/** Fastify app serving only the OAuth redirect target. Not listening yet. */
export async function buildOAuthCallbackApp(options: OAuthCallbackOptions): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: false });
  await fastify.register(oauthCallbackRoutes, options);
  return fastify;
}

export interface WaitForCodeOptions {
  readonly expectedState: string;
  readonly port: number;
  readonly log: Logger;
  readonly host?: string;
  readonly timeoutMs?: number;
}

/**
 * Listens for the OAuth redirect, resolves with the authorization code
 * and shuts the listener down again, whatever the outcome.
 */
export async function waitForAuthorizationCode(options: WaitForCodeOptions): Promise<string> {
  let resolveCode: (code: string) => void = () => undefined;
  let rejectCode: (err: Error) => void = () => undefined;
  const code = new Promise<string>((resolve, reject) => {
    resolveCode = resolve;
    rejectCode = reject;
  });

  const fastify = await buildOAuthCallbackApp({
    expectedState: options.expectedState,
    onCode: resolveCode,
    onDenied: (reason) => rejectCode(new SourceError('google-oauth', `authorization denied: ${reason}`)),
  });

  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  let timer: NodeJS.Timeout | undefined;

  try {
    await fastify.listen({ host: options.host ?? DEFAULT_HOST, port: options.port });
    options.log.info({ port: options.port }, 'Waiting for OAuth callback');
    timer = setTimeout(() => {
      rejectCode(new SourceError('google-oauth', `no authorization received within ${timeoutMs / 1000}s`));
    }, timeoutMs);
    return await code;
  } finally {
    clearTimeout(timer);
    await fastify.close();
  }
}

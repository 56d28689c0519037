import fp from 'fastify-plugin';
import { z } from 'zod';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

export interface OAuthCallbackOptions {
  /** `state` sent with the authorization URL; anything else is rejected. */
  readonly expectedState: string;
  readonly onCode: (code: string) => void;
  readonly onDenied: (reason: string) => void;
}

const callbackQuerySchema = z.object({
  code: z.string().min(1).optional(),
  state: z.string().optional(),
  error: z.string().min(1).optional(),
});

/**
 * Registers the OAuth redirect target.
 *
 * GET /: Google redirects the browser here with `?code=...&state=...`
 * (or `?error=access_denied`). The page only tells the user to return
 * to the terminal; the code is handed to `onCode`.
 */
async function oauthCallbackRoutes(fastify: FastifyInstance, opts: OAuthCallbackOptions): Promise<void> {
  fastify.get('/', async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = callbackQuerySchema.safeParse(request.query);

    if (!parsed.success) {
      return reply.status(400).type('text/plain').send('Malformed callback');
    }

    const { code, state, error } = parsed.data;

    if (state !== opts.expectedState) {
      fastify.log.warn('OAuth callback with unexpected state ignored');
      return reply.status(400).type('text/plain').send('Unexpected state, start the authorization again');
    }

    if (error !== undefined) {
      opts.onDenied(error);
      return reply.status(400).type('text/plain').send('Authorization failed, check your terminal');
    }

    if (code === undefined) {
      return reply.status(400).type('text/plain').send('Missing authorization code');
    }

    opts.onCode(code);
    return reply.type('text/plain').send('Go back to your terminal :)');
  });
}

export default fp(oauthCallbackRoutes, {
  name: 'oauth-callback-routes',
  fastify: '5.x',
});

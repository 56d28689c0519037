import { describe, it, expect, vi, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildOAuthCallbackApp, waitForAuthorizationCode } from '../../src/interfaces/http/index.js';
import { SourceError } from '../../src/domain/index.js';
import { fakeLogger } from '../helpers.js';

describe('OAuth callback route', () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  async function createApp() {
    const onCode = vi.fn();
    const onDenied = vi.fn();
    app = await buildOAuthCallbackApp({ expectedState: 'state-1', onCode, onDenied });
    return { app, onCode, onDenied };
  }

  it('hands the code over and sends the user back to the terminal', async () => {
    const { app, onCode } = await createApp();

    const response = await app.inject({ method: 'GET', url: '/?code=auth-code&state=state-1' });

    expect(response.statusCode).toBe(200);
    expect(response.body).toBe('Go back to your terminal :)');
    expect(onCode).toHaveBeenCalledWith('auth-code');
  });

  it('ignores a callback with another state', async () => {
    const { app, onCode } = await createApp();

    const response = await app.inject({ method: 'GET', url: '/?code=auth-code&state=forged' });

    expect(response.statusCode).toBe(400);
    expect(onCode).not.toHaveBeenCalled();
  });

  it('reports a denied consent', async () => {
    const { app, onCode, onDenied } = await createApp();

    const response = await app.inject({ method: 'GET', url: '/?error=access_denied&state=state-1' });

    expect(response.statusCode).toBe(400);
    expect(onDenied).toHaveBeenCalledWith('access_denied');
    expect(onCode).not.toHaveBeenCalled();
  });

  it('rejects a callback without a code', async () => {
    const { app } = await createApp();

    const response = await app.inject({ method: 'GET', url: '/?state=state-1' });

    expect(response.statusCode).toBe(400);
    expect(response.body).toBe('Missing authorization code');
  });

  it('rejects repeated query parameters', async () => {
    const { app } = await createApp();

    const response = await app.inject({ method: 'GET', url: '/?code=a&code=b&state=state-1' });

    expect(response.statusCode).toBe(400);
    expect(response.body).toBe('Malformed callback');
  });
});

describe('waitForAuthorizationCode', () => {
  it('gives up after the timeout', async () => {
    const error = await waitForAuthorizationCode({
      expectedState: 'state-1',
      port: 0,
      log: fakeLogger(),
      timeoutMs: 50,
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(SourceError);
    if (error instanceof SourceError) {
      expect(error.message).toBe('google-oauth: no authorization received within 0.05s');
    }
  });
});

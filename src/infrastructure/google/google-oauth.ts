import { SourceError } from '../../domain/index.js';
import type { GoogleClientCredentials, GoogleToken } from '../config/index.js';
import { fetchJson } from '../http/index.js';
import type { FetchFn } from '../http/index.js';
import { tokenResponseSchema } from './google-schema.js';

const SOURCE_NAME = 'google-oauth';
const AUTH_URL = 'https://accounts.google.com/o/oauth2/v2/auth';
const TOKEN_URL = 'https://oauth2.googleapis.com/token';

export const OAUTH_CALLBACK_PORT = 7890;
export const OAUTH_REDIRECT_URI = `http://localhost:${OAUTH_CALLBACK_PORT}`;

const SCOPES = [
  'https://www.googleapis.com/auth/calendar.readonly',
  'https://www.googleapis.com/auth/calendar.events.readonly',
];

/** Tokens are refreshed this long before they actually expire. */
const REFRESH_MARGIN_MS = 60_000;

export interface GoogleOAuthOptions {
  readonly client: GoogleClientCredentials;
  readonly fetchFn?: FetchFn;
  readonly now?: () => number;
  readonly redirectUri?: string;
}

/**
 * Installed-app OAuth flow against Google: authorization URL, code
 * exchange and refresh. Stateless; token persistence is the caller's.
 */
export class GoogleOAuthClient {
  private readonly client: GoogleClientCredentials;
  private readonly fetchFn: FetchFn;
  private readonly nowFn: () => number;
  private readonly redirectUri: string;

  constructor(options: GoogleOAuthOptions) {
    this.client = options.client;
    this.fetchFn = options.fetchFn ?? fetch;
    this.nowFn = options.now ?? Date.now;
    this.redirectUri = options.redirectUri ?? OAUTH_REDIRECT_URI;
  }

  authorizeUrl(state: string): string {
    const params = new URLSearchParams({
      client_id: this.client.client_id,
      redirect_uri: this.redirectUri,
      response_type: 'code',
      scope: SCOPES.join(' '),
      access_type: 'offline',
      prompt: 'consent',
      state,
    });
    return `${AUTH_URL}?${params.toString()}`;
  }

  async exchangeCode(code: string): Promise<GoogleToken> {
    const response = await this.requestToken({
      grant_type: 'authorization_code',
      code,
      redirect_uri: this.redirectUri,
    });

    if (response.refresh_token === undefined) {
      throw new SourceError(SOURCE_NAME, 'token response has no refresh_token');
    }

    return {
      access_token: response.access_token,
      refresh_token: response.refresh_token,
      expires_at: this.expiresAt(response.expires_in),
    };
  }

  /** Google only sometimes rotates the refresh token; the old one is kept otherwise. */
  async refresh(token: GoogleToken): Promise<GoogleToken> {
    const response = await this.requestToken({
      grant_type: 'refresh_token',
      refresh_token: token.refresh_token,
    });

    return {
      access_token: response.access_token,
      refresh_token: response.refresh_token ?? token.refresh_token,
      expires_at: this.expiresAt(response.expires_in),
    };
  }

  needsRefresh(token: GoogleToken): boolean {
    return new Date(token.expires_at).getTime() - REFRESH_MARGIN_MS <= this.nowFn();
  }

  private expiresAt(expiresInSeconds: number): string {
    return new Date(this.nowFn() + expiresInSeconds * 1000).toISOString();
  }

  private async requestToken(params: Record<string, string>) {
    const { body } = await fetchJson(SOURCE_NAME, this.fetchFn, TOKEN_URL, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({
        ...params,
        client_id: this.client.client_id,
        client_secret: this.client.client_secret,
      }).toString(),
    });

    const parsed = tokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new SourceError(SOURCE_NAME, 'unexpected token response');
    }
    return parsed.data;
  }
}

/**
 * Hands out a valid access token, refreshing it when it is about to
 * expire. `onRefresh` receives every new token so it can be persisted.
 */
export class GoogleSession {
  private token: GoogleToken;

  constructor(
    private readonly oauth: GoogleOAuthClient,
    token: GoogleToken,
    private readonly onRefresh: (token: GoogleToken) => void,
  ) {
    this.token = token;
  }

  async accessToken(): Promise<string> {
    if (this.oauth.needsRefresh(this.token)) {
      this.token = await this.oauth.refresh(this.token);
      this.onRefresh(this.token);
    }
    return this.token.access_token;
  }
}

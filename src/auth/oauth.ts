import { AuthorizationCode } from 'simple-oauth2';
import { z } from 'zod';
import type { ClientConfig } from '../config/index.js';
import { logger as defaultLogger, sanitizeForLog, type Logger } from '../config/logger.js';
import { ApiError, ConfigurationError, classifyFailure, classifyResponse } from '../client/errors.js';
import { systemClock, type Clock, type HttpTransport } from '../client/types.js';
import type { TokenPair, TokenStore } from './store.js';

// Token endpoint payload; only access_token is mandatory
export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).nullish(),
  token_type: z.string().optional(),
  expires_in: z.coerce.number().optional(),
});

export type TokenResponse = z.input<typeof TokenResponseSchema>;

export type OAuthSettings = Pick<ClientConfig, 'clientId' | 'clientSecret' | 'redirectUri' | 'authUrl' | 'accountKey' | 'tokens'> & {
  http: Pick<ClientConfig['http'], 'timeoutMs'>;
};

export interface TokenInfo {
  hasAccessToken: boolean;
  hasRefreshToken: boolean;
  issuedAt: string | null;
  expiresAt: string | null;
  expiresInSeconds: number | null;
  needsRefresh: boolean;
}

const DEFAULT_EXPIRES_IN_SECONDS = 3600;
const TOKEN_PATH = '/oauth2/access_token';
const AUTHORIZE_PATH = '/oauth2/authorize';

export function assertOAuthConfigured(settings: Pick<ClientConfig, 'clientId' | 'clientSecret' | 'redirectUri'>): void {
  const missing = (['clientId', 'clientSecret', 'redirectUri'] as const).filter((key) => settings[key].trim() === '');
  if (missing.length > 0) {
    throw new ConfigurationError(`Missing required configuration: ${missing.join(', ')}`, missing);
  }
}

function parseBody(text: string): unknown {
  if (text.trim() === '') return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * TokenService — owns the OAuth2 token lifecycle for one account.
 *
 * getValidAccessToken() is the only thing the dispatcher calls per request:
 * it either returns a token that is valid now or null. Refreshes start once
 * the token is inside the refresh buffer and collapse into a single token
 * endpoint call per account no matter how many callers arrive at once.
 */
export class TokenService {
  private readonly store: TokenStore;
  private readonly transport: HttpTransport;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly oauthClient: AuthorizationCode;

  constructor(
    private readonly settings: OAuthSettings,
    deps: { store: TokenStore; transport: HttpTransport; clock?: Clock; logger?: Logger },
  ) {
    assertOAuthConfigured(settings);

    this.store = deps.store;
    this.transport = deps.transport;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? defaultLogger;

    this.oauthClient = new AuthorizationCode({
      client: { id: settings.clientId, secret: settings.clientSecret },
      auth: {
        tokenHost: settings.authUrl,
        tokenPath: TOKEN_PATH,
        authorizePath: AUTHORIZE_PATH,
      },
    });
  }

  private get refreshBufferMs(): number {
    return this.settings.tokens.refreshBufferSeconds * 1000;
  }

  getAuthorizationUrl(state?: string): string {
    return this.oauthClient.authorizeURL({
      redirect_uri: this.settings.redirectUri,
      ...(state ? { state } : {}),
    });
  }

  async getValidAccessToken(): Promise<string | null> {
    const pair = await this.store.get(this.settings.accountKey);
    if (!pair) {
      this.logger.warn('TokenService: no access token stored', { accountKey: this.settings.accountKey });
      return null;
    }

    if (!this.needsRefresh(pair)) {
      return pair.accessToken;
    }

    this.logger.debug('TokenService: token inside refresh buffer', {
      expiresAt: pair.expiresAt.toISOString(),
      secondsLeft: Math.round((pair.expiresAt.getTime() - this.clock.now()) / 1000),
    });

    try {
      const refreshed = await this.refresh();
      return refreshed.accessToken;
    } catch (error) {
      this.logger.error('TokenService: refresh failed, no valid token available', {
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  async hasValidTokens(): Promise<boolean> {
    const pair = await this.store.get(this.settings.accountKey);
    if (!pair || !pair.refreshToken) return false;
    return !this.needsRefresh(pair);
  }

  /**
   * Validates a token endpoint response and stores it as a brand-new pair.
   * A response without refresh_token keeps the refresh token already stored.
   */
  async storeTokens(response: TokenResponse): Promise<TokenPair> {
    const parsed = TokenResponseSchema.safeParse(response);
    if (!parsed.success) {
      throw new ApiError('Validation', 'No access token in token response', {
        errors: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    const data = parsed.data;
    let refreshToken = data.refresh_token ?? null;
    if (refreshToken === null) {
      const existing = await this.store.get(this.settings.accountKey);
      refreshToken = existing?.refreshToken ?? null;
    }

    const now = this.clock.now();
    const expiresIn = data.expires_in ?? DEFAULT_EXPIRES_IN_SECONDS;
    const pair: TokenPair = {
      accessToken: data.access_token,
      refreshToken,
      tokenType: data.token_type ?? 'Bearer',
      issuedAt: new Date(now),
      expiresAt: new Date(now + expiresIn * 1000),
    };

    await this.store.save(this.settings.accountKey, pair, this.settings.tokens.cacheTtlSeconds);

    this.logger.info('TokenService: tokens stored', {
      expiresAt: pair.expiresAt.toISOString(),
      hasRefreshToken: refreshToken !== null,
      refreshTokenSource: data.refresh_token ? 'new' : 'preserved',
    });

    return pair;
  }

  /**
   * Exchanges the stored refresh token for a new pair. Concurrent callers
   * share one in-flight exchange and receive the same pair.
   */
  refresh(): Promise<TokenPair> {
    return this.store.withRefreshLock(this.settings.accountKey, () => this.performRefresh());
  }

  async exchangeAuthorizationCode(code: string): Promise<TokenPair> {
    const response = await this.postToTokenEndpoint({
      grant_type: 'authorization_code',
      code,
      redirect_uri: this.settings.redirectUri,
    });
    return this.storeTokens(response);
  }

  async clearTokens(): Promise<void> {
    await this.store.delete(this.settings.accountKey);
    this.logger.info('TokenService: tokens cleared', { accountKey: this.settings.accountKey });
  }

  async getTokenInfo(): Promise<TokenInfo> {
    const pair = await this.store.get(this.settings.accountKey);
    if (!pair) {
      return {
        hasAccessToken: false,
        hasRefreshToken: false,
        issuedAt: null,
        expiresAt: null,
        expiresInSeconds: null,
        needsRefresh: true,
      };
    }

    return {
      hasAccessToken: pair.accessToken !== '',
      hasRefreshToken: pair.refreshToken !== null,
      issuedAt: pair.issuedAt.toISOString(),
      expiresAt: pair.expiresAt.toISOString(),
      expiresInSeconds: Math.max(0, Math.floor((pair.expiresAt.getTime() - this.clock.now()) / 1000)),
      needsRefresh: this.needsRefresh(pair),
    };
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private needsRefresh(pair: TokenPair): boolean {
    return this.clock.now() >= pair.expiresAt.getTime() - this.refreshBufferMs;
  }

  private async performRefresh(): Promise<TokenPair> {
    // Read again under the lock: a caller that saw the old pair may arrive
    // after another refresh already stored a fresh one
    const current = await this.store.get(this.settings.accountKey);
    if (current && !this.needsRefresh(current)) {
      this.logger.debug('TokenService: token already refreshed, skipping exchange', {
        expiresAt: current.expiresAt.toISOString(),
      });
      return current;
    }
    if (!current?.refreshToken) {
      await this.clearTokens();
      throw new ApiError('Unauthorized', 'Token refresh not possible: no refresh token available. Please reconnect.', {
        statusCode: 401,
      });
    }

    this.logger.info('TokenService: refreshing access token', sanitizeForLog({ refreshToken: current.refreshToken }));

    let response: TokenResponse;
    try {
      response = await this.postToTokenEndpoint({
        grant_type: 'refresh_token',
        refresh_token: current.refreshToken,
      });
    } catch (error) {
      const failure = classifyFailure(error);
      // 400 invalid_grant / 401: the refresh token itself is dead
      if (failure.statusCode === 400 || failure.statusCode === 401) {
        this.logger.error('TokenService: refresh token rejected, clearing tokens', {
          status: failure.statusCode,
          error: failure.message,
        });
        await this.clearTokens();
      }
      throw new ApiError('Unauthorized', `Token refresh failed: ${failure.message}`, {
        statusCode: failure.statusCode || 401,
        cause: failure,
      });
    }

    const pair = await this.storeTokens(response);
    this.logger.info('TokenService: access token refreshed', { expiresAt: pair.expiresAt.toISOString() });
    return pair;
  }

  private async postToTokenEndpoint(params: Record<string, string>): Promise<TokenResponse> {
    const response = await this.transport.send({
      method: 'POST',
      url: `${this.settings.authUrl.replace(/\/$/, '')}${TOKEN_PATH}`,
      headers: { Accept: 'application/json' },
      form: {
        client_id: this.settings.clientId,
        client_secret: this.settings.clientSecret,
        ...params,
      },
      timeoutMs: this.settings.http.timeoutMs,
    });

    const body = parseBody(response.body);
    if (response.status < 200 || response.status >= 300) {
      throw classifyResponse(response.status, body, response.headers, this.clock.now());
    }

    const parsed = TokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ApiError('Validation', 'No access token in token response', {
        statusCode: response.status,
        body: sanitizeForLog(body),
      });
    }
    return parsed.data;
  }
}

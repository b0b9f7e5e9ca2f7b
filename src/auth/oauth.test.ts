import { beforeEach, describe, expect, it } from 'vitest';
import { parseConfig } from '../config/index.js';
import { ApiError, ConfigurationError } from '../client/errors.js';
import { createTestLogger, FakeTransport, json, ManualClock, T0, testConfig } from '../../tests/helpers.js';
import { MemoryTokenStore } from './memory-store.js';
import { TokenService } from './oauth.js';
import type { TokenPair } from './store.js';

// Reads are snapshotted when issued and delivered after a real delay
class LaggingStore extends MemoryTokenStore {
  constructor(private readonly lagMs: number, clock: ManualClock) {
    super({ clock });
  }

  override async get(accountKey: string): Promise<TokenPair | null> {
    const snapshot = await super.get(accountKey);
    await new Promise((resolve) => setTimeout(resolve, this.lagMs));
    return snapshot;
  }
}

const TOKEN_ROUTE = '/oauth2/access_token';

describe('TokenService', () => {
  let clock: ManualClock;
  let store: MemoryTokenStore;
  let transport: FakeTransport;
  let logger: ReturnType<typeof createTestLogger>;
  let service: TokenService;

  beforeEach(() => {
    clock = new ManualClock();
    store = new MemoryTokenStore({ clock });
    transport = new FakeTransport();
    logger = createTestLogger();
    service = new TokenService(parseConfig(testConfig()), { store, transport, clock, logger });
  });

  async function seed(expiresInSeconds: number, refreshToken: string | null = 'refresh-1'): Promise<void> {
    await store.save('default', {
      accessToken: 'access-1',
      refreshToken,
      tokenType: 'Bearer',
      issuedAt: new Date(clock.now()),
      expiresAt: new Date(clock.now() + expiresInSeconds * 1000),
    }, 3600);
  }

  it('refuses to start without client credentials', () => {
    const create = () =>
      new TokenService(parseConfig(testConfig({ clientSecret: '' })), { store, transport, clock });

    expect(create).toThrow(ConfigurationError);
    expect(create).toThrow('Missing required configuration: clientSecret');
  });

  it('builds the authorization URL from the configured client', () => {
    const url = new URL(service.getAuthorizationUrl('state-123'));

    expect(`${url.origin}${url.pathname}`).toBe('https://auth.example.test/oauth2/authorize');
    expect(url.searchParams.get('response_type')).toBe('code');
    expect(url.searchParams.get('client_id')).toBe('test-client');
    expect(url.searchParams.get('redirect_uri')).toBe('http://localhost:3000/callback');
    expect(url.searchParams.get('state')).toBe('state-123');
  });

  describe('storeTokens', () => {
    it('stores a fresh pair with expiry relative to now', async () => {
      const pair = await service.storeTokens({ access_token: 'a', refresh_token: 'r', expires_in: 3600 });

      expect(pair).toEqual({
        accessToken: 'a',
        refreshToken: 'r',
        tokenType: 'Bearer',
        issuedAt: new Date(T0),
        expiresAt: new Date(T0 + 3_600_000),
      });
      expect(await service.getValidAccessToken()).toBe('a');
      expect(await service.hasValidTokens()).toBe(true);
    });

    it('defaults a missing expires_in to one hour', async () => {
      const pair = await service.storeTokens({ access_token: 'a', refresh_token: 'r' });
      expect(pair.expiresAt.getTime()).toBe(T0 + 3_600_000);
    });

    it('stores a negative expires_in as an already invalid pair', async () => {
      const pair = await service.storeTokens({ access_token: 'a', refresh_token: 'r', expires_in: -100 });

      expect(pair.expiresAt.getTime()).toBe(T0 - 100_000);
      expect(await service.hasValidTokens()).toBe(false);
      const info = await service.getTokenInfo();
      expect(info.needsRefresh).toBe(true);
      expect(info.expiresInSeconds).toBe(0);
    });

    it('keeps the stored refresh token when the response has none', async () => {
      await seed(3600);
      const pair = await service.storeTokens({ access_token: 'a2', expires_in: 3600 });
      expect(pair.refreshToken).toBe('refresh-1');
    });

    it('rejects a response without an access token', async () => {
      await expect(service.storeTokens({ access_token: '' })).rejects.toMatchObject({ kind: 'Validation' });
    });
  });

  describe('getValidAccessToken', () => {
    it('returns null when nothing is stored', async () => {
      expect(await service.getValidAccessToken()).toBeNull();
      expect(transport.requests).toHaveLength(0);
    });

    it('returns the stored token outside the refresh buffer without a network call', async () => {
      await seed(301);
      expect(await service.getValidAccessToken()).toBe('access-1');
      expect(transport.requests).toHaveLength(0);
    });

    it('refreshes once for concurrent callers when the token is about to expire', async () => {
      await seed(2);
      transport.on(TOKEN_ROUTE, json(200, { access_token: 'access-2', refresh_token: 'refresh-2', expires_in: 3600 }));

      const tokens = await Promise.all([
        service.getValidAccessToken(),
        service.getValidAccessToken(),
        service.getValidAccessToken(),
      ]);

      expect(tokens).toEqual(['access-2', 'access-2', 'access-2']);
      const calls = transport.callsTo(TOKEN_ROUTE);
      expect(calls).toHaveLength(1);
      expect(calls[0].url).toBe('https://auth.example.test/oauth2/access_token');
      expect(calls[0].form).toEqual({
        client_id: 'test-client',
        client_secret: 'test-secret',
        grant_type: 'refresh_token',
        refresh_token: 'refresh-1',
      });
      expect((await store.get('default'))?.refreshToken).toBe('refresh-2');
    });

    it('does not exchange again for a caller that read the pair before a refresh finished', async () => {
      const lagging = new LaggingStore(10, clock);
      await lagging.save('default', {
        accessToken: 'access-1',
        refreshToken: 'refresh-1',
        tokenType: 'Bearer',
        issuedAt: new Date(clock.now()),
        expiresAt: new Date(clock.now() + 2_000),
      }, 3600);
      const lagged = new TokenService(parseConfig(testConfig()), { store: lagging, transport, clock, logger });
      transport.on(
        TOKEN_ROUTE,
        json(200, { access_token: 'access-2', refresh_token: 'refresh-2', expires_in: 3600 }),
        json(200, { access_token: 'access-3', refresh_token: 'refresh-3', expires_in: 3600 }),
      );

      // First caller refreshes around 20 ms; the second reads the stale pair at 15 ms
      const first = lagged.getValidAccessToken();
      const second = new Promise<string | null>((resolve, reject) => {
        setTimeout(() => {
          lagged.getValidAccessToken().then(resolve, reject);
        }, 15);
      });

      expect(await Promise.all([first, second])).toEqual(['access-2', 'access-2']);
      expect(transport.callsTo(TOKEN_ROUTE)).toHaveLength(1);
      expect((await lagging.get('default'))?.refreshToken).toBe('refresh-2');
    });

    it('carries the old refresh token over when the refresh response omits it', async () => {
      await seed(2);
      transport.on(TOKEN_ROUTE, json(200, { access_token: 'access-2', expires_in: 3600 }));

      expect(await service.getValidAccessToken()).toBe('access-2');
      expect((await store.get('default'))?.refreshToken).toBe('refresh-1');
    });

    it('clears the tokens when the refresh token is rejected', async () => {
      await seed(2);
      transport.on(TOKEN_ROUTE, json(400, { error: 'invalid_grant', error_description: 'Refresh token revoked' }));

      expect(await service.getValidAccessToken()).toBeNull();
      expect(await store.get('default')).toBeNull();
      expect(logger.error).toHaveBeenCalledWith('TokenService: refresh token rejected, clearing tokens', {
        status: 400,
        error: 'Refresh token revoked',
      });
    });

    it('keeps the tokens after a transient token endpoint failure', async () => {
      await seed(2);
      transport.on(TOKEN_ROUTE, json(503, { message: 'Service unavailable' }));

      expect(await service.getValidAccessToken()).toBeNull();
      expect((await store.get('default'))?.accessToken).toBe('access-1');
    });

    it('clears the tokens when there is no refresh token to use', async () => {
      await seed(2, null);

      expect(await service.getValidAccessToken()).toBeNull();
      expect(await store.get('default')).toBeNull();
      expect(transport.requests).toHaveLength(0);
    });
  });

  describe('refresh', () => {
    it('surfaces a rejected refresh as Unauthorized', async () => {
      await seed(2);
      transport.on(TOKEN_ROUTE, json(401, { error: 'invalid_client' }));

      const error = await service.refresh().catch((err: unknown) => err);
      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({ kind: 'Unauthorized', statusCode: 401, message: 'Token refresh failed: invalid_client' });
    });
  });

  describe('exchangeAuthorizationCode', () => {
    it('posts the code grant and stores the result', async () => {
      transport.on(TOKEN_ROUTE, json(200, { access_token: 'access-new', refresh_token: 'refresh-new', expires_in: 3600 }));

      const pair = await service.exchangeAuthorizationCode('auth-code');

      expect(pair.accessToken).toBe('access-new');
      expect(transport.requests[0].form).toEqual({
        client_id: 'test-client',
        client_secret: 'test-secret',
        grant_type: 'authorization_code',
        code: 'auth-code',
        redirect_uri: 'http://localhost:3000/callback',
      });
      expect((await store.get('default'))?.refreshToken).toBe('refresh-new');
    });

    it('fails with Validation when the endpoint answers without a token', async () => {
      transport.on(TOKEN_ROUTE, json(200, { token_type: 'Bearer' }));
      await expect(service.exchangeAuthorizationCode('auth-code')).rejects.toMatchObject({
        kind: 'Validation',
        message: 'No access token in token response',
      });
    });
  });

  it('clearTokens removes the stored pair', async () => {
    await seed(3600);
    await service.clearTokens();
    expect(await service.getTokenInfo()).toEqual({
      hasAccessToken: false,
      hasRefreshToken: false,
      issuedAt: null,
      expiresAt: null,
      expiresInSeconds: null,
      needsRefresh: true,
    });
  });
});

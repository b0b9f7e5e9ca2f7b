import { assertOAuthConfigured, TokenService } from '../auth/oauth.js';
import { SqliteTokenStore, type TokenStore } from '../auth/store.js';
import { parseConfig, type ClientConfig, type ClientConfigInput } from '../config/index.js';
import { createLogger, sanitizeForLog, type Logger } from '../config/logger.js';
import { CallLog } from './call-log.js';
import {
  ApiError,
  ConfigurationError,
  classifyFailure,
  classifyResponse,
  userMessage,
  type ErrorKind,
} from './errors.js';
import { computeBackoffDelay, RateLimiter, type RateLimitStatistics } from './rate-limit.js';
import { GotTransport } from './transport.js';
import {
  sleep as defaultSleep,
  systemClock,
  type Clock,
  type HttpMethod,
  type HttpTransport,
  type ResponseHeaders,
  type Sleep,
  type TransportResponse,
} from './types.js';

export interface RequestFailure {
  kind: ErrorKind;
  message: string;
  errors: string[];
  status: number;
  retryable: boolean;
  retryAfter: number | null;
  attempts: number;
  userMessage: string;
}

/**
 * RequestOutcome — the only value handed back across the client boundary.
 * Callers switch on `type`; there is no "check for an error key" convention.
 */
export type RequestOutcome =
  | { type: 'payload'; data: unknown; status: number; headers: ResponseHeaders }
  | { type: 'no_content'; status: number; headers: ResponseHeaders }
  | { type: 'error'; error: RequestFailure; status: number; headers: ResponseHeaders };

export interface ApiClientDeps {
  transport?: HttpTransport;
  store?: TokenStore;
  tokenService?: TokenService;
  rateLimiter?: RateLimiter;
  callLog?: CallLog;
  clock?: Clock;
  sleep?: Sleep;
  /** Jitter source for retry backoff */
  random?: () => number;
  logger?: Logger;
}

function decodeBody(text: string): unknown {
  if (text.trim() === '') return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export function toRequestFailure(error: ApiError): RequestFailure {
  return {
    kind: error.kind,
    message: error.message,
    errors: error.errors,
    status: error.statusCode,
    retryable: error.retryable,
    retryAfter: error.retryAfter,
    attempts: error.attempts,
    userMessage: userMessage(error.kind),
  };
}

/**
 * ApiClient — the request pipeline every resource call goes through.
 *
 * Per attempt:
 *   preflight config → acquire token → rate check (one wait at most) → send
 *   → classify → update rate state → retry decision
 *
 * Design constraints:
 *   - Resource code never touches tokens, headers or retries, only request()
 *   - Only RateLimitExceeded, ServerError and Transport are retried
 *   - Each retry re-acquires the token; a long backoff may have outlived it
 *   - Max `http.maxConcurrent` sends in flight per instance
 *   - A surfaced error is logged exactly once, here, never in the classifier
 */
export class ApiClient {
  private readonly config: ClientConfig;
  private readonly transport: HttpTransport;
  private readonly tokenService: TokenService;
  private readonly rateLimiter: RateLimiter;
  private readonly callLog: CallLog;
  private readonly clock: Clock;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly logger: Logger;

  private apiVersion: string;
  private throwExceptions: boolean;
  private manualToken: string | null = null;

  // Sends currently holding a slot, and callers waiting for one
  private sending = 0;
  private readonly slotWaiters: Array<() => void> = [];

  constructor(input: ClientConfigInput, deps: ApiClientDeps = {}) {
    this.config = parseConfig(input);
    assertOAuthConfigured(this.config);

    this.clock = deps.clock ?? systemClock;
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
    this.logger = deps.logger ?? createLogger(this.config.logLevel);
    this.transport = deps.transport ?? new GotTransport();
    this.callLog = deps.callLog ?? new CallLog();
    this.rateLimiter = deps.rateLimiter ?? new RateLimiter(this.config.rateLimit, { clock: this.clock, logger: this.logger });
    this.tokenService = deps.tokenService ?? new TokenService(this.config, {
      store: deps.store ?? new SqliteTokenStore(this.config.tokens.storePath, { clock: this.clock }),
      transport: this.transport,
      clock: this.clock,
      logger: this.logger,
    });

    this.apiVersion = this.config.apiVersion;
    this.throwExceptions = this.config.throwExceptions;
  }

  // ---------------------------------------------------------------------------
  // Request pipeline
  // ---------------------------------------------------------------------------

  async request(method: HttpMethod, path: string, body: object | null = null): Promise<RequestOutcome> {
    const label = `${method} ${path}`;
    try {
      return await this.withRetry(label, (attempt) => this.attempt(method, path, body, attempt));
    } catch (error) {
      const failure = classifyFailure(error);
      this.logFailure(label, failure);
      if (this.throwExceptions) throw failure;
      return {
        type: 'error',
        error: toRequestFailure(failure),
        status: failure.statusCode,
        headers: failure.headers,
      };
    }
  }

  /**
   * One-shot exchange of an authorization code for a token pair, through the
   * same retry machinery as request(). The state value is only logged; CSRF
   * validation belongs to whoever rendered the authorization redirect.
   */
  async handleOAuthCallback(code: string, state?: string): Promise<boolean> {
    const label = 'OAuth callback';
    this.logger.info('Handling OAuth callback', { hasCode: code !== '', hasState: Boolean(state) });

    try {
      await this.withRetry(label, async () => {
        if (code.trim() === '') {
          throw new ApiError('Validation', 'Missing authorization code', { statusCode: 400 });
        }
        return this.tokenService.exchangeAuthorizationCode(code);
      });
      this.manualToken = null;
      this.logger.info('OAuth callback handled successfully');
      return true;
    } catch (error) {
      const failure = classifyFailure(error);
      this.logFailure(label, failure);
      if (this.throwExceptions) throw failure;
      return false;
    }
  }

  private async withRetry<T>(label: string, operation: (attempt: number) => Promise<T>): Promise<T> {
    const { maxAttempts } = this.config.retry;

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation(attempt);
      } catch (error) {
        const failure = classifyFailure(error);
        failure.attempts = attempt;

        if (!failure.retryable || attempt >= maxAttempts) {
          throw failure;
        }

        const delayMs = this.retryDelay(failure, attempt);
        this.logger.info(`Retrying ${label} after ${failure.kind} (attempt ${attempt}/${maxAttempts})`, {
          error: failure.message,
          status: failure.statusCode,
          delayMs,
        });
        await this.sleep(delayMs);
      }
    }
  }

  private retryDelay(failure: ApiError, attempt: number): number {
    const backoff = computeBackoffDelay(attempt, this.config.retry, this.random);
    if (
      failure.kind === 'RateLimitExceeded' &&
      this.config.rateLimit.respectRetryAfter &&
      failure.retryAfter !== null
    ) {
      return Math.max(backoff, failure.retryAfter * 1000);
    }
    return backoff;
  }

  private async attempt(
    method: HttpMethod,
    path: string,
    body: object | null,
    attempt: number,
  ): Promise<RequestOutcome> {
    this.preflight();

    const accessToken = await this.resolveAccessToken();
    if (!accessToken) {
      throw new ApiError('Unauthorized', 'No access token available. Please connect to the API first.', {
        statusCode: 401,
      });
    }

    if (this.config.rateLimit.enabled) {
      await this.throttle(`${method} ${path}`);
    }

    const response = await this.dispatch(method, path, body, accessToken, attempt);
    const decoded = decodeBody(response.body);
    const ok = response.status >= 200 && response.status < 300;

    if (this.config.rateLimit.enabled) {
      if (ok) this.rateLimiter.recordRequest();
      this.rateLimiter.updateFromResponseHeaders(response.headers);
    }

    if (ok) {
      if (response.status === 204 || decoded === null) {
        return { type: 'no_content', status: response.status, headers: response.headers };
      }
      return { type: 'payload', data: decoded, status: response.status, headers: response.headers };
    }

    const failure = classifyResponse(response.status, decoded, response.headers, this.clock.now());
    if (failure.kind === 'RateLimitExceeded' && this.config.rateLimit.enabled) {
      this.rateLimiter.registerRateLimitHit(failure.retryAfter);
    }
    throw failure;
  }

  private preflight(): void {
    if (this.apiVersion.trim() === '') {
      throw new ConfigurationError('Missing required configuration: apiVersion', ['apiVersion']);
    }
    if (this.config.baseUrl.trim() === '') {
      throw new ConfigurationError('Missing required configuration: baseUrl', ['baseUrl']);
    }
  }

  private resolveAccessToken(): Promise<string | null> {
    if (this.manualToken !== null) {
      return Promise.resolve(this.manualToken);
    }
    return this.tokenService.getValidAccessToken();
  }

  // At most one wait for the window per attempt, so a call never blocks unboundedly
  private async throttle(label: string): Promise<void> {
    let decision = this.rateLimiter.checkAndThrottle();

    if (!decision.canProceed) {
      this.logger.warn('Rate limit exceeded, waiting for reset', {
        context: label,
        waitMs: decision.delayMs,
        resetAt: new Date(decision.resetAt).toISOString(),
        reason: decision.reason,
      });
      await this.sleep(decision.delayMs);

      decision = this.rateLimiter.checkAndThrottle();
      if (!decision.canProceed) {
        throw new ApiError('RateLimitExceeded', 'Rate limit exceeded. Too many requests. Please wait before trying again.', {
          retryAfter: Math.ceil(decision.delayMs / 1000),
        });
      }
    }

    if (decision.delayMs > 0) {
      this.logger.debug('Applying throttling delay', {
        context: label,
        delayMs: decision.delayMs,
        usagePercentage: decision.usagePercentage,
        throttleLevel: decision.throttleLevel,
      });
      await this.sleep(decision.delayMs);
    }
  }

  private dispatch(
    method: HttpMethod,
    path: string,
    body: object | null,
    accessToken: string,
    attempt: number,
  ): Promise<TransportResponse> {
    return this.withSendSlot(async () => {
      const startedAt = this.clock.now();
      let status = 0;
      let responseSize = 0;

      try {
        this.logger.debug('Making API request', { method, path, apiVersion: this.apiVersion, attempt });
        const response = await this.transport.send({
          method,
          url: `${this.config.baseUrl.replace(/\/$/, '')}/${path.replace(/^\//, '')}`,
          headers: {
            'Authorization': `Bearer ${accessToken}`,
            'X-Api-Version': this.apiVersion,
          },
          json: body ?? undefined,
          timeoutMs: this.config.http.timeoutMs,
        });
        status = response.status;
        responseSize = Buffer.byteLength(response.body, 'utf8');
        return response;
      } finally {
        this.callLog.record({
          method,
          path,
          attempt,
          status,
          durationMs: this.clock.now() - startedAt,
          timestamp: startedAt,
          apiVersion: this.apiVersion,
          responseSize,
        });
      }
    });
  }

  // At most http.maxConcurrent sends run at once; the rest wait in arrival order
  private async withSendSlot<T>(send: () => Promise<T>): Promise<T> {
    if (this.sending < this.config.http.maxConcurrent) {
      this.sending++;
    } else {
      await new Promise<void>((resolve) => this.slotWaiters.push(resolve));
    }

    try {
      return await send();
    } finally {
      const waiter = this.slotWaiters.shift();
      // The slot passes straight to the waiter, so `sending` only drops when nobody queues
      if (waiter) {
        waiter();
      } else {
        this.sending--;
      }
    }
  }

  private logFailure(context: string, failure: ApiError): void {
    const meta = {
      context,
      kind: failure.kind,
      status: failure.statusCode,
      attempt: failure.attempts,
      errors: failure.errors,
      body: sanitizeForLog(failure.body),
    };
    const message = `API error: ${failure.message}`;

    switch (failure.kind) {
      case 'NotFound':
        this.logger.info(message, meta);
        break;
      case 'Validation':
      case 'RateLimitExceeded':
        this.logger.warn(message, meta);
        break;
      default:
        this.logger.error(message, meta);
    }
  }

  // ---------------------------------------------------------------------------
  // Authentication escape hatches
  // ---------------------------------------------------------------------------

  async isAuthenticated(): Promise<boolean> {
    if (this.manualToken !== null) {
      return this.manualToken !== '';
    }
    return this.tokenService.hasValidTokens();
  }

  /** Bypasses the TokenService until useTokenService() or logout() is called. */
  setAccessToken(token: string): this {
    this.manualToken = token;
    this.logger.debug('Access token set manually', sanitizeForLog({ token }));
    return this;
  }

  useTokenService(): this {
    this.manualToken = null;
    return this;
  }

  async logout(): Promise<void> {
    await this.tokenService.clearTokens();
    this.manualToken = null;
    this.logger.debug('Logged out, tokens cleared');
  }

  getAuthorizationUrl(state?: string): string {
    return this.tokenService.getAuthorizationUrl(state);
  }

  // ---------------------------------------------------------------------------
  // Accessors
  // ---------------------------------------------------------------------------

  getApiVersion(): string {
    return this.apiVersion;
  }

  setApiVersion(version: string): this {
    this.apiVersion = version;
    this.logger.debug('API version updated', { version });
    return this;
  }

  setThrowExceptions(enabled = true): this {
    this.throwExceptions = enabled;
    return this;
  }

  getThrowExceptions(): boolean {
    return this.throwExceptions;
  }

  getRateLimitStats(): RateLimitStatistics {
    return this.rateLimiter.getStatistics();
  }

  getRateLimiter(): RateLimiter {
    return this.rateLimiter;
  }

  getTokenService(): TokenService {
    return this.tokenService;
  }

  getCallLog(): CallLog {
    return this.callLog;
  }

  getConfig(): ClientConfig {
    return this.config;
  }
}

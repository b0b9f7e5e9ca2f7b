import { z } from 'zod';

/** 'true'/'1'/'yes' → true, 'false'/'0'/'no' → false; everything else is left to zod. */
const envBoolean = z.preprocess((value) => {
  if (typeof value !== 'string') return value;
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  return value;
}, z.boolean());

const httpSchema = z
  .object({
    timeoutMs: z.coerce.number().int().positive().default(30_000),
    maxConcurrent: z.coerce.number().int().min(1).default(5),
  })
  .default({});

const retrySchema = z
  .object({
    maxAttempts: z.coerce.number().int().min(1).default(3),
    baseDelayMs: z.coerce.number().int().min(0).default(1_000),
    maxDelayMs: z.coerce.number().int().min(0).default(30_000),
    jitter: envBoolean.default(true),
  })
  .default({});

const rateLimitSchema = z
  .object({
    enabled: envBoolean.default(true),
    requestsPerWindow: z.coerce.number().int().positive().default(200),
    windowMs: z.coerce.number().int().positive().default(60_000),
    throttleThreshold: z.coerce.number().min(0).max(1).default(0.7),
    aggressiveThreshold: z.coerce.number().min(0).max(1).default(0.9),
    throttleBaseDelayMs: z.coerce.number().int().min(0).default(200),
    throttleMaxDelayMs: z.coerce.number().int().min(0).default(1_000),
    aggressiveDelayMs: z.coerce.number().int().min(0).default(2_000),
    respectRetryAfter: envBoolean.default(true),
  })
  .default({});

const tokensSchema = z
  .object({
    refreshBufferSeconds: z.coerce.number().int().min(0).default(300),
    storePath: z.string().min(1).default('./tokens.db'),
    /** How long a stored pair survives in the cache; outlives the access token so the refresh token stays usable. */
    cacheTtlSeconds: z.coerce.number().int().positive().default(7 * 24 * 60 * 60),
  })
  .default({});

export const clientConfigSchema = z.object({
  clientId: z.string().default(''),
  clientSecret: z.string().default(''),
  redirectUri: z.string().default(''),

  baseUrl: z.string().url().default('https://api.focus.teamleader.eu'),
  authUrl: z.string().url().default('https://focus.teamleader.eu'),
  apiVersion: z.string().default('2023-09-26'),

  /** Key under which the token pair and its refresh lock live. One client = one account. */
  accountKey: z.string().min(1).default('default'),

  http: httpSchema,
  retry: retrySchema,
  rateLimit: rateLimitSchema,
  tokens: tokensSchema,

  throwExceptions: envBoolean.default(false),
  logLevel: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
});

export type ClientConfig = z.infer<typeof clientConfigSchema>;
export type ClientConfigInput = z.input<typeof clientConfigSchema>;
export type RetrySettings = ClientConfig['retry'];
export type RateLimitSettings = ClientConfig['rateLimit'];

export function parseConfig(input: ClientConfigInput = {}): ClientConfig {
  return clientConfigSchema.parse(input);
}

// Empty env values fall through to the schema defaults instead of failing coercion.
function env(source: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = source[key];
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Builds a ClientConfig from TEAMLEADER_* environment variables.
 * Example: TEAMLEADER_RATE_LIMIT=100 TEAMLEADER_THROTTLE_THRESHOLD=0.6
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): ClientConfig {
  return clientConfigSchema.parse({
    clientId: env(source, 'TEAMLEADER_CLIENT_ID'),
    clientSecret: env(source, 'TEAMLEADER_CLIENT_SECRET'),
    redirectUri: env(source, 'TEAMLEADER_REDIRECT_URI'),
    baseUrl: env(source, 'TEAMLEADER_BASE_URL'),
    authUrl: env(source, 'TEAMLEADER_AUTH_URL'),
    apiVersion: env(source, 'TEAMLEADER_API_VERSION'),
    accountKey: env(source, 'TEAMLEADER_ACCOUNT_KEY'),
    http: {
      timeoutMs: env(source, 'TEAMLEADER_API_TIMEOUT_MS'),
      maxConcurrent: env(source, 'TEAMLEADER_MAX_CONCURRENT'),
    },
    retry: {
      maxAttempts: env(source, 'TEAMLEADER_API_RETRY_ATTEMPTS'),
      baseDelayMs: env(source, 'TEAMLEADER_API_RETRY_DELAY_MS'),
      maxDelayMs: env(source, 'TEAMLEADER_API_RETRY_MAX_DELAY_MS'),
      jitter: env(source, 'TEAMLEADER_API_RETRY_JITTER'),
    },
    rateLimit: {
      enabled: env(source, 'TEAMLEADER_RATE_LIMITING_ENABLED'),
      requestsPerWindow: env(source, 'TEAMLEADER_RATE_LIMIT'),
      windowMs: env(source, 'TEAMLEADER_RATE_LIMIT_WINDOW_MS'),
      throttleThreshold: env(source, 'TEAMLEADER_THROTTLE_THRESHOLD'),
      aggressiveThreshold: env(source, 'TEAMLEADER_AGGRESSIVE_THRESHOLD'),
      respectRetryAfter: env(source, 'TEAMLEADER_RESPECT_RETRY_AFTER'),
    },
    tokens: {
      refreshBufferSeconds: env(source, 'TEAMLEADER_REFRESH_BUFFER_SECONDS'),
      storePath: env(source, 'TEAMLEADER_TOKEN_STORE_PATH'),
      cacheTtlSeconds: env(source, 'TEAMLEADER_TOKEN_CACHE_TTL_SECONDS'),
    },
    throwExceptions: env(source, 'TEAMLEADER_THROW_EXCEPTIONS'),
    logLevel: env(source, 'LOG_LEVEL'),
  });
}

export interface ConfigIssue {
  severity: 'error' | 'warning';
  key: string;
  message: string;
}

const REQUIRED_KEYS = ['clientId', 'clientSecret', 'redirectUri'] as const;

/**
 * Semantic checks the schema cannot express. Errors make the client unusable;
 * warnings flag settings that work but are probably unintended.
 */
export function validateConfig(config: ClientConfig): ConfigIssue[] {
  const issues: ConfigIssue[] = [];

  for (const key of REQUIRED_KEYS) {
    if (config[key].trim() === '') {
      issues.push({ severity: 'error', key, message: `Missing required configuration: ${key}` });
    }
  }

  if (config.redirectUri !== '' && !/^https?:\/\//.test(config.redirectUri)) {
    issues.push({ severity: 'error', key: 'redirectUri', message: 'redirectUri must be an http(s) URL' });
  }

  if (config.apiVersion.trim() === '') {
    issues.push({ severity: 'error', key: 'apiVersion', message: 'apiVersion must not be empty' });
  }

  const { throttleThreshold, aggressiveThreshold, throttleBaseDelayMs, throttleMaxDelayMs } = config.rateLimit;
  if (aggressiveThreshold < throttleThreshold) {
    issues.push({
      severity: 'error',
      key: 'rateLimit.aggressiveThreshold',
      message: 'aggressiveThreshold must not be lower than throttleThreshold',
    });
  }
  if (throttleMaxDelayMs < throttleBaseDelayMs) {
    issues.push({
      severity: 'warning',
      key: 'rateLimit.throttleMaxDelayMs',
      message: 'throttleMaxDelayMs is lower than throttleBaseDelayMs; throttling delay will decrease as usage grows',
    });
  }

  if (config.retry.maxDelayMs < config.retry.baseDelayMs) {
    issues.push({
      severity: 'warning',
      key: 'retry.maxDelayMs',
      message: 'retry.maxDelayMs caps every backoff below retry.baseDelayMs',
    });
  }

  if (config.tokens.cacheTtlSeconds <= config.tokens.refreshBufferSeconds) {
    issues.push({
      severity: 'warning',
      key: 'tokens.cacheTtlSeconds',
      message: 'token cache TTL is shorter than the refresh buffer; stored tokens may vanish before they can be refreshed',
    });
  }

  if (config.redirectUri.startsWith('http://') && !/^http:\/\/(localhost|127\.0\.0\.1)/.test(config.redirectUri)) {
    issues.push({ severity: 'warning', key: 'redirectUri', message: 'redirectUri uses plain http outside localhost' });
  }

  return issues;
}

export { ApiClient, toRequestFailure } from './client/ApiClient.js';
export type { ApiClientDeps, RequestFailure, RequestOutcome } from './client/ApiClient.js';
export { CallLog } from './client/call-log.js';
export type { CallLogEntry } from './client/call-log.js';
export {
  ApiError,
  ConfigurationError,
  classifyFailure,
  classifyResponse,
  isRetryable,
  parseErrors,
  parseRetryAfter,
  userMessage,
} from './client/errors.js';
export type { ErrorKind } from './client/errors.js';
export { computeBackoffDelay, RateLimiter } from './client/rate-limit.js';
export type { RateLimitStatistics, ThrottleDecision, ThrottleLevel } from './client/rate-limit.js';
export { GotTransport } from './client/transport.js';
export { TransportError, sleep, systemClock } from './client/types.js';
export type {
  Clock,
  HttpMethod,
  HttpTransport,
  ResponseHeaders,
  Sleep,
  TransportRequest,
  TransportResponse,
} from './client/types.js';
export { TokenService, TokenResponseSchema } from './auth/oauth.js';
export type { OAuthSettings, TokenInfo, TokenResponse } from './auth/oauth.js';
export { SingleFlight, SqliteTokenStore } from './auth/store.js';
export type { TokenPair, TokenStore } from './auth/store.js';
export { MemoryTokenStore } from './auth/memory-store.js';
export { clientConfigSchema, loadConfig, parseConfig, validateConfig } from './config/index.js';
export type { ClientConfig, ClientConfigInput, ConfigIssue } from './config/index.js';
export { createLogger, logger, sanitizeForLog } from './config/logger.js';
export type { Logger } from './config/logger.js';
export { runHealthCheck } from './health.js';
export type { HealthCheckResult, HealthReport } from './health.js';

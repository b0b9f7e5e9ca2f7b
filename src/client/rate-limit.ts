import type { RateLimitSettings, RetrySettings } from '../config/index.js';
import { logger as defaultLogger, type Logger } from '../config/logger.js';
import { systemClock, type Clock, type ResponseHeaders } from './types.js';

/**
 * computeBackoffDelay — exponential backoff for retry number `attempt` (1-based).
 * attempt=1 → base, attempt=2 → 2×base, attempt=3 → 4×base, capped at maxDelayMs.
 * With jitter, up to 10% of the delay is added so parallel clients spread out.
 */
export function computeBackoffDelay(
  attempt: number,
  settings: Pick<RetrySettings, 'baseDelayMs' | 'maxDelayMs' | 'jitter'>,
  random: () => number = Math.random,
): number {
  const exponential = settings.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
  const jitter = settings.jitter ? Math.floor(random() * exponential * 0.1) : 0;
  return Math.min(exponential + jitter, settings.maxDelayMs);
}

export type ThrottleLevel = 'none' | 'low' | 'moderate' | 'high' | 'critical';

export interface ThrottleDecision {
  canProceed: boolean;
  delayMs: number;
  reason: string;
  usagePercentage: number;
  /** Effective remaining quota: the smaller of the local and server-reported figures */
  remaining: number;
  throttleLevel: ThrottleLevel;
  /** Epoch ms at which the next slot frees up */
  resetAt: number;
}

export interface RateLimitStatistics {
  totalRequests: number;
  limit: number;
  remaining: number;
  usagePercentage: number;
  throttleLevel: ThrottleLevel;
  secondsUntilReset: number;
  lifetimeRequests: number;
  throttledRequests: number;
  totalDelayMs: number;
  efficiency: number;
  serverRemaining: number | null;
  serverLimit: number | null;
}

// Last quota figures the API reported, and until when they are believable
interface ServerSnapshot {
  remaining: number | null;
  limit: number | null;
  validUntil: number;
}

function headerValue(headers: ResponseHeaders, name: string): string | undefined {
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === name) {
      return Array.isArray(value) ? value[0] : value;
    }
  }
  return undefined;
}

function parseCount(value: string | undefined): number | null {
  if (value === undefined) return null;
  const n = Number.parseInt(value, 10);
  return Number.isNaN(n) || n < 0 ? null : n;
}

function round1(n: number): number {
  return Math.round(n * 10) / 10;
}

/**
 * RateLimiter — sliding-window quota tracking for one client instance.
 *
 * The local view is the list of request instants inside the trailing window.
 * Rate-limit headers from the API can only make the limiter more cautious:
 * checkAndThrottle() measures usage against min(configured, server limit) and
 * caps the headroom at the server's remaining figure. Statistics report the
 * local view against the configured limit only.
 */
export class RateLimiter {
  private requests: number[] = [];
  private server: ServerSnapshot | null = null;
  private lifetimeRequests = 0;
  private throttledRequests = 0;
  private totalDelayMs = 0;

  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(
    private readonly settings: RateLimitSettings,
    options: { clock?: Clock; logger?: Logger } = {},
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? defaultLogger;
  }

  get limit(): number {
    return this.settings.requestsPerWindow;
  }

  checkAndThrottle(): ThrottleDecision {
    const now = this.clock.now();
    const localCount = this.currentUsage(now);
    const { remaining, used } = this.quota(now, localCount);
    const usagePercentage = round1(used * 100);
    const throttleLevel = this.levelFor(used);

    if (remaining <= 0) {
      const resetAt = this.nextSlotAt(now);
      const decision: ThrottleDecision = {
        canProceed: false,
        delayMs: Math.max(0, resetAt - now),
        reason: 'Rate limit window exhausted, waiting for a free slot',
        usagePercentage,
        remaining: 0,
        throttleLevel: 'critical',
        resetAt,
      };
      this.logger.info('Rate limiting: window exhausted', { ...decision, localCount });
      return decision;
    }

    const delayMs = this.delayFor(used);
    const decision: ThrottleDecision = {
      canProceed: true,
      delayMs,
      reason: delayMs > 0 ? this.reasonFor(used) : 'Normal operation',
      usagePercentage,
      remaining,
      throttleLevel,
      resetAt: now,
    };

    if (delayMs > 0) {
      this.throttledRequests++;
      this.totalDelayMs += delayMs;
      this.logger.debug('Rate limiting: throttling applied', { ...decision, localCount });
    }

    return decision;
  }

  // Call only after a request actually went out and succeeded
  recordRequest(): void {
    const now = this.clock.now();
    this.requests.push(now);
    this.lifetimeRequests++;
    this.prune(now);
  }

  updateFromResponseHeaders(headers: ResponseHeaders): void {
    const remaining = parseCount(headerValue(headers, 'x-ratelimit-remaining'));
    const limit = parseCount(headerValue(headers, 'x-ratelimit-limit'));
    if (remaining === null && limit === null) return;

    const now = this.clock.now();
    const reset = parseCount(headerValue(headers, 'x-ratelimit-reset'));
    let validUntil = now + this.settings.windowMs;
    if (reset !== null) {
      // Large values are unix timestamps, small ones are seconds from now
      validUntil = reset > 1_000_000_000 ? reset * 1000 : now + reset * 1000;
    }

    this.server = { remaining, limit, validUntil };

    this.logger.debug('Rate limit headers processed', {
      serverRemaining: remaining,
      serverLimit: limit,
      localUsage: this.currentUsage(now),
    });
  }

  /** A 429 means the server quota is spent whatever our counters say. */
  registerRateLimitHit(retryAfterSeconds: number | null): void {
    const now = this.clock.now();
    const waitMs = (retryAfterSeconds ?? this.settings.windowMs / 1000) * 1000;
    this.server = { remaining: 0, limit: this.server?.limit ?? null, validUntil: now + waitMs };

    this.logger.warn('Rate limit exceeded (429 response)', {
      retryAfterSeconds,
      resetAt: new Date(now + waitMs).toISOString(),
      localUsage: this.currentUsage(now),
    });
  }

  getStatistics(): RateLimitStatistics {
    const now = this.clock.now();
    const usage = this.currentUsage(now);
    const used = this.limit > 0 ? usage / this.limit : 1;
    const server = this.activeServerSnapshot(now);

    return {
      totalRequests: usage,
      limit: this.limit,
      remaining: Math.max(0, this.limit - usage),
      usagePercentage: round1(used * 100),
      throttleLevel: this.levelFor(used),
      secondsUntilReset: this.requests.length > 0
        ? Math.max(0, Math.ceil((this.requests[0] + this.settings.windowMs - now) / 1000))
        : 0,
      lifetimeRequests: this.lifetimeRequests,
      throttledRequests: this.throttledRequests,
      totalDelayMs: this.totalDelayMs,
      efficiency: this.lifetimeRequests > 0
        ? round1((1 - this.throttledRequests / this.lifetimeRequests) * 100)
        : 100,
      serverRemaining: server?.remaining ?? null,
      serverLimit: server?.limit ?? null,
    };
  }

  isThrottled(): boolean {
    const now = this.clock.now();
    return this.quota(now, this.currentUsage(now)).used >= this.settings.throttleThreshold;
  }

  reset(): void {
    this.requests = [];
    this.server = null;
    this.lifetimeRequests = 0;
    this.throttledRequests = 0;
    this.totalDelayMs = 0;
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private prune(now: number): void {
    const cutoff = now - this.settings.windowMs;
    let drop = 0;
    while (drop < this.requests.length && this.requests[drop] <= cutoff) drop++;
    if (drop > 0) this.requests = this.requests.slice(drop);
  }

  private currentUsage(now: number): number {
    this.prune(now);
    return this.requests.length;
  }

  private activeServerSnapshot(now: number): ServerSnapshot | null {
    if (this.server && this.server.validUntil <= now) {
      this.server = null;
    }
    return this.server;
  }

  // A lowered server limit shrinks the denominator as well as the headroom
  private effectiveLimit(now: number): number {
    const serverLimit = this.activeServerSnapshot(now)?.limit;
    return serverLimit === null || serverLimit === undefined ? this.limit : Math.min(this.limit, serverLimit);
  }

  /**
   * remaining = min(effectiveLimit - localCount, serverRemaining)
   * used      = 1 - remaining / effectiveLimit
   * Without a server remaining figure this is localCount / effectiveLimit.
   */
  private quota(now: number, localCount: number): { remaining: number; used: number } {
    const limit = this.effectiveLimit(now);
    const serverRemaining = this.activeServerSnapshot(now)?.remaining;
    let remaining = limit - localCount;
    if (serverRemaining !== null && serverRemaining !== undefined) {
      remaining = Math.min(remaining, serverRemaining);
    }
    remaining = Math.max(0, remaining);
    return { remaining, used: limit > 0 ? 1 - remaining / limit : 1 };
  }

  private nextSlotAt(now: number): number {
    const server = this.activeServerSnapshot(now);
    const limit = this.effectiveLimit(now);
    const localFree = this.requests.length >= limit && limit > 0
      ? this.requests[this.requests.length - limit] + this.settings.windowMs
      : now;
    const serverFree = server?.remaining === 0 ? server.validUntil : now;
    const candidate = Math.max(localFree, serverFree);
    // Nothing local explains the exhaustion (e.g. a server limit of 0): wait one window
    return candidate > now ? candidate : now + this.settings.windowMs;
  }

  private delayFor(used: number): number {
    const { throttleThreshold, aggressiveThreshold, throttleBaseDelayMs, throttleMaxDelayMs, aggressiveDelayMs } =
      this.settings;

    if (used < throttleThreshold) return 0;
    if (used >= aggressiveThreshold) return aggressiveDelayMs;

    const span = aggressiveThreshold - throttleThreshold;
    const progress = span > 0 ? (used - throttleThreshold) / span : 1;
    return Math.round(throttleBaseDelayMs + (throttleMaxDelayMs - throttleBaseDelayMs) * progress);
  }

  private levelFor(used: number): ThrottleLevel {
    const { throttleThreshold, aggressiveThreshold } = this.settings;
    if (used >= 1) return 'critical';
    if (used >= aggressiveThreshold) return 'high';
    if (used >= (throttleThreshold + aggressiveThreshold) / 2) return 'moderate';
    if (used >= throttleThreshold) return 'low';
    return 'none';
  }

  private reasonFor(used: number): string {
    if (used >= this.settings.aggressiveThreshold) return 'High usage, aggressive throttling';
    return 'Approaching limit, preventive throttling';
  }
}

/**
 * errors.ts — ErrorKind taxonomy and classification for every failed call.
 *
 * Each failed attempt maps to exactly one ErrorKind. The kind alone decides
 * whether the dispatcher retries: only RateLimitExceeded, ServerError and
 * Transport are retryable.
 */

import type { ResponseHeaders } from './types.js';
import { TransportError } from './types.js';

export type ErrorKind =
  | 'Configuration'
  | 'Unauthorized'
  | 'NotFound'
  | 'Validation'
  | 'RateLimitExceeded'
  | 'ServerError'
  | 'Transport';

const RETRYABLE: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  'RateLimitExceeded',
  'ServerError',
  'Transport',
]);

export function isRetryable(kind: ErrorKind): boolean {
  return RETRYABLE.has(kind);
}

export interface ApiErrorOptions {
  statusCode?: number;
  errors?: string[];
  retryAfter?: number | null;
  body?: unknown;
  headers?: ResponseHeaders;
  cause?: unknown;
}

/**
 * ApiError — the typed exception behind every failed call.
 *
 * In throw mode it reaches the caller as-is; in value mode the same fields
 * are copied into the error variant of RequestOutcome.
 */
export class ApiError extends Error {
  readonly kind: ErrorKind;
  readonly statusCode: number;
  readonly errors: string[];
  /** Seconds to wait before retrying; only set for RateLimitExceeded */
  readonly retryAfter: number | null;
  readonly body: unknown;
  readonly headers: ResponseHeaders;
  attempts = 0;

  constructor(kind: ErrorKind, message: string, options: ApiErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'ApiError';
    this.kind = kind;
    this.statusCode = options.statusCode ?? 0;
    this.errors = options.errors ?? [message];
    this.retryAfter = options.retryAfter ?? null;
    this.body = options.body;
    this.headers = options.headers ?? {};
  }

  get retryable(): boolean {
    return isRetryable(this.kind);
  }
}

// Missing client credentials, raised before any network activity
export class ConfigurationError extends ApiError {
  constructor(message: string, readonly missing: string[] = []) {
    super('Configuration', message);
    this.name = 'ConfigurationError';
  }
}

function statusToKind(status: number): ErrorKind {
  if (status === 401) return 'Unauthorized';
  if (status === 404) return 'NotFound';
  if (status === 429) return 'RateLimitExceeded';
  if (status >= 500 && status <= 599) return 'ServerError';
  // Any other 4xx, and stray 1xx/3xx that should never reach an API client
  return 'Validation';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * parseErrors — pulls human-readable messages out of whichever error envelope
 * the API used. Envelopes are tried in order and the first one present wins:
 *   { errors: [{ title }, ...] }   (JSON:API style; plain strings accepted too)
 *   { error, error_description }   (OAuth token endpoint)
 *   { message }
 */
export function parseErrors(body: unknown): string[] {
  if (!isRecord(body)) {
    return typeof body === 'string' && body.trim() !== '' ? [body.trim()] : [];
  }

  if (Array.isArray(body['errors'])) {
    const messages: string[] = [];
    for (const entry of body['errors']) {
      if (typeof entry === 'string') {
        messages.push(entry);
      } else if (isRecord(entry) && typeof entry['title'] === 'string') {
        messages.push(entry['title']);
      }
    }
    return messages;
  }

  if (body['error'] !== undefined && body['error'] !== null) {
    const description = body['error_description'];
    if (typeof description === 'string' && description !== '') return [description];
    return [String(body['error'])];
  }

  if (typeof body['message'] === 'string') {
    return [body['message']];
  }

  return [];
}

export function primaryMessage(body: unknown): string {
  return parseErrors(body)[0] ?? 'Unknown error';
}

function headerValue(headers: ResponseHeaders, name: string): string | undefined {
  const target = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === target) {
      return Array.isArray(value) ? value[0] : value;
    }
  }
  return undefined;
}

/**
 * parseRetryAfter — Retry-After as whole seconds.
 * Accepts delta-seconds ("30") or an HTTP-date; null when absent or unparseable.
 */
export function parseRetryAfter(value: string | string[] | undefined, now: number = Date.now()): number | null {
  const header = Array.isArray(value) ? value[0] : value;
  if (header === undefined || header.trim() === '') return null;

  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return Math.max(0, Math.ceil(seconds));
  }

  const ts = new Date(header).getTime();
  if (!Number.isNaN(ts)) {
    return Math.max(0, Math.ceil((ts - now) / 1000));
  }

  return null;
}

/**
 * classifyResponse — turns a non-2xx response into exactly one ApiError.
 */
export function classifyResponse(
  status: number,
  body: unknown,
  headers: ResponseHeaders = {},
  now: number = Date.now(),
): ApiError {
  const kind = statusToKind(status);
  const errors = parseErrors(body);
  const message = errors[0] ?? 'Unknown error';

  return new ApiError(kind, message, {
    statusCode: status,
    errors: errors.length > 0 ? errors : [message],
    retryAfter: kind === 'RateLimitExceeded' ? parseRetryAfter(headerValue(headers, 'retry-after'), now) : null,
    body,
    headers,
  });
}

/**
 * classifyFailure — normalizes anything thrown during an attempt.
 * ApiErrors pass through; transport failures become Transport; anything else
 * unexpected is treated as a transport-level failure too, since no usable
 * response exists.
 */
export function classifyFailure(error: unknown): ApiError {
  if (error instanceof ApiError) return error;
  if (error instanceof TransportError) {
    return new ApiError('Transport', `HTTP request failed: ${error.message}`, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ApiError('Transport', `HTTP request failed: ${message}`, { cause: error });
}

export function userMessage(kind: ErrorKind): string {
  switch (kind) {
    case 'Configuration':
      return 'The API client is not configured. Check the client id, secret and redirect URI.';
    case 'Unauthorized':
      return 'Authentication failed. Please reconnect your account.';
    case 'NotFound':
      return 'The requested resource was not found.';
    case 'Validation':
      return 'The request was rejected. Check the submitted data.';
    case 'RateLimitExceeded':
      return 'API rate limit exceeded. Please try again later.';
    case 'ServerError':
      return 'The API is having problems. Please try again later.';
    case 'Transport':
      return 'Could not reach the API. Check your network connection.';
  }
}

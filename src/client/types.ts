// Source of the current time for token expiry and rate windows; tests swap in a manual clock
export interface Clock {
  now(): number;
}

export const systemClock: Clock = { now: () => Date.now() };

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

// Header values as Node delivers them: multi-value headers may arrive as arrays
export type ResponseHeaders = Record<string, string | string[] | undefined>;

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  /** JSON body; mutually exclusive with form */
  json?: unknown;
  /** application/x-www-form-urlencoded body (token endpoint) */
  form?: Record<string, string>;
  timeoutMs: number;
}

export interface TransportResponse {
  status: number;
  headers: ResponseHeaders;
  body: string;
}

/**
 * HttpTransport — one request, one response.
 *
 * Implementations must resolve for every HTTP status (4xx/5xx included) and
 * reject with TransportError only when no response was received.
 */
export interface HttpTransport {
  send(request: TransportRequest): Promise<TransportResponse>;
}

// Thrown by transports when the request never produced an HTTP response (timeout, DNS, reset)
export class TransportError extends Error {
  readonly code: string;
  constructor(message: string, code = 'ETRANSPORT', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
    this.code = code;
  }
}

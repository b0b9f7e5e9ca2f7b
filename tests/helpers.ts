import { vi } from 'vitest';
import type { ClientConfigInput } from '../src/config/index.js';
import type {
  Clock,
  HttpTransport,
  ResponseHeaders,
  TransportRequest,
  TransportResponse,
} from '../src/client/types.js';
import { TransportError } from '../src/client/types.js';

export const T0 = Date.UTC(2024, 0, 1, 12, 0, 0);

export class ManualClock implements Clock {
  constructor(private current = T0) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  set(ms: number): void {
    this.current = ms;
  }
}

/** Sleep that records each requested delay and moves the clock instead of waiting. */
export function recordingSleep(clock: ManualClock) {
  const delays: number[] = [];
  const sleep = async (ms: number): Promise<void> => {
    delays.push(ms);
    clock.advance(ms);
  };
  return { sleep, delays };
}

export function createTestLogger() {
  return { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
}

type Reply = TransportResponse | TransportError | ((request: TransportRequest) => TransportResponse | Promise<TransportResponse>);

export function json(status: number, body: unknown, headers: ResponseHeaders = {}): TransportResponse {
  return { status, headers: { 'content-type': 'application/json', ...headers }, body: JSON.stringify(body) };
}

export function empty(status: number, headers: ResponseHeaders = {}): TransportResponse {
  return { status, headers, body: '' };
}

/**
 * In-process HttpTransport. Replies are consumed per route in FIFO order and
 * the last one repeats. A route matches when the request URL ends with it.
 */
export class FakeTransport implements HttpTransport {
  readonly requests: TransportRequest[] = [];
  private readonly routes = new Map<string, Reply[]>();

  on(route: string, ...replies: Reply[]): this {
    const queue = this.routes.get(route) ?? [];
    queue.push(...replies);
    this.routes.set(route, queue);
    return this;
  }

  callsTo(route: string): TransportRequest[] {
    return this.requests.filter((request) => request.url.endsWith(route));
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    this.requests.push(request);

    for (const [route, queue] of this.routes) {
      if (!request.url.endsWith(route)) continue;
      const reply = queue.length > 1 ? queue.shift() : queue[0];
      if (reply === undefined) break;
      if (reply instanceof TransportError) throw reply;
      if (typeof reply === 'function') return reply(request);
      return reply;
    }

    throw new Error(`FakeTransport: no reply queued for ${request.method} ${request.url}`);
  }
}

export const testConfig = (overrides: ClientConfigInput = {}): ClientConfigInput => ({
  clientId: 'test-client',
  clientSecret: 'test-secret',
  redirectUri: 'http://localhost:3000/callback',
  baseUrl: 'https://api.example.test',
  authUrl: 'https://auth.example.test',
  ...overrides,
});

import type { HttpMethod } from './types.js';

export interface CallLogEntry {
  method: HttpMethod;
  path: string;
  attempt: number;
  /** 0 when the attempt produced no HTTP response */
  status: number;
  durationMs: number;
  /** Epoch ms at which the attempt was sent */
  timestamp: number;
  apiVersion: string;
  responseSize: number;
}

/**
 * CallLog — every dispatched attempt of one client, successful or not.
 * Owned by the client instance so parallel clients and tests never share it.
 * Oldest entries are dropped beyond `capacity`; `count` keeps the full total.
 */
export class CallLog {
  private log: CallLogEntry[] = [];
  private total = 0;

  constructor(private readonly capacity = 1000) {}

  record(entry: CallLogEntry): void {
    this.log.push(entry);
    this.total++;
    if (this.log.length > this.capacity) {
      this.log = this.log.slice(this.log.length - this.capacity);
    }
  }

  entries(): readonly CallLogEntry[] {
    return [...this.log];
  }

  get count(): number {
    return this.total;
  }

  reset(): void {
    this.log = [];
    this.total = 0;
  }
}

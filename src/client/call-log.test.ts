import { describe, expect, it } from 'vitest';
import { CallLog, type CallLogEntry } from './call-log.js';

function entry(attempt: number): CallLogEntry {
  return {
    method: 'POST',
    path: 'contacts.list',
    attempt,
    status: 200,
    durationMs: 12,
    timestamp: 1_000 * attempt,
    apiVersion: '2023-09-26',
    responseSize: 2,
  };
}

describe('CallLog', () => {
  it('keeps the newest entries up to its capacity', () => {
    const log = new CallLog(2);
    log.record(entry(1));
    log.record(entry(2));
    log.record(entry(3));

    expect(log.entries().map((e) => e.attempt)).toEqual([2, 3]);
    expect(log.count).toBe(3);
  });

  it('hands out copies', () => {
    const log = new CallLog();
    log.record(entry(1));

    const snapshot = log.entries();
    log.record(entry(2));

    expect(snapshot).toHaveLength(1);
  });

  it('reset empties the log', () => {
    const log = new CallLog();
    log.record(entry(1));
    log.reset();

    expect(log.entries()).toEqual([]);
    expect(log.count).toBe(0);
  });
});

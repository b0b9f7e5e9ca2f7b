import { systemClock, type Clock } from '../client/types.js';
import { SingleFlight, type TokenPair, type TokenStore } from './store.js';

interface Entry {
  pair: TokenPair;
  cacheExpiresAt: number;
}

// Process-local TokenStore for embedding and tests; state dies with the process
export class MemoryTokenStore implements TokenStore {
  private readonly entries = new Map<string, Entry>();
  private readonly locks = new SingleFlight<TokenPair>();
  private readonly clock: Clock;

  constructor(options: { clock?: Clock } = {}) {
    this.clock = options.clock ?? systemClock;
  }

  async get(accountKey: string): Promise<TokenPair | null> {
    const entry = this.entries.get(accountKey);
    if (!entry) return null;
    if (entry.cacheExpiresAt <= this.clock.now()) {
      this.entries.delete(accountKey);
      return null;
    }
    return entry.pair;
  }

  async save(accountKey: string, pair: TokenPair, ttlSeconds: number): Promise<void> {
    this.entries.set(accountKey, { pair, cacheExpiresAt: this.clock.now() + ttlSeconds * 1000 });
  }

  async delete(accountKey: string): Promise<void> {
    this.entries.delete(accountKey);
  }

  withRefreshLock(accountKey: string, fn: () => Promise<TokenPair>): Promise<TokenPair> {
    return this.locks.run(accountKey, fn);
  }
}

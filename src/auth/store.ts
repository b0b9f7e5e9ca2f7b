import Database from 'better-sqlite3';
import { systemClock, type Clock } from '../client/types.js';

// Replaced wholesale on every exchange, never patched in place
export interface TokenPair {
  accessToken: string;
  refreshToken: string | null;
  tokenType: string;
  issuedAt: Date;
  expiresAt: Date;
}

/**
 * TokenStore — passive persistence for token pairs, keyed by account.
 *
 * Entries carry a cache TTL that is independent of the access token's own
 * expiry; an entry past its TTL reads back as absent.
 */
export interface TokenStore {
  get(accountKey: string): Promise<TokenPair | null>;
  save(accountKey: string, pair: TokenPair, ttlSeconds: number): Promise<void>;
  delete(accountKey: string): Promise<void>;
  /**
   * Runs fn unless a call for the same key is already in flight, in which
   * case the caller receives that call's promise instead.
   */
  withRefreshLock(accountKey: string, fn: () => Promise<TokenPair>): Promise<TokenPair>;
}

/**
 * SingleFlight — per-key promise sharing.
 *
 * The in-flight promise is registered synchronously before fn gets a chance
 * to yield, so there is no gap between "check" and "acquire".
 */
export class SingleFlight<T> {
  private readonly inFlight = new Map<string, Promise<T>>();

  run(key: string, fn: () => Promise<T>): Promise<T> {
    const existing = this.inFlight.get(key);
    if (existing) {
      return existing;
    }

    const promise = Promise.resolve()
      .then(fn)
      .finally(() => {
        this.inFlight.delete(key);
      });
    this.inFlight.set(key, promise);
    return promise;
  }
}

interface TokenRow {
  account_key: string;
  access_token: string;
  refresh_token: string | null;
  token_type: string;
  issued_at: number;
  expires_at: number;
  cache_expires_at: number;
}

function isTokenRow(row: unknown): row is TokenRow {
  return (
    typeof row === 'object' &&
    row !== null &&
    'access_token' in row &&
    'expires_at' in row &&
    'cache_expires_at' in row
  );
}

export class SqliteTokenStore implements TokenStore {
  private readonly db: Database.Database;
  private readonly clock: Clock;
  private readonly locks = new SingleFlight<TokenPair>();

  constructor(dbPath = ':memory:', options: { clock?: Clock } = {}) {
    this.db = new Database(dbPath);
    if (dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.clock = options.clock ?? systemClock;
    this.migrate();
  }

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS token_cache (
        account_key      TEXT PRIMARY KEY,
        access_token     TEXT NOT NULL,
        refresh_token    TEXT,
        token_type       TEXT NOT NULL DEFAULT 'Bearer',
        issued_at        INTEGER NOT NULL,
        expires_at       INTEGER NOT NULL,
        cache_expires_at INTEGER NOT NULL,
        updated_at       INTEGER NOT NULL
      );
    `);
  }

  async get(accountKey: string): Promise<TokenPair | null> {
    const row: unknown = this.db
      .prepare('SELECT * FROM token_cache WHERE account_key = ?')
      .get(accountKey);

    if (!isTokenRow(row)) return null;

    if (row.cache_expires_at <= this.clock.now()) {
      this.db.prepare('DELETE FROM token_cache WHERE account_key = ?').run(accountKey);
      return null;
    }

    return {
      accessToken: row.access_token,
      refreshToken: row.refresh_token,
      tokenType: row.token_type,
      issuedAt: new Date(row.issued_at),
      expiresAt: new Date(row.expires_at),
    };
  }

  async save(accountKey: string, pair: TokenPair, ttlSeconds: number): Promise<void> {
    const now = this.clock.now();
    // Single statement upsert: both tokens land together or not at all
    this.db.prepare(`
      INSERT INTO token_cache (account_key, access_token, refresh_token, token_type, issued_at, expires_at, cache_expires_at, updated_at)
      VALUES (@accountKey, @accessToken, @refreshToken, @tokenType, @issuedAt, @expiresAt, @cacheExpiresAt, @updatedAt)
      ON CONFLICT(account_key) DO UPDATE SET
        access_token     = excluded.access_token,
        refresh_token    = excluded.refresh_token,
        token_type       = excluded.token_type,
        issued_at        = excluded.issued_at,
        expires_at       = excluded.expires_at,
        cache_expires_at = excluded.cache_expires_at,
        updated_at       = excluded.updated_at
    `).run({
      accountKey,
      accessToken: pair.accessToken,
      refreshToken: pair.refreshToken,
      tokenType: pair.tokenType,
      issuedAt: pair.issuedAt.getTime(),
      expiresAt: pair.expiresAt.getTime(),
      cacheExpiresAt: now + ttlSeconds * 1000,
      updatedAt: now,
    });
  }

  async delete(accountKey: string): Promise<void> {
    this.db.prepare('DELETE FROM token_cache WHERE account_key = ?').run(accountKey);
  }

  withRefreshLock(accountKey: string, fn: () => Promise<TokenPair>): Promise<TokenPair> {
    return this.locks.run(accountKey, fn);
  }

  close(): void {
    this.db.close();
  }
}

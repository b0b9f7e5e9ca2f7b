import { afterEach, describe, expect, it } from 'vitest';
import { ManualClock, T0 } from '../../tests/helpers.js';
import { MemoryTokenStore } from './memory-store.js';
import { SingleFlight, SqliteTokenStore, type TokenPair, type TokenStore } from './store.js';

function makePair(overrides: Partial<TokenPair> = {}): TokenPair {
  return {
    accessToken: 'access-1',
    refreshToken: 'refresh-1',
    tokenType: 'Bearer',
    issuedAt: new Date(T0),
    expiresAt: new Date(T0 + 3_600_000),
    ...overrides,
  };
}

const open: SqliteTokenStore[] = [];

const stores: Array<[string, (clock: ManualClock) => TokenStore]> = [
  ['SqliteTokenStore', (clock) => {
    const store = new SqliteTokenStore(':memory:', { clock });
    open.push(store);
    return store;
  }],
  ['MemoryTokenStore', (clock) => new MemoryTokenStore({ clock })],
];

afterEach(() => {
  for (const store of open.splice(0)) store.close();
});

describe.each(stores)('%s', (_name, create) => {
  it('returns null for an unknown account', async () => {
    const store = create(new ManualClock());
    expect(await store.get('nobody')).toBeNull();
  });

  it('round-trips a pair including dates', async () => {
    const store = create(new ManualClock());
    await store.save('acct', makePair(), 600);

    expect(await store.get('acct')).toEqual(makePair());
  });

  it('keeps a null refresh token', async () => {
    const store = create(new ManualClock());
    await store.save('acct', makePair({ refreshToken: null }), 600);

    expect((await store.get('acct'))?.refreshToken).toBeNull();
  });

  it('replaces the whole pair on save', async () => {
    const store = create(new ManualClock());
    await store.save('acct', makePair(), 600);
    await store.save('acct', makePair({ accessToken: 'access-2', refreshToken: 'refresh-2' }), 600);

    const pair = await store.get('acct');
    expect(pair?.accessToken).toBe('access-2');
    expect(pair?.refreshToken).toBe('refresh-2');
  });

  it('keeps accounts apart', async () => {
    const store = create(new ManualClock());
    await store.save('a', makePair({ accessToken: 'token-a' }), 600);
    await store.save('b', makePair({ accessToken: 'token-b' }), 600);
    await store.delete('a');

    expect(await store.get('a')).toBeNull();
    expect((await store.get('b'))?.accessToken).toBe('token-b');
  });

  it('reads an entry past its cache TTL as absent', async () => {
    const clock = new ManualClock();
    const store = create(clock);
    await store.save('acct', makePair(), 60);

    clock.advance(59_999);
    expect(await store.get('acct')).not.toBeNull();

    clock.advance(1);
    expect(await store.get('acct')).toBeNull();
  });

  it('collapses concurrent refreshes for one account into a single call', async () => {
    const store = create(new ManualClock());
    let calls = 0;
    const refresh = async (): Promise<TokenPair> => {
      calls++;
      await new Promise((resolve) => setTimeout(resolve, 5));
      return makePair({ accessToken: `access-${calls + 1}` });
    };

    const results = await Promise.all([
      store.withRefreshLock('acct', refresh),
      store.withRefreshLock('acct', refresh),
      store.withRefreshLock('acct', refresh),
    ]);

    expect(calls).toBe(1);
    expect(results.map((pair) => pair.accessToken)).toEqual(['access-2', 'access-2', 'access-2']);
  });
});

describe('SingleFlight', () => {
  it('releases the key once the call settles, even on failure', async () => {
    const flight = new SingleFlight<number>();

    await expect(flight.run('k', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    await expect(flight.run('k', async () => 2)).resolves.toBe(2);
  });

  it('shares the rejection with every waiter', async () => {
    const flight = new SingleFlight<number>();
    let calls = 0;
    const failing = async (): Promise<number> => {
      calls++;
      throw new Error('refresh rejected');
    };

    const results = await Promise.allSettled([flight.run('k', failing), flight.run('k', failing)]);

    expect(calls).toBe(1);
    expect(results.map((result) => result.status)).toEqual(['rejected', 'rejected']);
  });

  it('runs different keys independently', async () => {
    const flight = new SingleFlight<string>();
    const [a, b] = await Promise.all([flight.run('a', async () => 'A'), flight.run('b', async () => 'B')]);
    expect([a, b]).toEqual(['A', 'B']);
  });
});

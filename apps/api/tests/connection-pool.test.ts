import { describe, it, expect, vi } from 'vitest';
import { ConnectionPool } from '../src/database/connection-pool.js';
import type { ConnectionHandle } from '../src/database/connection-handle.js';
import type { SqlConnection } from '../src/database/connection.js';
import { SessionContextBinder } from '../src/database/session-context.js';
import {
  DatabaseUnavailableError,
  LeakageGuardViolation,
  PoolExhaustedError,
  RequestCancelledError,
} from '../src/utils/errors.js';
import { FakePostgres, RLS_ROLE, ROLE_CLAIM, SUBJECT_CLAIM } from './support/fake-postgres.js';
import { identity } from './support/harness.js';

function setup(capacity: number, acquireTimeoutMs = 500) {
  const server = new FakePostgres();
  const pool = new ConnectionPool({ capacity, acquireTimeoutMs, connect: server.connect });
  return { server, pool };
}

describe('ConnectionPool', () => {
  it('rejects a non-positive capacity', () => {
    const server = new FakePostgres();
    expect(() => new ConnectionPool({ capacity: 0, acquireTimeoutMs: 10, connect: server.connect })).toThrow(RangeError);
  });

  it('opens connections lazily up to capacity', async () => {
    const { server, pool } = setup(2);
    expect(server.connections).toHaveLength(0);

    const a = await pool.acquire();
    const b = await pool.acquire();

    expect(a).not.toBe(b);
    expect(server.connections).toHaveLength(2);
    expect(pool.stats()).toMatchObject({ capacity: 2, total: 2, leased: 2, idle: 0 });
  });

  it('reuses a released handle before opening a new one', async () => {
    const { server, pool } = setup(2);
    const a = await pool.acquire();
    await pool.release(a);

    const again = await pool.acquire();

    expect(again).toBe(a);
    expect(server.connections).toHaveLength(1);
  });

  it('queues callers at capacity and hands released handles over', async () => {
    const { pool } = setup(2);
    const a = await pool.acquire();
    await pool.acquire();

    const pending = pool.acquire();
    expect(pool.stats().waiting).toBe(1);

    await pool.release(a);

    await expect(pending).resolves.toBe(a);
    expect(pool.stats()).toMatchObject({ total: 2, leased: 2, waiting: 0, peakLeased: 2 });
  });

  it('serves waiters in arrival order', async () => {
    const { pool } = setup(1);
    const a = await pool.acquire();
    const order: string[] = [];
    const first = pool.acquire().then((handle) => {
      order.push('first');
      return handle;
    });
    const second = pool.acquire().then((handle) => {
      order.push('second');
      return handle;
    });

    await pool.release(a);
    const handle = await first;
    expect(order).toEqual(['first']);

    await pool.release(handle);
    await second;
    expect(order).toEqual(['first', 'second']);
  });

  it('fails with a retryable PoolExhaustedError after the timeout', async () => {
    const { pool } = setup(1, 1000);
    await pool.acquire();

    await expect(pool.acquire(20)).rejects.toMatchObject({
      name: 'PoolExhaustedError',
      code: 'POOL_EXHAUSTED',
      statusCode: 503,
      retryable: true,
    });
    expect(pool.stats().waiting).toBe(0);
  });

  it('never leases more handles than its capacity', async () => {
    const { server, pool } = setup(3, 2000);
    const inUse = new Set<ConnectionHandle>();
    let maxInUse = 0;

    await Promise.all(
      Array.from({ length: 20 }, async () => {
        const handle = await pool.acquire();
        expect(inUse.has(handle)).toBe(false);
        inUse.add(handle);
        maxInUse = Math.max(maxInUse, inUse.size);
        await new Promise((resolve) => setTimeout(resolve, 1));
        inUse.delete(handle);
        await pool.release(handle);
      })
    );

    expect(maxInUse).toBe(3);
    expect(pool.stats().peakLeased).toBe(3);
    expect(server.connections).toHaveLength(3);
    expect(pool.stats()).toMatchObject({ idle: 3, leased: 0, waiting: 0 });
  });

  it('discards a handle returned with residual session context', async () => {
    const { server, pool } = setup(2);
    const binder = new SessionContextBinder({ role: RLS_ROLE, subjectClaim: SUBJECT_CLAIM, roleClaim: ROLE_CLAIM });
    const handle = await pool.acquire();
    await binder.apply(handle, identity('alice'));

    await expect(pool.release(handle)).rejects.toBeInstanceOf(LeakageGuardViolation);

    expect(handle.state).toBe('discarded');
    expect(server.connections[0]?.closed).toBe(true);
    expect(pool.idleHandles()).toHaveLength(0);
    expect(pool.stats()).toMatchObject({ total: 0, discarded: 1 });
  });

  it('refuses a release of a handle it has not leased', async () => {
    const { pool } = setup(1);
    const handle = await pool.acquire();
    await pool.release(handle);

    await expect(pool.release(handle)).rejects.toBeInstanceOf(LeakageGuardViolation);
    expect(pool.idleHandles()).toEqual([handle]);
  });

  it('closes tainted handles and replaces them on demand', async () => {
    const { server, pool } = setup(1);
    const handle = await pool.acquire();
    handle.taint('test');

    await pool.release(handle);

    expect(handle.state).toBe('discarded');
    expect(server.connections[0]?.closed).toBe(true);

    const replacement = await pool.acquire();
    expect(replacement).not.toBe(handle);
    expect(replacement.id).toBe(2);
    expect(server.connections).toHaveLength(2);
  });

  it('opens a replacement for a waiter when a handle is discarded', async () => {
    const { server, pool } = setup(1);
    const handle = await pool.acquire();
    const pending = pool.acquire();

    await pool.discard(handle);

    const replacement = await pending;
    expect(replacement.id).toBe(2);
    expect(server.openConnections).toHaveLength(1);
  });

  it('reports connect failures as DatabaseUnavailableError and frees the slot', async () => {
    const { server, pool } = setup(1);
    server.refuseConnections = true;

    await expect(pool.acquire()).rejects.toBeInstanceOf(DatabaseUnavailableError);
    expect(pool.stats()).toMatchObject({ total: 0, opening: 0 });

    server.refuseConnections = false;
    await expect(pool.acquire()).resolves.toMatchObject({ id: 1 });
  });

  it('rejects waiters and new callers once closed', async () => {
    const { server, pool } = setup(1);
    const handle = await pool.acquire();
    const waiting = expect(pool.acquire()).rejects.toMatchObject({ code: 'POOL_CLOSED' });

    await pool.close();
    await waiting;
    await expect(pool.acquire()).rejects.toMatchObject({ code: 'POOL_CLOSED' });

    await pool.release(handle);
    expect(server.openConnections).toHaveLength(0);
  });

  describe('slow and lost connections', () => {
    it('fails with PoolExhaustedError when opening a connection outlasts the timeout', async () => {
      const pool = new ConnectionPool({
        capacity: 1,
        acquireTimeoutMs: 1000,
        connect: () => new Promise<SqlConnection>(() => undefined),
      });

      await expect(pool.acquire(30)).rejects.toBeInstanceOf(PoolExhaustedError);
      expect(pool.stats()).toMatchObject({ opening: 0, total: 0, leased: 0 });
    });

    it('closes a connection that arrives after the caller gave up', async () => {
      const server = new FakePostgres();
      let arrive: () => void = () => undefined;
      const connect = () =>
        new Promise<SqlConnection>((resolve, reject) => {
          arrive = () => {
            server.connect().then(resolve, reject);
          };
        });
      const pool = new ConnectionPool({ capacity: 1, acquireTimeoutMs: 1000, connect });

      await expect(pool.acquire(20)).rejects.toBeInstanceOf(PoolExhaustedError);
      arrive();

      await vi.waitFor(() => expect(server.connections[0]?.closed).toBe(true));
      expect(pool.stats()).toMatchObject({ total: 0, idle: 0 });
    });

    it('skips and discards idle handles whose session was lost', async () => {
      const { server, pool } = setup(2);
      const handle = await pool.acquire();
      await pool.release(handle);
      server.connections[0]?.terminate();

      const next = await pool.acquire();

      expect(next).not.toBe(handle);
      expect(handle.state).toBe('discarded');
      expect(server.connections).toHaveLength(2);
      expect(pool.stats()).toMatchObject({ discarded: 1, leased: 1, idle: 0 });
    });

    it('discards a handle whose session was lost while leased', async () => {
      const { server, pool } = setup(1);
      const handle = await pool.acquire();
      server.connections[0]?.terminate();

      await pool.release(handle);

      expect(handle.state).toBe('discarded');
      expect(handle.taintedBecause).toBe('connection lost while leased');
      expect(pool.idleHandles()).toHaveLength(0);
    });
  });

  describe('cancellation', () => {
    it('removes a queued caller whose signal aborts', async () => {
      const { pool } = setup(1);
      const held = await pool.acquire();
      const controller = new AbortController();
      const waiting = pool.acquire(1000, controller.signal);
      expect(pool.stats().waiting).toBe(1);

      controller.abort();

      await expect(waiting).rejects.toBeInstanceOf(RequestCancelledError);
      expect(pool.stats().waiting).toBe(0);
      await pool.release(held);
      expect(pool.idleHandles()).toEqual([held]);
    });

    it('refuses a caller whose signal is already aborted', async () => {
      const { server, pool } = setup(1);
      const controller = new AbortController();
      controller.abort();

      await expect(pool.acquire(100, controller.signal)).rejects.toBeInstanceOf(RequestCancelledError);
      expect(server.connections).toHaveLength(0);
    });
  });
});

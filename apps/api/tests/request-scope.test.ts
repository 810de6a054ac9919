import { describe, it, expect, vi } from 'vitest';
import { withRequestScope, type RequestScope } from '../src/database/request-scope.js';
import { TaskRepository } from '../src/models/task.js';
import {
  AuthError,
  ContextBindError,
  PoolExhaustedError,
  QueryError,
  RequestCancelledError,
  ScopeStateError,
} from '../src/utils/errors.js';
import { FakePgError, SESSION_USER } from './support/fake-postgres.js';
import { createHarness, taskInput, tokenFor } from './support/harness.js';

describe('RequestScope', () => {
  describe('tenant isolation', () => {
    it("keeps one tenant's task out of another tenant's listing", async () => {
      const { db } = createHarness();

      const created = await withRequestScope(db.scopes, tokenFor('alice'), (scope) =>
        TaskRepository.create(scope, taskInput('Quarterly report'))
      );
      const bobTasks = await withRequestScope(db.scopes, tokenFor('bob'), (scope) => TaskRepository.findAll(scope));
      const aliceTasks = await withRequestScope(db.scopes, tokenFor('alice'), (scope) =>
        TaskRepository.findAll(scope)
      );

      expect(created.tenant_id).toBe('alice');
      expect(bobTasks).toEqual([]);
      expect(aliceTasks.map((task) => task.id)).toEqual([created.id]);
    });

    it('hides foreign rows from lookups and writes', async () => {
      const { server, db } = createHarness();
      const foreign = server.seedTask('alice', { title: 'Private' });

      const result = await withRequestScope(db.scopes, tokenFor('bob'), async (scope) => ({
        found: await TaskRepository.findById(scope, foreign.id),
        updated: await TaskRepository.update(scope, foreign.id, taskInput('Hijacked')),
        completed: await TaskRepository.setCompleted(scope, foreign.id, true),
        deleted: await TaskRepository.delete(scope, foreign.id),
      }));

      expect(result).toEqual({ found: null, updated: null, completed: null, deleted: false });
      expect(server.tasksOf('alice')).toEqual([foreign]);
    });

    it('lists newest first and filters on completion', async () => {
      const { server, db } = createHarness();
      const older = server.seedTask('carol', { date_time: new Date('2026-01-01T08:00:00Z'), completed: true });
      const newer = server.seedTask('carol', { date_time: new Date('2026-02-01T08:00:00Z') });

      const { all, done } = await withRequestScope(db.scopes, tokenFor('carol'), async (scope) => ({
        all: await TaskRepository.findAll(scope),
        done: await TaskRepository.findAll(scope, { completed: true }),
      }));

      expect(all.map((task) => task.id)).toEqual([newer.id, older.id]);
      expect(done.map((task) => task.id)).toEqual([older.id]);
    });

    it('runs 50 concurrent requests for 5 tenants on 5 connections without residue', async () => {
      const { server, db } = createHarness({ capacity: 5, acquireTimeoutMs: 5000 });
      const tenants = ['t1', 't2', 't3', 't4', 't5'];

      const listings = await Promise.all(
        Array.from({ length: 50 }, (_, index) => {
          const tenant = tenants[index % tenants.length] ?? 't1';
          return withRequestScope(db.scopes, tokenFor(tenant), async (scope) => {
            await TaskRepository.create(scope, taskInput(`${tenant}-${index}`));
            const tasks = await TaskRepository.findAll(scope);
            return { tenant, owners: new Set(tasks.map((task) => task.tenant_id)) };
          });
        })
      );

      for (const { tenant, owners } of listings) {
        expect([...owners]).toEqual([tenant]);
      }
      expect(server.tasks).toHaveLength(50);
      expect(server.connections.length).toBeLessThanOrEqual(5);
      expect(db.pool.stats()).toMatchObject({ leased: 0, waiting: 0 });
      expect(db.pool.idleHandles().every((handle) => handle.boundIdentity === null)).toBe(true);
      for (const session of server.openConnections) {
        expect(session.role).toBe(SESSION_USER);
        expect(session.settings.size).toBe(0);
      }
      const binderStats = db.binder.stats();
      expect(binderStats.applied).toBe(50);
      expect(binderStats.cleared).toBe(50);
      expect(binderStats.pending).toBe(0);
    });
  });

  describe('transactions', () => {
    it('commits the work and releases the connection unbound', async () => {
      const { server, db } = createHarness();
      let captured: RequestScope | null = null;

      await withRequestScope(db.scopes, tokenFor('alice'), async (scope) => {
        captured = scope;
        await TaskRepository.create(scope, taskInput('Persisted'));
      });

      expect(server.tasksOf('alice').map((task) => task.title)).toEqual(['Persisted']);
      expect(captured).toMatchObject({ state: 'released', outcome: 'committed' });
      expect(db.pool.idleHandles()).toHaveLength(1);
      expect(db.pool.idleHandles()[0]?.boundIdentity).toBeNull();
    });

    it('rolls back and rethrows the original error when the work fails', async () => {
      const { server, db } = createHarness();
      const failure = new Error('handler failed');

      const request = withRequestScope(db.scopes, tokenFor('alice'), async (scope) => {
        await TaskRepository.create(scope, taskInput('Discarded'));
        throw failure;
      });

      await expect(request).rejects.toBe(failure);
      expect(server.tasks).toHaveLength(0);
      expect(db.pool.idleHandles()).toHaveLength(1);
      expect(db.pool.idleHandles()[0]?.boundIdentity).toBeNull();
    });

    it('wraps database failures as QueryError and rolls back', async () => {
      const { server, db } = createHarness();

      const request = withRequestScope(db.scopes, tokenFor('alice'), async (scope) => {
        await TaskRepository.create(scope, taskInput('First'));
        return TaskRepository.create(scope, { ...taskInput('Too short'), duration_minutes: 3 });
      });

      await expect(request).rejects.toMatchObject({
        name: 'QueryError',
        statusCode: 422,
        sqlState: '23514',
        constraint: 'chk_duration',
      });
      expect(server.tasks).toHaveLength(0);
    });

    it('maps a policy denial to 403', async () => {
      const { server, db } = createHarness();
      server.failOn(/^INSERT INTO tasks/, new FakePgError('new row violates row-level security policy', '42501'));

      const request = withRequestScope(db.scopes, tokenFor('alice'), (scope) =>
        TaskRepository.create(scope, taskInput('Denied'))
      );

      await expect(request).rejects.toMatchObject({ name: 'QueryError', statusCode: 403, sqlState: '42501' });
    });

    it('reports a failed commit and discards the connection', async () => {
      const { server, db } = createHarness();
      server.failOn(/^COMMIT$/, new FakePgError('could not serialize access', '40001'));

      const request = withRequestScope(db.scopes, tokenFor('alice'), (scope) =>
        TaskRepository.create(scope, taskInput('Lost'))
      );

      await expect(request).rejects.toBeInstanceOf(QueryError);
      expect(server.tasks).toHaveLength(0);
      expect(server.connections[0]?.closed).toBe(true);
      expect(db.pool.stats()).toMatchObject({ total: 0, discarded: 1 });
    });

    it('keeps a committed result when clearing the session fails afterwards', async () => {
      const { server, db } = createHarness();
      server.failOn(/^RESET ROLE$/);

      const created = await withRequestScope(db.scopes, tokenFor('alice'), (scope) =>
        TaskRepository.create(scope, taskInput('Kept'))
      );

      expect(created.title).toBe('Kept');
      expect(server.tasksOf('alice')).toHaveLength(1);
      expect(server.connections[0]?.closed).toBe(true);
      expect(db.pool.stats()).toMatchObject({ leased: 0, idle: 0, discarded: 1 });
    });

    it('shares one cleanup between concurrent end calls', async () => {
      const { db } = createHarness();
      const scope = await db.scopes.begin(tokenFor('alice'));

      const first = scope.end();
      const second = scope.end('rollback');
      await first;

      expect(second).toBe(first);
      expect(scope.state).toBe('released');
      expect(scope.outcome).toBe('committed');
      expect(db.binder.stats()).toEqual({ applied: 1, cleared: 1, pending: 0 });
    });
  });

  describe('scope state', () => {
    it('rejects repository calls on a scope that was never begun', async () => {
      const { db } = createHarness();

      await expect(TaskRepository.findAll(db.scopes.create())).rejects.toBeInstanceOf(ScopeStateError);
    });

    it('rejects repository calls after the scope ended', async () => {
      const { db } = createHarness();
      const scope = await db.scopes.begin(tokenFor('alice'));
      await scope.end();

      await expect(TaskRepository.findAll(scope)).rejects.toBeInstanceOf(ScopeStateError);
    });

    it('rejects a second call while one is executing', async () => {
      const { db } = createHarness();

      const request = withRequestScope(db.scopes, tokenFor('alice'), (scope) =>
        Promise.all([TaskRepository.findAll(scope), TaskRepository.findAll(scope)])
      );

      await expect(request).rejects.toBeInstanceOf(ScopeStateError);
      expect(db.pool.idleHandles()[0]?.boundIdentity).toBeNull();
    });

    it('cannot be begun twice', async () => {
      const { db } = createHarness();
      const scope = await db.scopes.begin(tokenFor('alice'));

      await expect(scope.begin(tokenFor('alice'))).rejects.toBeInstanceOf(ScopeStateError);
      await scope.end();
    });
  });

  describe('begin failures', () => {
    it('resolves identity before touching the pool', async () => {
      const { server, db } = createHarness();

      await expect(db.scopes.begin('not-a-token')).rejects.toBeInstanceOf(AuthError);
      expect(server.connections).toHaveLength(0);
    });

    it('aborts with ContextBindError without running business statements', async () => {
      const { server, db } = createHarness();
      server.failOn(/set_config/);
      const work = vi.fn(async (scope: RequestScope) => TaskRepository.findAll(scope));

      const request = withRequestScope(db.scopes, tokenFor('alice'), work);

      await expect(request).rejects.toBeInstanceOf(ContextBindError);
      expect(work).not.toHaveBeenCalled();
      const session = server.connections[0];
      expect(session?.log.some((sql) => sql.includes('tasks'))).toBe(false);
      expect(session?.closed).toBe(true);
      expect(db.pool.idleHandles()).toHaveLength(0);
      expect(db.pool.stats()).toMatchObject({ leased: 0, discarded: 1 });
    });

    it('discards the connection when BEGIN fails', async () => {
      const { server, db } = createHarness();
      server.failOn(/^BEGIN$/);

      await expect(db.scopes.begin(tokenFor('alice'))).rejects.toBeInstanceOf(ContextBindError);
      expect(server.connections[0]?.closed).toBe(true);
      expect(db.pool.stats()).toMatchObject({ total: 0, leased: 0 });
    });

    it('fails with PoolExhaustedError when every connection is leased', async () => {
      const { db } = createHarness({ capacity: 1, acquireTimeoutMs: 30 });
      const holder = await db.scopes.begin(tokenFor('alice'));

      await expect(db.scopes.begin(tokenFor('bob'))).rejects.toBeInstanceOf(PoolExhaustedError);

      await holder.end();
      const next = await db.scopes.begin(tokenFor('bob'));
      expect(next.identity).toBe('bob');
      await next.end();
    });

    it('leaves the pool queue when the request is cancelled while waiting', async () => {
      const { db } = createHarness({ capacity: 1, acquireTimeoutMs: 1000 });
      const holder = await db.scopes.begin(tokenFor('alice'));
      const controller = new AbortController();
      const waiting = db.scopes.begin(tokenFor('bob'), { signal: controller.signal });
      await vi.waitFor(() => expect(db.pool.stats().waiting).toBe(1));

      controller.abort();

      await expect(waiting).rejects.toBeInstanceOf(RequestCancelledError);
      expect(db.pool.stats().waiting).toBe(0);
      await holder.end();
      expect(db.pool.stats()).toMatchObject({ idle: 1, leased: 0 });
    });

    it('refuses to start for an already aborted request', async () => {
      const { server, db } = createHarness();
      const controller = new AbortController();
      controller.abort();

      await expect(db.scopes.begin(tokenFor('alice'), { signal: controller.signal })).rejects.toBeInstanceOf(
        RequestCancelledError
      );
      expect(server.connections).toHaveLength(0);
    });
  });

  describe('cancellation', () => {
    it('rolls back and returns the connection unbound when cancelled mid-query', async () => {
      const { server, db } = createHarness({ cancelGraceMs: 1000 });
      const held = server.holdOn(/FROM tasks/);
      const controller = new AbortController();

      const request = withRequestScope(
        db.scopes,
        tokenFor('alice'),
        async (scope) => {
          await TaskRepository.create(scope, taskInput('Uncommitted'));
          return TaskRepository.findAll(scope);
        },
        { signal: controller.signal }
      );
      const outcome = expect(request).rejects.toBeInstanceOf(RequestCancelledError);

      await held.reached;
      controller.abort();
      held.release();
      await outcome;

      expect(server.tasks).toHaveLength(0);
      expect(db.pool.idleHandles()).toHaveLength(1);
      expect(db.pool.idleHandles()[0]?.boundIdentity).toBeNull();
      const session = server.connections[0];
      expect(session?.closed).toBe(false);
      expect(session?.role).toBe(SESSION_USER);
      expect(session?.settings.size).toBe(0);
      expect(session?.log.slice(-4)).toEqual([
        'ROLLBACK',
        'RESET ROLE',
        'RESET request.jwt.claim.sub',
        'RESET request.jwt.claim.role',
      ]);
    });

    it('discards the connection when the statement outlives the grace period', async () => {
      const { server, db } = createHarness({ cancelGraceMs: 20 });
      const held = server.holdOn(/FROM tasks/);
      const controller = new AbortController();

      const request = withRequestScope(db.scopes, tokenFor('alice'), (scope) => TaskRepository.findAll(scope), {
        signal: controller.signal,
      });
      const outcome = expect(request).rejects.toBeInstanceOf(RequestCancelledError);

      await held.reached;
      controller.abort();
      await outcome;

      expect(server.connections[0]?.closed).toBe(true);
      expect(db.pool.stats()).toMatchObject({ total: 0, leased: 0, discarded: 1 });
      expect(db.binder.stats().pending).toBe(0);
      held.release();
    });
  });
});

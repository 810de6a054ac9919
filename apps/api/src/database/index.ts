import { config } from '../config/index.js';
import { IdentityResolver } from '../services/identity-resolver.js';
import { ConnectionPool } from './connection-pool.js';
import { createPgConnectionFactory, type ConnectionFactory } from './connection.js';
import { RequestScopeFactory } from './request-scope.js';
import { SessionContextBinder } from './session-context.js';

export { ConnectionPool, type PoolStats } from './connection-pool.js';
export { SessionContextBinder, type BinderStats } from './session-context.js';
export { RequestScope, RequestScopeFactory, withRequestScope } from './request-scope.js';
export type { SqlConnection, ConnectionFactory } from './connection.js';

export interface Database {
  pool: ConnectionPool;
  binder: SessionContextBinder;
  scopes: RequestScopeFactory;
  close(): Promise<void>;
}

export interface DatabaseOptions {
  connect?: ConnectionFactory;
  resolver?: IdentityResolver;
  capacity?: number;
  acquireTimeoutMs?: number;
  cancelGraceMs?: number;
}

/**
 * Wire pool, binder and scope factory from config. Tests pass their own
 * connection factory and resolver.
 */
export function createDatabase(options: DatabaseOptions = {}): Database {
  const pool = new ConnectionPool({
    capacity: options.capacity ?? config.database.poolSize,
    acquireTimeoutMs: options.acquireTimeoutMs ?? config.database.acquireTimeoutMs,
    connect: options.connect ?? createPgConnectionFactory(),
  });
  const binder = new SessionContextBinder(config.rls);
  const scopes = new RequestScopeFactory({
    resolver: options.resolver ?? new IdentityResolver(),
    pool,
    binder,
    cancelGraceMs: options.cancelGraceMs ?? config.database.cancelGraceMs,
  });

  return {
    pool,
    binder,
    scopes,
    close: () => pool.close(),
  };
}

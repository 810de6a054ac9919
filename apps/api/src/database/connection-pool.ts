import { ConnectionHandle } from './connection-handle.js';
import type { ConnectionFactory, SqlConnection } from './connection.js';
import {
  AppError,
  DatabaseUnavailableError,
  LeakageGuardViolation,
  PoolExhaustedError,
  RequestCancelledError,
} from '../utils/errors.js';
import { logger, logHelpers } from '../utils/logger.js';

export interface ConnectionPoolOptions {
  /** Maximum number of physical connections, leased or idle */
  capacity: number;
  /** Default wait for `acquire` when no timeout is passed */
  acquireTimeoutMs: number;
  connect: ConnectionFactory;
}

export interface PoolStats {
  capacity: number;
  total: number;
  idle: number;
  leased: number;
  opening: number;
  waiting: number;
  peakLeased: number;
  discarded: number;
}

interface Waiter {
  resolve: (handle: ConnectionHandle) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
  /** Epoch ms after which the caller has given up */
  deadline: number;
  detach: () => void;
}

/**
 * Bounded pool of exclusively leased connections.
 *
 * Every hand-out happens synchronously inside one turn of the event loop
 * (idle list shift, waiter shift), so two callers can never receive the
 * same handle. Connections are opened lazily up to `capacity`; `opening`
 * counts towards the bound while a connect is in flight.
 */
export class ConnectionPool {
  private readonly idle: ConnectionHandle[] = [];
  private readonly leased = new Set<ConnectionHandle>();
  private readonly waiters: Waiter[] = [];
  private opening = 0;
  private nextHandleId = 1;
  private peakLeased = 0;
  private discardedCount = 0;
  private closed = false;

  constructor(private readonly options: ConnectionPoolOptions) {
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new RangeError(`Pool capacity must be a positive integer, got ${options.capacity}`);
    }
  }

  get capacity(): number {
    return this.options.capacity;
  }

  private get size(): number {
    return this.idle.length + this.leased.size + this.opening;
  }

  /**
   * Lease a handle. Waits FIFO behind earlier callers when the pool is at
   * capacity and fails with PoolExhaustedError once `timeoutMs` elapses,
   * including time spent opening a new connection. Aborting `signal` gives
   * up the place in the queue.
   */
  async acquire(timeoutMs = this.options.acquireTimeoutMs, signal?: AbortSignal): Promise<ConnectionHandle> {
    if (this.closed) {
      throw new AppError(503, 'Connection pool is closed', true, 'POOL_CLOSED');
    }
    if (signal?.aborted) {
      throw new RequestCancelledError();
    }

    let handle = this.idle.shift();
    while (handle?.connection.broken) {
      handle.taint('connection lost while idle');
      // Closing a dead client may never settle; do not make the caller wait
      this.discard(handle).catch((error: unknown) => {
        logger.warn('Discarding lost connection failed', { error });
      });
      handle = this.idle.shift();
    }
    if (handle) {
      return this.lease(handle);
    }

    if (this.size < this.options.capacity) {
      return this.open(timeoutMs);
    }

    return new Promise<ConnectionHandle>((resolve, reject) => {
      const onAbort = () => {
        this.dequeue(waiter);
        reject(new RequestCancelledError());
      };
      const waiter: Waiter = {
        resolve,
        reject,
        deadline: Date.now() + timeoutMs,
        timer: setTimeout(() => {
          this.dequeue(waiter);
          logger.warn('Connection pool exhausted', { timeoutMs, ...this.stats() });
          reject(new PoolExhaustedError(timeoutMs));
        }, timeoutMs),
        detach: () => signal?.removeEventListener('abort', onAbort),
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /**
   * Return a handle. The handle must carry no session context: a bound
   * handle is closed instead of reused and the breach is raised.
   */
  async release(handle: ConnectionHandle): Promise<void> {
    if (!this.leased.has(handle)) {
      const violation = new LeakageGuardViolation(
        `Handle ${handle.id} released while not leased (state: ${handle.state})`,
        handle.id
      );
      logHelpers.logInvariantBreach(violation.message, { handleId: handle.id, state: handle.state });
      throw violation;
    }

    const residual = handle.boundIdentity;
    if (residual !== null) {
      logHelpers.logInvariantBreach('Handle returned to pool with residual session context', {
        handleId: handle.id,
        tenant: residual,
      });
      await this.discard(handle);
      throw new LeakageGuardViolation(
        `Handle ${handle.id} returned to pool while still bound to a tenant`,
        handle.id
      );
    }

    if (handle.connection.broken) {
      handle.taint('connection lost while leased');
    }
    if (handle.tainted || this.closed) {
      await this.discard(handle);
      return;
    }

    this.leased.delete(handle);
    this.handOff(handle);
  }

  /**
   * Close a handle for good. A caller waiting for capacity gets a freshly
   * opened replacement; otherwise the next acquire opens one lazily.
   */
  async discard(handle: ConnectionHandle): Promise<void> {
    if (handle.state === 'discarded') {
      return;
    }

    this.leased.delete(handle);
    const idleIndex = this.idle.indexOf(handle);
    if (idleIndex !== -1) {
      this.idle.splice(idleIndex, 1);
    }
    handle.state = 'discarded';
    this.discardedCount += 1;

    logger.warn('Discarding database connection', {
      handleId: handle.id,
      reason: handle.taintedBecause ?? 'released with residual context',
    });

    this.growForWaiters();

    try {
      await handle.connection.end();
    } catch (error) {
      logger.warn('Closing discarded connection failed', { handleId: handle.id, error });
    }
  }

  /**
   * Reject pending waiters and close idle connections. Leased handles are
   * closed as they come back.
   */
  async close(): Promise<void> {
    this.closed = true;

    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.detach();
      waiter.reject(new AppError(503, 'Connection pool is closed', true, 'POOL_CLOSED'));
    }

    const idle = this.idle.splice(0);
    await Promise.all(
      idle.map(async (handle) => {
        handle.state = 'discarded';
        await handle.connection.end();
      })
    );
  }

  stats(): PoolStats {
    return {
      capacity: this.options.capacity,
      total: this.size,
      idle: this.idle.length,
      leased: this.leased.size,
      opening: this.opening,
      waiting: this.waiters.length,
      peakLeased: this.peakLeased,
      discarded: this.discardedCount,
    };
  }

  /**
   * Snapshot of the free list, for health checks and invariant assertions.
   */
  idleHandles(): readonly ConnectionHandle[] {
    return [...this.idle];
  }

  private async open(timeoutMs: number): Promise<ConnectionHandle> {
    this.opening += 1;
    let connection: SqlConnection;
    try {
      connection = await this.connectWithin(timeoutMs);
    } catch (error) {
      this.opening -= 1;
      this.growForWaiters();
      if (error instanceof PoolExhaustedError) {
        logger.warn('Opening database connection timed out', { timeoutMs, ...this.stats() });
        throw error;
      }
      logger.error('Opening database connection failed', { error });
      throw new DatabaseUnavailableError({ cause: error });
    }
    this.opening -= 1;

    const handle = new ConnectionHandle(this.nextHandleId++, connection);
    logger.debug('Opened database connection', { handleId: handle.id, total: this.size + 1 });

    if (this.closed) {
      handle.state = 'discarded';
      await handle.connection.end();
      throw new AppError(503, 'Connection pool is closed', true, 'POOL_CLOSED');
    }

    return this.lease(handle);
  }

  /**
   * Run the connect factory against the caller's deadline. A connection
   * that arrives after the deadline is closed, never pooled.
   */
  private connectWithin(timeoutMs: number): Promise<SqlConnection> {
    return new Promise<SqlConnection>((resolve, reject) => {
      let expired = false;
      const timer = setTimeout(() => {
        expired = true;
        reject(new PoolExhaustedError(timeoutMs));
      }, timeoutMs);

      this.options.connect().then(
        (connection) => {
          clearTimeout(timer);
          if (!expired) {
            resolve(connection);
            return;
          }
          logger.warn('Connection opened after acquire timeout, closing it');
          connection.end().catch((error: unknown) => {
            logger.warn('Closing late connection failed', { error });
          });
        },
        (error: unknown) => {
          clearTimeout(timer);
          if (expired) {
            logger.debug('Connect failed after acquire timeout', { error });
            return;
          }
          reject(error);
        }
      );
    });
  }

  private lease(handle: ConnectionHandle): ConnectionHandle {
    handle.state = 'leased';
    this.leased.add(handle);
    this.peakLeased = Math.max(this.peakLeased, this.leased.size);
    return handle;
  }

  private handOff(handle: ConnectionHandle): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.detach();
      waiter.resolve(this.lease(handle));
      return;
    }
    handle.state = 'idle';
    this.idle.push(handle);
  }

  private growForWaiters(): void {
    while (this.waiters.length > 0 && this.size < this.options.capacity && !this.closed) {
      const waiter = this.waiters.shift();
      if (!waiter) return;
      clearTimeout(waiter.timer);
      waiter.detach();
      this.open(Math.max(0, waiter.deadline - Date.now())).then(waiter.resolve, waiter.reject);
    }
  }

  private dequeue(waiter: Waiter): void {
    clearTimeout(waiter.timer);
    waiter.detach();
    const index = this.waiters.indexOf(waiter);
    if (index !== -1) {
      this.waiters.splice(index, 1);
    }
  }
}

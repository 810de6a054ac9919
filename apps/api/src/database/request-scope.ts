import type { ConnectionHandle, SessionContext } from './connection-handle.js';
import type { ConnectionPool } from './connection-pool.js';
import type { SqlConnection } from './connection.js';
import type { SessionContextBinder } from './session-context.js';
import type { IdentityResolver } from '../services/identity-resolver.js';
import type { TenantIdentity } from '../types/tenant-identity.js';
import {
  ContextBindError,
  QueryError,
  RequestCancelledError,
  ScopeStateError,
} from '../utils/errors.js';
import { logger, logHelpers } from '../utils/logger.js';

export type ScopeState = 'idle' | 'bound' | 'executing' | 'committed' | 'rolled_back' | 'released';

export type ScopeOutcome = 'commit' | 'rollback';

export interface RequestScopeOptions {
  resolver: IdentityResolver;
  pool: ConnectionPool;
  binder: SessionContextBinder;
  /** Wait for a free connection; pool default when omitted */
  acquireTimeoutMs?: number;
  /** How long cleanup waits for an in-flight statement after cancellation */
  cancelGraceMs: number;
}

export interface BeginOptions {
  signal?: AbortSignal;
}

/**
 * Unit of work for one inbound request.
 *
 *   idle -> bound -> executing -> bound ... -> committed | rolled_back -> released
 *
 * Owns exactly one connection handle between `begin` and `end`. `end` always
 * runs COMMIT/ROLLBACK, then clear, then release, whichever way the request
 * finished; when anything in that chain fails the handle is discarded
 * instead of going back to the free list.
 */
export class RequestScope {
  private currentState: ScopeState = 'idle';
  private handle: ConnectionHandle | null = null;
  private sessionContext: SessionContext | null = null;
  private failed = false;
  private inFlight: Promise<unknown> | null = null;
  private ending: Promise<void> | null = null;
  private detachSignal: (() => void) | null = null;
  private cancelReason: RequestCancelledError | null = null;
  private finalOutcome: 'committed' | 'rolled_back' | null = null;
  private readonly cancelListeners = new Set<(reason: RequestCancelledError) => void>();

  constructor(private readonly options: RequestScopeOptions) {}

  get state(): ScopeState {
    return this.currentState;
  }

  get identity(): TenantIdentity | null {
    return this.sessionContext?.identity ?? null;
  }

  /** How the transaction ended, once `end` has run */
  get outcome(): 'committed' | 'rolled_back' | null {
    return this.finalOutcome;
  }

  get cancelled(): boolean {
    return this.cancelReason !== null;
  }

  /**
   * Resolve identity, lease a connection, bind the tenant context and open
   * the transaction. On failure nothing stays leased.
   */
  async begin(credential: string, opts: BeginOptions = {}): Promise<this> {
    if (this.currentState !== 'idle') {
      throw new ScopeStateError(`Cannot begin a scope in state ${this.currentState}`);
    }
    if (opts.signal?.aborted) {
      throw new RequestCancelledError();
    }

    const identity = this.options.resolver.resolve(credential);
    const handle = await this.options.pool.acquire(this.options.acquireTimeoutMs, opts.signal);

    try {
      this.sessionContext = await this.options.binder.apply(handle, identity);
    } catch (error) {
      await this.abandon(handle);
      throw error;
    }

    try {
      await handle.connection.query('BEGIN');
    } catch (error) {
      handle.taint('BEGIN failed');
      await this.abandon(handle);
      throw new ContextBindError('Could not open transaction on bound connection', { cause: error });
    }

    this.handle = handle;
    this.currentState = 'bound';

    if (opts.signal) {
      const signal = opts.signal;
      const onAbort = () => {
        this.cancel();
      };
      signal.addEventListener('abort', onAbort, { once: true });
      this.detachSignal = () => signal.removeEventListener('abort', onAbort);
      if (signal.aborted) {
        this.cancel();
      }
    }

    logger.debug('Request scope bound', { handleId: handle.id });
    return this;
  }

  /**
   * Execute one repository call on the bound connection.
   * A failure marks the scope for rollback and is rethrown unchanged.
   */
  async run<T>(operation: string, work: (connection: SqlConnection) => Promise<T>): Promise<T> {
    if (this.cancelReason) {
      throw this.cancelReason;
    }
    if (this.currentState !== 'bound' || !this.handle || this.ending) {
      throw new ScopeStateError(`Cannot run ${operation} on a scope in state ${this.currentState}`);
    }
    const handle = this.handle;

    this.currentState = 'executing';
    const pending = work(handle.connection);
    // Tracked until the statement itself settles, not until the caller
    // stops waiting: after a cancel the connection may still be busy.
    this.inFlight = pending;
    const settle = () => {
      if (this.inFlight === pending) {
        this.inFlight = null;
      }
    };
    pending.then(settle, settle);

    try {
      return await this.raceCancellation(pending);
    } catch (error) {
      this.failed = true;
      throw error;
    } finally {
      if (this.currentState === 'executing') {
        this.currentState = 'bound';
      }
    }
  }

  /**
   * Finish the unit of work. Idempotent: later and concurrent calls share
   * the first call's cleanup.
   */
  end(outcome: ScopeOutcome = 'commit'): Promise<void> {
    if (!this.ending) {
      this.ending = this.finish(outcome);
    }
    return this.ending;
  }

  /**
   * Abort the in-flight call (if any) and roll back.
   */
  cancel(reason = 'Request was cancelled'): void {
    if (this.cancelReason || this.currentState === 'idle' || this.currentState === 'released') {
      return;
    }
    const cancellation = new RequestCancelledError(reason);
    this.cancelReason = cancellation;
    this.failed = true;
    for (const listener of this.cancelListeners) {
      listener(cancellation);
    }
    logger.warn('Request scope cancelled', { handleId: this.handle?.id, state: this.currentState });
    this.end('rollback').catch((error: unknown) => {
      logger.error('Cleanup after cancellation failed', { error });
    });
  }

  private async finish(outcome: ScopeOutcome): Promise<void> {
    this.detachSignal?.();
    this.detachSignal = null;

    const handle = this.handle;
    if (!handle) {
      this.currentState = 'released';
      return;
    }

    let reusable = await this.settleInFlight();
    let cleanupError: unknown = null;

    if (reusable) {
      const commit = outcome === 'commit' && !this.failed;
      try {
        await handle.connection.query(commit ? 'COMMIT' : 'ROLLBACK');
        this.currentState = commit ? 'committed' : 'rolled_back';
      } catch (error) {
        cleanupError = commit ? new QueryError('commit', error) : null;
        reusable = false;
        this.currentState = 'rolled_back';
        handle.taint('transaction end failed');
        logger.error('Ending transaction failed', { handleId: handle.id, commit, error });
      }
    } else {
      this.currentState = 'rolled_back';
    }

    try {
      await this.options.binder.clear(handle);
    } catch (error) {
      reusable = false;
      if (this.currentState === 'committed') {
        // Committed work stands: the request succeeds, the handle is dropped.
        logHelpers.logInvariantBreach('Session context not cleared after commit', { handleId: handle.id, error });
      } else {
        cleanupError = cleanupError ?? error;
      }
    }

    this.handle = null;
    this.finalOutcome = this.currentState === 'committed' ? 'committed' : 'rolled_back';
    this.currentState = 'released';

    if (reusable && !handle.tainted) {
      await this.options.pool.release(handle);
    } else {
      await this.options.pool.discard(handle);
    }

    logger.debug('Request scope released', { handleId: handle.id, outcome: this.finalOutcome });

    if (cleanupError) {
      throw cleanupError;
    }
  }

  /**
   * After cancellation an in-flight statement may still be running on the
   * connection. Give it `cancelGraceMs` to finish; past that the
   * connection cannot be trusted and is discarded.
   */
  private async settleInFlight(): Promise<boolean> {
    const pending = this.inFlight;
    if (!pending) {
      return true;
    }

    let timer: NodeJS.Timeout | undefined;
    const settled = await Promise.race([
      pending.then(
        () => true,
        () => true
      ),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(false), this.options.cancelGraceMs);
      }),
    ]);
    clearTimeout(timer);

    if (!settled && this.handle) {
      this.handle.taint('statement still running after cancellation');
    }
    return settled;
  }

  private raceCancellation<T>(pending: Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      if (this.cancelReason) {
        reject(this.cancelReason);
        return;
      }
      const onCancel = (reason: RequestCancelledError) => reject(reason);
      this.cancelListeners.add(onCancel);
      pending.then(resolve, reject).finally(() => {
        this.cancelListeners.delete(onCancel);
      });
    });
  }

  /**
   * begin() failed after the lease: undo the session and give the
   * connection back (or drop it if the session cannot be trusted).
   */
  private async abandon(handle: ConnectionHandle): Promise<void> {
    try {
      await this.options.binder.clear(handle);
    } catch (error) {
      logger.warn('Clearing context after failed begin did not succeed', { handleId: handle.id, error });
    }

    if (handle.tainted || handle.boundIdentity !== null) {
      await this.options.pool.discard(handle);
    } else {
      await this.options.pool.release(handle);
    }
    this.currentState = 'released';
  }
}

/**
 * Builds request scopes over one shared pool and binder.
 */
export class RequestScopeFactory {
  constructor(private readonly options: RequestScopeOptions) {}

  create(): RequestScope {
    return new RequestScope(this.options);
  }

  async begin(credential: string, opts: BeginOptions = {}): Promise<RequestScope> {
    return this.create().begin(credential, opts);
  }
}

/**
 * Scoped acquisition: begin, run `work`, commit. Any error rolls back and
 * is rethrown unchanged once cleanup has finished.
 */
export async function withRequestScope<T>(
  factory: RequestScopeFactory,
  credential: string,
  work: (scope: RequestScope) => Promise<T>,
  opts: BeginOptions = {}
): Promise<T> {
  const scope = await factory.begin(credential, opts);

  let result: T;
  try {
    result = await work(scope);
  } catch (error) {
    try {
      await scope.end('rollback');
    } catch (cleanupError) {
      logger.error('Scope cleanup failed after request error', { error: cleanupError });
    }
    throw error;
  }

  await scope.end('commit');
  if (scope.cancelled) {
    throw new RequestCancelledError();
  }
  return result;
}

import type { SqlConnection } from './connection.js';
import type { TenantIdentity } from '../types/tenant-identity.js';

/**
 * "Tenant X is currently activated on connection Y".
 * Created by SessionContextBinder.apply, destroyed by clear.
 */
export interface SessionContext {
  readonly identity: TenantIdentity;
  readonly handleId: number;
  readonly appliedAt: Date;
}

export type HandleState = 'idle' | 'leased' | 'discarded';

/**
 * Leasable wrapper around one physical connection.
 *
 * Owned by the pool while idle and by exactly one RequestScope while leased.
 * `boundIdentity` is null whenever the pool holds the handle.
 */
export class ConnectionHandle {
  private sessionContext: SessionContext | null = null;
  private taintReason: string | null = null;
  /** @internal maintained by ConnectionPool */
  state: HandleState = 'idle';
  readonly createdAt = new Date();

  constructor(
    readonly id: number,
    readonly connection: SqlConnection
  ) {}

  get boundIdentity(): TenantIdentity | null {
    return this.sessionContext?.identity ?? null;
  }

  get session(): SessionContext | null {
    return this.sessionContext;
  }

  get tainted(): boolean {
    return this.taintReason !== null;
  }

  get taintedBecause(): string | null {
    return this.taintReason;
  }

  /** @internal SessionContextBinder only */
  attachSession(context: SessionContext): void {
    this.sessionContext = context;
  }

  /** @internal SessionContextBinder only */
  detachSession(): void {
    this.sessionContext = null;
  }

  /**
   * Marks the session as unusable. A tainted handle is never returned to the
   * free list; the pool closes it and opens a replacement.
   */
  taint(reason: string): void {
    if (this.taintReason === null) {
      this.taintReason = reason;
    }
  }
}

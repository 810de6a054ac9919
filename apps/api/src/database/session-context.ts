import type { ConnectionHandle, SessionContext } from './connection-handle.js';
import type { TenantIdentity } from '../types/tenant-identity.js';
import { ContextBindError, LeakageGuardViolation } from '../utils/errors.js';
import { logger, logHelpers } from '../utils/logger.js';

export interface SessionContextOptions {
  /** Database role whose policies apply to tenant sessions */
  role: string;
  /** Session setting the policies read the tenant identity from */
  subjectClaim: string;
  /** Session setting carrying the role claim */
  roleClaim: string;
}

export interface BinderStats {
  applied: number;
  cleared: number;
  pending: number;
}

const IDENTIFIER = /^[a-z_][a-z0-9_]*$/;
const SETTING_NAME = /^[a-z_]+(\.[a-z_]+)+$/;

interface VerifyRow {
  role_name: string;
  subject: string | null;
}

/**
 * Places a leased connection into a tenant-scoped state and takes it out again.
 *
 * Role and setting names cannot be bound as parameters, so they are
 * validated once here and interpolated; the identity itself always travels
 * as a bind parameter.
 *
 * Settings are session level (`set_config(..., false)`): they outlive the
 * request's transaction and are only removed by `clear`.
 */
export class SessionContextBinder {
  private readonly pending = new Set<ConnectionHandle>();
  private appliedCount = 0;
  private clearedCount = 0;

  constructor(private readonly options: SessionContextOptions) {
    if (!IDENTIFIER.test(options.role)) {
      throw new RangeError(`Invalid RLS role name: ${options.role}`);
    }
    if (!SETTING_NAME.test(options.subjectClaim) || !SETTING_NAME.test(options.roleClaim)) {
      throw new RangeError('RLS claim names must be dotted lowercase setting names');
    }
  }

  /**
   * Activate `identity` on the handle's session.
   *
   * Same identity already bound: no-op. Different identity bound:
   * LeakageGuardViolation. Any statement or verification failure taints the
   * handle and raises ContextBindError; the caller must still call `clear`.
   */
  async apply(handle: ConnectionHandle, identity: TenantIdentity): Promise<SessionContext> {
    const existing = handle.session;
    if (existing) {
      if (existing.identity === identity) {
        return existing;
      }
      logHelpers.logInvariantBreach('Attempted to rebind a bound connection to another tenant', {
        handleId: handle.id,
        boundTenant: existing.identity,
        requestedTenant: identity,
      });
      handle.taint('rebind attempted');
      throw new LeakageGuardViolation(
        `Handle ${handle.id} is already bound to another tenant`,
        handle.id
      );
    }

    this.pending.add(handle);
    this.appliedCount += 1;

    const { role, subjectClaim, roleClaim } = this.options;
    try {
      await handle.connection.query(`SET ROLE ${role}`);
      await handle.connection.query('SELECT set_config($1, $2, false)', [subjectClaim, identity]);
      await handle.connection.query('SELECT set_config($1, $2, false)', [roleClaim, role]);

      const { rows } = await handle.connection.query<VerifyRow>(
        'SELECT current_user AS role_name, current_setting($1, true) AS subject',
        [subjectClaim]
      );
      const session = rows[0];
      if (!session || session.role_name !== role || session.subject !== identity) {
        throw new Error(
          `Session verification failed (role=${session?.role_name ?? 'none'}, subject matches=${session?.subject === identity})`
        );
      }
    } catch (error) {
      handle.taint('context bind failed');
      logger.error('Binding tenant context failed', { handleId: handle.id, error });
      throw new ContextBindError('Could not activate tenant context on connection', { cause: error });
    }

    const context: SessionContext = { identity, handleId: handle.id, appliedAt: new Date() };
    handle.attachSession(context);
    logger.debug('Tenant context applied', { handleId: handle.id });
    return context;
  }

  /**
   * Return the session to the unprivileged baseline. Runs once per `apply`
   * attempt; later calls are no-ops. On failure the handle is tainted and
   * keeps its recorded context, so the pool cannot mistake it for clean.
   * A handle that is already tainted keeps its context too and is left to
   * the pool to close.
   */
  async clear(handle: ConnectionHandle): Promise<void> {
    if (!this.pending.delete(handle)) {
      return;
    }
    this.clearedCount += 1;

    if (handle.tainted) {
      // The connection is going to be closed; statements on it may never return.
      logger.debug('Skipping context reset on tainted connection', { handleId: handle.id });
      return;
    }

    const { subjectClaim, roleClaim } = this.options;
    try {
      await handle.connection.query('RESET ROLE');
      await handle.connection.query(`RESET ${subjectClaim}`);
      await handle.connection.query(`RESET ${roleClaim}`);
    } catch (error) {
      handle.taint('context clear failed');
      logger.error('Clearing tenant context failed', { handleId: handle.id, error });
      throw new ContextBindError('Could not clear tenant context on connection', { cause: error });
    }

    handle.detachSession();
    logger.debug('Tenant context cleared', { handleId: handle.id });
  }

  stats(): BinderStats {
    return {
      applied: this.appliedCount,
      cleared: this.clearedCount,
      pending: this.pending.size,
    };
  }
}

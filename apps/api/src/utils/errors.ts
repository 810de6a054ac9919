/**
 * Application error hierarchy
 *
 * Every error that crosses the RequestScope boundary is one of these classes,
 * so the HTTP layer only has to read `statusCode` and `code`.
 */

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    statusCode: number,
    message: string,
    isOperational = true,
    code = 'INTERNAL_ERROR',
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.code = code;
    this.details = details;
  }
}

export class ValidationError extends AppError {
  constructor(message = 'Validation failed', details?: Record<string, unknown>) {
    super(400, message, true, 'VALIDATION_ERROR', details);
  }
}

export class AuthenticationError extends AppError {
  constructor(message = 'Authentication required') {
    super(401, message, true, 'AUTHENTICATION_ERROR');
  }
}

export class NotFoundError extends AppError {
  constructor(resource = 'Resource') {
    super(404, `${resource} not found`, true, 'NOT_FOUND');
  }
}

export class ConflictError extends AppError {
  constructor(message = 'Resource already exists') {
    super(409, message, true, 'CONFLICT');
  }
}

export type AuthErrorKind = 'InvalidSignature' | 'Expired' | 'Malformed';

const AUTH_ERRORS: Record<AuthErrorKind, { code: string; message: string }> = {
  InvalidSignature: { code: 'AUTH_INVALID_SIGNATURE', message: 'Credential signature is invalid' },
  Expired: { code: 'AUTH_EXPIRED', message: 'Credential has expired' },
  Malformed: { code: 'AUTH_MALFORMED', message: 'Credential is malformed' },
};

/**
 * Credential could not be turned into a tenant identity. Never retried.
 */
export class AuthError extends AppError {
  public readonly kind: AuthErrorKind;

  constructor(kind: AuthErrorKind, options?: { cause?: unknown }) {
    super(401, AUTH_ERRORS[kind].message, true, AUTH_ERRORS[kind].code, undefined, options);
    this.kind = kind;
  }
}

/**
 * The session could not be placed into a tenant-scoped state.
 * Fatal for the request; the connection it happened on is discarded.
 */
export class ContextBindError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(500, message, false, 'CONTEXT_BIND_ERROR', undefined, options);
  }
}

/**
 * No connection became free before the acquire timeout. Retryable with backoff.
 */
export class PoolExhaustedError extends AppError {
  public readonly retryable = true;
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(503, `No database connection available within ${timeoutMs}ms`, true, 'POOL_EXHAUSTED', { timeoutMs });
    this.timeoutMs = timeoutMs;
  }
}

/**
 * A safety invariant around session context was broken (rebind of a bound
 * handle, or a handle handed back to the pool with residual context).
 */
export class LeakageGuardViolation extends AppError {
  public readonly handleId: number;

  constructor(message: string, handleId: number) {
    super(500, message, false, 'LEAKAGE_GUARD_VIOLATION', { handleId });
    this.handleId = handleId;
  }
}

/**
 * Postgres SQLSTATE classes mapped to caller-facing status codes.
 * 42501 is what a row-level policy denial reports.
 */
function statusForSqlState(sqlState: string | undefined): number {
  if (!sqlState) return 500;
  if (sqlState === '42501') return 403;
  if (sqlState === '23505') return 409;
  if (sqlState.startsWith('23') || sqlState.startsWith('22')) return 422;
  return 500;
}

/**
 * Database-reported failure after the tenant context was correctly bound.
 * Triggers rollback; never retried automatically.
 */
export class QueryError extends AppError {
  public readonly sqlState?: string;
  public readonly constraint?: string;

  constructor(operation: string, cause: unknown) {
    const sqlState = readStringField(cause, 'code');
    const constraint = readStringField(cause, 'constraint');
    super(
      statusForSqlState(sqlState),
      `Query failed during ${operation}`,
      true,
      'QUERY_ERROR',
      { operation, ...(sqlState ? { sqlState } : {}), ...(constraint ? { constraint } : {}) },
      { cause }
    );
    this.sqlState = sqlState;
    this.constraint = constraint;
  }
}

/**
 * RequestScope used outside the state its operation requires.
 */
export class ScopeStateError extends AppError {
  constructor(message: string) {
    super(500, message, false, 'SCOPE_STATE_ERROR');
  }
}

export class RequestCancelledError extends AppError {
  constructor(reason = 'Request was cancelled') {
    super(503, reason, true, 'REQUEST_CANCELLED');
  }
}

export class DatabaseUnavailableError extends AppError {
  constructor(options?: { cause?: unknown }) {
    super(503, 'Database connection could not be established', true, 'DATABASE_UNAVAILABLE', undefined, options);
  }
}

function readStringField(value: unknown, field: string): string | undefined {
  if (typeof value !== 'object' || value === null || !(field in value)) {
    return undefined;
  }
  const candidate: unknown = Reflect.get(value, field);
  return typeof candidate === 'string' ? candidate : undefined;
}

/**
 * Error response format
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    timestamp: string;
    path?: string;
    details?: Record<string, unknown>;
  };
}

/**
 * Format error for API response.
 * Non-operational errors never expose their message outside development.
 */
export function formatErrorResponse(error: Error, path?: string, exposeInternal = false): ErrorResponse {
  if (error instanceof AppError) {
    const expose = error.isOperational || exposeInternal;
    return {
      success: false,
      error: {
        code: error.code,
        message: expose ? error.message : 'Internal server error',
        timestamp: new Date().toISOString(),
        path,
        ...(expose && error.details ? { details: error.details } : {}),
      },
    };
  }

  return {
    success: false,
    error: {
      code: 'INTERNAL_ERROR',
      message: exposeInternal ? error.message : 'Internal server error',
      timestamp: new Date().toISOString(),
      path,
    },
  };
}

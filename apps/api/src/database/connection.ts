import pg, { type QueryResultRow } from 'pg';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';

/**
 * Result shape shared by pg and the in-process test double.
 */
export interface SqlResult<R> {
  rows: R[];
  rowCount: number | null;
}

export type { QueryResultRow };

/**
 * One physical database session. Statements on a connection run in the
 * order they are issued; session settings persist until reset.
 */
export interface SqlConnection {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<SqlResult<R>>;
  end(): Promise<void>;
  /** Set once the server side of the session is gone */
  readonly broken: boolean;
}

/**
 * Opens a new physical connection. Called by the pool when it grows or
 * replaces a discarded handle.
 */
export type ConnectionFactory = () => Promise<SqlConnection>;

type PgClient = InstanceType<typeof pg.Client>;

/** SQLSTATE classes raised when the server session itself ended */
const SESSION_LOST = /^(08|57P)/;

/**
 * Whether the session is still usable after `error`. Only errors the server
 * reported with a SQLSTATE qualify; driver and socket failures do not.
 */
export function sessionSurvives(error: unknown): boolean {
  return error instanceof pg.DatabaseError && !SESSION_LOST.test(error.code ?? '');
}

class PgConnection implements SqlConnection {
  private lost = false;

  constructor(private readonly client: PgClient) {
    // An idle client whose backend terminates emits 'error'; unhandled, it
    // would take the process down.
    client.on('error', (error) => {
      this.lost = true;
      logger.error('Database connection lost', { error });
    });
  }

  get broken(): boolean {
    return this.lost;
  }

  async query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<SqlResult<R>> {
    const result = await this.client.query<R>(text, values);
    return { rows: result.rows, rowCount: result.rowCount };
  }

  async end(): Promise<void> {
    await this.client.end();
  }
}

function sslOption(mode: 'disable' | 'require' | 'no-verify'): pg.ClientConfig['ssl'] {
  if (mode === 'disable') return false;
  return { rejectUnauthorized: mode === 'require' };
}

export interface PgConnectionOptions {
  url: string;
  sslMode: 'disable' | 'require' | 'no-verify';
  connectTimeoutMs: number;
  applicationName?: string;
}

/**
 * Connection factory backed by node-postgres. Each call opens a dedicated
 * Client, so a leased handle is one server session for its whole lease.
 */
export function createPgConnectionFactory(
  options: PgConnectionOptions = {
    url: config.database.url,
    sslMode: config.database.sslMode,
    connectTimeoutMs: config.database.acquireTimeoutMs,
  }
): ConnectionFactory {
  return async () => {
    const client = new pg.Client({
      connectionString: options.url,
      ssl: sslOption(options.sslMode),
      application_name: options.applicationName ?? 'taskvault-api',
      connectionTimeoutMillis: options.connectTimeoutMs,
    });
    const connection = new PgConnection(client);
    await client.connect();
    return connection;
  };
}

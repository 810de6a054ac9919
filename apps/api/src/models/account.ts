import type { ConnectionPool } from '../database/connection-pool.js';
import { sessionSurvives, type SqlConnection } from '../database/connection.js';
import { AppError, ConflictError, QueryError } from '../utils/errors.js';

/**
 * Account row. The username doubles as the tenant identity placed in the
 * token's subject claim.
 */
export interface Account {
  id: string;
  name_user: string;
  hashed_password: string;
}

export interface CreateAccountInput {
  username: string;
  passwordHash: string;
}

const UNIQUE_VIOLATION = '23505';

/**
 * The users table carries no row policies: it is read before any identity
 * exists. Lease a plain handle, run, hand it back. A session that failed
 * below the SQL layer is discarded on release.
 */
async function withUnboundConnection<T>(
  pool: ConnectionPool,
  operation: string,
  work: (connection: SqlConnection) => Promise<T>
): Promise<T> {
  const handle = await pool.acquire();
  let result: T;
  try {
    result = await work(handle.connection);
  } catch (error) {
    if (!(error instanceof AppError) && !sessionSurvives(error)) {
      handle.taint(`${operation} failed outside SQL`);
    }
    await pool.release(handle);
    if (error instanceof AppError) {
      throw error;
    }
    throw new QueryError(operation, error);
  }
  await pool.release(handle);
  return result;
}

/**
 * Account model - credential storage for login and registration
 */
export class AccountModel {
  /**
   * Find an account by username
   */
  static async findByUsername(pool: ConnectionPool, username: string): Promise<Account | null> {
    return withUnboundConnection(pool, 'AccountModel.findByUsername', async (connection) => {
      const result = await connection.query<Account>(
        'SELECT id, name_user, hashed_password FROM users WHERE name_user = $1',
        [username]
      );
      return result.rows[0] ?? null;
    });
  }

  /**
   * Create an account
   * @throws ConflictError when the username is taken
   */
  static async create(pool: ConnectionPool, input: CreateAccountInput): Promise<Account> {
    try {
      return await withUnboundConnection(pool, 'AccountModel.create', async (connection) => {
        const result = await connection.query<Account>(
          `INSERT INTO users (name_user, hashed_password)
           VALUES ($1, $2)
           RETURNING id, name_user, hashed_password`,
          [input.username, input.passwordHash]
        );
        const account = result.rows[0];
        if (!account) {
          throw new Error('INSERT returned no row');
        }
        return account;
      });
    } catch (error) {
      if (error instanceof QueryError && error.sqlState === UNIQUE_VIOLATION) {
        throw new ConflictError('Username already registered');
      }
      throw error;
    }
  }
}

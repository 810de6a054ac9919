import type { SqlConnection } from '../database/connection.js';
import type { RequestScope } from '../database/request-scope.js';
import { AppError, QueryError } from '../utils/errors.js';

/**
 * Run repository work on the scope's bound connection. Driver failures
 * become QueryError; errors the scope raised itself (cancellation, state)
 * pass through untouched.
 */
export async function scopedQuery<T>(
  scope: RequestScope,
  operation: string,
  work: (connection: SqlConnection) => Promise<T>
): Promise<T> {
  return scope.run(operation, async (connection) => {
    try {
      return await work(connection);
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      throw new QueryError(operation, error);
    }
  });
}

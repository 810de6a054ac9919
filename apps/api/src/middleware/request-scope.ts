import { Request, Response } from 'express';
import { withRequestScope, type RequestScope, type RequestScopeFactory } from '../database/request-scope.js';
import { extractBearerCredential } from '../services/identity-resolver.js';
import { asyncHandler, type ParsedBodyRequest } from './validator.js';

export interface ScopedResult {
  status: number;
  body?: unknown;
}

/**
 * Route handler that runs inside a RequestScope.
 *
 * The bearer credential is resolved, a tenant-bound connection is leased and
 * the handler's repository calls share one transaction. The response is only
 * written after the transaction committed, so a failed commit surfaces as an
 * error instead of a stale 2xx.
 *
 * `Body` is the output type of the body schema validated ahead of this
 * handler; without one the body stays `unknown`.
 */
export function scopedHandler<Body = unknown>(
  scopes: RequestScopeFactory,
  handler: (scope: RequestScope, req: ParsedBodyRequest<Body>) => Promise<ScopedResult>
) {
  return asyncHandler(async (req: Request, res: Response) => {
    const credential = extractBearerCredential(req.headers.authorization);
    const result = await withRequestScope(scopes, credential, (scope) => handler(scope, req), {
      signal: req.abortSignal,
    });

    if (res.headersSent) {
      return;
    }
    if (result.body === undefined) {
      res.status(result.status).end();
      return;
    }
    res.status(result.status).json(result.body);
  });
}

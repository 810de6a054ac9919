import { Router, Response } from 'express';
import { z } from 'zod';
import type { ConnectionPool } from '../database/connection-pool.js';
import { asyncHandler, loginRateLimiter, validateRequest, type ParsedBodyRequest } from '../middleware/index.js';
import { AuthService } from '../services/auth.js';
import { logger } from '../utils/logger.js';

/**
 * Credentials schema
 * Login also accepts form-encoded bodies, as OAuth2 password clients send them.
 */
const credentialsSchema = z.object({
  username: z
    .string()
    .min(3, 'Username must be at least 3 characters')
    .max(50, 'Username must be at most 50 characters')
    .regex(/^\S+$/, 'Username must not contain whitespace'),
  password: z.string().min(8, 'Password must be at least 8 characters'),
});

const loginSchema = z.object({
  username: z.string().min(1, 'Username is required'),
  password: z.string().min(1, 'Password is required'),
});

type Credentials = z.output<typeof loginSchema>;

/**
 * Authentication routes. Accounts live outside the row-level policies, so
 * these handlers use the pool directly instead of a RequestScope.
 */
export function createAuthRouter(pool: ConnectionPool): Router {
  const router = Router();

  /**
   * POST /auth/register
   */
  router.post(
    '/register',
    validateRequest({ body: credentialsSchema }),
    asyncHandler(async (req: ParsedBodyRequest<Credentials>, res: Response) => {
      const { username, password } = req.body;
      const account = await AuthService.register(pool, username, password);

      res.status(201).json({
        success: true,
        data: {
          id: account.id,
          username: account.name_user,
        },
      });
    })
  );

  /**
   * POST /auth/login
   * Returns a bearer token whose subject is the username.
   */
  router.post(
    '/login',
    loginRateLimiter(),
    validateRequest({ body: loginSchema }),
    asyncHandler(async (req: ParsedBodyRequest<Credentials>, res: Response) => {
      const { username, password } = req.body;
      const account = await AuthService.authenticate(pool, username, password);
      const token = AuthService.generateAccessToken(account.name_user);

      logger.info('User logged in', { accountId: account.id });
      res.json(token);
    })
  );

  return router;
}

import jwt from 'jsonwebtoken';
import bcrypt from 'bcryptjs';
import { config } from '../config/index.js';
import type { ConnectionPool } from '../database/connection-pool.js';
import { AccountModel, type Account } from '../models/account.js';
import { AuthenticationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

// bcrypt hash of an unguessable value; never matches a real password
const DUMMY_HASH = '$2a$10$CwTycUXWue0Thq9StjUM0uJ8.pGYbTnV1cV5gx7Qp8Ax8v0uRLYIq';

/**
 * Claims placed in issued access tokens. `sub` is the tenant identity the
 * database policies key on; the role claim is informational.
 */
export interface AccessTokenClaims {
  sub: string;
  role: string;
}

export interface IssuedToken {
  access_token: string;
  token_type: 'bearer';
  expires_in: number;
}

/**
 * Authentication service
 * Handles password hashing, credential checks and access token issue.
 */
export class AuthService {
  /**
   * Hash password using bcrypt
   */
  static async hashPassword(password: string): Promise<string> {
    const saltRounds = 10;
    return bcrypt.hash(password, saltRounds);
  }

  /**
   * Verify password against hash
   */
  static async verifyPassword(password: string, hash: string): Promise<boolean> {
    return bcrypt.compare(password, hash);
  }

  /**
   * Sign an access token for `subject`
   */
  static generateAccessToken(subject: string, secret: string = config.jwt.secret): IssuedToken {
    const expiresInSeconds = config.jwt.expiresInMinutes * 60;
    const claims: AccessTokenClaims = { sub: subject, role: config.rls.role };
    const accessToken = jwt.sign(claims, secret, {
      algorithm: config.jwt.algorithm,
      expiresIn: expiresInSeconds,
    });
    return { access_token: accessToken, token_type: 'bearer', expires_in: expiresInSeconds };
  }

  /**
   * Check credentials. The same error is raised for an unknown user and a
   * wrong password.
   */
  static async authenticate(pool: ConnectionPool, username: string, password: string): Promise<Account> {
    const account = await AccountModel.findByUsername(pool, username);
    if (!account) {
      // Compare anyway so both failure paths take similar time
      await AuthService.verifyPassword(password, DUMMY_HASH);
      throw new AuthenticationError('Incorrect username or password');
    }

    const valid = await AuthService.verifyPassword(password, account.hashed_password);
    if (!valid) {
      logger.info('Login rejected', { accountId: account.id });
      throw new AuthenticationError('Incorrect username or password');
    }
    return account;
  }

  /**
   * Register a new account
   * @throws ConflictError when the username is taken
   */
  static async register(pool: ConnectionPool, username: string, password: string): Promise<Account> {
    const passwordHash = await AuthService.hashPassword(password);
    const account = await AccountModel.create(pool, { username, passwordHash });
    logger.info('Account registered', { accountId: account.id });
    return account;
  }
}

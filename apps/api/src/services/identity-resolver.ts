import jwt from 'jsonwebtoken';
import { config } from '../config/index.js';
import { toTenantIdentity, type TenantIdentity } from '../types/tenant-identity.js';
import { AuthError } from '../utils/errors.js';

export interface IdentityResolverOptions {
  secret: string;
  /** Milliseconds since epoch; defaults to Date.now */
  clock?: () => number;
}

const SEGMENT = /^[A-Za-z0-9_-]+$/;

/**
 * Verifies a bearer credential and extracts the tenant identity from its
 * subject claim. Pure: no database or pool access.
 */
export class IdentityResolver {
  private readonly clock: () => number;

  constructor(private readonly options: IdentityResolverOptions = { secret: config.jwt.secret }) {
    this.clock = options.clock ?? Date.now;
  }

  /**
   * @throws AuthError Malformed, InvalidSignature or Expired
   */
  resolve(credential: string): TenantIdentity {
    const segments = credential.split('.');
    if (segments.length !== 3 || !segments.every((segment) => SEGMENT.test(segment))) {
      throw new AuthError('Malformed');
    }

    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(credential, this.options.secret, {
        algorithms: [config.jwt.algorithm],
        clockTimestamp: Math.floor(this.clock() / 1000),
      });
    } catch (error) {
      // TokenExpiredError and NotBeforeError extend JsonWebTokenError; check them first
      if (error instanceof jwt.TokenExpiredError || error instanceof jwt.NotBeforeError) {
        throw new AuthError('Expired', { cause: error });
      }
      if (error instanceof jwt.JsonWebTokenError && /signature|algorithm/i.test(error.message)) {
        throw new AuthError('InvalidSignature', { cause: error });
      }
      throw new AuthError('Malformed', { cause: error });
    }

    if (typeof payload === 'string' || typeof payload.exp !== 'number') {
      throw new AuthError('Malformed');
    }

    const identity = toTenantIdentity(payload.sub);
    if (identity === null) {
      throw new AuthError('Malformed');
    }
    return identity;
  }
}

const BEARER = /^bearer\s+(\S+)\s*$/i;

/**
 * Pull the credential out of an Authorization header value. The scheme
 * name is matched case-insensitively.
 */
export function extractBearerCredential(header: string | undefined): string {
  const credential = header?.match(BEARER)?.[1];
  if (!credential) {
    throw new AuthError('Malformed');
  }
  return credential;
}

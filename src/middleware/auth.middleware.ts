import { Request, Response, NextFunction } from 'express';
import { verify } from 'jsonwebtoken';
import { env } from '../config/env';
import { Role, isRole } from '../config/permissions';
import { ResponseBuilder } from '../utils/response-builder';

/** Defines the structure of the payload after JWT decoding. */
export interface IAuthUser {
  sub: string; // The acting user's id in the identity provider
  orgId: string; // Tenant the token is scoped to
  role: Role;
  email?: string;
}

// Global declaration merging to add 'user' property to Request
declare module 'express-serve-static-core' {
  interface Request {
    user?: IAuthUser;
  }
}

function toAuthUser(decoded: unknown): IAuthUser | null {
  if (typeof decoded !== 'object' || decoded === null) return null;
  if (!('sub' in decoded) || !('orgId' in decoded) || !('role' in decoded)) return null;

  const { sub, orgId, role } = decoded;
  if (typeof sub !== 'string' || !sub || typeof orgId !== 'string' || !orgId || !isRole(role)) return null;

  const email = 'email' in decoded && typeof decoded.email === 'string' ? decoded.email : undefined;
  return { sub, orgId, role, email };
}

/**
 * Middleware to extract and validate the JWT.
 * On success, populates req.user with decoded payload.
 */
export const authenticate = (req: Request, res: Response, next: NextFunction): void => {
  const authHeader = req.headers.authorization;

  // 1. Check for token presence (401 Unauthorized)
  const token = authHeader && authHeader.startsWith('Bearer ') ? authHeader.split(' ')[1] : undefined;
  if (!token) {
    ResponseBuilder.unauthorized(res, 'Authentication token is missing or malformed.');
    return;
  }

  // 2. Verify token and its claims
  let authUser: IAuthUser | null;
  try {
    authUser = toAuthUser(verify(token, env.ACCESS_TOKEN_SECRET));
  } catch {
    // 3. Expired or tampered token
    ResponseBuilder.unauthorized(res, 'Authentication token is invalid or has expired.');
    return;
  }

  if (!authUser) {
    ResponseBuilder.unauthorized(res, 'Authentication token is missing required claims.');
    return;
  }

  req.user = authUser;
  next();
};

/**
 * Authenticated user of a request that passed `authenticate`.
 * @throws {Error} - 'AuthenticationMissing' when the middleware did not run.
 */
export function authUserOf(req: Request): IAuthUser {
  if (!req.user) {
    throw new Error('AuthenticationMissing');
  }
  return req.user;
}

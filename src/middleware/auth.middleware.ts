/**
 * Authentication Middleware
 *
 * Runs BEFORE protected routes. It extracts the JWT from the
 * Authorization header, verifies it, and attaches the claims to the request.
 *
 * AUTHORIZATION HEADER FORMAT:
 * Authorization: Bearer <token>
 *
 * Only the token's validity is checked; the role it carries is not.
 */

import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { AuthenticatedRequest, TokenClaims } from '../types';
import { verifyToken } from '../services/auth.service';
import { AuthError } from '../utils/errors.utils';
import { createRequestContext, logWarning } from '../utils/logger.utils';

/**
 * Extract token from Authorization header
 */
function extractToken(req: Request): string | null {
  const authHeader = req.headers.authorization;

  if (!authHeader) {
    return null;
  }

  // Format: "Bearer <token>"
  const parts = authHeader.split(' ');
  if (parts.length !== 2 || parts[0] !== 'Bearer') {
    return null;
  }

  return parts[1];
}

/**
 * Get client IP address (handles proxies)
 */
export function getClientIp(req: Request): string {
  return req.ip || req.socket.remoteAddress || 'unknown';
}

/**
 * Middleware: Require authentication
 * Rejects the request with an AuthError if the token is missing or invalid
 */
export function requireAuth(req: AuthenticatedRequest, res: Response, next: NextFunction): void {
  req.requestId = uuidv4();

  const token = extractToken(req);
  if (!token) {
    logWarning(
      'auth.access_denied',
      'No token provided',
      createRequestContext(req.requestId, undefined, undefined, undefined, getClientIp(req)),
      { path: req.path }
    );
    next(new AuthError('Authorization token required'));
    return;
  }

  const claims = verifyToken(token);
  if (!claims) {
    logWarning(
      'auth.access_denied',
      'Invalid or expired token',
      createRequestContext(req.requestId, undefined, undefined, undefined, getClientIp(req)),
      { path: req.path }
    );
    next(new AuthError('Invalid or expired token', 'INVALID_TOKEN'));
    return;
  }

  req.user = claims;
  next();
}

/**
 * Claims of the authenticated caller. Route handlers behind requireAuth use
 * this instead of reaching into req.user.
 */
export function currentUser(req: AuthenticatedRequest): TokenClaims {
  if (!req.user) {
    throw new AuthError('Authorization token required');
  }
  return req.user;
}

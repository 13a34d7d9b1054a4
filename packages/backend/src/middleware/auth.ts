import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { AuthenticationError } from '../shared/errors';
import { logAuthFailure } from '../shared/logger';
import '../shared/types';

export const TOKEN_ISSUER = 'catalog-reindexer';
export const TOKEN_AUDIENCE = 'catalog-reindexer-api';

const PUBLIC_ROUTES: Array<{ method: string; path: string | RegExp }> = [
  { method: 'GET', path: '/api/v1/health' },
];

const claimsSchema = z.object({
  userId: z.string().min(1),
  name: z.string().min(1),
});

function isPublicRoute(method: string, path: string): boolean {
  return PUBLIC_ROUTES.some((route) => {
    if (route.method !== method.toUpperCase()) return false;
    if (typeof route.path === 'string') return route.path === path;
    return route.path.test(path);
  });
}

export function createAuthMiddleware(jwtSecret: string) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (isPublicRoute(req.method, req.path)) {
      return next();
    }

    const fail = (reason: string) => {
      logAuthFailure({
        sourceIp: req.ip || req.socket.remoteAddress || 'unknown',
        userAgent: req.headers['user-agent'],
        reason,
      });
      next(new AuthenticationError(reason));
    };

    const authHeader = req.headers.authorization;
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      return fail('Missing or invalid authorization header');
    }

    let decoded: unknown;
    try {
      decoded = jwt.verify(authHeader.slice(7), jwtSecret, {
        issuer: TOKEN_ISSUER,
        audience: TOKEN_AUDIENCE,
      });
    } catch (err) {
      return fail(err instanceof jwt.TokenExpiredError ? 'Token has expired' : 'Invalid token');
    }

    const claims = claimsSchema.safeParse(decoded);
    if (!claims.success) {
      return fail('Invalid token claims');
    }

    req.user = { userId: claims.data.userId, name: claims.data.name };
    next();
  };
}

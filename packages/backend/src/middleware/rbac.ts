import { Request, Response, NextFunction } from 'express';
import { AuthenticationError, AuthorizationError } from '../shared/errors';
import { logAuthzFailure } from '../shared/logger';
import * as userRepo from '../modules/auth/user.repository';
import '../shared/types';

/**
 * Only catalog administrators may start reindex jobs or touch indexes.
 * The caller is resolved by the token's name claim; the stored user id
 * replaces the claim on success.
 */
export function requireAdmin() {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    try {
      if (!req.user) {
        throw new AuthenticationError('Authentication required');
      }

      const user = await userRepo.findByName(req.user.name);
      if (!user) {
        logAuthzFailure({ userName: req.user.name, resource: req.originalUrl, reason: 'unknown user' });
        throw new AuthorizationError('User not found');
      }

      if (!user.isAdmin) {
        logAuthzFailure({ userName: user.name, resource: req.originalUrl, reason: 'not an admin' });
        throw new AuthorizationError('Admin privileges required');
      }

      req.user = { userId: user.id, name: user.name, isAdmin: true };
      next();
    } catch (err) {
      next(err);
    }
  };
}

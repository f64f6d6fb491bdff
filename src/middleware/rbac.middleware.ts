import { Request, Response, NextFunction } from 'express';
import { Permission, checkPermissions } from '../config/permissions';
import { ResponseBuilder } from '../utils/response-builder';

/**
 * Middleware function generator for Role-Based Access Control (RBAC).
 * Role comes from the verified token; tenants have no per-user records here.
 * @param requiredPermissions An array of permission constants (from src/config/permissions.ts).
 */
export const authorize = (requiredPermissions: Permission[]) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    // Assumes authenticate middleware has run and req.user is present
    if (!req.user) {
      ResponseBuilder.unauthorized(res);
      return;
    }

    if (!checkPermissions(req.user.role, requiredPermissions)) {
      // 403 Forbidden: role lacks the necessary permissions
      ResponseBuilder.forbidden(res, 'You do not have the required role or permissions.');
      return;
    }

    next();
  };
};

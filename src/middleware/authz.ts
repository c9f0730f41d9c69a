import type { RequestHandler } from "express";

import { getRequestUser } from "../shared/auth-context.js";
import { AuthenticationError, AuthorizationError } from "../shared/errors.js";
import type { Role } from "../modules/users/users.schemas.js";

/**
 * Role gate. Throws when `user.role` is not one of `allowedRoles`.
 */
export function authorize(user: { role: Role }, allowedRoles: ReadonlySet<Role>): void {
  if (!allowedRoles.has(user.role)) {
    throw new AuthorizationError();
  }
}

/**
 * Mount after `requireUser`.
 */
export function requireRole(...roles: Role[]): RequestHandler {
  const allowed: ReadonlySet<Role> = new Set(roles);
  return (req, _res, next) => {
    const user = getRequestUser(req);
    if (!user) {return next(new AuthenticationError());}
    try {
      authorize(user, allowed);
    } catch (err) {
      return next(err);
    }
    return next();
  };
}

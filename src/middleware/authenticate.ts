import type { RequestHandler } from "express";

import { setRequestUser } from "../shared/auth-context.js";
import type { AuthService } from "../modules/auth/auth.service.js";

/**
 * Resolves `Authorization: Bearer <access token>` into `req.currentUser`.
 * Every request re-verifies the token and re-reads the user.
 */
export function requireUser(auth: Pick<AuthService, "resolveCurrentUser">): RequestHandler {
  return (req, _res, next) => {
    setRequestUser(req, undefined);
    void auth
      .resolveCurrentUser(req.headers.authorization)
      .then((user) => {
        setRequestUser(req, user);
        next();
      })
      .catch(next);
  };
}

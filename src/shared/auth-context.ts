import type { User } from "../modules/users/users.schemas.js";
import { AuthenticationError } from "./errors.js";

/**
 * Accessors for the authenticated user stored on the Express request by
 * `requireUser`.
 */
export function getRequestUser(req: { currentUser?: User }): User | undefined {
  return req.currentUser;
}

export function setRequestUser(req: { currentUser?: User }, user: User | undefined): void {
  req.currentUser = user;
}

/**
 * For handlers mounted behind `requireUser`; throws if the gate did not run.
 */
export function requireRequestUser(req: { currentUser?: User }): User {
  const user = getRequestUser(req);
  if (!user) {throw new AuthenticationError();}
  return user;
}

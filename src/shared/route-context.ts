import type { RequestHandler } from "express";

import type { AppConfig } from "../config/env.js";
import type { RateLimitFactory } from "../middleware/rate-limit.js";
import type { AuthService } from "../modules/auth/auth.service.js";
import type { ContactsService } from "../modules/contacts/contacts.service.js";
import type { UsersService } from "../modules/users/users.service.js";

/**
 * Everything a module router needs, assembled once by `createApp`.
 */
export type RouteContext = {
  config: Readonly<AppConfig>;
  authService: AuthService;
  usersService: UsersService;
  contactsService: ContactsService;
  requireUser: RequestHandler;
  rateLimit: RateLimitFactory;
};

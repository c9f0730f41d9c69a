/**
 * Users Module
 * ============
 * User records, the store contract and profile routes.
 */

export * from "./users.schemas.js";
export { createPgUserStore, type UserStore } from "./users.repository.js";
export { createUsersService, gravatarUrl, type UsersService } from "./users.service.js";
export { createUsersRouter } from "./users.routes.js";

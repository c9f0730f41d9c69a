/**
 * Email Module
 * ============
 * Email confirmation endpoints (the flows live in the auth service).
 */

export { createEmailRouter } from "./email.routes.js";
export type * from "./email.schemas.js";

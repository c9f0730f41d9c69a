/**
 * Auth Module
 * ===========
 * Signup, login, refresh rotation and the authentication gate.
 */

// ═══════════════════════════════════════════════════════════════════════════
// PRESENTATION LAYER
// ═══════════════════════════════════════════════════════════════════════════

export { createAuthRouter } from "./auth.routes.js";

// ═══════════════════════════════════════════════════════════════════════════
// ORCHESTRATION LAYER
// ═══════════════════════════════════════════════════════════════════════════

export { createAuthService, type AuthService, type AuthServiceDeps } from "./auth.service.js";

// ═══════════════════════════════════════════════════════════════════════════
// FOUNDATION LAYER
// ═══════════════════════════════════════════════════════════════════════════

export type * from "./auth.schemas.js";
export { validateLoginInput, validateSignupInput } from "./auth.schemas.js";

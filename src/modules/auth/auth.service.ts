/**
 * Auth Service
 * ============
 * Signup / login / refresh / email confirmation orchestration, plus the
 * authentication gate that resolves a bearer token into a user.
 */

import { extractBearerToken, type TokenService } from "../../shared/auth.js";
import { AppError, AuthenticationError, ConflictError } from "../../shared/errors.js";
import { logger } from "../../shared/logger.js";
import type { Mailer } from "../../shared/mailer.js";
import { hashPassword, verifyPassword } from "../../shared/password.js";
import type { UserStore } from "../users/users.repository.js";
import type { User } from "../users/users.schemas.js";
import { gravatarUrl } from "../users/users.service.js";
import type { LoginInput, SignupInput, TokenPair } from "./auth.schemas.js";

export type AuthServiceDeps = {
  users: UserStore;
  tokens: TokenService;
  mailer: Mailer;
};

export type MessageResult = { message: string };

export type AuthService = ReturnType<typeof createAuthService>;

export function createAuthService(deps: AuthServiceDeps) {
  const { users, tokens, mailer } = deps;

  async function issuePair(user: User): Promise<TokenPair> {
    const claims = { sub: user.email };
    const accessToken = await tokens.issueAccessToken(claims);
    const refreshToken = await tokens.issueRefreshToken(claims);
    await users.setRefreshToken(user, refreshToken);
    return { access_token: accessToken, refresh_token: refreshToken, token_type: "bearer" };
  }

  /**
   * Detached: the caller's response does not wait for SMTP, and a failed
   * send is only logged.
   */
  function dispatchVerification(user: User, baseUrl: string): void {
    void (async () => {
      const token = await tokens.issueEmailToken({ sub: user.email });
      const link = `${baseUrl.replace(/\/+$/, "")}/email/confirmed_email/${token}`;
      await mailer.sendVerification(user.email, user.username, link);
    })().catch((err: unknown) => {
      logger.error("Verification email failed", {
        to: user.email,
        error: err instanceof Error ? err.message : String(err),
      });
    });
  }

  return {
    async signup(input: SignupInput, baseUrl: string): Promise<User> {
      const existing = await users.findByEmail(input.email);
      if (existing) {throw new ConflictError("Account already exists");}

      const created = await users.create({
        username: input.username,
        email: input.email,
        password: await hashPassword(input.password),
        avatar: gravatarUrl(input.email),
      });
      logger.info("User signed up", { userId: created.id });

      dispatchVerification(created, baseUrl);
      return created;
    },

    async login(input: LoginInput): Promise<TokenPair> {
      const user = await users.findByEmail(input.username);
      if (!user) {throw new AuthenticationError("Invalid email");}
      if (!user.confirmed) {throw new AuthenticationError("Email not confirmed");}

      const ok = await verifyPassword(input.password, user.password);
      if (!ok) {throw new AuthenticationError("Invalid password");}

      return issuePair(user);
    },

    /**
     * Rotates the caller's refresh token. Presenting anything but the stored
     * token clears it, so the whole session must log in again.
     */
    async refresh(authorization: unknown): Promise<TokenPair> {
      const token = extractBearerToken(authorization);
      if (!token) {throw new AuthenticationError();}

      const email = await tokens.verifyRefreshToken(token);
      const user = await users.findByEmail(email);
      if (!user) {throw new AuthenticationError();}

      if (user.refreshToken !== token) {
        await users.setRefreshToken(user, null);
        logger.warn("Refresh token reuse detected; session revoked", { userId: user.id });
        throw new AuthenticationError("Invalid refresh token");
      }

      return issuePair(user);
    },

    async confirmEmail(token: string): Promise<MessageResult> {
      const email = await tokens.verifyEmailToken(token);
      const user = await users.findByEmail(email);
      if (!user) {throw new AppError("Verification error", 400, "VERIFICATION_ERROR");}
      if (user.confirmed) {return { message: "Your email is already confirmed" };}

      await users.setConfirmed(user);
      logger.info("Email confirmed", { userId: user.id });
      return { message: "Email confirmed" };
    },

    async requestEmail(email: string, baseUrl: string): Promise<MessageResult> {
      const user = await users.findByEmail(email);
      if (user?.confirmed) {return { message: "Your email is already confirmed" };}
      if (user) {dispatchVerification(user, baseUrl);}
      return { message: "Check your email for confirmation." };
    },

    /**
     * Authentication gate: one signature/expiry check and one store lookup
     * per call. Bad token and unknown subject fail identically.
     */
    async resolveCurrentUser(authorization: unknown): Promise<User> {
      const token = extractBearerToken(authorization);
      if (!token) {throw new AuthenticationError();}

      const email = await tokens.verifyAccessToken(token);
      const user = await users.findByEmail(email);
      if (!user) {throw new AuthenticationError();}
      return user;
    },
  };
}

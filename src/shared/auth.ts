import { randomUUID } from "node:crypto";

import { jwtVerify, SignJWT, type JWTPayload } from "jose";

import type { JwtAlgorithm, JwtConfig } from "../config/env.js";
import { AuthenticationError, UnprocessableTokenError } from "./errors.js";

export type TokenScope = "access_token" | "refresh_token";

export type TokenClaims = {
  sub: string; // user email
};

export const EMAIL_TOKEN_TTL_SECONDS = 7 * 24 * 60 * 60;

export type TokenServiceConfig = JwtConfig & {
  /** Milliseconds since epoch; defaults to Date.now. */
  now?: () => number;
};

export type TokenService = {
  issueAccessToken(claims: TokenClaims, ttlSeconds?: number): Promise<string>;
  issueRefreshToken(claims: TokenClaims, ttlSeconds?: number): Promise<string>;
  issueEmailToken(claims: TokenClaims): Promise<string>;
  verifyAccessToken(token: string): Promise<string>;
  verifyRefreshToken(token: string): Promise<string>;
  verifyEmailToken(token: string): Promise<string>;
};

function readSubject(payload: JWTPayload): string | null {
  return typeof payload.sub === "string" && payload.sub.trim() ? payload.sub : null;
}

/**
 * Builds the signer/verifier for the three token kinds.
 *
 * Access and refresh tokens carry a `scope` claim and each verifier only
 * accepts its own scope. Email verification tokens carry no scope at all.
 * Every rejection surfaces the same message regardless of the cause.
 * Each token gets a random `jti`, so two tokens minted in the same second
 * for the same subject still differ.
 */
export function createTokenService(config: TokenServiceConfig): TokenService {
  const key = new TextEncoder().encode(config.secret);
  const algorithm: JwtAlgorithm = config.algorithm;
  const now = config.now ?? Date.now;

  async function sign(claims: TokenClaims, ttlSeconds: number, scope?: TokenScope): Promise<string> {
    const issuedAt = Math.floor(now() / 1000);
    return await new SignJWT(scope ? { scope } : {})
      .setProtectedHeader({ alg: algorithm, typ: "JWT" })
      .setSubject(claims.sub)
      .setJti(randomUUID())
      .setIssuedAt(issuedAt)
      .setExpirationTime(issuedAt + ttlSeconds)
      .sign(key);
  }

  async function decode(token: string): Promise<JWTPayload> {
    const { payload } = await jwtVerify(token, key, {
      algorithms: [algorithm],
      currentDate: new Date(now()),
      requiredClaims: ["sub", "exp"],
    });
    return payload;
  }

  async function verifyScoped(token: string, scope: TokenScope): Promise<string> {
    let payload: JWTPayload;
    try {
      payload = await decode(token);
    } catch {
      throw new AuthenticationError();
    }
    const sub = readSubject(payload);
    if (payload.scope !== scope || !sub) {throw new AuthenticationError();}
    return sub;
  }

  return {
    issueAccessToken(claims, ttlSeconds = config.accessTtlSeconds) {
      return sign(claims, ttlSeconds, "access_token");
    },

    issueRefreshToken(claims, ttlSeconds = config.refreshTtlSeconds) {
      return sign(claims, ttlSeconds, "refresh_token");
    },

    issueEmailToken(claims) {
      return sign(claims, EMAIL_TOKEN_TTL_SECONDS);
    },

    verifyAccessToken(token) {
      return verifyScoped(token, "access_token");
    },

    verifyRefreshToken(token) {
      return verifyScoped(token, "refresh_token");
    },

    async verifyEmailToken(token) {
      let payload: JWTPayload;
      try {
        payload = await decode(token);
      } catch {
        throw new UnprocessableTokenError();
      }
      const sub = readSubject(payload);
      if (!sub) {throw new UnprocessableTokenError();}
      return sub;
    },
  };
}

export function extractBearerToken(value: unknown): string | null {
  if (typeof value !== "string") {return null;}
  const v = value.trim();
  if (!v) {return null;}
  const m = /^Bearer\s+(.+)$/i.exec(v);
  if (!m) {return null;}
  const token = m[1]?.trim();
  return token ? token : null;
}

/**
 * Application Configuration
 * =========================
 * Reads the process environment once at startup and freezes the result.
 *
 * Missing JWT_SECRET_KEY / JWT_ALGORITHM is fatal: `loadConfig` throws a
 * ConfigurationError and the server never starts listening.
 */

import { z } from "zod";

import { ConfigurationError } from "../shared/errors.js";

export const JWT_ALGORITHMS = ["HS256", "HS384", "HS512"] as const;
export type JwtAlgorithm = (typeof JWT_ALGORITHMS)[number];

function envString(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const raw = env[key];
  const trimmed = typeof raw === "string" ? raw.trim() : "";
  return trimmed.length > 0 ? trimmed : undefined;
}

function envInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = envString(env, key);
  if (!raw) {return fallback;}
  const v = Number(raw);
  return Number.isFinite(v) && v > 0 ? Math.floor(v) : fallback;
}

function envBool(env: NodeJS.ProcessEnv, key: string, fallback: boolean): boolean {
  const raw = envString(env, key)?.toLowerCase();
  if (raw === undefined) {return fallback;}
  return raw === "1" || raw === "true" || raw === "yes";
}

function envList(env: NodeJS.ProcessEnv, key: string): string[] {
  const raw = envString(env, key);
  if (!raw) {return [];}
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * Express `trust proxy` value. Unset or "false" trusts no proxy, so
 * X-Forwarded-For is ignored; a number trusts that many hops; anything else
 * is a list of addresses/subnets (e.g. "loopback, 10.0.0.0/8").
 */
export type TrustProxy = false | number | string[];

function envTrustProxy(env: NodeJS.ProcessEnv, key: string): TrustProxy {
  const raw = envString(env, key)?.toLowerCase();
  if (raw === undefined || raw === "false" || raw === "0") {return false;}
  if (raw === "true") {return 1;}
  if (/^\d+$/.test(raw)) {return Number(raw);}
  return envList(env, key);
}

const jwtSchema = z.object({
  secret: z.string({ required_error: "JWT_SECRET_KEY is required" }).min(1, "JWT_SECRET_KEY is required"),
  algorithm: z.enum(JWT_ALGORITHMS, {
    required_error: "JWT_ALGORITHM is required",
    invalid_type_error: "JWT_ALGORITHM is required",
  }),
  accessTtlSeconds: z.number().int().positive(),
  refreshTtlSeconds: z.number().int().positive(),
});

export type JwtConfig = z.infer<typeof jwtSchema>;

export type MailConfig = {
  host: string;
  port: number;
  secure: boolean;
  username: string | undefined;
  password: string | undefined;
  from: string;
  fromName: string;
};

export type CloudinaryConfig = {
  cloudName: string;
  apiKey: string;
  apiSecret: string;
};

export type AppConfig = {
  nodeEnv: string;
  port: number;
  jwt: JwtConfig;
  databaseUrl: string | undefined;
  redisUrl: string | undefined;
  mail: MailConfig;
  cloudinary: CloudinaryConfig | null;
  corsOrigins: string[];
  bannedIps: string[];
  bannedUserAgents: string[];
  publicBaseUrl: string | undefined;
  rateLimitEnabled: boolean;
  trustProxy: TrustProxy;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const parsedJwt = jwtSchema.safeParse({
    secret: envString(env, "JWT_SECRET_KEY"),
    algorithm: envString(env, "JWT_ALGORITHM"),
    accessTtlSeconds: envInt(env, "AUTH_ACCESS_TTL_SECONDS", 15 * 60),
    refreshTtlSeconds: envInt(env, "AUTH_REFRESH_TTL_SECONDS", 7 * 24 * 60 * 60),
  });
  if (!parsedJwt.success) {
    const first = parsedJwt.error.issues[0];
    throw new ConfigurationError(first?.message ?? "invalid JWT settings");
  }

  const cloudName = envString(env, "CLOUDINARY_NAME");
  const cloudKey = envString(env, "CLOUDINARY_API_KEY");
  const cloudSecret = envString(env, "CLOUDINARY_API_SECRET");

  const mailFrom = envString(env, "MAIL_FROM") || "no-reply@localhost";

  return Object.freeze({
    nodeEnv: envString(env, "NODE_ENV") || "development",
    port: envInt(env, "PORT", 8000),
    jwt: Object.freeze(parsedJwt.data),
    databaseUrl: envString(env, "DATABASE_URL"),
    redisUrl: envString(env, "REDIS_URL"),
    mail: Object.freeze({
      host: envString(env, "MAIL_SERVER") || "localhost",
      port: envInt(env, "MAIL_PORT", 465),
      secure: envBool(env, "MAIL_SSL_TLS", true),
      username: envString(env, "MAIL_USERNAME"),
      password: envString(env, "MAIL_PASSWORD"),
      from: mailFrom,
      fromName: envString(env, "MAIL_FROM_NAME") || "Contacts API",
    }),
    cloudinary:
      cloudName && cloudKey && cloudSecret
        ? Object.freeze({ cloudName, apiKey: cloudKey, apiSecret: cloudSecret })
        : null,
    corsOrigins: envList(env, "CORS_ORIGINS"),
    bannedIps: envList(env, "BANNED_IPS"),
    bannedUserAgents: envList(env, "BANNED_USER_AGENTS"),
    publicBaseUrl: envString(env, "PUBLIC_BASE_URL"),
    rateLimitEnabled: envBool(env, "RATE_LIMIT_ENABLED", true),
    trustProxy: envTrustProxy(env, "TRUST_PROXY"),
  });
}

import { describe, expect, it } from "vitest";

import { loadConfig } from "../src/config/env.js";
import { ConfigurationError } from "../src/shared/errors.js";

const base = { JWT_SECRET_KEY: "test-secret", JWT_ALGORITHM: "HS256" };

describe("loadConfig", () => {
  it("applies defaults around the required JWT settings", () => {
    const config = loadConfig(base);

    expect(config.jwt).toEqual({
      secret: "test-secret",
      algorithm: "HS256",
      accessTtlSeconds: 900,
      refreshTtlSeconds: 604800,
    });
    expect(config.port).toBe(8000);
    expect(config.rateLimitEnabled).toBe(true);
    expect(config.cloudinary).toBeNull();
    expect(config.corsOrigins).toEqual([]);
    expect(config.trustProxy).toBe(false);
  });

  it("reads TRUST_PROXY as a hop count or an address list", () => {
    expect(loadConfig({ ...base, TRUST_PROXY: "2" }).trustProxy).toBe(2);
    expect(loadConfig({ ...base, TRUST_PROXY: "true" }).trustProxy).toBe(1);
    expect(loadConfig({ ...base, TRUST_PROXY: "false" }).trustProxy).toBe(false);
    expect(loadConfig({ ...base, TRUST_PROXY: "loopback, 10.0.0.0/8" }).trustProxy).toEqual([
      "loopback",
      "10.0.0.0/8",
    ]);
  });

  it("fails when the signing key is missing", () => {
    expect(() => loadConfig({ JWT_ALGORITHM: "HS256" })).toThrow(ConfigurationError);
    expect(() => loadConfig({ JWT_SECRET_KEY: "  ", JWT_ALGORITHM: "HS256" })).toThrow(
      "Configuration error: JWT_SECRET_KEY is required"
    );
  });

  it("fails when the algorithm is missing", () => {
    expect(() => loadConfig({ JWT_SECRET_KEY: "test-secret" })).toThrow(
      "Configuration error: JWT_ALGORITHM is required"
    );
  });

  it("rejects algorithms outside the HMAC family", () => {
    expect(() => loadConfig({ ...base, JWT_ALGORITHM: "RS256" })).toThrow(ConfigurationError);
  });

  it("parses lists, numbers and flags", () => {
    const config = loadConfig({
      ...base,
      PORT: "9000",
      AUTH_ACCESS_TTL_SECONDS: "60",
      CORS_ORIGINS: "http://a.test, http://b.test",
      BANNED_IPS: "10.0.0.1",
      RATE_LIMIT_ENABLED: "false",
      CLOUDINARY_NAME: "demo",
      CLOUDINARY_API_KEY: "key",
      CLOUDINARY_API_SECRET: "test-secret",
    });

    expect(config.port).toBe(9000);
    expect(config.jwt.accessTtlSeconds).toBe(60);
    expect(config.corsOrigins).toEqual(["http://a.test", "http://b.test"]);
    expect(config.bannedIps).toEqual(["10.0.0.1"]);
    expect(config.rateLimitEnabled).toBe(false);
    expect(config.cloudinary).toEqual({ cloudName: "demo", apiKey: "key", apiSecret: "test-secret" });
  });
});

/**
 * Express Application Factory
 * ============================
 * Creates and configures the Express app with all routes and middleware.
 * Collaborators (stores, mailer, image host, rate-limit store) are injected
 * so tests can run the whole HTTP surface in process.
 */

import express from "express";
import cors from "cors";
import swaggerUi from "swagger-ui-express";

// Module routers
import { createAuthRouter, createAuthService } from "./modules/auth/index.js";
import { createEmailRouter } from "./modules/email/index.js";
import { createUsersRouter, createUsersService, createPgUserStore, type UserStore } from "./modules/users/index.js";
import {
  createContactsRouter,
  createContactsService,
  createPgContactStore,
  type ContactStore,
} from "./modules/contacts/index.js";

// Error handling
import { notFoundHandler } from "./middleware/not-found.js";
import { errorHandler } from "./middleware/error-handler.js";

// Middleware
import { requireUser } from "./middleware/authenticate.js";
import { requestGuard } from "./middleware/request-guard.js";
import {
  createRateLimiter,
  createRedisRateLimitStoreFactory,
  type RateLimitStoreFactory,
} from "./middleware/rate-limit.js";

// Shared
import { createTokenService } from "./shared/auth.js";
import { createCloudinaryAvatarHost, type AvatarHost } from "./shared/avatar-host.js";
import { getPool } from "./shared/db.js";
import { asyncHandler } from "./middleware/async-handler.js";
import { logger } from "./shared/logger.js";
import { createSmtpMailer, type Mailer } from "./shared/mailer.js";
import { getRedisClient } from "./shared/redis.js";
import type { RouteContext } from "./shared/route-context.js";

// Config
import type { AppConfig } from "./config/env.js";
import { swaggerSpec } from "./config/swagger.js";

export type AppDeps = {
  config: Readonly<AppConfig>;
  users: UserStore;
  contacts: ContactStore;
  mailer: Mailer;
  avatars: AvatarHost;
  /** Omit to count requests in process memory. */
  rateLimitStore?: RateLimitStoreFactory;
  /** Resolves when the database answers; rejects otherwise. */
  checkDatabase: () => Promise<void>;
  /** Epoch milliseconds; token issuance and expiry follow it. */
  now?: () => number;
  /** Today's date as YYYY-MM-DD; the birthday window starts here. */
  today?: () => string;
};

/**
 * Wire the production collaborators from configuration.
 */
export function createDefaultDeps(config: Readonly<AppConfig>): AppDeps {
  const pool = getPool(config.databaseUrl);
  const { redisUrl } = config;

  let rateLimitStore: RateLimitStoreFactory | undefined;
  if (redisUrl) {
    rateLimitStore = createRedisRateLimitStoreFactory(() => getRedisClient(redisUrl));
  } else {
    logger.warn("REDIS_URL not set, rate limits are tracked in process memory");
  }

  return {
    config,
    users: createPgUserStore(pool),
    contacts: createPgContactStore(pool),
    mailer: createSmtpMailer(config.mail),
    avatars: createCloudinaryAvatarHost(config.cloudinary),
    rateLimitStore,
    checkDatabase: async () => {
      await pool.query("SELECT 1");
    },
  };
}

export function createApp(deps: AppDeps) {
  const { config } = deps;
  const app = express();

  const tokens = createTokenService({ ...config.jwt, now: deps.now });
  const authService = createAuthService({ users: deps.users, tokens, mailer: deps.mailer });
  const ctx: RouteContext = {
    config,
    authService,
    usersService: createUsersService({ users: deps.users, avatars: deps.avatars }),
    contactsService: createContactsService({ contacts: deps.contacts, today: deps.today }),
    requireUser: requireUser(authService),
    rateLimit: createRateLimiter({ enabled: config.rateLimitEnabled, storeFactory: deps.rateLimitStore }),
  };

  // Middleware
  app.set("trust proxy", config.trustProxy);
  app.use(requestGuard({ bannedIps: config.bannedIps, bannedUserAgents: config.bannedUserAgents }));
  app.use(
    cors({
      origin: config.corsOrigins.length > 0 ? config.corsOrigins : "*",
      credentials: config.corsOrigins.length > 0,
    })
  );
  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: false }));

  // Swagger UI
  app.use("/api-docs", swaggerUi.serve, swaggerUi.setup(swaggerSpec));
  app.get("/api-docs.json", (req, res) => {
    res.json(swaggerSpec);
  });

  /**
   * @swagger
   * /:
   *   get:
   *     summary: Greeting
   *     tags: [Health]
   *     responses:
   *       200:
   *         description: "{ message: Contacts API }"
   */
  app.get("/", (req, res) => {
    res.json({ message: "Contacts API" });
  });

  /**
   * @swagger
   * /healthchecker:
   *   get:
   *     summary: Database connectivity check
   *     tags: [Health]
   *     responses:
   *       200:
   *         description: Database reachable
   *       500:
   *         description: Error connecting to the database
   */
  app.get(
    "/healthchecker",
    asyncHandler(async (req, res) => {
      try {
        await deps.checkDatabase();
      } catch (error) {
        logger.error("Health check failed", {
          error: error instanceof Error ? error.message : String(error),
        });
        return res.status(500).json({
          success: false,
          error: "Error connecting to the database",
          code: "DATABASE_UNAVAILABLE",
        });
      }
      return res.json({ status: "ok", message: "Database is reachable", timestamp: new Date().toISOString() });
    })
  );

  // Register module routes
  app.use("/auth", createAuthRouter(ctx));
  app.use("/email", createEmailRouter(ctx));
  app.use("/user", createUsersRouter(ctx));
  app.use("/contacts", createContactsRouter(ctx));

  // 404 + error handling (keep last)
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

/**
 * Server Entry Point
 * ==================
 * Starts the Express server
 */

import "dotenv/config";

import { createApp, createDefaultDeps } from "./app.js";
import { loadConfig } from "./config/env.js";
import { disconnectDb } from "./shared/db.js";
import { logger } from "./shared/logger.js";
import { disconnectRedis } from "./shared/redis.js";

const config = loadConfig();
const app = createApp(createDefaultDeps(config));
const PORT = config.port;

const server = app.listen(PORT, () => {
  console.log("\n" + "=".repeat(80));
  console.log(`🚀 Contacts API Server`);
  console.log("=".repeat(80));
  console.log(`📡 Server running on http://localhost:${PORT}`);
  console.log(`🏥 Health check: http://localhost:${PORT}/healthchecker`);
  console.log(`📚 Swagger UI: http://localhost:${PORT}/api-docs`);
  console.log(`📋 API Docs JSON: http://localhost:${PORT}/api-docs.json`);
  console.log("=".repeat(80) + "\n");
});

// Graceful shutdown
function shutdown(signal: string) {
  logger.info(`${signal} received, closing server...`);
  server.close(() => {
    Promise.all([disconnectDb(), disconnectRedis()])
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error("Shutdown failed", {
          error: error instanceof Error ? error.message : String(error),
        });
        process.exit(1);
      });
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));

export default app;

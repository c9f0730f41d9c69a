/**
 * Redis Singleton
 * ===============
 * Lazily connected client backing the rate limiter.
 *
 * Notes:
 * - Connects on first use.
 * - Without a REDIS_URL the app falls back to an in-memory limiter store and
 *   never calls into this module.
 */

import { createClient } from "redis";

import { logger } from "./logger.js";

export type RedisClient = ReturnType<typeof createClient>;

let client: RedisClient | null = null;
let connectPromise: Promise<void> | null = null;

async function ensureConnected(c: RedisClient): Promise<void> {
  if (c.isOpen) {return;}
  if (!connectPromise) {
    connectPromise = c
      .connect()
      .then(() => undefined)
      .catch((err: unknown) => {
        // Reset so the next request retries the connection
        connectPromise = null;
        throw err;
      });
  }
  await connectPromise;
}

export async function getRedisClient(url: string): Promise<RedisClient> {
  if (!client) {
    client = createClient({ url });
    client.on("error", (err: Error) => {
      logger.error("Redis client error", { error: err.message });
    });
    client.on("reconnecting", () => {
      logger.warn("Redis reconnecting...");
    });
  }

  await ensureConnected(client);
  return client;
}

export async function disconnectRedis(): Promise<void> {
  if (!client) {return;}
  const current = client;
  client = null;
  connectPromise = null;
  if (current.isOpen) {
    await current.quit();
  }
}

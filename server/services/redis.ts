import Redis from "ioredis";

import { env } from "../config/env";
import { logger } from "../logger";

const BASE_OPTIONS = {
  maxRetriesPerRequest: 3,
  // fail fast when the server is not ready within 2 seconds
  connectTimeout: 2000,
  enableReadyCheck: true,
  lazyConnect: false,
};

let sharedClient: Redis | null = null;

export function createRedisClient(
  url: string,
  connectionName?: string,
): Redis {
  const client = new Redis(url, {
    ...BASE_OPTIONS,
    connectionName,
  });
  client.on("error", (err) => {
    logger.error({ err, connectionName }, "[REDIS] Connection error");
  });
  client.on("ready", () => {
    logger.info({ connectionName }, "[REDIS] ready");
  });
  return client;
}

/** Shared client, or null when REDIS_URL is not configured. */
export function getSharedRedisClient(): Redis | null {
  if (!env.REDIS_URL) {
    return null;
  }
  sharedClient ??= createRedisClient(env.REDIS_URL, "pipeline-events");
  return sharedClient;
}

export async function closeSharedRedisClient() {
  if (sharedClient) {
    await sharedClient.quit();
    sharedClient = null;
  }
}

export type RedisClient = Redis;

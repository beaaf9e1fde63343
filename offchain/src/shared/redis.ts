import { createClient } from "redis";
import { logger } from "./logger";

export let redisClient: ReturnType<typeof createClient> | undefined = undefined;
export let redisConnected = false;

export async function initRedis(url: string | undefined, production: boolean): Promise<boolean> {
  if (!url || url.trim() === "") {
    if (production) {
      throw new Error("[Redis] REDIS_URL not set. Cannot start in production.");
    }
    logger.warn("[Redis] REDIS_URL not set. Rate limiting disabled.");
    return false;
  }

  redisClient = createClient({ url });
  redisClient.on("error", (error: unknown) => {
    logger.error("[Redis] Client error", { error });
  });

  try {
    if (!redisClient.isOpen) {
      await redisClient.connect();
    }
    redisConnected = true;
    logger.info("[Redis] Connected");
    return true;
  } catch (error) {
    if (production) {
      logger.error("[Redis] Failed to connect", { error });
      throw error;
    }
    logger.warn("[Redis] Failed to connect (dev mode, rate limiting disabled)", { error });
    redisConnected = false;
    return false;
  }
}

export function isRedisConnected(): boolean {
  return redisConnected && redisClient?.isOpen === true;
}

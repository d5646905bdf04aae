import { Redis } from "ioredis";
import { config } from "../config/index.js";

let publisher: Redis | null = null;

function createRedisClient(url: string): Redis {
  return new Redis(url, {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    retryStrategy: (times: number) => Math.min(times * 100, 3000),
  });
}

/** Null when REDIS_URL is not configured; ledger events then stay in process. */
export function getRedisPublisher(): Redis | null {
  const url = config.redisUrl;
  if (url === undefined) return null;
  if (publisher === null) {
    publisher = createRedisClient(url);
  }
  return publisher;
}

export async function closeRedis(): Promise<void> {
  if (publisher !== null) {
    await publisher.quit();
    publisher = null;
  }
}

import Redis from "ioredis";
import { CacheBackend } from "./cache";
import { Logger } from "./logger";

export class RedisCacheStore implements CacheBackend {
  readonly name = "redis";
  private readonly client: Redis;

  constructor(redisUrl: string, logger: Logger) {
    this.client = new Redis(redisUrl, {
      maxRetriesPerRequest: 3,
      retryStrategy(times) {
        if (times > 3) {
          return null;
        }
        return Math.min(times * 200, 2000);
      }
    });

    this.client.on("error", (error: Error) => {
      logger.warn("redis_error", { error: error.message });
    });
  }

  async get(key: string): Promise<Buffer | null> {
    return this.client.getBuffer(key);
  }

  async set(key: string, value: Buffer, ttlSeconds: number): Promise<void> {
    await this.client.set(key, value, "EX", ttlSeconds);
  }

  async ttl(key: string): Promise<number> {
    return this.client.ttl(key);
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}

import type { Redis } from "ioredis";
import type { Logger } from "../infrastructure/logger.js";

export class RateLimiter {
  private readonly PREFIX = "ratelimit:";

  constructor(
    private readonly redis: Redis,
    private readonly logger: Logger,
  ) {}

  /**
   * Fixed-window counter.
   * @param key Identifier (e.g. "chat:@alice:example.org")
   * @param limit Max requests per window
   * @param windowSeconds Window length
   */
  async isAllowed(
    key: string,
    limit: number,
    windowSeconds: number,
  ): Promise<boolean> {
    const redisKey = `${this.PREFIX}${key}`;

    try {
      const multi = this.redis.multi();
      multi.incr(redisKey);
      multi.expire(redisKey, windowSeconds, "NX"); // Set expiry only if not set

      const results = await multi.exec();
      const count = results?.[0]?.[1];
      if (typeof count !== "number") return false;
      return count <= limit;
    } catch (err) {
      // Chat stays usable while Redis is down
      this.logger.warn({ err, key }, "Rate limiter unavailable, allowing message");
      return true;
    }
  }
}

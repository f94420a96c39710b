/**
 * User Repository - read side of the user directory
 *
 * Records are written by the teacher dashboard; the bot only reads them.
 */
import type { Redis } from "ioredis";
import type { Logger } from "../infrastructure/logger.js";
import { userRecordSchema } from "./schemas.js";
import type { UserRecord } from "./schemas.js";

// Redis key patterns
const USER_KEY = (chatId: string) => `directory:user:${chatId}`;
const USER_LMS_INDEX_KEY = (lmsId: number) => `directory:user:lms:${lmsId}`;
const USER_ID_INDEX_KEY = (id: string) => `directory:user:id:${id}`;

export class UserRepository {
  constructor(
    private readonly redis: Redis,
    private readonly logger: Logger,
  ) {}

  async getByChatId(chatId: string): Promise<UserRecord | null> {
    try {
      const raw = await this.redis.hgetall(USER_KEY(chatId));
      if (Object.keys(raw).length === 0) return null;

      const parsed = userRecordSchema.safeParse(raw);
      if (!parsed.success) {
        this.logger.warn(
          { chatId, errors: parsed.error.format() },
          "Malformed user record",
        );
        return null;
      }
      return parsed.data;
    } catch (err) {
      this.logger.error({ err, chatId }, "Failed to load user");
      return null;
    }
  }

  async getByLmsId(lmsId: number): Promise<UserRecord | null> {
    return this.getByIndex(USER_LMS_INDEX_KEY(lmsId));
  }

  async getById(id: string): Promise<UserRecord | null> {
    return this.getByIndex(USER_ID_INDEX_KEY(id));
  }

  private async getByIndex(indexKey: string): Promise<UserRecord | null> {
    try {
      const chatId = await this.redis.get(indexKey);
      if (!chatId) return null;
      return await this.getByChatId(chatId);
    } catch (err) {
      this.logger.error({ err, indexKey }, "Failed to resolve user index");
      return null;
    }
  }
}

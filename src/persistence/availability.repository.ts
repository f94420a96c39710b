/**
 * Availability Repository - weekly tutoring windows per teacher
 */
import type { Redis } from "ioredis";
import type { Logger } from "../infrastructure/logger.js";
import type { AvailabilityWindow } from "../domains/tutoring/availability.js";
import { availabilityWindowsSchema } from "./schemas.js";

const AVAILABILITY_KEY = (teacherId: string) =>
  `directory:teacher:${teacherId}:availability`;

export class AvailabilityRepository {
  constructor(
    private readonly redis: Redis,
    private readonly logger: Logger,
  ) {}

  async getWindows(teacherId: string): Promise<AvailabilityWindow[]> {
    let raw: string | null;
    try {
      raw = await this.redis.get(AVAILABILITY_KEY(teacherId));
    } catch (err) {
      this.logger.error({ err, teacherId }, "Failed to load availability");
      return [];
    }
    if (!raw) return [];

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (err) {
      this.logger.warn({ err, teacherId }, "Availability is not valid JSON");
      return [];
    }

    const parsed = availabilityWindowsSchema.safeParse(decoded);
    if (!parsed.success) {
      this.logger.warn(
        { teacherId, errors: parsed.error.format() },
        "Malformed availability windows",
      );
      return [];
    }
    return parsed.data;
  }
}

/**
 * Membership Repository - pending room invites with TTL
 *
 * An invite lets a user join a registered room once; joining consumes it.
 */
import type { Redis } from "ioredis";
import type { Logger } from "../infrastructure/logger.js";
import { invitePayloadSchema } from "./schemas.js";
import type { RoomInvite } from "./schemas.js";

const INVITE_KEY = (roomId: string, userId: string) =>
  `room:${roomId}:invite:${userId}`;

export class MembershipRepository {
  constructor(
    private readonly redis: Redis,
    private readonly logger: Logger,
  ) {}

  async createInvite(
    roomId: string,
    userId: string,
    invitedBy: string,
    ttlSeconds: number,
  ): Promise<void> {
    const invite: RoomInvite = { invitedBy, createdAt: Date.now() };
    await this.redis.set(
      INVITE_KEY(roomId, userId),
      JSON.stringify(invite),
      "EX",
      ttlSeconds,
    );
    this.logger.debug({ roomId, userId, invitedBy }, "Room invite stored");
  }

  async hasInvite(roomId: string, userId: string): Promise<boolean> {
    try {
      return (await this.redis.exists(INVITE_KEY(roomId, userId))) === 1;
    } catch (err) {
      this.logger.error({ err, roomId, userId }, "Failed to check invite");
      return false;
    }
  }

  /**
   * Atomically read and delete the invite
   */
  async consumeInvite(roomId: string, userId: string): Promise<RoomInvite | null> {
    const raw = await this.redis.getdel(INVITE_KEY(roomId, userId));
    if (!raw) return null;

    try {
      const parsed = invitePayloadSchema.safeParse(JSON.parse(raw));
      if (parsed.success) return parsed.data;
    } catch (err) {
      this.logger.warn({ err, roomId, userId }, "Invite payload is not valid JSON");
    }
    // A present but unreadable invite still grants the join
    return { invitedBy: "unknown", createdAt: 0 };
  }

  async revokeInvite(roomId: string, userId: string): Promise<void> {
    await this.redis.del(INVITE_KEY(roomId, userId));
  }
}

/**
 * Chat Gateway - outbound effects of the bot on the chat surface
 *
 * Everything the command layer does to rooms and users goes through this
 * interface, so commands never touch Socket.IO directly.
 */
import type { Logger } from "../infrastructure/logger.js";
import type { ClientManager } from "../client/clientManager.js";
import type { MembershipRepository } from "../persistence/membership.repository.js";
import type { SendResult } from "../domains/tutoring/tutoring.types.js";
import type { AppServer, ChatMessageEvent } from "../socket/types.js";
import { generateCorrelationId } from "../shared/crypto.js";
import { localpart } from "../shared/identity.js";

export interface ChatGateway {
  sendText(roomId: string, text: string): Promise<SendResult>;
  inviteUser(roomId: string, userId: string, invitedBy: string): Promise<SendResult>;
  kickUser(roomId: string, userId: string, reason: string): Promise<SendResult>;
  /** Connected in the room or holding a pending invite */
  isMember(roomId: string, userId: string): Promise<boolean>;
}

export interface SocketChatGatewayOptions {
  botUserId: string;
  inviteTtlSeconds: number;
}

export class SocketChatGateway implements ChatGateway {
  constructor(
    private readonly io: AppServer,
    private readonly clientManager: ClientManager,
    private readonly membershipRepository: MembershipRepository,
    private readonly logger: Logger,
    private readonly options: SocketChatGatewayOptions,
  ) {}

  async sendText(roomId: string, text: string): Promise<SendResult> {
    const message: ChatMessageEvent = {
      id: generateCorrelationId(),
      roomId,
      userId: this.options.botUserId,
      userName: localpart(this.options.botUserId),
      content: text,
      timestamp: Date.now(),
    };

    try {
      this.io.to(roomId).emit("chat:message", message);
      return { ok: true };
    } catch (err) {
      this.logger.warn({ err, roomId }, "Failed to send bot message");
      return { ok: false, error: errorMessage(err) };
    }
  }

  async inviteUser(
    roomId: string,
    userId: string,
    invitedBy: string,
  ): Promise<SendResult> {
    try {
      await this.membershipRepository.createInvite(
        roomId,
        userId,
        invitedBy,
        this.options.inviteTtlSeconds,
      );
    } catch (err) {
      this.logger.error({ err, roomId, userId }, "Failed to store invite");
      return { ok: false, error: errorMessage(err) };
    }

    const socketIds = this.clientManager.getSocketIds(userId);
    if (socketIds.length > 0) {
      this.io.to(socketIds).emit("room:invited", { roomId, invitedBy });
    }

    this.logger.info(
      { roomId, userId, invitedBy, onlineSockets: socketIds.length },
      "User invited to room",
    );
    return { ok: true };
  }

  async kickUser(roomId: string, userId: string, reason: string): Promise<SendResult> {
    try {
      await this.membershipRepository.revokeInvite(roomId, userId);
    } catch (err) {
      this.logger.error({ err, roomId, userId }, "Failed to revoke invite");
      return { ok: false, error: errorMessage(err) };
    }

    const socketIds = this.clientManager.getSocketIdsInRoom(roomId, userId);
    if (socketIds.length === 0) {
      return { ok: true };
    }

    for (const socketId of socketIds) {
      this.clientManager.leaveRoom(socketId, roomId);
    }
    this.io.in(socketIds).socketsLeave(roomId);
    this.io.to(socketIds).emit("room:kicked", { roomId, reason });
    this.io.to(roomId).emit("room:userLeft", { roomId, userId });

    this.logger.info({ roomId, userId, reason }, "User removed from room");
    return { ok: true };
  }

  async isMember(roomId: string, userId: string): Promise<boolean> {
    if (this.clientManager.isUserInRoom(roomId, userId)) return true;
    return this.membershipRepository.hasInvite(roomId, userId);
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

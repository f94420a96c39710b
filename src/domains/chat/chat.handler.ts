import { randomUUID } from "node:crypto";
import { chatMessageSchema } from "../../socket/schemas.js";
import type { AppContext } from "../../context.js";
import type { AppSocket, ChatMessageEvent } from "../../socket/types.js";
import { config } from "../../config/index.js";
import { logger } from "../../infrastructure/logger.js";
import { createHandler, requireUser } from "../../shared/handler.utils.js";
import { Errors } from "../../shared/errors.js";

const handleChatMessage = createHandler(
  "chat:message",
  chatMessageSchema,
  async (payload, socket, context) => {
    const user = requireUser(socket);

    // Sender must have joined the room on this socket
    if (!socket.rooms.has(payload.roomId)) {
      return { success: false, error: Errors.NOT_IN_ROOM };
    }

    const allowed = await context.rateLimiter.isAllowed(
      `chat:${user.id}:${payload.roomId}`,
      config.RATE_LIMIT_MESSAGES_PER_MINUTE,
      60,
    );
    if (!allowed) {
      return { success: false, error: Errors.RATE_LIMITED };
    }

    const message: ChatMessageEvent = {
      id: randomUUID(),
      roomId: payload.roomId,
      userId: user.id,
      userName: user.displayName,
      content: payload.content,
      timestamp: Date.now(),
    };

    // Emit to everyone in room INCLUDING sender (simplifies frontend state sync)
    socket.nsp.in(payload.roomId).emit("chat:message", message);

    logger.debug({ roomId: payload.roomId, userId: user.id }, "Chat message");

    await context.tutoringQueue.recordMessage(payload.roomId, user.id, payload.content);

    // Commands run after the ack; their replies arrive as bot messages
    if (context.commandRegistry.isCommand(payload.content)) {
      context.commandRegistry
        .dispatch({ roomId: payload.roomId, sender: user, body: payload.content })
        .catch((err: unknown) => {
          logger.error({ err, roomId: payload.roomId }, "Command dispatch failed");
        });
    }

    return { success: true, data: { id: message.id } };
  },
);

export const chatHandler = (socket: AppSocket, context: AppContext) => {
  socket.on("chat:message", handleChatMessage(socket, context));
};

import type { AppContext } from "../../context.js";
import type { AppSocket } from "../../socket/types.js";
import { logger } from "../../infrastructure/logger.js";
import { joinRoomSchema, leaveRoomSchema } from "../../socket/schemas.js";
import { createHandler, requireUser } from "../../shared/handler.utils.js";
import type { HandlerResult } from "../../shared/handler.utils.js";
import { Errors } from "../../shared/errors.js";

/**
 * Registered rooms admit their owner and invited users; the invite is spent
 * on the user's first socket. Unregistered rooms are open.
 */
async function checkJoinPolicy(
  context: AppContext,
  roomId: string,
  userId: string,
): Promise<HandlerResult | null> {
  const room = await context.roomRepository.getRoom(roomId);
  if (!room) return null;

  if (!room.active) {
    return { success: false, error: Errors.ROOM_INACTIVE };
  }

  if (room.teacherId !== undefined) {
    const owner = await context.userRepository.getById(room.teacherId);
    if (owner?.chatId === userId) return null;
  }

  const invite = await context.membershipRepository.consumeInvite(roomId, userId);
  if (!invite) {
    return { success: false, error: Errors.INVITE_REQUIRED };
  }

  logger.debug({ roomId, userId, invitedBy: invite.invitedBy }, "Invite accepted");
  return null;
}

/** Policy checks in flight, keyed by room and user */
const pendingAdmissions = new Map<string, Promise<HandlerResult | null>>();

/**
 * Sockets of one user joining the same room at once share a single policy
 * check, so a single invite admits all of them
 */
function admit(
  context: AppContext,
  roomId: string,
  userId: string,
): Promise<HandlerResult | null> {
  const key = `${roomId} ${userId}`;
  let pending = pendingAdmissions.get(key);
  if (!pending) {
    pending = checkJoinPolicy(context, roomId, userId).finally(() => {
      pendingAdmissions.delete(key);
    });
    pendingAdmissions.set(key, pending);
  }
  return pending;
}

/**
 * Runs when a user's last socket leaves a room, by request or by disconnect
 */
export async function announceDeparture(
  context: AppContext,
  roomId: string,
  userId: string,
): Promise<void> {
  context.io.to(roomId).emit("room:userLeft", { roomId, userId });
  await context.chatGateway.sendText(roomId, `👋 ${userId} has left the room.`);

  const released = await context.tutoringQueue.handleExternalDeparture(roomId, userId);
  if (released) {
    logger.info({ roomId, userId }, "Tutoring room freed after occupant left");
  }
}

const handleJoin = createHandler(
  "room:join",
  joinRoomSchema,
  async ({ roomId }, socket, context) => {
    const user = requireUser(socket);
    const { clientManager } = context;

    // Another socket of the same user already holds the membership
    if (!clientManager.isUserInRoom(roomId, user.id)) {
      const rejection = await admit(context, roomId, user.id);
      if (rejection) return rejection;
    }

    await socket.join(roomId);
    const firstSocket = clientManager.joinRoom(socket.id, roomId);

    if (firstSocket) {
      socket.to(roomId).emit("room:userJoined", { roomId, userId: user.id });
      await context.chatGateway.sendText(roomId, `🎓 Welcome ${user.id} to the room!`);
      logger.info({ roomId, userId: user.id }, "User joined room");
    }

    return {
      success: true,
      data: { members: clientManager.getUsersInRoom(roomId) },
    };
  },
);

const handleLeave = createHandler(
  "room:leave",
  leaveRoomSchema,
  async ({ roomId }, socket, context) => {
    const user = requireUser(socket);

    if (!socket.rooms.has(roomId)) {
      return { success: false, error: Errors.NOT_IN_ROOM };
    }

    await socket.leave(roomId);
    const fullyLeft = context.clientManager.leaveRoom(socket.id, roomId);

    if (fullyLeft) {
      logger.info({ roomId, userId: user.id }, "User left room");
      await announceDeparture(context, roomId, user.id);
    }

    return { success: true };
  },
);

export const roomHandler = (socket: AppSocket, context: AppContext) => {
  socket.on("room:join", handleJoin(socket, context));
  socket.on("room:leave", handleLeave(socket, context));
};

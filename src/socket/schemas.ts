import { z } from "zod";

const roomIdSchema = z.string().trim().min(1).max(255);

export const joinRoomSchema = z.object({
  roomId: roomIdSchema,
});

export const leaveRoomSchema = z.object({
  roomId: roomIdSchema,
});

export const chatMessageSchema = z.object({
  roomId: roomIdSchema,
  content: z.string().trim().min(1).max(4000),
});

export type JoinRoomPayload = z.infer<typeof joinRoomSchema>;
export type LeaveRoomPayload = z.infer<typeof leaveRoomSchema>;
export type ChatMessagePayload = z.infer<typeof chatMessageSchema>;

import type { Server, Socket } from "socket.io";
import type { AuthSocketData } from "../auth/types.js";
import type { HandlerResult } from "../shared/handler.utils.js";

export type SocketCallback = (result: HandlerResult) => void;

export interface ClientToServerEvents {
  "room:join": (payload: unknown, callback?: SocketCallback) => void;
  "room:leave": (payload: unknown, callback?: SocketCallback) => void;
  "chat:message": (payload: unknown, callback?: SocketCallback) => void;
}

export interface ChatMessageEvent {
  id: string;
  roomId: string;
  userId: string;
  userName: string;
  content: string;
  timestamp: number;
}

export interface ServerToClientEvents {
  "chat:message": (message: ChatMessageEvent) => void;
  "room:invited": (event: { roomId: string; invitedBy: string }) => void;
  "room:kicked": (event: { roomId: string; reason: string }) => void;
  "room:userJoined": (event: { roomId: string; userId: string }) => void;
  "room:userLeft": (event: { roomId: string; userId: string }) => void;
}

export type InterServerEvents = Record<string, never>;

export type AppServer = Server<
  ClientToServerEvents,
  ServerToClientEvents,
  InterServerEvents,
  AuthSocketData
>;

export type AppSocket = Socket<
  ClientToServerEvents,
  ServerToClientEvents,
  InterServerEvents,
  AuthSocketData
>;

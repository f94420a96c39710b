/**
 * Shared error message constants for consistent socket acks
 */
export const Errors = {
  // General
  INVALID_PAYLOAD: "Invalid payload",
  INTERNAL_ERROR: "Internal server error",
  NOT_AUTHORIZED: "Not authorized",
  RATE_LIMITED: "Too many messages",

  // Room
  ROOM_NOT_FOUND: "Room not found",
  ROOM_INACTIVE: "Room is not active",
  NOT_IN_ROOM: "Not in room",
  INVITE_REQUIRED: "An invite is required to join this room",

  // Auth
  AUTH_REQUIRED: "Authentication required",
  INVALID_CREDENTIALS: "Invalid credentials",
  AUTH_FAILED: "Authentication failed",
} as const;

export type ErrorCode = (typeof Errors)[keyof typeof Errors];

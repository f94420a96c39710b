/**
 * Socket handler utilities
 * Provides a createHandler wrapper for consistent validation, error handling, and metrics
 */
import type { z } from "zod";
import { logger } from "../infrastructure/logger.js";
import { metrics } from "../infrastructure/metrics.js";
import { generateCorrelationId } from "./crypto.js";
import { Errors } from "./errors.js";
import type { AppContext } from "../context.js";
import type { AppSocket, SocketCallback } from "../socket/types.js";
import type { ChatUser } from "../auth/types.js";

/**
 * Standard handler result shape
 */
export interface HandlerResult {
  success: boolean;
  error?: string;
  data?: unknown;
}

type HandlerFn<TPayload> = (
  payload: TPayload,
  socket: AppSocket,
  context: AppContext,
) => Promise<HandlerResult>;

/**
 * Create a wrapped socket event handler with:
 * - Zod schema validation
 * - Centralized error handling
 * - Logging with correlation IDs
 * - Event counters and latency histogram
 *
 * @example
 * ```typescript
 * const handleLeave = createHandler("room:leave", leaveRoomSchema, async (payload, socket, context) => {
 *   return { success: true };
 * });
 *
 * socket.on("room:leave", handleLeave(socket, context));
 * ```
 */
export function createHandler<TPayload>(
  eventName: string,
  schema: z.ZodType<TPayload, z.ZodTypeDef, unknown>,
  handler: HandlerFn<TPayload>,
) {
  return (socket: AppSocket, context: AppContext) => {
    return async (rawPayload: unknown, callback?: SocketCallback) => {
      const startTime = Date.now();
      const requestId = generateCorrelationId();
      const userId = socket.data.user?.id;

      const parseResult = schema.safeParse(rawPayload);
      if (!parseResult.success) {
        logger.debug(
          {
            requestId,
            event: eventName,
            userId,
            errors: parseResult.error.format(),
          },
          "Validation failed",
        );
        metrics.eventsTotal.inc({ event: eventName, status: "invalid" });
        callback?.({ success: false, error: Errors.INVALID_PAYLOAD });
        return;
      }

      try {
        const result = await handler(parseResult.data, socket, context);

        const durationMs = Date.now() - startTime;
        logger.debug(
          {
            requestId,
            event: eventName,
            userId,
            success: result.success,
            durationMs,
          },
          "Handler completed",
        );
        metrics.eventsTotal.inc({
          event: eventName,
          status: result.success ? "ok" : "rejected",
        });
        metrics.eventLatency.observe({ event: eventName }, durationMs / 1000);

        callback?.(result);
      } catch (err) {
        const durationMs = Date.now() - startTime;
        logger.error(
          {
            err,
            requestId,
            event: eventName,
            userId,
            durationMs,
          },
          "Handler exception",
        );
        metrics.eventsTotal.inc({ event: eventName, status: "error" });

        callback?.({ success: false, error: Errors.INTERNAL_ERROR });
      }
    };
  };
}

/**
 * Authenticated user of a socket; the auth middleware guarantees it on connect
 */
export function requireUser(socket: AppSocket): ChatUser {
  const user = socket.data.user;
  if (!user) {
    throw new Error("socket.data.user is missing (auth middleware may have been bypassed)");
  }
  return user;
}

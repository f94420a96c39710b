import type { Redis } from "ioredis";
import type { Logger } from "../infrastructure/logger.js";
import type { AppSocket } from "../socket/types.js";
import { metrics } from "../infrastructure/metrics.js";
import { Errors } from "../shared/errors.js";
import { verifyJwt } from "./jwtValidator.js";

export function createAuthMiddleware(redis: Redis, logger: Logger) {
  return async (socket: AppSocket, next: (err?: Error) => void) => {
    const rawToken: unknown =
      socket.handshake.auth.token ?? socket.handshake.headers.authorization;

    if (typeof rawToken !== "string" || rawToken.length === 0) {
      logger.warn({ socketId: socket.id }, "Connection attempt without token");
      metrics.authAttempts.inc({ result: "no_token" });
      next(new Error(Errors.AUTH_REQUIRED));
      return;
    }

    // Handle "Bearer " prefix if present in header
    const token = rawToken.replace(/^Bearer\s+/i, "");

    try {
      const user = await verifyJwt(token, redis, logger);
      if (!user) {
        logger.warn({ socketId: socket.id }, "Invalid token provided");
        metrics.authAttempts.inc({ result: "invalid_token" });
        next(new Error(Errors.INVALID_CREDENTIALS));
        return;
      }

      socket.data.user = user;
      socket.data.token = token;

      metrics.authAttempts.inc({ result: "success" });
      logger.info({ socketId: socket.id, userId: user.id }, "Client authenticated");
      next();
    } catch (err) {
      logger.error({ err, socketId: socket.id }, "Authentication error");
      metrics.authAttempts.inc({ result: "error" });
      next(new Error(Errors.AUTH_FAILED));
    }
  };
}

import type { FastifyPluginAsync } from "fastify";
import { getRedisClient } from "./redis.js";
import type { TutoringQueue } from "../domains/tutoring/tutoringQueue.js";

export const createHealthRoutes = (
  tutoringQueue: TutoringQueue,
): FastifyPluginAsync => {
  return async (fastify) => {
    fastify.get("/health", async (_request, reply) => {
      // Directory lookups need Redis; the queue itself does not
      const redisOk = getRedisClient().status === "ready";
      const status = redisOk ? "ok" : "degraded";

      if (status !== "ok") {
        reply.code(503);
      }

      return {
        status,
        redis: redisOk ? "ready" : "unavailable",
        tutoring: tutoringQueue.getStats(),
        uptime: process.uptime(),
        timestamp: new Date().toISOString(),
      };
    });
  };
};

import Fastify from "fastify";
import type { FastifyInstance } from "fastify";
import { Server } from "socket.io";
import { config } from "../config/index.js";
import { getRedisClient } from "./redis.js";
import { createHealthRoutes } from "./health.js";
import { createMetricsRoutes } from "./metrics.js";
import { logger } from "./logger.js";
import { initializeSocket } from "../socket/index.js";
import type { AppContext } from "../context.js";
import type {
  ClientToServerEvents,
  InterServerEvents,
  ServerToClientEvents,
  AppServer,
} from "../socket/types.js";
import type { AuthSocketData } from "../auth/types.js";

export interface BootstrapResult {
  server: FastifyInstance;
  io: AppServer;
  context: AppContext;
}

export async function bootstrapServer(): Promise<BootstrapResult> {
  // The pino instance narrows Fastify's logger generic; plugins use the base type
  const fastify = Fastify({
    loggerInstance: logger,
  }) as unknown as FastifyInstance;

  const redis = getRedisClient();

  // Queue state is per process, so no cross-node adapter
  const io = new Server<
    ClientToServerEvents,
    ServerToClientEvents,
    InterServerEvents,
    AuthSocketData
  >(fastify.server, {
    cors: {
      origin: [...config.CORS_ORIGINS],
      methods: ["GET", "POST"],
      credentials: true,
    },
  });

  const context = initializeSocket(io, redis);

  await fastify.register(createHealthRoutes(context.tutoringQueue));
  await fastify.register(createMetricsRoutes(context.tutoringQueue, context.clientManager));

  return { server: fastify, io, context };
}

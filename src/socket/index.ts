import type { Redis } from "ioredis";
import { config } from "../config/index.js";
import { logger } from "../infrastructure/logger.js";
import { metrics } from "../infrastructure/metrics.js";
import { createAuthMiddleware } from "../auth/middleware.js";
import { ClientManager } from "../client/clientManager.js";
import { RateLimiter } from "../utils/rateLimiter.js";
import { TutoringQueue } from "../domains/tutoring/tutoringQueue.js";
import { QuestionNotifier } from "../domains/questions/question.notifier.js";
import { createCommandRegistry } from "../domains/commands/index.js";
import { announceDeparture, registerAllDomains } from "../domains/index.js";
import { SocketChatGateway } from "../gateway/chat.gateway.js";
import { LmsClient } from "../integrations/lms/lmsClient.js";
import { UserRepository } from "../persistence/user.repository.js";
import { RoomRepository } from "../persistence/room.repository.js";
import { AvailabilityRepository } from "../persistence/availability.repository.js";
import { MembershipRepository } from "../persistence/membership.repository.js";
import { QuestionRepository } from "../persistence/question.repository.js";
import type { AppContext } from "../context.js";
import type { AppServer } from "./types.js";

export function initializeSocket(io: AppServer, redis: Redis): AppContext {
  const clientManager = new ClientManager();
  const rateLimiter = new RateLimiter(redis, logger);

  const userRepository = new UserRepository(redis, logger);
  const roomRepository = new RoomRepository(redis, logger);
  const availabilityRepository = new AvailabilityRepository(redis, logger);
  const membershipRepository = new MembershipRepository(redis, logger);
  const questionRepository = new QuestionRepository(redis, logger);

  const lmsClient = new LmsClient(logger, {
    baseUrl: config.LMS_URL,
    token: config.LMS_TOKEN,
    timeoutMs: config.LMS_TIMEOUT_MS,
  });

  const chatGateway = new SocketChatGateway(
    io,
    clientManager,
    membershipRepository,
    logger,
    {
      botUserId: config.BOT_USER_ID,
      inviteTtlSeconds: config.ROOM_INVITE_TTL_SECONDS,
    },
  );

  const tutoringQueue = new TutoringQueue(logger, {
    confirmationTimeoutMs: config.TUTORING_CONFIRM_TIMEOUT_SECONDS * 1000,
    commandPrefix: config.COMMAND_PREFIX,
  });
  tutoringQueue.configureNotifier((target, text) => chatGateway.sendText(target, text));

  const questionNotifier = new QuestionNotifier(questionRepository, chatGateway, logger, {
    intervalMs: config.QUESTION_CHECK_INTERVAL_SECONDS * 1000,
    commandPrefix: config.COMMAND_PREFIX,
  });
  questionNotifier.start();

  const commandRegistry = createCommandRegistry(
    {
      gateway: chatGateway,
      tutoringQueue,
      users: userRepository,
      rooms: roomRepository,
      availability: availabilityRepository,
      questions: questionRepository,
      lms: lmsClient,
      serverName: config.SERVER_NAME,
      commandPrefix: config.COMMAND_PREFIX,
      botUserId: config.BOT_USER_ID,
    },
    logger,
  );

  // Authentication Middleware
  io.use(createAuthMiddleware(redis, logger));

  const appContext: AppContext = {
    io,
    redis,
    clientManager,
    rateLimiter,
    tutoringQueue,
    questionNotifier,
    chatGateway,
    commandRegistry,
    lmsClient,
    userRepository,
    roomRepository,
    availabilityRepository,
    membershipRepository,
    questionRepository,
  };

  io.on("connection", (socket) => {
    const user = socket.data.user;
    if (!user) {
      logger.warn({ socketId: socket.id }, "Unauthenticated socket, disconnecting");
      socket.disconnect(true);
      return;
    }

    logger.info({ socketId: socket.id, userId: user.id }, "Socket connected");
    clientManager.addClient(socket.id, user);
    metrics.socketConnections.inc();

    registerAllDomains(socket, appContext);

    socket.on("disconnect", (reason) => {
      logger.info({ socketId: socket.id, userId: user.id, reason }, "Socket disconnected");
      metrics.socketConnections.dec();

      const leftRooms = clientManager.removeClient(socket.id);
      for (const roomId of leftRooms) {
        announceDeparture(appContext, roomId, user.id).catch((err: unknown) => {
          logger.error({ err, roomId, userId: user.id }, "Departure handling failed");
        });
      }
    });
  });

  return appContext;
}

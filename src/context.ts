import type { Redis } from "ioredis";
import type { AppServer } from "./socket/types.js";
import type { ClientManager } from "./client/clientManager.js";
import type { RateLimiter } from "./utils/rateLimiter.js";
import type { TutoringQueue } from "./domains/tutoring/tutoringQueue.js";
import type { QuestionNotifier } from "./domains/questions/question.notifier.js";
import type { CommandRegistry } from "./domains/commands/command.registry.js";
import type { ChatGateway } from "./gateway/chat.gateway.js";
import type { LmsClient } from "./integrations/lms/lmsClient.js";
import type { UserRepository } from "./persistence/user.repository.js";
import type { RoomRepository } from "./persistence/room.repository.js";
import type { AvailabilityRepository } from "./persistence/availability.repository.js";
import type { MembershipRepository } from "./persistence/membership.repository.js";
import type { QuestionRepository } from "./persistence/question.repository.js";

export interface AppContext {
  io: AppServer;
  redis: Redis;
  clientManager: ClientManager;
  rateLimiter: RateLimiter;
  tutoringQueue: TutoringQueue;
  questionNotifier: QuestionNotifier;
  chatGateway: ChatGateway;
  commandRegistry: CommandRegistry;
  lmsClient: LmsClient;
  userRepository: UserRepository;
  roomRepository: RoomRepository;
  availabilityRepository: AvailabilityRepository;
  membershipRepository: MembershipRepository;
  questionRepository: QuestionRepository;
}

/**
 * Commands - chat command registry and its built-in commands
 */
import type { Logger } from "../../infrastructure/logger.js";
import { CommandRegistry } from "./command.registry.js";
import {
  createAnswerCommand,
  createAnswersCommand,
  createHelpCommand,
  createQuestionsCommand,
  createReinviteCommand,
  createTeachersCommand,
  createTutoringCommand,
} from "./handlers/index.js";
import type { AnswerCommandDeps } from "./handlers/answer.command.js";
import type { AnswersCommandDeps } from "./handlers/answers.command.js";
import type { QuestionsCommandDeps } from "./handlers/questions.command.js";
import type { ReinviteCommandDeps } from "./handlers/reinvite.command.js";
import type { TeachersCommandDeps } from "./handlers/teachers.command.js";
import type { TutoringCommandDeps } from "./handlers/tutoring.command.js";

export { CommandRegistry } from "./command.registry.js";
export type { Command, CommandInvocation } from "./command.types.js";

export type CommandDeps = TutoringCommandDeps &
  TeachersCommandDeps &
  ReinviteCommandDeps &
  QuestionsCommandDeps &
  AnswerCommandDeps &
  AnswersCommandDeps;

export function createCommandRegistry(deps: CommandDeps, logger: Logger): CommandRegistry {
  const registry = new CommandRegistry(deps.gateway, logger, deps.commandPrefix);

  registry
    .register(createTutoringCommand(deps))
    .register(createTeachersCommand(deps))
    .register(createReinviteCommand(deps))
    .register(createQuestionsCommand(deps))
    .register(createAnswerCommand(deps))
    .register(createAnswersCommand(deps))
    .register(createHelpCommand(registry));

  return registry;
}

export { createAnswerCommand } from "./answer.command.js";
export { createAnswersCommand } from "./answers.command.js";
export { createHelpCommand } from "./help.command.js";
export { createQuestionsCommand } from "./questions.command.js";
export { createReinviteCommand } from "./reinvite.command.js";
export { createTeachersCommand } from "./teachers.command.js";
export { createTutoringCommand } from "./tutoring.command.js";

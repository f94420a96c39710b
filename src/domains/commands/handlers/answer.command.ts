/**
 * !answer - submit an answer to an active question
 */
import { metrics } from "../../../infrastructure/metrics.js";
import type { LmsClient } from "../../../integrations/lms/lmsClient.js";
import type { QuestionRepository } from "../../../persistence/question.repository.js";
import type { RoomRepository } from "../../../persistence/room.repository.js";
import type { UserRepository } from "../../../persistence/user.repository.js";
import { gradeAnswer } from "../../questions/grading.js";
import { questionTitle } from "../../questions/question.format.js";
import { questionStatus } from "../../questions/question.status.js";
import type { Command } from "../command.types.js";
import { parseQuestionId, requireLmsUser } from "./lookup.js";

export interface AnswerCommandDeps {
  lms: Pick<LmsClient, "fetchUserCourses" | "fetchUserGroupsInCourse">;
  users: Pick<UserRepository, "getByChatId">;
  rooms: Pick<RoomRepository, "getRoom">;
  questions: Pick<
    QuestionRepository,
    "getQuestion" | "getOptions" | "getResponses" | "addResponse" | "closeQuestion"
  >;
  commandPrefix: string;
  clock?: () => number;
}

export function createAnswerCommand(deps: AnswerCommandDeps): Command {
  const usage = `${deps.commandPrefix}answer <question id> <answer>|<option> [<option> ...]`;
  const clock = deps.clock ?? (() => Date.now());

  return {
    name: "answer",
    usage,
    description: "Answers an active question. Separate several options with spaces.",
    async run(invocation) {
      const [rawId, ...parts] = invocation.args;
      if (parts.length === 0) {
        await invocation.reply(`⚠️ Usage: ${usage}`);
        return;
      }

      const questionId = parseQuestionId(rawId);
      if (questionId === null) {
        await invocation.reply("❌ The question id must be a number.");
        return;
      }

      const user = await requireLmsUser(invocation, deps.users);
      if (!user) return;

      const question = await deps.questions.getQuestion(questionId);
      if (!question) {
        await invocation.reply(`❌ Question #${questionId} was not found.`);
        return;
      }

      const status = questionStatus(question, clock());
      switch (status) {
        case "closed":
          await invocation.reply(`❌ Question #${questionId} is already closed.`);
          return;
        case "ended":
          await invocation.reply(
            `❌ Question #${questionId} has closed and does not accept late answers.`,
          );
          return;
        case "inactive":
          await invocation.reply(`❌ Question #${questionId} is not active right now.`);
          return;
        case "active":
        case "late":
          break;
      }
      const late = status === "late";

      const room = question.roomId ? await deps.rooms.getRoom(question.roomId) : null;
      const courseId = room?.lmsCourseId;
      if (courseId !== undefined) {
        const courses = await deps.lms.fetchUserCourses(user.lmsId);
        if (!courses.some((course) => course.id === courseId)) {
          await invocation.reply("❌ You are not enrolled in this question's course.");
          return;
        }

        const group = room?.lmsGroup;
        if (group !== undefined) {
          const groups = await deps.lms.fetchUserGroupsInCourse(courseId, user.lmsId);
          if (!groups.includes(group)) {
            await invocation.reply("❌ You are not in this question's group.");
            return;
          }
        }
      }

      const previous = await deps.questions.getResponses(questionId, user.id);
      if (previous.length > 0 && !question.allowMultipleSubmissions) {
        await invocation.reply(
          `❌ You already answered question #${questionId} and multiple submissions are not allowed.`,
        );
        return;
      }

      const options = await deps.questions.getOptions(questionId);
      const grade = gradeAnswer(question, options, parts);
      if (!grade.ok) {
        await invocation.reply(grade.error);
        return;
      }

      const version = await deps.questions.addResponse(questionId, user.id, {
        answerText: grade.answerText,
        optionKeys: grade.optionKeys,
        score: grade.score,
        graded: grade.graded,
        late,
        submittedAt: clock(),
      });
      if (version === null) {
        await invocation.reply("❌ Could not save your answer. Please try again.");
        return;
      }
      metrics.questionResponses.inc({ qtype: question.qtype, late: String(late) });

      const closedByThis = question.closeOnFirstCorrect && grade.score === 100;
      if (closedByThis) {
        await deps.questions.closeQuestion(questionId);
      }

      const title = questionTitle(question);
      const notes =
        (question.allowMultipleSubmissions && version > 1 ? ` (🔄 Attempt #${version})` : "") +
        (late ? " (⚠️ Late answer)" : "");

      if (question.qtype === "essay" || question.qtype === "poll") {
        await invocation.reply(`✅ Your answer to '${title}' was recorded.${notes}`);
        return;
      }
      if (!grade.graded || grade.score === null) {
        await invocation.reply(`✅ Your answer to '${title}' was recorded. Pending grading.${notes}`);
        return;
      }

      const emoji = grade.score === 100 ? "🎉" : "📊";
      let text =
        `${emoji} Your answer to '${title}' was recorded.${notes}\n` +
        `📈 Score: ${Math.round(grade.score)}/100`;
      if (closedByThis) {
        text += "\n🏁 You closed the question by being the first to answer correctly!";
      }
      await invocation.reply(text);
    },
  };
}

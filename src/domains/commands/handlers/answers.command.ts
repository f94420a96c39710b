import type { QuestionRepository } from "../../../persistence/question.repository.js";
import type { QuestionResponse } from "../../../persistence/schemas.js";
import type { UserRepository } from "../../../persistence/user.repository.js";
import { formatDateTime, questionTitle, typeLabel } from "../../questions/question.format.js";
import { isQuestionActive } from "../../questions/question.status.js";
import type { Command } from "../command.types.js";
import { parseQuestionId } from "./lookup.js";

export interface AnswersCommandDeps {
  users: Pick<UserRepository, "getByChatId">;
  questions: Pick<QuestionRepository, "getQuestion" | "getOptions" | "getResponses">;
  commandPrefix: string;
  clock?: () => number;
}

function scoreLine(response: QuestionResponse): string {
  if (!response.graded || response.score === null) return "   ⏳ Pending grading";
  const score = Math.round(response.score);
  const emoji = score === 100 ? "🎉" : score >= 50 ? "📊" : "📉";
  return `   ${emoji} Score: ${score}/100`;
}

/**
 * !answers <id> - the sender's submissions to a question. Scores stay hidden
 * while the question is still open.
 */
export function createAnswersCommand(deps: AnswersCommandDeps): Command {
  const usage = `${deps.commandPrefix}answers <question id>`;
  const clock = deps.clock ?? (() => Date.now());

  return {
    name: "answers",
    usage,
    description: "Shows your answers to a question.",
    async run(invocation) {
      const [rawId] = invocation.args;
      if (rawId === undefined) {
        await invocation.reply(`⚠️ Usage: ${usage}`);
        return;
      }

      const questionId = parseQuestionId(rawId);
      if (questionId === null) {
        await invocation.reply("❌ The question id must be a number.");
        return;
      }

      const user = await deps.users.getByChatId(invocation.sender.id);
      if (!user) {
        await invocation.reply("❌ You are not registered in the directory.");
        return;
      }

      const question = await deps.questions.getQuestion(questionId);
      if (!question) {
        await invocation.reply(`❌ Question #${questionId} was not found.`);
        return;
      }

      const title = questionTitle(question);
      const responses = await deps.questions.getResponses(questionId, user.id);
      if (responses.length === 0) {
        await invocation.reply(`ℹ️ You have no answers to question #${questionId} (${title}).`);
        return;
      }

      const active = isQuestionActive(question, clock());
      const options = await deps.questions.getOptions(questionId);
      const optionText = new Map(options.map((option) => [option.key, option.text]));
      const latest = responses.at(-1)?.version;

      const lines = [
        `📋 Your answers to: #${questionId} │ ${title}`,
        `   Type: ${typeLabel(question.qtype)}`,
      ];
      if (question.allowMultipleSubmissions) lines.push("   🔁 Multiple submissions");
      if (active) lines.push("   🟢 Question active (scores hidden)");
      lines.push("─".repeat(35));

      for (const response of responses) {
        const isLatest = question.allowMultipleSubmissions && response.version === latest;
        lines.push("", `🔄 Attempt #${response.version}${isLatest ? " (✓ Latest)" : ""}`);
        lines.push(`   📅 Submitted: ${formatDateTime(response.submittedAt)}`);
        if (response.late) lines.push("   ⚠️ Late answer");
        if (response.answerText) lines.push(`   📝 Answer: ${response.answerText}`);
        if (response.optionKeys.length > 0) {
          lines.push("   📝 Selected options:");
          for (const key of response.optionKeys) {
            lines.push(`      • ${key}) ${optionText.get(key) ?? ""}`);
          }
        }
        if (!active) {
          lines.push(scoreLine(response));
          if (response.graded) {
            lines.push(
              response.graderId
                ? `   👤 Graded by: ${response.graderId}`
                : "   🤖 Graded by: automatic",
            );
          }
          if (response.feedback) lines.push(`   💬 Feedback: ${response.feedback}`);
        }
      }
      lines.push("", "━".repeat(35));

      await invocation.reply(lines.join("\n"));
    },
  };
}

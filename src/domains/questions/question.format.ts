/**
 * Texts shared by the question commands and the announcer
 */
import type {
  QuestionOption,
  QuestionRecord,
  QuestionType,
} from "../../persistence/schemas.js";

const TYPE_LABELS: Record<QuestionType, string> = {
  multiple_choice: "📝 Multiple choice",
  poll: "📊 Poll",
  true_false: "✅ True/False",
  short_answer: "✍️ Short answer",
  numeric: "🔢 Numeric",
  essay: "📄 Essay",
};

const OPTION_TYPES = new Set<QuestionType>(["multiple_choice", "true_false", "poll"]);

export function typeLabel(qtype: QuestionType): string {
  return TYPE_LABELS[qtype];
}

export function isOptionType(qtype: QuestionType): boolean {
  return OPTION_TYPES.has(qtype);
}

export function questionTitle(question: Pick<QuestionRecord, "id" | "title">): string {
  return question.title ?? `Question #${question.id}`;
}

/** e.g. `📝 Multiple choice · ✅ Multiple selection` */
export function questionFlags(question: QuestionRecord): string {
  const flags = [typeLabel(question.qtype)];
  if (question.allowMultipleSelections) flags.push("✅ Multiple selection");
  if (question.allowMultipleSubmissions) flags.push("🔁 Multiple submissions");
  if (question.closeOnFirstCorrect) flags.push("🏁 Closes on first correct answer");
  if (question.allowLate) flags.push("⏰ Late answers allowed");
  return flags.join(" · ");
}

/** Local `YYYY-MM-DD HH:MM` */
export function formatDateTime(timestamp: number): string {
  const date = new Date(timestamp);
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}`
  );
}

export function answerHint(question: QuestionRecord, commandPrefix: string): string {
  const command = `${commandPrefix}answer ${question.id}`;
  if (question.allowMultipleSelections) {
    return `Answer with \`${command} <option 1> [<option 2> ...]\` (keys separated by spaces).`;
  }
  if (isOptionType(question.qtype)) {
    return `Answer with \`${command} <option>\`.`;
  }
  return `Answer with \`${command} <answer>\`.`;
}

export function announcementMessage(
  question: QuestionRecord,
  options: QuestionOption[],
  commandPrefix: string,
): string {
  const lines = [
    "📣 New active question!",
    "",
    `🔹 #${question.id} │ ${questionTitle(question)}`,
    `   ${questionFlags(question)}`,
  ];
  if (question.endAt !== undefined) {
    lines.push(`   ⏰ Closes: ${formatDateTime(question.endAt)}`);
  }
  if (question.body.trim()) {
    lines.push("", question.body.trim());
  }
  if (options.length > 0) {
    lines.push("", ...options.map((option) => `  ${option.key}) ${option.text}`));
  }
  lines.push("", answerHint(question, commandPrefix));
  return lines.join("\n");
}

/**
 * Question lifecycle
 *
 * A question opens manually or by schedule. After its end time it is "late"
 * when late answers are allowed and "ended" otherwise. A question closed by
 * its first correct answer stays closed.
 */
import type { QuestionRecord } from "../../persistence/schemas.js";

export type QuestionStatus = "active" | "late" | "ended" | "inactive" | "closed";

type Schedule = Pick<
  QuestionRecord,
  "manualActive" | "closeTriggered" | "startAt" | "endAt" | "allowLate"
>;

export function questionStatus(question: Schedule, now: number): QuestionStatus {
  if (question.closeTriggered) return "closed";
  if (question.manualActive) return "active";

  const { startAt, endAt } = question;
  if (startAt === undefined && endAt === undefined) return "inactive";
  if (startAt !== undefined && startAt > now) return "inactive";
  if (endAt === undefined || endAt >= now) return "active";
  return question.allowLate ? "late" : "ended";
}

export function isQuestionActive(question: Schedule, now: number): boolean {
  return questionStatus(question, now) === "active";
}

/**
 * User-facing texts posted by the tutoring queue
 */
import { localpart } from "../../shared/identity.js";
import type { TranscriptLine } from "./tutoring.types.js";

export const QueueMessages = {
  NOT_AT_FRONT: "You are not at the front of the queue or have no active offer.",
  ACCESS_CONFIRMED: "Access confirmed. Enjoy your tutoring session!",
  NO_QUEUE: "There is no queue for this room.",
  OFFER_LAPSED: "⏱️ Time is up. Moving on to the next person in the queue.",
} as const;

export function offerMessage(
  userId: string,
  teacherLabel: string,
  teacherLocalpart: string,
  windowSeconds: number,
  commandPrefix: string,
): string {
  return (
    `👋 ${localpart(userId)}, the tutoring room of ${teacherLabel} is free. ` +
    `Reply with \`${commandPrefix}tutoring confirm ${teacherLocalpart}\` ` +
    `within ${windowSeconds} seconds to keep your turn.`
  );
}

function clock(timestamp: number): string {
  const date = new Date(timestamp);
  const hours = String(date.getHours()).padStart(2, "0");
  const minutes = String(date.getMinutes()).padStart(2, "0");
  return `${hours}:${minutes}`;
}

/** Session log sent to the student once the room is released */
export function transcriptMessage(teacherLocalpart: string, lines: TranscriptLine[]): string {
  const body = lines.map(
    (line) => `[${clock(line.sentAt)}] ${localpart(line.senderId)}: ${line.text}`,
  );
  return [`📝 Transcript of your tutoring session with ${teacherLocalpart}:`, ...body].join("\n");
}

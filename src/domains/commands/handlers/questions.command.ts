/**
 * !questions - active questions of the sender's courses and groups
 */
import type { LmsClient } from "../../../integrations/lms/lmsClient.js";
import type { QuestionRepository } from "../../../persistence/question.repository.js";
import type { RoomRepository } from "../../../persistence/room.repository.js";
import type { UserRepository } from "../../../persistence/user.repository.js";
import type { QuestionRecord, RoomRecord } from "../../../persistence/schemas.js";
import {
  formatDateTime,
  questionFlags,
  questionTitle,
} from "../../questions/question.format.js";
import { isQuestionActive } from "../../questions/question.status.js";
import type { Command } from "../command.types.js";
import { requireLmsUser } from "./lookup.js";

export interface QuestionsCommandDeps {
  lms: Pick<LmsClient, "fetchUserCourses" | "fetchUserGroupsInCourse">;
  users: Pick<UserRepository, "getByChatId">;
  rooms: Pick<RoomRepository, "getRooms">;
  questions: Pick<QuestionRepository, "listQuestions" | "getOptions">;
  commandPrefix: string;
  clock?: () => number;
}

interface Listed {
  question: QuestionRecord;
  room: RoomRecord;
}

export function createQuestionsCommand(deps: QuestionsCommandDeps): Command {
  const clock = deps.clock ?? (() => Date.now());

  return {
    name: "questions",
    usage: `${deps.commandPrefix}questions`,
    description: "Shows the active questions of your courses.",
    async run(invocation) {
      const user = await requireLmsUser(invocation, deps.users);
      if (!user) return;

      const courses = await deps.lms.fetchUserCourses(user.lmsId);
      if (courses.length === 0) {
        await invocation.reply("❌ No courses were found in the LMS for your user.");
        return;
      }
      const courseIds = new Set(courses.map((course) => course.id));

      const now = clock();
      const active = (await deps.questions.listQuestions()).filter((question) =>
        isQuestionActive(question, now),
      );
      const roomIds = [
        ...new Set(active.flatMap((question) => (question.roomId ? [question.roomId] : []))),
      ];
      const rooms = new Map(
        (await deps.rooms.getRooms(roomIds)).map((room) => [room.roomId, room]),
      );

      const inCourses: Listed[] = [];
      for (const question of active) {
        const room = question.roomId ? rooms.get(question.roomId) : undefined;
        const courseId = room?.lmsCourseId;
        if (room && courseId !== undefined && courseIds.has(courseId)) {
          inCourses.push({ question, room });
        }
      }
      if (inCourses.length === 0) {
        await invocation.reply("ℹ️ There are no active questions in your courses.");
        return;
      }

      // Group-restricted rooms need the sender's groups, fetched once per course
      const groupsByCourse = new Map<number, Set<string>>();
      const visible: Listed[] = [];
      for (const entry of inCourses) {
        const { lmsGroup, lmsCourseId } = entry.room;
        if (lmsGroup !== undefined && lmsCourseId !== undefined) {
          let groups = groupsByCourse.get(lmsCourseId);
          if (!groups) {
            groups = new Set(await deps.lms.fetchUserGroupsInCourse(lmsCourseId, user.lmsId));
            groupsByCourse.set(lmsCourseId, groups);
          }
          if (!groups.has(lmsGroup)) continue;
        }
        visible.push(entry);
      }
      if (visible.length === 0) {
        await invocation.reply("ℹ️ There are no active questions in your courses or groups.");
        return;
      }

      const byRoom = new Map<string, QuestionRecord[]>();
      for (const { question, room } of visible) {
        const list = byRoom.get(room.shortcode) ?? [];
        list.push(question);
        byRoom.set(room.shortcode, list);
      }

      const lines = [`📋 Active questions (${visible.length})`];
      for (const [shortcode, questions] of byRoom) {
        lines.push("", "─".repeat(25), `🏠 ${shortcode}`, "─".repeat(25));
        for (const question of questions) {
          lines.push("", `  🔹 #${question.id} │ ${questionTitle(question)}`);
          lines.push(`     ${questionFlags(question)}`);
          if (question.endAt !== undefined) {
            lines.push(`     ⏰ Closes: ${formatDateTime(question.endAt)}`);
          }
          const body = question.body.trim();
          if (body) {
            lines.push("", "     📄 Question:");
            lines.push(...body.split("\n").map((line) => `     ${line}`));
          }
          const options = await deps.questions.getOptions(question.id);
          if (options.length > 0) {
            lines.push("", ...options.map((option) => `       ${option.key}) ${option.text}`));
          }
        }
      }
      lines.push(
        "",
        "━".repeat(30),
        `💡 Answer with ${deps.commandPrefix}answer <ID> <answer>|<option 1> [<option 2> ...].`,
      );

      await invocation.reply(lines.join("\n"));
    },
  };
}

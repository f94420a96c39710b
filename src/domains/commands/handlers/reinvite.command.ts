/**
 * !reinvite - invite the sender back into the general rooms of their courses
 */
import type { ChatGateway } from "../../../gateway/chat.gateway.js";
import type { LmsClient } from "../../../integrations/lms/lmsClient.js";
import { courseName } from "../../../integrations/lms/types.js";
import type { RoomRepository } from "../../../persistence/room.repository.js";
import type { UserRepository } from "../../../persistence/user.repository.js";
import type { Command } from "../command.types.js";
import { requireLmsUser } from "./lookup.js";

const TEACHERS_ROOM_SUFFIX = "_teachers";
const MAX_REPORTED_ERRORS = 3;

export interface ReinviteCommandDeps {
  gateway: Pick<ChatGateway, "inviteUser" | "isMember">;
  lms: Pick<LmsClient, "fetchUserCourses">;
  users: Pick<UserRepository, "getByChatId">;
  rooms: Pick<RoomRepository, "getGeneralRoomsForCourses">;
  botUserId: string;
  commandPrefix: string;
}

export function createReinviteCommand(deps: ReinviteCommandDeps): Command {
  return {
    name: "reinvite",
    usage: `${deps.commandPrefix}reinvite`,
    description: "Invites you to the general rooms of your LMS courses.",
    async run(invocation) {
      const user = await requireLmsUser(invocation, deps.users);
      if (!user) return;

      const courses = await deps.lms.fetchUserCourses(user.lmsId);
      if (courses.length === 0) {
        await invocation.reply("❌ No courses were found in the LMS for your user.");
        return;
      }

      const courseNames = new Map(courses.map((course) => [course.id, courseName(course)]));

      let rooms = await deps.rooms.getGeneralRoomsForCourses([...courseNames.keys()]);
      if (rooms.length === 0) {
        await invocation.reply("ℹ️ There are no general rooms registered for your LMS courses.");
        return;
      }

      if (!user.isTeacher) {
        rooms = rooms.filter((room) => !room.shortcode.endsWith(TEACHERS_ROOM_SUFFIX));
        if (rooms.length === 0) {
          await invocation.reply(
            "ℹ️ There are no general (non-teacher) rooms registered for your courses.",
          );
          return;
        }
      }

      let invited = 0;
      let alreadyIn = 0;
      const errors: string[] = [];
      const roomLines: string[] = [];

      for (const room of rooms) {
        const label =
          room.lmsCourseId !== undefined
            ? (courseNames.get(room.lmsCourseId) ?? `Course ${room.lmsCourseId}`)
            : room.shortcode;
        roomLines.push(`• ${label}: ${room.roomId}`);

        if (await deps.gateway.isMember(room.roomId, invocation.sender.id)) {
          alreadyIn += 1;
          continue;
        }

        const result = await deps.gateway.inviteUser(
          room.roomId,
          invocation.sender.id,
          deps.botUserId,
        );
        if (result.ok) {
          invited += 1;
        } else {
          errors.push(`${room.shortcode}: ${result.error}`);
        }
      }

      const summary: string[] = [];
      if (invited > 0) summary.push(`✅ Sent ${invited} new invite(s).`);
      if (alreadyIn > 0) summary.push(`ℹ️ You were already in ${alreadyIn} room(s).`);
      if (errors.length > 0) {
        summary.push(
          `⚠️ Errors in ${errors.length} room(s): ${errors.slice(0, MAX_REPORTED_ERRORS).join("; ")}`,
        );
      }

      await invocation.reply(
        `📋 General rooms of your courses:\n${roomLines.join("\n")}\n\n${summary.join("\n")}`,
      );
    },
  };
}

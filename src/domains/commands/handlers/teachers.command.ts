/**
 * !teachers - the sender's LMS courses with their teachers, rooms and
 * tutoring hours
 */
import type { LmsClient } from "../../../integrations/lms/lmsClient.js";
import { courseName, participantName } from "../../../integrations/lms/types.js";
import type { AvailabilityRepository } from "../../../persistence/availability.repository.js";
import type { RoomRepository } from "../../../persistence/room.repository.js";
import type { UserRepository } from "../../../persistence/user.repository.js";
import type { UserRecord } from "../../../persistence/schemas.js";
import { localpart } from "../../../shared/identity.js";
import { formatAvailabilityWindows } from "../../tutoring/availability.js";
import type { Command } from "../command.types.js";
import { requireLmsUser } from "./lookup.js";

export interface TeachersCommandDeps {
  lms: Pick<LmsClient, "fetchUserCourses" | "fetchCourseTeachers">;
  users: Pick<UserRepository, "getByChatId" | "getByLmsId">;
  rooms: Pick<RoomRepository, "getActiveRoomsForTeacherAndCourse">;
  availability: Pick<AvailabilityRepository, "getWindows">;
  commandPrefix: string;
}

export function createTeachersCommand(deps: TeachersCommandDeps): Command {
  return {
    name: "teachers",
    usage: `${deps.commandPrefix}teachers`,
    description: "Lists your teachers with their rooms and tutoring hours.",
    async run(invocation) {
      const user = await requireLmsUser(invocation, deps.users);
      if (!user) return;

      const courses = await deps.lms.fetchUserCourses(user.lmsId);
      if (courses.length === 0) {
        await invocation.reply("❌ No courses were found in the LMS for your user.");
        return;
      }

      // Caches live for one invocation; a teacher often spans several courses
      const teacherCache = new Map<number, UserRecord | null>();
      const availabilityCache = new Map<string, string>();

      const lines: string[] = [];
      for (const course of courses) {
        lines.push(`📚 ${courseName(course)}`);

        const teachers = await deps.lms.fetchCourseTeachers(course.id);
        if (teachers.length === 0) {
          lines.push("    • No teachers available.", "");
          continue;
        }

        const seen = new Set<number>();
        for (const participant of teachers) {
          if (seen.has(participant.id)) continue;
          seen.add(participant.id);

          lines.push(`  • ${participantName(participant)}`);

          let record = teacherCache.get(participant.id);
          if (record === undefined) {
            record = await deps.users.getByLmsId(participant.id);
            teacherCache.set(participant.id, record);
          }

          if (!record) {
            lines.push("      ▹ Rooms: No active rooms linked.");
            lines.push("      ▹ Tutoring: Not registered in chat.");
            continue;
          }

          const rooms = await deps.rooms.getActiveRoomsForTeacherAndCourse(
            course.id,
            record.id,
          );
          const roomNames = rooms.map((room) => room.shortcode).join(", ");
          lines.push(`      ▹ Rooms: ${roomNames || "No active rooms linked."}`);

          let hours = availabilityCache.get(record.id);
          if (hours === undefined) {
            hours = formatAvailabilityWindows(await deps.availability.getWindows(record.id));
            availabilityCache.set(record.id, hours);
          }

          lines.push(`      ▹ Tutoring: ${localpart(record.chatId)}`);
          for (const slot of hours.split("\n")) {
            lines.push(`               -${slot}`);
          }
        }
        lines.push("");
      }

      if (lines[lines.length - 1] === "") lines.pop();
      await invocation.reply(["📋 Enrolled teachers:", ...lines].join("\n"));
    },
  };
}

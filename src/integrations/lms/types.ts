/**
 * Moodle web-service payloads
 *
 * Only the fields the bot reads are declared; everything else passes through.
 */
import { z } from "zod";

const lmsId = z.coerce.number().int();

export const lmsCourseSchema = z
  .object({
    id: lmsId,
    shortname: z.string().optional(),
    fullname: z.string().optional(),
    displayname: z.string().optional(),
  })
  .passthrough();

export type LmsCourse = z.infer<typeof lmsCourseSchema>;

export const lmsRoleSchema = z
  .object({
    shortname: z.string().optional(),
  })
  .passthrough();

export const lmsParticipantSchema = z
  .object({
    id: lmsId,
    fullname: z.string().optional(),
    firstname: z.string().optional(),
    lastname: z.string().optional(),
    roles: z.array(lmsRoleSchema).optional(),
  })
  .passthrough();

export type LmsParticipant = z.infer<typeof lmsParticipantSchema>;

export const lmsUserGroupsSchema = z
  .object({
    groups: z.array(
      z
        .object({
          id: lmsId,
          name: z.string().optional(),
        })
        .passthrough(),
    ),
  })
  .passthrough();

/** Moodle reports failures as a 200 with this body */
export const lmsExceptionSchema = z.object({
  exception: z.string(),
  errorcode: z.string().optional(),
  message: z.string().optional(),
});

export const TEACHER_ROLE_SHORTNAMES = new Set(["teacher", "editingteacher"]);

export function courseName(course: LmsCourse): string {
  return (
    course.fullname ||
    course.displayname ||
    course.shortname ||
    `Course ${course.id}`
  );
}

export function participantName(participant: LmsParticipant): string {
  const joined = [participant.firstname, participant.lastname]
    .filter(Boolean)
    .join(" ");
  return participant.fullname || joined || `Teacher ${participant.id}`;
}

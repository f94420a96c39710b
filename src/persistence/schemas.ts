/**
 * Record shapes stored in the Redis directory.
 * Hash fields arrive as strings, so each schema coerces them.
 */
import { z } from "zod";
import { WEEKDAYS } from "../domains/tutoring/availability.js";

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.length > 0 ? v : undefined));

const optionalInt = z
  .string()
  .optional()
  .transform((v) => {
    if (!v) return undefined;
    const n = Number(v);
    return Number.isInteger(n) ? n : undefined;
  });

const flag = z
  .string()
  .optional()
  .transform((v) => v === "true" || v === "1");

export const userRecordSchema = z.object({
  id: z.string().min(1),
  chatId: z.string().min(1),
  lmsId: optionalInt,
  isTeacher: flag,
  displayName: optionalString,
});

export type UserRecord = z.infer<typeof userRecordSchema>;

export const roomRecordSchema = z.object({
  roomId: z.string().min(1),
  shortcode: z.string().min(1),
  teacherId: optionalString,
  lmsCourseId: optionalInt,
  /** LMS group id or name; members of other groups do not see its questions */
  lmsGroup: optionalString,
  active: flag,
  createdAt: optionalInt,
});

export type RoomRecord = z.infer<typeof roomRecordSchema>;

const timeSchema = z.string().regex(/^\d{1,2}:\d{2}(:\d{2})?$/);

export const availabilityWindowsSchema = z.array(
  z.object({
    dayOfWeek: z.enum(WEEKDAYS),
    startTime: timeSchema,
    endTime: timeSchema,
  }),
);

export const invitePayloadSchema = z.object({
  invitedBy: z.string(),
  createdAt: z.number(),
});

export type RoomInvite = z.infer<typeof invitePayloadSchema>;

export const QUESTION_TYPES = [
  "multiple_choice",
  "poll",
  "true_false",
  "short_answer",
  "numeric",
  "essay",
] as const;

export type QuestionType = (typeof QUESTION_TYPES)[number];

/** Timestamps are epoch milliseconds */
export const questionRecordSchema = z.object({
  id: z.coerce.number().int().positive(),
  teacherId: optionalString,
  roomId: optionalString,
  title: optionalString,
  body: z.string().default(""),
  qtype: z.enum(QUESTION_TYPES),
  expectedAnswer: optionalString,
  startAt: optionalInt,
  endAt: optionalInt,
  manualActive: flag,
  allowMultipleSubmissions: flag,
  allowMultipleSelections: flag,
  allowLate: flag,
  closeOnFirstCorrect: flag,
  closeTriggered: flag,
  createdAt: optionalInt,
});

export type QuestionRecord = z.infer<typeof questionRecordSchema>;

export const questionOptionsSchema = z.array(
  z.object({
    key: z.string().min(1),
    text: z.string().default(""),
    isCorrect: z.boolean().default(false),
    position: z.number().int().default(0),
  }),
);

export type QuestionOption = z.infer<typeof questionOptionsSchema>[number];

/** One submission; its version is its position in the user's list */
export const storedResponseSchema = z.object({
  answerText: z.string().optional(),
  optionKeys: z.array(z.string()).default([]),
  score: z.number().nullable(),
  graded: z.boolean(),
  late: z.boolean(),
  submittedAt: z.number(),
  graderId: z.string().optional(),
  feedback: z.string().optional(),
});

export type StoredResponse = z.infer<typeof storedResponseSchema>;

export type QuestionResponse = StoredResponse & { version: number };

/**
 * LMS Client - Moodle REST web services
 *
 * Lookups never throw: transport errors, HTTP errors and unexpected payloads
 * are logged and produce an empty list.
 */
import { z } from "zod";
import type { Logger } from "../../infrastructure/logger.js";
import { metrics } from "../../infrastructure/metrics.js";
import {
  TEACHER_ROLE_SHORTNAMES,
  lmsCourseSchema,
  lmsExceptionSchema,
  lmsParticipantSchema,
  lmsUserGroupsSchema,
} from "./types.js";
import type { LmsCourse, LmsParticipant } from "./types.js";

export interface LmsClientOptions {
  baseUrl: string;
  token: string;
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 20_000;

export class LmsClient {
  private readonly endpoint: string;
  private readonly token: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly logger: Logger,
    options: LmsClientOptions,
  ) {
    this.endpoint = `${options.baseUrl.replace(/\/+$/, "")}/webservice/rest/server.php`;
    this.token = options.token;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async fetchUserCourses(lmsUserId: number): Promise<LmsCourse[]> {
    const courses = await this.call(
      "core_enrol_get_users_courses",
      { userid: String(lmsUserId) },
      z.array(lmsCourseSchema),
    );
    return courses ?? [];
  }

  async fetchCourseParticipants(courseId: number): Promise<LmsParticipant[]> {
    const participants = await this.call(
      "core_enrol_get_enrolled_users",
      { courseid: String(courseId) },
      z.array(lmsParticipantSchema),
    );
    return participants ?? [];
  }

  /**
   * Groups of a user in one course, as ids and names
   * (a room's group may be stored either way)
   */
  async fetchUserGroupsInCourse(courseId: number, lmsUserId: number): Promise<string[]> {
    const result = await this.call(
      "core_group_get_course_user_groups",
      { courseid: String(courseId), userid: String(lmsUserId) },
      lmsUserGroupsSchema,
    );
    if (!result) return [];

    return result.groups.flatMap((group) =>
      group.name ? [String(group.id), group.name] : [String(group.id)],
    );
  }

  async fetchCourseTeachers(courseId: number): Promise<LmsParticipant[]> {
    const participants = await this.fetchCourseParticipants(courseId);
    return participants.filter(isTeacher);
  }

  // ─────────────────────────────────────────────────────────────────
  // Private Helpers
  // ─────────────────────────────────────────────────────────────────

  private async call<T extends z.ZodTypeAny>(
    wsfunction: string,
    params: Record<string, string>,
    schema: T,
  ): Promise<z.infer<T> | null> {
    const url = new URL(this.endpoint);
    url.search = new URLSearchParams({
      wstoken: this.token,
      wsfunction,
      moodlewsrestformat: "json",
      ...params,
    }).toString();

    const endTimer = metrics.lmsApiLatency.startTimer({ function: wsfunction });
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(url, {
        method: "GET",
        headers: { Accept: "application/json" },
        signal: controller.signal,
      });

      if (!response.ok) {
        this.logger.warn(
          { wsfunction, status: response.status },
          "LMS request failed",
        );
        metrics.lmsApiCalls.inc({ function: wsfunction, status: "error" });
        return null;
      }

      const body: unknown = await response.json();

      const exception = lmsExceptionSchema.safeParse(body);
      if (exception.success) {
        this.logger.warn(
          { wsfunction, errorcode: exception.data.errorcode, message: exception.data.message },
          "LMS returned an exception",
        );
        metrics.lmsApiCalls.inc({ function: wsfunction, status: "error" });
        return null;
      }

      const parsed = schema.safeParse(body);
      if (!parsed.success) {
        this.logger.warn(
          { wsfunction, errors: parsed.error.format() },
          "Unexpected LMS payload",
        );
        metrics.lmsApiCalls.inc({ function: wsfunction, status: "invalid" });
        return null;
      }

      metrics.lmsApiCalls.inc({ function: wsfunction, status: "success" });
      return parsed.data;
    } catch (err) {
      this.logger.warn({ err, wsfunction }, "Error querying LMS");
      metrics.lmsApiCalls.inc({ function: wsfunction, status: "error" });
      return null;
    } finally {
      clearTimeout(timeoutId);
      endTimer();
    }
  }
}

function isTeacher(participant: LmsParticipant): boolean {
  return (participant.roles ?? []).some((role) =>
    TEACHER_ROLE_SHORTNAMES.has((role.shortname ?? "").toLowerCase()),
  );
}

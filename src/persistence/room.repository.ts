/**
 * Room Repository - registered chat rooms (course rooms and tutoring rooms)
 *
 * A tutoring room is an active room owned by a teacher with no LMS course.
 */
import type { Redis } from "ioredis";
import type { Logger } from "../infrastructure/logger.js";
import { roomRecordSchema } from "./schemas.js";
import type { RoomRecord } from "./schemas.js";

// Redis key patterns
const ROOM_KEY = (roomId: string) => `directory:room:${roomId}`;
const COURSE_ROOMS_KEY = (courseId: number) => `directory:course:${courseId}:rooms`;
const TUTORING_ROOM_KEY = (teacherId: string) =>
  `directory:teacher:${teacherId}:tutoring-room`;

export class RoomRepository {
  constructor(
    private readonly redis: Redis,
    private readonly logger: Logger,
  ) {}

  async getRoom(roomId: string): Promise<RoomRecord | null> {
    try {
      const raw = await this.redis.hgetall(ROOM_KEY(roomId));
      return this.parse(roomId, raw);
    } catch (err) {
      this.logger.error({ err, roomId }, "Failed to load room");
      return null;
    }
  }

  async getTeacherTutoringRoom(teacherId: string): Promise<RoomRecord | null> {
    try {
      const roomId = await this.redis.get(TUTORING_ROOM_KEY(teacherId));
      if (!roomId) return null;

      const room = await this.getRoom(roomId);
      if (!room || !room.active || room.lmsCourseId !== undefined) {
        return null;
      }
      return room;
    } catch (err) {
      this.logger.error({ err, teacherId }, "Failed to resolve tutoring room");
      return null;
    }
  }

  async getActiveRoomsForTeacherAndCourse(
    courseId: number,
    teacherId: string,
  ): Promise<RoomRecord[]> {
    const rooms = await this.getCourseRooms([courseId]);
    return rooms
      .filter((room) => room.active && room.teacherId === teacherId)
      .sort((a, b) => a.shortcode.localeCompare(b.shortcode));
  }

  /**
   * Active course rooms without an owning teacher (the course room and its
   * `_teachers` companion)
   */
  async getGeneralRoomsForCourses(courseIds: number[]): Promise<RoomRecord[]> {
    const rooms = await this.getCourseRooms(courseIds);
    return rooms
      .filter((room) => room.active && room.teacherId === undefined)
      .sort(
        (a, b) =>
          (a.lmsCourseId ?? 0) - (b.lmsCourseId ?? 0) ||
          a.shortcode.localeCompare(b.shortcode),
      );
  }

  /**
   * Load several rooms in one pipeline; unknown and malformed rooms are skipped
   */
  async getRooms(roomIds: string[]): Promise<RoomRecord[]> {
    if (roomIds.length === 0) return [];

    try {
      const pipeline = this.redis.pipeline();
      for (const roomId of roomIds) {
        pipeline.hgetall(ROOM_KEY(roomId));
      }
      const results = (await pipeline.exec()) ?? [];

      const rooms: RoomRecord[] = [];
      results.forEach(([err, raw], index) => {
        const roomId = roomIds[index];
        if (err || roomId === undefined) return;
        const room = this.parse(roomId, raw);
        if (room) rooms.push(room);
      });
      return rooms;
    } catch (err) {
      this.logger.error({ err, roomIds }, "Failed to load rooms");
      return [];
    }
  }

  private async getCourseRooms(courseIds: number[]): Promise<RoomRecord[]> {
    if (courseIds.length === 0) return [];

    try {
      const roomIdSets = await Promise.all(
        courseIds.map((courseId) => this.redis.smembers(COURSE_ROOMS_KEY(courseId))),
      );
      return await this.getRooms([...new Set(roomIdSets.flat())]);
    } catch (err) {
      this.logger.error({ err, courseIds }, "Failed to load course rooms");
      return [];
    }
  }

  private parse(roomId: string, raw: unknown): RoomRecord | null {
    if (typeof raw !== "object" || raw === null || Object.keys(raw).length === 0) {
      return null;
    }
    const parsed = roomRecordSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn(
        { roomId, errors: parsed.error.format() },
        "Malformed room record",
      );
      return null;
    }
    return parsed.data;
  }
}

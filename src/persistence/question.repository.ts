/**
 * Question Repository - in-class questions, their options and student answers
 *
 * Questions are authored outside the bot; it reads them and appends answers.
 */
import type { Redis } from "ioredis";
import type { Logger } from "../infrastructure/logger.js";
import {
  questionOptionsSchema,
  questionRecordSchema,
  storedResponseSchema,
} from "./schemas.js";
import type {
  QuestionOption,
  QuestionRecord,
  QuestionResponse,
  StoredResponse,
} from "./schemas.js";

// Redis key patterns
const QUESTIONS_KEY = "directory:questions";
const QUESTION_KEY = (questionId: number) => `directory:question:${questionId}`;
const OPTIONS_KEY = (questionId: number) => `directory:question:${questionId}:options`;
const RESPONSES_KEY = (questionId: number, userId: string) =>
  `question:${questionId}:responses:${userId}`;

export class QuestionRepository {
  constructor(
    private readonly redis: Redis,
    private readonly logger: Logger,
  ) {}

  async getQuestion(questionId: number): Promise<QuestionRecord | null> {
    try {
      const raw = await this.redis.hgetall(QUESTION_KEY(questionId));
      return this.parse(questionId, raw);
    } catch (err) {
      this.logger.error({ err, questionId }, "Failed to load question");
      return null;
    }
  }

  /**
   * Every registered question, ordered by id
   */
  async listQuestions(): Promise<QuestionRecord[]> {
    try {
      const members = await this.redis.smembers(QUESTIONS_KEY);
      const ids = members.map(Number).filter((id) => Number.isInteger(id) && id > 0);
      if (ids.length === 0) return [];

      const pipeline = this.redis.pipeline();
      for (const id of ids) {
        pipeline.hgetall(QUESTION_KEY(id));
      }
      const results = (await pipeline.exec()) ?? [];

      const questions: QuestionRecord[] = [];
      results.forEach(([err, raw], index) => {
        const id = ids[index];
        if (err || id === undefined) return;
        const question = this.parse(id, raw);
        if (question) questions.push(question);
      });
      return questions.sort((a, b) => a.id - b.id);
    } catch (err) {
      this.logger.error({ err }, "Failed to list questions");
      return [];
    }
  }

  async getOptions(questionId: number): Promise<QuestionOption[]> {
    let raw: string | null;
    try {
      raw = await this.redis.get(OPTIONS_KEY(questionId));
    } catch (err) {
      this.logger.error({ err, questionId }, "Failed to load question options");
      return [];
    }
    if (!raw) return [];

    const parsed = questionOptionsSchema.safeParse(decode(raw));
    if (!parsed.success) {
      this.logger.warn(
        { questionId, errors: parsed.error.format() },
        "Malformed question options",
      );
      return [];
    }
    return parsed.data.sort(
      (a, b) => a.position - b.position || a.key.localeCompare(b.key),
    );
  }

  async getResponses(questionId: number, userId: string): Promise<QuestionResponse[]> {
    let rows: string[];
    try {
      rows = await this.redis.lrange(RESPONSES_KEY(questionId, userId), 0, -1);
    } catch (err) {
      this.logger.error({ err, questionId, userId }, "Failed to load responses");
      return [];
    }

    const responses: QuestionResponse[] = [];
    rows.forEach((row, index) => {
      const parsed = storedResponseSchema.safeParse(decode(row));
      if (!parsed.success) {
        this.logger.warn({ questionId, userId, index }, "Malformed question response");
        return;
      }
      responses.push({ ...parsed.data, version: index + 1 });
    });
    return responses;
  }

  /**
   * Append a submission and return its version, or null when it was not stored
   */
  async addResponse(
    questionId: number,
    userId: string,
    response: StoredResponse,
  ): Promise<number | null> {
    try {
      return await this.redis.rpush(
        RESPONSES_KEY(questionId, userId),
        JSON.stringify(response),
      );
    } catch (err) {
      this.logger.error({ err, questionId, userId }, "Failed to store response");
      return null;
    }
  }

  async closeQuestion(questionId: number): Promise<void> {
    try {
      await this.redis.hset(QUESTION_KEY(questionId), "closeTriggered", "true");
      this.logger.info({ questionId }, "Question closed after first correct answer");
    } catch (err) {
      this.logger.error({ err, questionId }, "Failed to close question");
    }
  }

  private parse(questionId: number, raw: unknown): QuestionRecord | null {
    if (typeof raw !== "object" || raw === null || Object.keys(raw).length === 0) {
      return null;
    }
    const parsed = questionRecordSchema.safeParse({ ...raw, id: questionId });
    if (!parsed.success) {
      this.logger.warn(
        { questionId, errors: parsed.error.format() },
        "Malformed question record",
      );
      return null;
    }
    return parsed.data;
  }
}

function decode(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

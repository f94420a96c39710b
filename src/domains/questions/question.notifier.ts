/**
 * Question Notifier
 * Background job that announces questions in their room once they become active
 */
import type { Logger } from "../../infrastructure/logger.js";
import { metrics } from "../../infrastructure/metrics.js";
import type { ChatGateway } from "../../gateway/chat.gateway.js";
import type { QuestionRepository } from "../../persistence/question.repository.js";
import type { QuestionRecord } from "../../persistence/schemas.js";
import { isQuestionActive } from "./question.status.js";
import { announcementMessage } from "./question.format.js";

export interface QuestionNotifierOptions {
  intervalMs: number;
  commandPrefix: string;
  now?: () => number;
}

export class QuestionNotifier {
  private timer: NodeJS.Timeout | null = null;
  private isRunning = false;
  /** Set once the questions active at startup have been recorded */
  private primed = false;
  private readonly announced = new Set<number>();
  private readonly now: () => number;

  constructor(
    private readonly questions: Pick<QuestionRepository, "listQuestions" | "getOptions">,
    private readonly gateway: Pick<ChatGateway, "sendText">,
    private readonly logger: Logger,
    private readonly options: QuestionNotifierOptions,
  ) {
    this.now = options.now ?? (() => Date.now());
  }

  /**
   * Start the background job. The first pass only records the questions
   * that are already active, so a restart does not repeat announcements.
   */
  start(): void {
    if (this.timer) {
      this.logger.warn("Question notifier already running");
      return;
    }

    this.timer = setInterval(() => void this.check(), this.options.intervalMs);
    void this.check();

    this.logger.info({ intervalMs: this.options.intervalMs }, "Question notifier started");
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger.info("Question notifier stopped");
    }
  }

  private async check(): Promise<void> {
    // Prevent concurrent runs
    if (this.isRunning) {
      return;
    }

    this.isRunning = true;

    try {
      const now = this.now();
      const active = (await this.questions.listQuestions()).filter((question) =>
        isQuestionActive(question, now),
      );

      if (!this.primed) {
        for (const question of active) this.announced.add(question.id);
        this.primed = true;
        this.logger.info({ alreadyActive: active.length }, "Question notifier primed");
        return;
      }

      for (const question of active) {
        if (this.announced.has(question.id)) continue;
        this.announced.add(question.id);
        if (question.roomId === undefined) continue;

        await this.announce(question, question.roomId);
      }
    } catch (err) {
      this.logger.error({ err }, "Question notifier error");
    } finally {
      this.isRunning = false;
    }
  }

  private async announce(question: QuestionRecord, roomId: string): Promise<void> {
    try {
      const options = await this.questions.getOptions(question.id);
      const result = await this.gateway.sendText(
        roomId,
        announcementMessage(question, options, this.options.commandPrefix),
      );
      if (result.ok) {
        metrics.questionAnnouncements.inc({ status: "sent" });
        this.logger.info({ questionId: question.id, roomId }, "Question announced");
        return;
      }
      this.logger.warn(
        { questionId: question.id, roomId, error: result.error },
        "Question announcement not delivered",
      );
    } catch (err) {
      this.logger.warn({ err, questionId: question.id, roomId }, "Question announcement failed");
    }

    // Retried on the next pass
    this.announced.delete(question.id);
    metrics.questionAnnouncements.inc({ status: "failed" });
  }
}

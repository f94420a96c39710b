/**
 * Tutoring Queue - FIFO access coordinator for teachers' tutoring rooms
 *
 * Each tutoring room is a single shared resource. Requesters wait in strict
 * arrival order; the head of the queue is offered the room and must confirm
 * within the confirmation window, otherwise the offer lapses and the next
 * person is asked.
 *
 * Every public operation runs its state transition inside one mutex and
 * returns the I/O to perform; notifications are sent after the mutex is
 * released so a slow chat send never blocks other rooms.
 */
import type { Logger } from "../../infrastructure/logger.js";
import { metrics } from "../../infrastructure/metrics.js";
import { AsyncMutex } from "../../shared/async-mutex.js";
import { QueueMessages, offerMessage } from "./tutoring.messages.js";
import type {
  ConfirmResult,
  EnqueueRequest,
  EnqueueResult,
  EntryStatus,
  NotificationSink,
  PendingTask,
  QueueEntry,
  QueueSnapshot,
  QueueStats,
  ReleaseResult,
  RoomQueue,
  TranscriptLine,
} from "./tutoring.types.js";

const DEFAULT_CONFIRMATION_TIMEOUT_MS = 60_000;
const MAX_TRANSCRIPT_LINES = 500;

export interface TutoringQueueOptions {
  confirmationTimeoutMs?: number;
  commandPrefix?: string;
}

/** Work captured under the mutex and carried out after it is released */
interface Advance {
  cancel: PendingTask | null;
  offerNext: boolean;
}

export class TutoringQueue {
  private readonly queues = new Map<string, RoomQueue>();
  private readonly mutex = new AsyncMutex();
  private readonly confirmationTimeoutMs: number;
  private readonly commandPrefix: string;
  private notifier: NotificationSink | null = null;
  private nextOfferId = 1;

  constructor(
    private readonly logger: Logger,
    options: TutoringQueueOptions = {},
  ) {
    this.confirmationTimeoutMs =
      options.confirmationTimeoutMs ?? DEFAULT_CONFIRMATION_TIMEOUT_MS;
    this.commandPrefix = options.commandPrefix ?? "!";
  }

  configureNotifier(sink: NotificationSink): void {
    this.notifier = sink;
  }

  // ─────────────────────────────────────────────────────────────────
  // Public operations
  // ─────────────────────────────────────────────────────────────────

  async enqueue(request: EnqueueRequest): Promise<EnqueueResult> {
    const { roomId, userId } = request;

    const outcome = await this.mutex.runExclusive(() => {
      let queue = this.queues.get(roomId);
      if (!queue) {
        queue = {
          roomId,
          teacherId: request.teacherId,
          teacherLabel: request.teacherLabel,
          teacherLocalpart: request.teacherLocalpart,
          entries: [],
          state: "free",
          pendingUser: null,
          pendingTask: null,
          activeUser: null,
          transcript: [],
        };
        this.queues.set(roomId, queue);
      } else {
        queue.teacherId = request.teacherId || queue.teacherId;
        queue.teacherLabel = request.teacherLabel || queue.teacherLabel;
        queue.teacherLocalpart = request.teacherLocalpart || queue.teacherLocalpart;
      }

      const existing = queue.entries.findIndex((entry) => entry.userId === userId);
      if (existing !== -1) {
        return { position: existing + 1, added: false, offer: false };
      }

      queue.entries.push({
        userId,
        notifyTarget: request.notifyTarget,
        requestedAt: Date.now(),
      });
      const position = queue.entries.length;
      const offer =
        position === 1 && queue.state === "free" && queue.pendingUser === null;
      return { position, added: true, offer };
    });

    if (outcome.added) {
      this.logger.info(
        { roomId, userId, position: outcome.position },
        "User joined tutoring queue",
      );
    }
    if (outcome.offer) {
      await this.offerNext(roomId);
    }
    return { position: outcome.position, added: outcome.added };
  }

  async confirmAccess(roomId: string, userId: string): Promise<ConfirmResult> {
    const outcome = await this.mutex.runExclusive(() => {
      const queue = this.queues.get(roomId);
      if (!queue || queue.pendingUser !== userId) {
        return null;
      }

      queue.state = "occupied";
      queue.activeUser = userId;
      queue.transcript = [];
      queue.pendingUser = null;
      const cancel = queue.pendingTask;
      queue.pendingTask = null;
      return { cancel };
    });

    if (!outcome) {
      return { success: false, error: QueueMessages.NOT_AT_FRONT };
    }

    this.cancelTask(outcome.cancel);
    metrics.tutoringOutcomes.inc({ outcome: "confirmed" });
    this.logger.info({ roomId, userId }, "Tutoring access confirmed");
    return { success: true, detail: QueueMessages.ACCESS_CONFIRMED };
  }

  async releaseCurrent(roomId: string): Promise<ReleaseResult> {
    const outcome = await this.mutex.runExclusive(() => {
      const queue = this.queues.get(roomId);
      if (!queue) return null;

      const released = queue.entries.shift();
      const transcript = queue.transcript;
      return {
        released: released ?? null,
        transcript,
        advance: this.vacateLocked(queue),
      };
    });

    if (!outcome) {
      return { success: false, error: QueueMessages.NO_QUEUE };
    }

    const releasedUserId = outcome.released?.userId ?? null;
    metrics.tutoringOutcomes.inc({ outcome: "released" });
    this.logger.info(
      { roomId, releasedUserId, transcriptLines: outcome.transcript.length },
      "Tutoring room released",
    );
    await this.advance(roomId, outcome.advance);
    return {
      success: true,
      releasedUserId,
      releasedNotifyTarget: outcome.released?.notifyTarget ?? null,
      transcript: outcome.transcript,
    };
  }

  async leaveQueue(roomId: string, userId: string): Promise<boolean> {
    const advance = await this.mutex.runExclusive((): Advance | null => {
      const queue = this.queues.get(roomId);
      if (!queue) return null;

      const index = queue.entries.findIndex((entry) => entry.userId === userId);
      if (index === -1) return null;

      queue.entries.splice(index, 1);
      let cancel: PendingTask | null = null;
      if (queue.pendingUser === userId) {
        cancel = queue.pendingTask;
        queue.pendingUser = null;
        queue.pendingTask = null;
      }
      if (queue.activeUser === userId) {
        queue.activeUser = null;
        queue.transcript = [];
        queue.state = "free";
      }

      const offerNext =
        queue.state === "free" &&
        queue.pendingUser === null &&
        queue.entries.length > 0;
      this.collectIfIdleLocked(queue);
      return { cancel, offerNext };
    });

    if (!advance) return false;

    metrics.tutoringOutcomes.inc({ outcome: "left" });
    this.logger.info({ roomId, userId }, "User left tutoring queue");
    await this.advance(roomId, advance);
    return true;
  }

  /**
   * React to the active occupant leaving the room without releasing it.
   * Anyone other than the active occupant is ignored.
   */
  async handleExternalDeparture(roomId: string, userId: string): Promise<boolean> {
    const advance = await this.mutex.runExclusive((): Advance | null => {
      const queue = this.queues.get(roomId);
      if (!queue || queue.activeUser !== userId) return null;

      if (queue.entries[0]?.userId === userId) {
        queue.entries.shift();
      }
      return this.vacateLocked(queue);
    });

    if (!advance) return false;

    metrics.tutoringOutcomes.inc({ outcome: "departed" });
    this.logger.info({ roomId, userId }, "Active tutoring user left the room");
    await this.advance(roomId, advance);
    return true;
  }

  /**
   * Append a chat message to the session transcript. Only messages posted
   * while the room is occupied are kept; the oldest lines are dropped past
   * the cap.
   */
  async recordMessage(roomId: string, senderId: string, text: string): Promise<boolean> {
    return this.mutex.runExclusive(() => {
      const queue = this.queues.get(roomId);
      if (!queue || queue.state !== "occupied") return false;

      const line: TranscriptLine = { senderId, text, sentAt: Date.now() };
      queue.transcript.push(line);
      if (queue.transcript.length > MAX_TRANSCRIPT_LINES) {
        queue.transcript.splice(0, queue.transcript.length - MAX_TRANSCRIPT_LINES);
      }
      return true;
    });
  }

  async getSnapshot(roomId: string): Promise<QueueSnapshot> {
    return this.mutex.runExclusive((): QueueSnapshot => {
      const queue = this.queues.get(roomId);
      if (!queue) {
        return { state: "free", entries: [] };
      }

      return {
        state: queue.state,
        entries: queue.entries.map((entry, index) => ({
          position: index + 1,
          userId: entry.userId,
          status: statusOf(queue, entry),
          requestedAt: entry.requestedAt,
        })),
      };
    });
  }

  async isActiveUser(roomId: string, userId: string): Promise<boolean> {
    return this.mutex.runExclusive(
      () => this.queues.get(roomId)?.activeUser === userId,
    );
  }

  getStats(): QueueStats {
    const stats: QueueStats = { queues: 0, waiting: 0, pending: 0, occupied: 0 };
    for (const queue of this.queues.values()) {
      stats.queues += 1;
      stats.waiting += queue.entries.length;
      if (queue.pendingUser !== null) stats.pending += 1;
      if (queue.state === "occupied") stats.occupied += 1;
    }
    return stats;
  }

  /**
   * Cancel every confirmation timer and drop all queues
   */
  async shutdown(): Promise<void> {
    const tasks = await this.mutex.runExclusive(() => {
      const pending: PendingTask[] = [];
      for (const queue of this.queues.values()) {
        if (queue.pendingTask) pending.push(queue.pendingTask);
      }
      this.queues.clear();
      return pending;
    });

    for (const task of tasks) {
      this.cancelTask(task);
    }
    this.logger.info({ cancelledOffers: tasks.length }, "Tutoring queues shut down");
  }

  // ─────────────────────────────────────────────────────────────────
  // Confirm-offer and timeout sub-protocol
  // ─────────────────────────────────────────────────────────────────

  private async offerNext(roomId: string): Promise<void> {
    const offer = await this.mutex.runExclusive(() => {
      const queue = this.queues.get(roomId);
      if (!queue || queue.state !== "free" || queue.pendingUser !== null) {
        return null;
      }
      const head = queue.entries[0];
      if (!head) return null;

      const offerId = this.nextOfferId++;
      queue.pendingUser = head.userId;
      queue.pendingTask = {
        offerId,
        timer: setTimeout(
          () => void this.expireOffer(roomId, head, offerId),
          this.confirmationTimeoutMs,
        ),
      };
      return {
        head,
        teacherLabel: queue.teacherLabel,
        teacherLocalpart: queue.teacherLocalpart,
      };
    });

    if (!offer) return;

    metrics.tutoringOffers.inc();
    this.logger.info(
      { roomId, userId: offer.head.userId, timeoutMs: this.confirmationTimeoutMs },
      "Tutoring room offered to head of queue",
    );
    await this.notify(
      offer.head.notifyTarget,
      offerMessage(
        offer.head.userId,
        offer.teacherLabel,
        offer.teacherLocalpart,
        Math.round(this.confirmationTimeoutMs / 1000),
        this.commandPrefix,
      ),
    );
  }

  private async expireOffer(
    roomId: string,
    entry: QueueEntry,
    offerId: number,
  ): Promise<void> {
    try {
      const offerNext = await this.mutex.runExclusive(() => {
        const queue = this.queues.get(roomId);
        // Stale timer: the offer was confirmed, withdrawn or superseded
        if (
          !queue ||
          queue.pendingUser !== entry.userId ||
          queue.pendingTask?.offerId !== offerId
        ) {
          return null;
        }

        if (queue.entries[0]?.userId === entry.userId) {
          queue.entries.shift();
        }
        queue.pendingUser = null;
        queue.pendingTask = null;
        queue.activeUser = null;
        queue.transcript = [];
        queue.state = "free";
        const hasNext = queue.entries.length > 0;
        this.collectIfIdleLocked(queue);
        return hasNext;
      });

      if (offerNext === null) return;

      metrics.tutoringOutcomes.inc({ outcome: "timeout" });
      this.logger.info({ roomId, userId: entry.userId }, "Tutoring offer lapsed");
      await this.notify(entry.notifyTarget, QueueMessages.OFFER_LAPSED);
      if (offerNext) {
        await this.offerNext(roomId);
      }
    } catch (err) {
      this.logger.error({ err, roomId, userId: entry.userId }, "Tutoring offer expiry failed");
    }
  }

  // ─────────────────────────────────────────────────────────────────
  // Helpers (the *Locked ones must run inside the mutex)
  // ─────────────────────────────────────────────────────────────────

  private vacateLocked(queue: RoomQueue): Advance {
    const cancel = queue.pendingTask;
    queue.activeUser = null;
    queue.pendingUser = null;
    queue.pendingTask = null;
    queue.transcript = [];
    queue.state = "free";
    const offerNext = queue.entries.length > 0;
    this.collectIfIdleLocked(queue);
    return { cancel, offerNext };
  }

  private collectIfIdleLocked(queue: RoomQueue): void {
    if (
      queue.entries.length > 0 ||
      queue.pendingUser !== null ||
      queue.activeUser !== null
    ) {
      return;
    }
    if (queue.pendingTask) {
      this.cancelTask(queue.pendingTask);
      queue.pendingTask = null;
    }
    this.queues.delete(queue.roomId);
  }

  private async advance(roomId: string, advance: Advance): Promise<void> {
    this.cancelTask(advance.cancel);
    if (advance.offerNext) {
      await this.offerNext(roomId);
    }
  }

  private cancelTask(task: PendingTask | null): void {
    if (task) clearTimeout(task.timer);
  }

  private async notify(target: string, text: string): Promise<void> {
    if (!this.notifier) {
      this.logger.debug({ target }, "No notifier configured, dropping queue message");
      return;
    }

    // Delivery failures are logged only; the transition has already committed
    try {
      const result = await this.notifier(target, text);
      if (!result.ok) {
        metrics.notificationFailures.inc();
        this.logger.warn({ target, error: result.error }, "Queue notification not delivered");
      }
    } catch (err) {
      metrics.notificationFailures.inc();
      this.logger.warn({ err, target }, "Queue notification failed");
    }
  }
}

function statusOf(queue: RoomQueue, entry: QueueEntry): EntryStatus {
  if (queue.activeUser === entry.userId) return "active";
  if (queue.pendingUser === entry.userId) return "awaiting-confirmation";
  return "waiting";
}

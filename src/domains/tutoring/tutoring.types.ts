/**
 * Tutoring domain types
 */

export type QueueState = "free" | "occupied";

export type EntryStatus = "waiting" | "awaiting-confirmation" | "active";

export interface QueueEntry {
  userId: string;
  /** Room where replies for this waiting user are posted; fixed at enqueue */
  notifyTarget: string;
  requestedAt: number;
}

export interface PendingTask {
  offerId: number;
  timer: NodeJS.Timeout;
}

export interface TranscriptLine {
  senderId: string;
  text: string;
  sentAt: number;
}

export interface RoomQueue {
  roomId: string;
  teacherId: string;
  teacherLabel: string;
  teacherLocalpart: string;
  entries: QueueEntry[];
  state: QueueState;
  pendingUser: string | null;
  pendingTask: PendingTask | null;
  activeUser: string | null;
  /** Messages posted in the room while it is occupied */
  transcript: TranscriptLine[];
}

export interface EnqueueRequest {
  roomId: string;
  teacherId: string;
  teacherLabel: string;
  teacherLocalpart: string;
  userId: string;
  notifyTarget: string;
}

export interface EnqueueResult {
  position: number;
  added: boolean;
}

export type ConfirmResult =
  | { success: true; detail: string }
  | { success: false; error: string };

export type ReleaseResult =
  | {
      success: true;
      releasedUserId: string | null;
      /** Where the released user asked for the room */
      releasedNotifyTarget: string | null;
      transcript: TranscriptLine[];
    }
  | { success: false; error: string };

export interface EntryView {
  position: number;
  userId: string;
  status: EntryStatus;
  requestedAt: number;
}

export interface QueueSnapshot {
  state: QueueState;
  entries: EntryView[];
}

export interface QueueStats {
  queues: number;
  waiting: number;
  pending: number;
  occupied: number;
}

export type SendResult = { ok: true } | { ok: false; error: string };

/**
 * Outbound messaging capability injected into the coordinator
 */
export type NotificationSink = (target: string, text: string) => Promise<SendResult>;

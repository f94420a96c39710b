/**
 * !tutoring - request, confirm, release, leave or inspect a teacher's
 * tutoring room queue
 */
import type { ChatGateway } from "../../../gateway/chat.gateway.js";
import type { AvailabilityRepository } from "../../../persistence/availability.repository.js";
import type { RoomRepository } from "../../../persistence/room.repository.js";
import type { UserRepository } from "../../../persistence/user.repository.js";
import type { RoomRecord, UserRecord } from "../../../persistence/schemas.js";
import { localpart, normalizeIdentifier } from "../../../shared/identity.js";
import { checkAvailability } from "../../tutoring/availability.js";
import { transcriptMessage } from "../../tutoring/tutoring.messages.js";
import type { TutoringQueue } from "../../tutoring/tutoringQueue.js";
import type { Command, CommandInvocation } from "../command.types.js";

type Action = "request" | "confirm" | "release" | "leave" | "status";

const SUBCOMMANDS: readonly Action[] = ["confirm", "release", "leave", "status"];
/** Subcommands a teacher may run on their own room without naming themselves */
const IMPLICIT_TEACHER_ACTIONS = new Set<Action>(["release", "status"]);

function parseSubcommand(value: string): Action | undefined {
  return SUBCOMMANDS.find((action) => action === value.toLowerCase());
}

export interface TutoringCommandDeps {
  gateway: Pick<ChatGateway, "sendText" | "inviteUser" | "kickUser">;
  tutoringQueue: Pick<
    TutoringQueue,
    | "enqueue"
    | "confirmAccess"
    | "releaseCurrent"
    | "leaveQueue"
    | "getSnapshot"
    | "isActiveUser"
  >;
  users: Pick<UserRepository, "getByChatId">;
  rooms: Pick<RoomRepository, "getTeacherTutoringRoom">;
  availability: Pick<AvailabilityRepository, "getWindows">;
  serverName: string;
  commandPrefix: string;
  now?: () => Date;
}

interface Target {
  teacher: UserRecord;
  teacherLocalpart: string;
  room: RoomRecord;
  label: string;
}

export function createTutoringCommand(deps: TutoringCommandDeps): Command {
  const usage = `${deps.commandPrefix}tutoring [confirm|release|leave|status] <teacher>`;
  const now = deps.now ?? (() => new Date());

  async function resolveTarget(
    invocation: CommandInvocation,
    teacherArg: string,
    implicit: boolean,
  ): Promise<Target | null> {
    const identity = normalizeIdentifier(teacherArg, deps.serverName);
    if (!identity) {
      await invocation.reply("❌ Invalid teacher identifier.");
      return null;
    }

    const teacher = await deps.users.getByChatId(identity.chatId);
    if (!teacher || !teacher.isTeacher) {
      await invocation.reply(
        implicit
          ? "❌ Only a registered teacher can use that command without naming a teacher."
          : "❌ No teacher was found with that chat ID.",
      );
      return null;
    }

    const room = await deps.rooms.getTeacherTutoringRoom(teacher.id);
    if (!room) {
      await invocation.reply("❌ That teacher has no registered tutoring room.");
      return null;
    }

    return {
      teacher,
      teacherLocalpart: identity.localpart,
      room,
      label: room.shortcode,
    };
  }

  async function request(invocation: CommandInvocation, target: Target): Promise<void> {
    const { sender } = invocation;
    if (sender.id === target.teacher.chatId) {
      await invocation.reply(
        `❌ A teacher cannot request their own tutoring room. Use "release" if you need to free the room.`,
      );
      return;
    }

    const windows = await deps.availability.getWindows(target.teacher.id);
    const check = checkAvailability(windows, now());
    if (!check.available) {
      await invocation.reply(check.reason);
      return;
    }

    const { position, added } = await deps.tutoringQueue.enqueue({
      roomId: target.room.roomId,
      teacherId: target.teacher.chatId,
      teacherLabel: target.label,
      teacherLocalpart: target.teacherLocalpart,
      userId: sender.id,
      notifyTarget: invocation.roomId,
    });

    if (added) {
      await invocation.reply(
        `✅ You joined the queue for ${target.label}. Current position: ${position}.\n` +
          "You will be notified when the room is free.",
      );
    } else {
      await invocation.reply(
        `ℹ️ You were already in the queue for ${target.label}. Current position: ${position}.`,
      );
    }
  }

  async function confirm(invocation: CommandInvocation, target: Target): Promise<void> {
    const { sender } = invocation;
    const result = await deps.tutoringQueue.confirmAccess(target.room.roomId, sender.id);
    if (!result.success) {
      await invocation.reply(`❌ ${result.error}`);
      return;
    }

    const invite = await deps.gateway.inviteUser(
      target.room.roomId,
      sender.id,
      target.teacher.chatId,
    );
    const inviteNote = invite.ok
      ? ""
      : `\n⚠️ Could not send the room invite automatically: ${invite.error}`;

    await invocation.reply(`✅ ${result.detail}${inviteNote}`);
    await deps.gateway.sendText(
      target.room.roomId,
      `📣 ${target.teacherLocalpart} - ${sender.id} confirmed their turn and is joining.`,
    );
  }

  async function release(invocation: CommandInvocation, target: Target): Promise<void> {
    const { sender } = invocation;
    const roomId = target.room.roomId;

    if (
      sender.id !== target.teacher.chatId &&
      !(await deps.tutoringQueue.isActiveUser(roomId, sender.id))
    ) {
      await invocation.reply(
        "❌ Only the teacher or the person being tutored can end the session.",
      );
      return;
    }

    const result = await deps.tutoringQueue.releaseCurrent(roomId);
    if (!result.success) {
      await invocation.reply(`❌ ${result.error}`);
      return;
    }

    let notes = "";
    const released = result.releasedUserId;
    if (released) {
      const kick = await deps.gateway.kickUser(
        roomId,
        released,
        `Room released via ${deps.commandPrefix}tutoring release`,
      );
      if (!kick.ok) {
        notes = `\n⚠️ Could not remove ${released} automatically: ${kick.error}`;
      }
    }

    if (result.transcript.length > 0 && result.releasedNotifyTarget) {
      const sent = await deps.gateway.sendText(
        result.releasedNotifyTarget,
        transcriptMessage(target.teacherLocalpart, result.transcript),
      );
      if (!sent.ok) {
        notes += `\n⚠️ Could not send the session transcript: ${sent.error}`;
      }
    }

    const tail = released
      ? `The next person will be notified (${localpart(released)} leaves).`
      : "The queue is empty for now.";
    await invocation.reply(`✅ Room released. ${tail}${notes}`);
  }

  async function leave(invocation: CommandInvocation, target: Target): Promise<void> {
    const removed = await deps.tutoringQueue.leaveQueue(
      target.room.roomId,
      invocation.sender.id,
    );
    await invocation.reply(
      removed
        ? `✅ You left the queue for ${target.label}.`
        : "ℹ️ You were not in the queue for that room.",
    );
  }

  async function status(invocation: CommandInvocation, target: Target): Promise<void> {
    const snapshot = await deps.tutoringQueue.getSnapshot(target.room.roomId);
    if (snapshot.entries.length === 0) {
      await invocation.reply(
        `📊 Empty queue for ${target.label} (state: ${snapshot.state}).`,
      );
      return;
    }

    const lines = [`📊 Status of ${target.label}: ${snapshot.state}`];
    for (const entry of snapshot.entries) {
      lines.push(`  • ${entry.position}. ${localpart(entry.userId)} - ${entry.status}`);
    }
    await invocation.reply(lines.join("\n"));
  }

  const actions: Record<Action, (invocation: CommandInvocation, target: Target) => Promise<void>> = {
    request,
    confirm,
    release,
    leave,
    status,
  };

  return {
    name: "tutoring",
    usage,
    description: `Manages one-to-one tutoring. Find <teacher> with ${deps.commandPrefix}teachers.`,
    async run(invocation) {
      const [first, second] = invocation.args;
      if (first === undefined) {
        await invocation.reply(`⚠️ Usage: ${usage}`);
        return;
      }

      let action: Action = "request";
      let teacherArg = first;
      let implicit = false;

      const subcommand = parseSubcommand(first);
      if (subcommand) {
        action = subcommand;
        if (second !== undefined) {
          teacherArg = second;
        } else if (IMPLICIT_TEACHER_ACTIONS.has(action)) {
          teacherArg = invocation.sender.id;
          implicit = true;
        } else {
          await invocation.reply(`⚠️ You must name the teacher: ${usage}`);
          return;
        }
      }

      const target = await resolveTarget(invocation, teacherArg, implicit);
      if (!target) return;

      await actions[action](invocation, target);
    },
  };
}

import { describe, it, expect, vi, beforeEach } from "vitest";
import { createQuestionsCommand } from "@src/domains/commands/handlers/questions.command.js";
import type { Command } from "@src/domains/commands/command.types.js";
import type { ChatUser } from "@src/auth/types.js";
import type { RoomRecord } from "@src/persistence/schemas.js";
import { makeOption, makeQuestion } from "../questions/question.fixtures.js";

const alice: ChatUser = { id: "@alice:school.test", displayName: "Alice" };
const aliceRecord = { id: "8", chatId: alice.id, lmsId: 43, isTeacher: false };

const ROOMS: Record<string, RoomRecord> = {
  "!math:x": { roomId: "!math:x", shortcode: "MATH1", lmsCourseId: 101, active: true },
  "!g1:x": {
    roomId: "!g1:x",
    shortcode: "MATH1_G1",
    lmsCourseId: 101,
    lmsGroup: "Group A",
    active: true,
  },
  "!g2:x": { roomId: "!g2:x", shortcode: "MATH1_G2", lmsCourseId: 101, lmsGroup: "7", active: true },
  "!other:x": { roomId: "!other:x", shortcode: "OTHER", lmsCourseId: 999, active: true },
};

const QUESTIONS = [
  makeQuestion({
    id: 1,
    title: "Fractions",
    body: "What is 1/2 + 1/4?\nShow your work.",
    manualActive: true,
    roomId: "!math:x",
  }),
  makeQuestion({ id: 2, title: "Group task", qtype: "essay", manualActive: true, roomId: "!g1:x" }),
  makeQuestion({ id: 3, manualActive: true, roomId: "!g2:x" }),
  makeQuestion({ id: 4, roomId: "!math:x" }),
  makeQuestion({ id: 5, manualActive: true, roomId: "!other:x" }),
];

describe("!questions", () => {
  let lms: {
    fetchUserCourses: ReturnType<typeof vi.fn>;
    fetchUserGroupsInCourse: ReturnType<typeof vi.fn>;
  };
  let users: { getByChatId: ReturnType<typeof vi.fn> };
  let rooms: { getRooms: ReturnType<typeof vi.fn> };
  let questions: { listQuestions: ReturnType<typeof vi.fn>; getOptions: ReturnType<typeof vi.fn> };
  let command: Command;
  let reply: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    lms = {
      fetchUserCourses: vi.fn().mockResolvedValue([{ id: 101 }, { id: 102 }]),
      fetchUserGroupsInCourse: vi.fn().mockResolvedValue(["5", "Group A"]),
    };
    users = { getByChatId: vi.fn().mockResolvedValue(aliceRecord) };
    rooms = {
      getRooms: vi.fn(async (roomIds: string[]) =>
        roomIds.flatMap((roomId) => {
          const room = ROOMS[roomId];
          return room ? [room] : [];
        }),
      ),
    };
    questions = {
      listQuestions: vi.fn().mockResolvedValue(QUESTIONS),
      getOptions: vi.fn(async (questionId: number) =>
        questionId === 1 ? [makeOption("A", "3/4", true), makeOption("B", "2/6")] : [],
      ),
    };
    command = createQuestionsCommand({
      lms,
      users,
      rooms,
      questions,
      commandPrefix: "!",
      clock: () => 1_700_000_000_000,
    });
    reply = vi.fn().mockResolvedValue(undefined);
  });

  const run = () => command.run({ roomId: "!lobby:x", sender: alice, args: [], reply });

  it("lists the active questions of the sender's courses and groups by room", async () => {
    await run();

    expect(rooms.getRooms).toHaveBeenCalledWith(["!math:x", "!g1:x", "!g2:x", "!other:x"]);
    expect(lms.fetchUserGroupsInCourse).toHaveBeenCalledTimes(1);
    expect(lms.fetchUserGroupsInCourse).toHaveBeenCalledWith(101, 43);
    expect(reply).toHaveBeenCalledWith(
      [
        "📋 Active questions (2)",
        "",
        "─".repeat(25),
        "🏠 MATH1",
        "─".repeat(25),
        "",
        "  🔹 #1 │ Fractions",
        "     📝 Multiple choice",
        "",
        "     📄 Question:",
        "     What is 1/2 + 1/4?",
        "     Show your work.",
        "",
        "       A) 3/4",
        "       B) 2/6",
        "",
        "─".repeat(25),
        "🏠 MATH1_G1",
        "─".repeat(25),
        "",
        "  🔹 #2 │ Group task",
        "     📄 Essay",
        "",
        "━".repeat(30),
        "💡 Answer with !answer <ID> <answer>|<option 1> [<option 2> ...].",
      ].join("\n"),
    );
  });

  it("requires a directory record", async () => {
    users.getByChatId.mockResolvedValue(null);

    await run();

    expect(reply).toHaveBeenCalledWith("❌ You are not registered in the directory.");
  });

  it("reports a user without courses", async () => {
    lms.fetchUserCourses.mockResolvedValue([]);

    await run();

    expect(reply).toHaveBeenCalledWith("❌ No courses were found in the LMS for your user.");
    expect(questions.listQuestions).not.toHaveBeenCalled();
  });

  it("reports when no active question belongs to the sender's courses", async () => {
    lms.fetchUserCourses.mockResolvedValue([{ id: 102 }]);

    await run();

    expect(reply).toHaveBeenCalledWith("ℹ️ There are no active questions in your courses.");
  });

  it("reports when every question is restricted to other groups", async () => {
    questions.listQuestions.mockResolvedValue(QUESTIONS.slice(1, 3));
    lms.fetchUserGroupsInCourse.mockResolvedValue([]);

    await run();

    expect(reply).toHaveBeenCalledWith(
      "ℹ️ There are no active questions in your courses or groups.",
    );
  });
});

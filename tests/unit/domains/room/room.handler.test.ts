import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("@src/infrastructure/logger.js", () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

vi.mock("@src/shared/crypto.js", () => ({
  generateCorrelationId: () => "test-correlation-id",
}));

import { announceDeparture, roomHandler } from "@src/domains/room/room.handler.js";
import { ClientManager } from "@src/client/clientManager.js";

const ROOM = "!algebra:school.test";
const ALICE = "@alice:school.test";
const PROF = "@prof:school.test";

function createMockSocket(socketId: string, userId: string) {
  const rooms = new Set<string>([socketId]);
  const toRoom = { emit: vi.fn() };
  return {
    id: socketId,
    data: { user: { id: userId, displayName: "User" } },
    rooms,
    join: vi.fn(async (roomId: string) => {
      rooms.add(roomId);
    }),
    leave: vi.fn(async (roomId: string) => {
      rooms.delete(roomId);
    }),
    to: vi.fn().mockReturnValue(toRoom),
    toRoom,
    on: vi.fn(),
  } as any;
}

function createMockContext(clientManager: ClientManager) {
  const ioRoom = { emit: vi.fn() };
  return {
    io: { to: vi.fn().mockReturnValue(ioRoom) },
    ioRoom,
    clientManager,
    roomRepository: {
      getRoom: vi.fn().mockResolvedValue({
        roomId: ROOM,
        shortcode: "ALG",
        teacherId: "7",
        lmsCourseId: 10,
        active: true,
        createdAt: 1,
      }),
    },
    userRepository: {
      getById: vi.fn().mockResolvedValue({ id: "7", chatId: PROF, isTeacher: true }),
    },
    membershipRepository: {
      consumeInvite: vi.fn().mockResolvedValue({ invitedBy: PROF, createdAt: 1 }),
    },
    chatGateway: {
      sendText: vi.fn().mockResolvedValue({ ok: true }),
    },
    tutoringQueue: {
      handleExternalDeparture: vi.fn().mockResolvedValue(false),
    },
  } as any;
}

type Listener = (payload: unknown, callback?: (result: any) => void) => Promise<void>;

function listener(socket: any, event: string): Listener {
  return socket.on.mock.calls.find((call: any[]) => call[0] === event)[1];
}

describe("room:join", () => {
  let clientManager: ClientManager;
  let context: any;
  let socket: any;
  let join: Listener;

  beforeEach(() => {
    clientManager = new ClientManager();
    context = createMockContext(clientManager);
    socket = createMockSocket("s1", ALICE);
    clientManager.addClient("s1", socket.data.user);
    roomHandler(socket, context);
    join = listener(socket, "room:join");
  });

  it("spends the invite and announces the newcomer", async () => {
    const cb = vi.fn();
    await join({ roomId: ROOM }, cb);

    expect(context.membershipRepository.consumeInvite).toHaveBeenCalledWith(ROOM, ALICE);
    expect(socket.join).toHaveBeenCalledWith(ROOM);
    expect(socket.to).toHaveBeenCalledWith(ROOM);
    expect(socket.toRoom.emit).toHaveBeenCalledWith("room:userJoined", {
      roomId: ROOM,
      userId: ALICE,
    });
    expect(context.chatGateway.sendText).toHaveBeenCalledWith(
      ROOM,
      `🎓 Welcome ${ALICE} to the room!`,
    );
    expect(cb).toHaveBeenCalledWith({ success: true, data: { members: [ALICE] } });
  });

  it("requires an invite", async () => {
    context.membershipRepository.consumeInvite.mockResolvedValue(null);

    const cb = vi.fn();
    await join({ roomId: ROOM }, cb);

    expect(cb).toHaveBeenCalledWith({
      success: false,
      error: "An invite is required to join this room",
    });
    expect(socket.join).not.toHaveBeenCalled();
  });

  it("admits the room's teacher without an invite", async () => {
    socket.data.user.id = PROF;
    clientManager.addClient("s1", socket.data.user);

    const cb = vi.fn();
    await join({ roomId: ROOM }, cb);

    expect(context.userRepository.getById).toHaveBeenCalledWith("7");
    expect(context.membershipRepository.consumeInvite).not.toHaveBeenCalled();
    expect(cb).toHaveBeenCalledWith({ success: true, data: { members: [PROF] } });
  });

  it("refuses inactive rooms", async () => {
    context.roomRepository.getRoom.mockResolvedValue({
      roomId: ROOM,
      shortcode: "ALG",
      teacherId: undefined,
      lmsCourseId: 10,
      active: false,
      createdAt: 1,
    });

    const cb = vi.fn();
    await join({ roomId: ROOM }, cb);

    expect(cb).toHaveBeenCalledWith({ success: false, error: "Room is not active" });
  });

  it("leaves unregistered rooms open", async () => {
    context.roomRepository.getRoom.mockResolvedValue(null);

    const cb = vi.fn();
    await join({ roomId: "!scratch:school.test" }, cb);

    expect(context.membershipRepository.consumeInvite).not.toHaveBeenCalled();
    expect(cb).toHaveBeenCalledWith({ success: true, data: { members: [ALICE] } });
  });

  it("skips the policy and the greeting for a second socket", async () => {
    await join({ roomId: ROOM }, vi.fn());

    const second = createMockSocket("s2", ALICE);
    clientManager.addClient("s2", second.data.user);
    roomHandler(second, context);

    const cb = vi.fn();
    await listener(second, "room:join")({ roomId: ROOM }, cb);

    expect(context.membershipRepository.consumeInvite).toHaveBeenCalledTimes(1);
    expect(context.chatGateway.sendText).toHaveBeenCalledTimes(1);
    expect(second.to).not.toHaveBeenCalled();
    expect(cb).toHaveBeenCalledWith({ success: true, data: { members: [ALICE] } });
  });

  it("spends one invite when two sockets of a user join at once", async () => {
    const second = createMockSocket("s2", ALICE);
    clientManager.addClient("s2", second.data.user);
    roomHandler(second, context);

    const cb1 = vi.fn();
    const cb2 = vi.fn();
    await Promise.all([
      join({ roomId: ROOM }, cb1),
      listener(second, "room:join")({ roomId: ROOM }, cb2),
    ]);

    expect(context.membershipRepository.consumeInvite).toHaveBeenCalledTimes(1);
    expect(socket.join).toHaveBeenCalledWith(ROOM);
    expect(second.join).toHaveBeenCalledWith(ROOM);
    expect(context.chatGateway.sendText).toHaveBeenCalledTimes(1);
    expect(cb1).toHaveBeenCalledWith({ success: true, data: { members: [ALICE] } });
    expect(cb2).toHaveBeenCalledWith({ success: true, data: { members: [ALICE] } });
  });

  it("rejects every concurrent socket when the invite is missing", async () => {
    context.membershipRepository.consumeInvite.mockResolvedValue(null);
    const second = createMockSocket("s2", ALICE);
    clientManager.addClient("s2", second.data.user);
    roomHandler(second, context);

    const cb1 = vi.fn();
    const cb2 = vi.fn();
    await Promise.all([
      join({ roomId: ROOM }, cb1),
      listener(second, "room:join")({ roomId: ROOM }, cb2),
    ]);

    const rejected = { success: false, error: "An invite is required to join this room" };
    expect(cb1).toHaveBeenCalledWith(rejected);
    expect(cb2).toHaveBeenCalledWith(rejected);
    expect(context.membershipRepository.consumeInvite).toHaveBeenCalledTimes(1);
  });
});

describe("room:leave", () => {
  let clientManager: ClientManager;
  let context: any;
  let socket: any;
  let leave: Listener;

  beforeEach(async () => {
    clientManager = new ClientManager();
    context = createMockContext(clientManager);
    socket = createMockSocket("s1", ALICE);
    clientManager.addClient("s1", socket.data.user);
    roomHandler(socket, context);
    await listener(socket, "room:join")({ roomId: ROOM }, vi.fn());
    context.chatGateway.sendText.mockClear();
    leave = listener(socket, "room:leave");
  });

  it("announces the departure and tells the tutoring queue", async () => {
    const cb = vi.fn();
    await leave({ roomId: ROOM }, cb);

    expect(socket.leave).toHaveBeenCalledWith(ROOM);
    expect(context.io.to).toHaveBeenCalledWith(ROOM);
    expect(context.ioRoom.emit).toHaveBeenCalledWith("room:userLeft", {
      roomId: ROOM,
      userId: ALICE,
    });
    expect(context.chatGateway.sendText).toHaveBeenCalledWith(
      ROOM,
      `👋 ${ALICE} has left the room.`,
    );
    expect(context.tutoringQueue.handleExternalDeparture).toHaveBeenCalledWith(ROOM, ALICE);
    expect(clientManager.isUserInRoom(ROOM, ALICE)).toBe(false);
    expect(cb).toHaveBeenCalledWith({ success: true });
  });

  it("stays quiet while another socket of the user remains", async () => {
    const second = createMockSocket("s2", ALICE);
    clientManager.addClient("s2", second.data.user);
    roomHandler(second, context);
    await listener(second, "room:join")({ roomId: ROOM }, vi.fn());

    const cb = vi.fn();
    await leave({ roomId: ROOM }, cb);

    expect(context.tutoringQueue.handleExternalDeparture).not.toHaveBeenCalled();
    expect(context.chatGateway.sendText).not.toHaveBeenCalled();
    expect(clientManager.isUserInRoom(ROOM, ALICE)).toBe(true);
    expect(cb).toHaveBeenCalledWith({ success: true });
  });

  it("rejects a socket that is not in the room", async () => {
    const cb = vi.fn();
    await leave({ roomId: "!other:school.test" }, cb);

    expect(cb).toHaveBeenCalledWith({ success: false, error: "Not in room" });
    expect(socket.leave).not.toHaveBeenCalled();
  });
});

describe("announceDeparture", () => {
  it("frees the tutoring room when its occupant leaves", async () => {
    const context = createMockContext(new ClientManager());
    context.tutoringQueue.handleExternalDeparture.mockResolvedValue(true);

    await announceDeparture(context, ROOM, ALICE);

    expect(context.tutoringQueue.handleExternalDeparture).toHaveBeenCalledWith(ROOM, ALICE);
    expect(context.ioRoom.emit).toHaveBeenCalledWith("room:userLeft", {
      roomId: ROOM,
      userId: ALICE,
    });
  });
});

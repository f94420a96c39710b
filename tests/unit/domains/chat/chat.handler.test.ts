import { describe, it, expect, vi, beforeEach } from "vitest";

/**
 * The chat handler is exercised by registering it on a mocked socket and
 * invoking the captured event listener with a mocked AppContext.
 */

// Mock logger to avoid noise
vi.mock("@src/infrastructure/logger.js", () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

vi.mock("@src/config/index.js", () => ({
  config: {
    RATE_LIMIT_MESSAGES_PER_MINUTE: 30,
  },
}));

// createHandler uses generateCorrelationId
vi.mock("@src/shared/crypto.js", () => ({
  generateCorrelationId: () => "test-correlation-id",
}));

import { chatHandler } from "@src/domains/chat/chat.handler.js";
import { logger } from "@src/infrastructure/logger.js";
import type { AppContext } from "@src/context.js";

const ROOM = "!algebra:school.test";
const USER_ID = "@alice:school.test";

function createMockSocket(opts: { roomId?: string; inRoom?: boolean } = {}) {
  const { roomId = ROOM, inRoom = true } = opts;
  const rooms = new Set<string>();
  if (inRoom) rooms.add(roomId);

  const broadcast = { emit: vi.fn() };
  return {
    id: "socket-1",
    data: {
      user: { id: USER_ID, displayName: "Alice" },
    },
    rooms,
    nsp: {
      in: vi.fn().mockReturnValue(broadcast),
    },
    broadcast,
    on: vi.fn(),
  } as any;
}

function createMockContext() {
  return {
    rateLimiter: {
      isAllowed: vi.fn().mockResolvedValue(true),
    },
    tutoringQueue: {
      recordMessage: vi.fn().mockResolvedValue(false),
    },
    commandRegistry: {
      isCommand: vi.fn((body: string) => body.startsWith("!")),
      dispatch: vi.fn().mockResolvedValue(true),
    },
  } as any;
}

describe("chatHandler registration", () => {
  it("registers chat:message event on socket", () => {
    const socket = createMockSocket();

    chatHandler(socket, createMockContext() as AppContext);

    expect(socket.on).toHaveBeenCalledWith("chat:message", expect.any(Function));
  });
});

describe("chat:message handler", () => {
  let socket: any;
  let context: any;
  let handler: (payload: unknown, callback?: (result: any) => void) => Promise<void>;

  beforeEach(() => {
    vi.clearAllMocks();
    socket = createMockSocket();
    context = createMockContext();

    chatHandler(socket, context);
    handler = socket.on.mock.calls[0][1];
  });

  it("broadcasts the message to the room, sender included", async () => {
    const cb = vi.fn();
    await handler({ roomId: ROOM, content: "  Hello!  " }, cb);

    expect(socket.nsp.in).toHaveBeenCalledWith(ROOM);
    expect(socket.broadcast.emit).toHaveBeenCalledWith("chat:message", {
      id: expect.any(String),
      roomId: ROOM,
      userId: USER_ID,
      userName: "Alice",
      content: "Hello!",
      timestamp: expect.any(Number),
    });
    expect(cb).toHaveBeenCalledWith({ success: true, data: { id: expect.any(String) } });
  });

  it("acks with the id of the broadcast message", async () => {
    const cb = vi.fn();
    await handler({ roomId: ROOM, content: "hi" }, cb);

    const emitted = socket.broadcast.emit.mock.calls[0][1];
    expect(cb.mock.calls[0]?.[0].data.id).toBe(emitted.id);
  });

  it("rejects when socket is NOT in the room", async () => {
    socket.rooms.delete(ROOM);

    const cb = vi.fn();
    await handler({ roomId: ROOM, content: "Hello!" }, cb);

    expect(cb).toHaveBeenCalledWith({ success: false, error: "Not in room" });
    expect(socket.nsp.in).not.toHaveBeenCalled();
  });

  it("rejects when rate limit is exceeded", async () => {
    context.rateLimiter.isAllowed.mockResolvedValue(false);

    const cb = vi.fn();
    await handler({ roomId: ROOM, content: "spam" }, cb);

    expect(cb).toHaveBeenCalledWith({ success: false, error: "Too many messages" });
    expect(socket.nsp.in).not.toHaveBeenCalled();
  });

  it("uses per-user-per-room rate-limit key", async () => {
    await handler({ roomId: ROOM, content: "hi" }, vi.fn());

    expect(context.rateLimiter.isAllowed).toHaveBeenCalledWith(
      `chat:${USER_ID}:${ROOM}`,
      30,
      60,
    );
  });

  it("adds the message to the tutoring transcript of the room", async () => {
    await handler({ roomId: ROOM, content: " explain step 2 " }, vi.fn());

    expect(context.tutoringQueue.recordMessage).toHaveBeenCalledWith(
      ROOM,
      USER_ID,
      "explain step 2",
    );
  });

  it("does not record rejected messages", async () => {
    context.rateLimiter.isAllowed.mockResolvedValue(false);

    await handler({ roomId: ROOM, content: "spam" }, vi.fn());

    expect(context.tutoringQueue.recordMessage).not.toHaveBeenCalled();
  });

  it("hands commands to the registry", async () => {
    const cb = vi.fn();
    await handler({ roomId: ROOM, content: "!tutoring prof" }, cb);

    expect(context.commandRegistry.dispatch).toHaveBeenCalledWith({
      roomId: ROOM,
      sender: { id: USER_ID, displayName: "Alice" },
      body: "!tutoring prof",
    });
    expect(cb).toHaveBeenCalledWith({ success: true, data: { id: expect.any(String) } });
  });

  it("does not dispatch plain messages", async () => {
    await handler({ roomId: ROOM, content: "good morning" }, vi.fn());

    expect(context.commandRegistry.dispatch).not.toHaveBeenCalled();
  });

  it("logs a failed dispatch without failing the message", async () => {
    const failure = new Error("registry down");
    context.commandRegistry.dispatch.mockRejectedValue(failure);

    const cb = vi.fn();
    await handler({ roomId: ROOM, content: "!help" }, cb);

    expect(cb).toHaveBeenCalledWith({ success: true, data: { id: expect.any(String) } });
    await vi.waitFor(() => {
      expect(logger.error).toHaveBeenCalledWith(
        { err: failure, roomId: ROOM },
        "Command dispatch failed",
      );
    });
  });

  it("rejects invalid payload (empty content)", async () => {
    const cb = vi.fn();
    await handler({ roomId: ROOM, content: "   " }, cb);

    expect(cb).toHaveBeenCalledWith({ success: false, error: "Invalid payload" });
  });

  it("rejects invalid payload (missing roomId)", async () => {
    const cb = vi.fn();
    await handler({ content: "hello" }, cb);

    expect(cb).toHaveBeenCalledWith({ success: false, error: "Invalid payload" });
  });
});

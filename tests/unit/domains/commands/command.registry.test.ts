import { describe, it, expect, vi, beforeEach } from "vitest";
import { CommandRegistry } from "@src/domains/commands/command.registry.js";
import { createHelpCommand } from "@src/domains/commands/handlers/help.command.js";
import type { Command } from "@src/domains/commands/command.types.js";

const sender = { id: "@alice:school.test", displayName: "Alice" };

function fakeCommand(name: string, run: Command["run"] = vi.fn(async () => {})): Command {
  return { name, usage: `!${name}`, description: `${name} command`, run };
}

describe("CommandRegistry", () => {
  let gateway: { sendText: ReturnType<typeof vi.fn> };
  let logger: { debug: ReturnType<typeof vi.fn>; warn: ReturnType<typeof vi.fn>; error: ReturnType<typeof vi.fn> };
  let registry: CommandRegistry;

  beforeEach(() => {
    gateway = { sendText: vi.fn().mockResolvedValue({ ok: true }) };
    logger = { debug: vi.fn(), warn: vi.fn(), error: vi.fn() };
    registry = new CommandRegistry(gateway, logger as any, "!");
  });

  const dispatch = (body: string) => registry.dispatch({ roomId: "!room:x", sender, body });

  it("ignores text without the prefix", async () => {
    expect(await dispatch("hello there")).toBe(false);
    expect(gateway.sendText).not.toHaveBeenCalled();
  });

  it("complains about an empty command", async () => {
    expect(await dispatch("!   ")).toBe(true);
    expect(gateway.sendText).toHaveBeenCalledWith("!room:x", "⚠️ No command given.");
  });

  it("reports unknown commands", async () => {
    await dispatch("!dance now");
    expect(gateway.sendText).toHaveBeenCalledWith("!room:x", "❌ Unknown command: dance");
  });

  it("passes whitespace-separated arguments to the command", async () => {
    const echo = fakeCommand("echo");
    registry.register(echo);

    await dispatch("  !echo  one   two ");

    expect(echo.run).toHaveBeenCalledWith({
      roomId: "!room:x",
      sender,
      args: ["one", "two"],
      reply: expect.any(Function),
    });
  });

  it("routes replies to the room the command came from", async () => {
    registry.register(fakeCommand("ping", async ({ reply }) => reply("pong")));

    await dispatch("!ping");

    expect(gateway.sendText).toHaveBeenCalledWith("!room:x", "pong");
  });

  it("logs replies that could not be delivered", async () => {
    gateway.sendText.mockResolvedValue({ ok: false, error: "room gone" });
    registry.register(fakeCommand("ping", async ({ reply }) => reply("pong")));

    await dispatch("!ping");

    expect(logger.warn).toHaveBeenCalledWith(
      { roomId: "!room:x", error: "room gone" },
      "Command reply not delivered",
    );
  });

  it("reports a failing command without throwing", async () => {
    registry.register(
      fakeCommand("boom", async () => {
        throw new Error("kaboom");
      }),
    );

    await expect(dispatch("!boom")).resolves.toBe(true);
    expect(gateway.sendText).toHaveBeenCalledWith("!room:x", "⚠️ Error running command `boom`.");
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it("refuses duplicate names", () => {
    registry.register(fakeCommand("echo"));
    expect(() => registry.register(fakeCommand("echo"))).toThrow("Command already registered: echo");
  });

  it("honours a custom prefix", async () => {
    const custom = new CommandRegistry(gateway, logger as any, "/");
    const echo = fakeCommand("echo");
    custom.register(echo);

    expect(custom.isCommand("!echo")).toBe(false);
    expect(await custom.dispatch({ roomId: "!room:x", sender, body: "/echo" })).toBe(true);
    expect(echo.run).toHaveBeenCalledTimes(1);
  });

  describe("help", () => {
    it("lists every command sorted by name", async () => {
      registry
        .register(fakeCommand("zeta"))
        .register(fakeCommand("alpha"))
        .register(createHelpCommand(registry));

      await dispatch("!help");

      expect(gateway.sendText).toHaveBeenCalledWith(
        "!room:x",
        "📘 Available commands:\n\n" +
          "• !alpha - alpha command\n" +
          "• !help - Shows this list of available commands.\n" +
          "• !zeta - zeta command\n\n" +
          "Use !<command> to run them.",
      );
    });
  });
});

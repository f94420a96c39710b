/**
 * Command Registry - prefix parsing and dispatch of chat commands
 */
import type { Logger } from "../../infrastructure/logger.js";
import { metrics } from "../../infrastructure/metrics.js";
import type { ChatGateway } from "../../gateway/chat.gateway.js";
import type { ChatUser } from "../../auth/types.js";
import type { Command } from "./command.types.js";

export interface InboundCommandMessage {
  roomId: string;
  sender: ChatUser;
  body: string;
}

export class CommandRegistry {
  private readonly commands = new Map<string, Command>();

  constructor(
    private readonly gateway: Pick<ChatGateway, "sendText">,
    private readonly logger: Logger,
    readonly prefix: string,
  ) {}

  register(command: Command): this {
    if (this.commands.has(command.name)) {
      throw new Error(`Command already registered: ${command.name}`);
    }
    this.commands.set(command.name, command);
    return this;
  }

  /** Registered commands sorted by name */
  list(): Command[] {
    return [...this.commands.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  isCommand(body: string): boolean {
    return body.trim().startsWith(this.prefix);
  }

  /**
   * Run the command in `body`. Returns false when the text is not a command.
   */
  async dispatch(message: InboundCommandMessage): Promise<boolean> {
    const body = message.body.trim();
    if (!body.startsWith(this.prefix)) return false;

    const reply = async (text: string): Promise<void> => {
      const result = await this.gateway.sendText(message.roomId, text);
      if (!result.ok) {
        this.logger.warn(
          { roomId: message.roomId, error: result.error },
          "Command reply not delivered",
        );
      }
    };

    const [name, ...args] = body.slice(this.prefix.length).split(/\s+/).filter(Boolean);
    if (name === undefined) {
      metrics.commandsTotal.inc({ command: "", status: "empty" });
      await reply("⚠️ No command given.");
      return true;
    }

    const command = this.commands.get(name);
    if (!command) {
      metrics.commandsTotal.inc({ command: "unknown", status: "unknown" });
      await reply(`❌ Unknown command: ${name}`);
      return true;
    }

    this.logger.debug(
      { command: name, args, roomId: message.roomId, sender: message.sender.id },
      "Dispatching command",
    );

    try {
      await command.run({
        roomId: message.roomId,
        sender: message.sender,
        args,
        reply,
      });
      metrics.commandsTotal.inc({ command: name, status: "ok" });
    } catch (err) {
      metrics.commandsTotal.inc({ command: name, status: "error" });
      this.logger.error(
        { err, command: name, roomId: message.roomId, sender: message.sender.id },
        "Command failed",
      );
      await reply(`⚠️ Error running command \`${name}\`.`);
    }
    return true;
  }
}

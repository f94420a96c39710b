import type { Command } from "../command.types.js";
import type { CommandRegistry } from "../command.registry.js";

export function createHelpCommand(registry: Pick<CommandRegistry, "list" | "prefix">): Command {
  return {
    name: "help",
    usage: `${registry.prefix}help`,
    description: "Shows this list of available commands.",
    async run({ reply }) {
      const lines = registry
        .list()
        .map((command) => `• ${command.usage} - ${command.description}`);

      await reply(
        `📘 Available commands:\n\n${lines.join("\n")}\n\nUse ${registry.prefix}<command> to run them.`,
      );
    },
  };
}

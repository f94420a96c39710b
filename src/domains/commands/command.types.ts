import type { ChatUser } from "../../auth/types.js";

/**
 * One parsed chat command, as seen by its handler
 */
export interface CommandInvocation {
  /** Room the command was typed in; replies go here */
  roomId: string;
  sender: ChatUser;
  args: string[];
  reply: (text: string) => Promise<void>;
}

export interface Command {
  name: string;
  usage: string;
  description: string;
  run(invocation: CommandInvocation): Promise<void>;
}

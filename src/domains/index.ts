/**
 * Domain Registry - Static registration
 *
 * To add a domain: Import and add to domains array
 */
import type { AppContext } from "../context.js";
import type { AppSocket } from "../socket/types.js";

import { roomHandler } from "./room/room.handler.js";
import { chatHandler } from "./chat/chat.handler.js";

export type DomainRegistration = (socket: AppSocket, ctx: AppContext) => void;

export const domains: readonly DomainRegistration[] = [roomHandler, chatHandler];

/**
 * Register all domain handlers for a socket connection
 */
export function registerAllDomains(socket: AppSocket, ctx: AppContext): void {
  for (const register of domains) {
    register(socket, ctx);
  }
}

export { announceDeparture } from "./room/room.handler.js";

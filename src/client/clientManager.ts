import type { ChatUser } from "../auth/types.js";

export interface ClientData {
  socketId: string;
  user: ChatUser;
  rooms: Set<string>;
  connectedAt: number;
}

/**
 * In-memory index of connected sockets and the rooms they joined.
 * A user may hold several sockets; presence in a room is per user.
 */
export class ClientManager {
  private readonly clients = new Map<string, ClientData>();
  /** roomId → userId → socketIds */
  private readonly roomMembers = new Map<string, Map<string, Set<string>>>();

  addClient(socketId: string, user: ChatUser): void {
    this.clients.set(socketId, {
      socketId,
      user,
      rooms: new Set(),
      connectedAt: Date.now(),
    });
  }

  /**
   * Forget a socket. Returns the rooms its user no longer has any socket in.
   */
  removeClient(socketId: string): string[] {
    const client = this.clients.get(socketId);
    if (!client) return [];

    const leftRooms: string[] = [];
    for (const roomId of client.rooms) {
      if (this.detach(roomId, client.user.id, socketId)) {
        leftRooms.push(roomId);
      }
    }
    this.clients.delete(socketId);
    return leftRooms;
  }

  getClient(socketId: string): ClientData | undefined {
    return this.clients.get(socketId);
  }

  /**
   * Returns true when this is the user's first socket in the room.
   */
  joinRoom(socketId: string, roomId: string): boolean {
    const client = this.clients.get(socketId);
    if (!client) return false;

    client.rooms.add(roomId);

    let users = this.roomMembers.get(roomId);
    if (!users) {
      users = new Map();
      this.roomMembers.set(roomId, users);
    }
    let sockets = users.get(client.user.id);
    const firstSocket = !sockets || sockets.size === 0;
    if (!sockets) {
      sockets = new Set();
      users.set(client.user.id, sockets);
    }
    sockets.add(socketId);
    return firstSocket;
  }

  /**
   * Returns true when the user has no socket left in the room.
   */
  leaveRoom(socketId: string, roomId: string): boolean {
    const client = this.clients.get(socketId);
    if (!client || !client.rooms.has(roomId)) return false;

    client.rooms.delete(roomId);
    return this.detach(roomId, client.user.id, socketId);
  }

  getSocketIds(userId: string): string[] {
    const result: string[] = [];
    for (const client of this.clients.values()) {
      if (client.user.id === userId) result.push(client.socketId);
    }
    return result;
  }

  getSocketIdsInRoom(roomId: string, userId: string): string[] {
    return [...(this.roomMembers.get(roomId)?.get(userId) ?? [])];
  }

  isUserInRoom(roomId: string, userId: string): boolean {
    return (this.roomMembers.get(roomId)?.get(userId)?.size ?? 0) > 0;
  }

  getUsersInRoom(roomId: string): string[] {
    return [...(this.roomMembers.get(roomId)?.keys() ?? [])];
  }

  getClientCount(): number {
    return this.clients.size;
  }

  private detach(roomId: string, userId: string, socketId: string): boolean {
    const users = this.roomMembers.get(roomId);
    const sockets = users?.get(userId);
    if (!users || !sockets) return false;

    sockets.delete(socketId);
    if (sockets.size > 0) return false;

    users.delete(userId);
    if (users.size === 0) this.roomMembers.delete(roomId);
    return true;
  }
}

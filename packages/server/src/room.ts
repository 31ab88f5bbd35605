/**
 * A single room's live side: its open connections and chat broadcast.
 */

import type { ChatService, ChatHistoryItem } from "./chat-service.js";
import type { Logger } from "./logger.js";
import type { ServerMessage } from "./protocol.js";
import { MSG_CHAT_MESSAGE, MSG_ROOM_JOINED } from "./protocol.js";

/** Handle the room uses to send messages to a connection. */
export interface RoomConnectionHandle {
  connectionId: string;
  userId: string;
  send(msg: ServerMessage): void;
}

export interface RoomOptions {
  roomId: string;
  chat: ChatService;
  historyLimit: number;
  logger: Logger;
}

export class Room {
  private readonly roomId: string;
  private readonly chat: ChatService;
  private readonly historyLimit: number;
  private readonly logger: Logger;
  private readonly connections = new Map<string, RoomConnectionHandle>();

  constructor(options: RoomOptions) {
    this.roomId = options.roomId;
    this.chat = options.chat;
    this.historyLimit = options.historyLimit;
    this.logger = options.logger;
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  has(connectionId: string): boolean {
    return this.connections.has(connectionId);
  }

  /** Add connection to room and send it room_joined with recent history. */
  async join(handle: RoomConnectionHandle): Promise<void> {
    this.connections.set(handle.connectionId, handle);

    let history: ChatHistoryItem[];
    try {
      history = await this.chat.recentMessages(this.roomId, this.historyLimit);
    } catch (err) {
      this.logger.warn({ err, roomId: this.roomId }, "history unavailable on join");
      history = [];
    }

    handle.send({
      type: MSG_ROOM_JOINED,
      payload: {
        roomId: this.roomId,
        connectionId: handle.connectionId,
        userId: handle.userId,
        history,
      },
    });
  }

  leave(connectionId: string): void {
    this.connections.delete(connectionId);
  }

  /** Append to the room's log, then broadcast to everyone in the room. */
  async sendChat(userId: string, message: string): Promise<void> {
    const entryId = await this.chat.sendMessage(this.roomId, userId, message);
    this.broadcast({
      type: MSG_CHAT_MESSAGE,
      payload: { roomId: this.roomId, entryId, userId, message },
    });
  }

  private broadcast(msg: ServerMessage): void {
    for (const conn of this.connections.values()) {
      conn.send(msg);
    }
  }
}

/**
 * Live rooms by id, created on first join and dropped when empty.
 */

import type { ChatService } from "./chat-service.js";
import type { Logger } from "./logger.js";
import { Room } from "./room.js";

export interface RoomManagerOptions {
  chat: ChatService;
  historyLimit: number;
  logger: Logger;
}

export class RoomManager {
  private readonly options: RoomManagerOptions;
  private readonly rooms = new Map<string, Room>();

  constructor(options: RoomManagerOptions) {
    this.options = options;
  }

  get chat(): ChatService {
    return this.options.chat;
  }

  getOrCreate(roomId: string): Room {
    let room = this.rooms.get(roomId);
    if (!room) {
      room = new Room({
        roomId,
        chat: this.options.chat,
        historyLimit: this.options.historyLimit,
        logger: this.options.logger,
      });
      this.rooms.set(roomId, room);
    }
    return room;
  }

  get(roomId: string): Room | undefined {
    return this.rooms.get(roomId);
  }

  removeIfEmpty(roomId: string): void {
    const room = this.rooms.get(roomId);
    if (room && room.connectionCount === 0) {
      this.rooms.delete(roomId);
    }
  }
}

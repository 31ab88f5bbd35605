/**
 * Wraps a WebSocket: parse messages, dispatch to the room.
 */

import type { WebSocket } from "ws";
import type { Logger } from "./logger.js";
import type { ClientMessage, ErrorCode, ServerMessage } from "./protocol.js";
import { clientMessageSchema, MSG_ERROR, MSG_JOIN_ROOM, MSG_LEAVE_ROOM, MSG_SEND_CHAT } from "./protocol.js";
import type { RoomManager } from "./room-manager.js";

function send(ws: WebSocket, msg: ServerMessage): void {
  if (ws.readyState !== ws.OPEN) return;
  ws.send(JSON.stringify(msg));
}

export interface ConnectionOptions {
  connectionId: string;
  userId: string;
  roomManager: RoomManager;
  logger: Logger;
}

export class Connection {
  private readonly ws: WebSocket;
  readonly connectionId: string;
  readonly userId: string;
  private readonly roomManager: RoomManager;
  private readonly logger: Logger;
  private currentRoomId: string | null = null;
  private closed = false;

  constructor(ws: WebSocket, options: ConnectionOptions) {
    this.ws = ws;
    this.connectionId = options.connectionId;
    this.userId = options.userId;
    this.roomManager = options.roomManager;
    this.logger = options.logger.child({ connectionId: this.connectionId, userId: this.userId });

    this.ws.on("message", (data: Buffer | string) => this.handleMessage(data));
    this.ws.on("close", () => this.handleClose());
  }

  get roomId(): string | null {
    return this.currentRoomId;
  }

  private send(msg: ServerMessage): void {
    send(this.ws, msg);
  }

  private sendError(code: ErrorCode, message: string): void {
    this.send({ type: MSG_ERROR, payload: { code, message } });
  }

  private handleMessage(data: Buffer | string): void {
    if (this.closed) return;
    let raw: unknown;
    try {
      raw = JSON.parse(typeof data === "string" ? data : data.toString("utf8"));
    } catch {
      this.sendError("INVALID_JSON", "Invalid JSON");
      return;
    }
    const parsed = clientMessageSchema.safeParse(raw);
    if (!parsed.success) {
      this.sendError("INVALID_MESSAGE", "Unknown or invalid message type");
      return;
    }
    this.dispatch(parsed.data).catch((err: unknown) => {
      this.logger.error({ err }, "message handling failed");
      this.sendError("SERVER_ERROR", err instanceof Error ? err.message : String(err));
    });
  }

  private async dispatch(clientMsg: ClientMessage): Promise<void> {
    switch (clientMsg.type) {
      case MSG_JOIN_ROOM: {
        const { roomId } = clientMsg.payload;
        const exists = await this.roomManager.chat.hasRoom(roomId);
        // the socket may have closed while the lookup was pending
        if (this.closed) return;
        if (!exists) {
          this.sendError("ROOM_NOT_FOUND", `Room ${roomId} does not exist`);
          return;
        }
        this.leaveCurrent();
        this.currentRoomId = roomId;
        const room = this.roomManager.getOrCreate(roomId);
        await room.join({
          connectionId: this.connectionId,
          userId: this.userId,
          send: (m) => this.send(m),
        });
        this.logger.debug({ roomId }, "joined room");
        break;
      }
      case MSG_LEAVE_ROOM: {
        const roomId = clientMsg.payload?.roomId ?? this.currentRoomId;
        if (roomId && this.currentRoomId === roomId) this.leaveCurrent();
        break;
      }
      case MSG_SEND_CHAT: {
        const room = this.currentRoomId ? this.roomManager.get(this.currentRoomId) : undefined;
        if (!room) {
          this.sendError("NOT_IN_ROOM", "Join a room before sending");
          return;
        }
        await room.sendChat(this.userId, clientMsg.payload.message);
        break;
      }
    }
  }

  private leaveCurrent(): void {
    if (!this.currentRoomId) return;
    const room = this.roomManager.get(this.currentRoomId);
    if (room) room.leave(this.connectionId);
    this.roomManager.removeIfEmpty(this.currentRoomId);
    this.currentRoomId = null;
  }

  private handleClose(): void {
    this.closed = true;
    this.leaveCurrent();
  }
}

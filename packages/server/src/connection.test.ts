import { describe, it, expect, vi, beforeEach } from "vitest";
import type { WebSocket } from "ws";
import { ChatService } from "./chat-service.js";
import { Connection } from "./connection.js";
import { createInMemoryLogClient, type InMemoryLogClient } from "./log/in-memory.js";
import { createLogger } from "./logger.js";
import {
  MSG_CHAT_MESSAGE,
  MSG_ERROR,
  MSG_JOIN_ROOM,
  MSG_LEAVE_ROOM,
  MSG_ROOM_JOINED,
  MSG_SEND_CHAT,
} from "./protocol.js";
import { RoomManager } from "./room-manager.js";
import { createInMemoryMessageStore } from "./storage/in-memory.js";

const logger = createLogger({ level: "silent" });

function createMockWs(): {
  ws: {
    readyState: number;
    OPEN: number;
    on: (ev: string, fn: (data?: unknown) => void) => void;
    send: (data: string) => void;
  };
  sent: unknown[];
  emitMessage: (data: string | Buffer) => void;
  emitClose: () => void;
} {
  const listeners: Record<string, (data?: unknown) => void> = {};
  const sent: unknown[] = [];
  return {
    ws: {
      readyState: 1,
      OPEN: 1,
      on(ev: string, fn: (data?: unknown) => void) {
        listeners[ev] = fn;
      },
      send(data: string) {
        sent.push(JSON.parse(data));
      },
    },
    sent,
    emitMessage(data: string | Buffer) {
      listeners["message"]?.(data);
    },
    emitClose() {
      listeners["close"]?.();
    },
  };
}

describe("Connection", () => {
  let mock: ReturnType<typeof createMockWs>;
  let log: InMemoryLogClient;
  let chat: ChatService;
  let roomManager: RoomManager;
  let roomId: string;

  const connect = (connectionId = "c1", userId = "alice"): Connection =>
    new Connection(mock.ws as unknown as WebSocket, { connectionId, userId, roomManager, logger });

  beforeEach(async () => {
    mock = createMockWs();
    log = createInMemoryLogClient({ now: () => 7 });
    chat = new ChatService({ log, store: createInMemoryMessageStore() });
    roomManager = new RoomManager({ chat, historyLimit: 10, logger });
    roomId = (await chat.createRoom("General")).id;
  });

  it("sends INVALID_JSON error for invalid JSON", () => {
    connect();
    mock.emitMessage("not json");
    expect(mock.sent).toEqual([{ type: MSG_ERROR, payload: { code: "INVALID_JSON", message: "Invalid JSON" } }]);
  });

  it("sends INVALID_MESSAGE error for unknown message type", () => {
    connect();
    mock.emitMessage(JSON.stringify({ type: "update_presence", payload: {} }));
    expect(mock.sent).toEqual([
      { type: MSG_ERROR, payload: { code: "INVALID_MESSAGE", message: "Unknown or invalid message type" } },
    ]);
  });

  it("sends INVALID_MESSAGE error for an empty chat message", () => {
    connect();
    mock.emitMessage(JSON.stringify({ type: MSG_SEND_CHAT, payload: { message: "" } }));
    expect(mock.sent).toEqual([
      { type: MSG_ERROR, payload: { code: "INVALID_MESSAGE", message: "Unknown or invalid message type" } },
    ]);
  });

  it("join_room for an unknown room sends ROOM_NOT_FOUND", async () => {
    const conn = connect();
    mock.emitMessage(JSON.stringify({ type: MSG_JOIN_ROOM, payload: { roomId: "nope" } }));
    await vi.waitFor(() => {
      expect(mock.sent).toEqual([
        { type: MSG_ERROR, payload: { code: "ROOM_NOT_FOUND", message: "Room nope does not exist" } },
      ]);
    });
    expect(conn.roomId).toBeNull();
  });

  it("join_room sends room_joined and leave_room cleans up", async () => {
    const conn = connect();
    mock.emitMessage(Buffer.from(JSON.stringify({ type: MSG_JOIN_ROOM, payload: { roomId } })));
    await vi.waitFor(() => {
      expect(mock.sent).toEqual([
        { type: MSG_ROOM_JOINED, payload: { roomId, connectionId: "c1", userId: "alice", history: [] } },
      ]);
    });
    expect(conn.roomId).toBe(roomId);

    mock.emitMessage(JSON.stringify({ type: MSG_LEAVE_ROOM }));
    await vi.waitFor(() => expect(conn.roomId).toBeNull());
    expect(roomManager.get(roomId)).toBeUndefined();
  });

  it("send_chat before joining sends NOT_IN_ROOM", async () => {
    connect();
    mock.emitMessage(JSON.stringify({ type: MSG_SEND_CHAT, payload: { message: "hi" } }));
    await vi.waitFor(() => {
      expect(mock.sent).toEqual([
        { type: MSG_ERROR, payload: { code: "NOT_IN_ROOM", message: "Join a room before sending" } },
      ]);
    });
    expect(await log.length(roomId)).toBe(0);
  });

  it("send_chat in a room appends and broadcasts", async () => {
    connect();
    mock.emitMessage(JSON.stringify({ type: MSG_JOIN_ROOM, payload: { roomId } }));
    await vi.waitFor(() => expect(mock.sent).toHaveLength(1));

    mock.emitMessage(JSON.stringify({ type: MSG_SEND_CHAT, payload: { message: "hello" } }));
    await vi.waitFor(() => {
      expect(mock.sent[1]).toEqual({
        type: MSG_CHAT_MESSAGE,
        payload: { roomId, entryId: "7-0", userId: "alice", message: "hello" },
      });
    });
    expect(await log.length(roomId)).toBe(1);
  });

  it("a failed send reports SERVER_ERROR", async () => {
    connect();
    mock.emitMessage(JSON.stringify({ type: MSG_JOIN_ROOM, payload: { roomId } }));
    await vi.waitFor(() => expect(mock.sent).toHaveLength(1));
    await log.close();

    mock.emitMessage(JSON.stringify({ type: MSG_SEND_CHAT, payload: { message: "lost" } }));
    await vi.waitFor(() => {
      expect(mock.sent[1]).toMatchObject({ type: MSG_ERROR, payload: { code: "SERVER_ERROR" } });
    });
  });

  it("close leaves the room and removes it when empty", async () => {
    connect();
    mock.emitMessage(JSON.stringify({ type: MSG_JOIN_ROOM, payload: { roomId } }));
    await vi.waitFor(() => expect(roomManager.get(roomId)?.connectionCount).toBe(1));
    mock.emitClose();
    expect(roomManager.get(roomId)).toBeUndefined();
  });

  it("a close while join_room is pending never adds the connection to the room", async () => {
    let resolveLookup: (exists: boolean) => void = () => undefined;
    const lookup = new Promise<boolean>((resolve) => {
      resolveLookup = resolve;
    });
    const hasRoom = vi.spyOn(chat, "hasRoom").mockReturnValueOnce(lookup);
    const conn = connect();
    mock.emitMessage(JSON.stringify({ type: MSG_JOIN_ROOM, payload: { roomId } }));
    mock.emitClose();
    resolveLookup(true);
    await vi.waitFor(() => expect(hasRoom).toHaveBeenCalledTimes(1));
    await lookup;
    await new Promise((resolve) => setTimeout(resolve, 10));

    expect(conn.roomId).toBeNull();
    expect(roomManager.get(roomId)).toBeUndefined();
    expect(mock.sent).toHaveLength(0);
  });

  it("ignores messages after close", () => {
    connect();
    mock.emitClose();
    mock.emitMessage("not json");
    expect(mock.sent).toHaveLength(0);
  });

  it("joining another room leaves the current one", async () => {
    const other = (await chat.createRoom("Random")).id;
    const conn = connect();
    mock.emitMessage(JSON.stringify({ type: MSG_JOIN_ROOM, payload: { roomId } }));
    await vi.waitFor(() => expect(conn.roomId).toBe(roomId));
    mock.emitMessage(JSON.stringify({ type: MSG_JOIN_ROOM, payload: { roomId: other } }));
    await vi.waitFor(() => expect(conn.roomId).toBe(other));
    expect(roomManager.get(roomId)).toBeUndefined();
    expect(roomManager.get(other)?.connectionCount).toBe(1);
  });
});

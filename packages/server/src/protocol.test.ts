import { describe, it, expect } from "vitest";
import {
  clientMessageSchema,
  MSG_CHAT_MESSAGE,
  MSG_ERROR,
  MSG_JOIN_ROOM,
  MSG_LEAVE_ROOM,
  MSG_ROOM_JOINED,
  MSG_SEND_CHAT,
} from "./protocol.js";

describe("protocol constants", () => {
  it("client message types are string constants", () => {
    expect(MSG_JOIN_ROOM).toBe("join_room");
    expect(MSG_LEAVE_ROOM).toBe("leave_room");
    expect(MSG_SEND_CHAT).toBe("send_chat");
  });

  it("server message types are string constants", () => {
    expect(MSG_ROOM_JOINED).toBe("room_joined");
    expect(MSG_CHAT_MESSAGE).toBe("chat_message");
    expect(MSG_ERROR).toBe("error");
  });
});

describe("clientMessageSchema", () => {
  it("accepts each client message", () => {
    expect(clientMessageSchema.safeParse({ type: "join_room", payload: { roomId: "r1" } }).success).toBe(true);
    expect(clientMessageSchema.safeParse({ type: "leave_room" }).success).toBe(true);
    expect(clientMessageSchema.safeParse({ type: "send_chat", payload: { message: "hi" } }).success).toBe(true);
  });

  it("rejects unknown types and missing payload fields", () => {
    expect(clientMessageSchema.safeParse({ type: "broadcast_event", payload: {} }).success).toBe(false);
    expect(clientMessageSchema.safeParse({ type: "join_room", payload: {} }).success).toBe(false);
    expect(clientMessageSchema.safeParse({ type: "send_chat", payload: { message: 3 } }).success).toBe(false);
    expect(clientMessageSchema.safeParse("join_room").success).toBe(false);
  });

  it("rejects chat messages over 4000 characters", () => {
    const result = clientMessageSchema.safeParse({ type: "send_chat", payload: { message: "x".repeat(4001) } });
    expect(result.success).toBe(false);
  });
});

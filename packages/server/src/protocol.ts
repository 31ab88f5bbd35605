/**
 * WebSocket wire protocol: JSON messages of shape { type, payload }.
 */

import { z } from "zod";
import type { ChatHistoryItem } from "./chat-service.js";

export type { ChatHistoryItem };

/** Identity attached to a connection at upgrade time. */
export interface UserInfo {
  userId: string;
  name?: string;
}

// ----- Client → Server -----

export const MSG_JOIN_ROOM = "join_room";
export const MSG_LEAVE_ROOM = "leave_room";
export const MSG_SEND_CHAT = "send_chat";

const joinRoomSchema = z.object({
  type: z.literal(MSG_JOIN_ROOM),
  payload: z.object({
    roomId: z.string().min(1),
  }),
});

const leaveRoomSchema = z.object({
  type: z.literal(MSG_LEAVE_ROOM),
  payload: z.object({ roomId: z.string().min(1).optional() }).optional(),
});

const sendChatSchema = z.object({
  type: z.literal(MSG_SEND_CHAT),
  payload: z.object({
    message: z.string().min(1).max(4000),
  }),
});

export const clientMessageSchema = z.discriminatedUnion("type", [joinRoomSchema, leaveRoomSchema, sendChatSchema]);

export type ClientMessage = z.infer<typeof clientMessageSchema>;
export type JoinRoomPayload = z.infer<typeof joinRoomSchema>["payload"];
export type LeaveRoomPayload = NonNullable<z.infer<typeof leaveRoomSchema>["payload"]>;
export type SendChatPayload = z.infer<typeof sendChatSchema>["payload"];

// ----- Server → Client -----

export const MSG_ROOM_JOINED = "room_joined";
export const MSG_CHAT_MESSAGE = "chat_message";
export const MSG_ERROR = "error";

export interface RoomJoinedPayload {
  roomId: string;
  connectionId: string;
  userId: string;
  /** Recent messages, newest first. */
  history: ChatHistoryItem[];
}

export interface ChatMessagePayload {
  roomId: string;
  entryId: string;
  userId: string;
  message: string;
}

export type ErrorCode =
  | "INVALID_JSON"
  | "INVALID_MESSAGE"
  | "ROOM_NOT_FOUND"
  | "NOT_IN_ROOM"
  | "SERVER_ERROR";

export interface ErrorPayload {
  code: ErrorCode;
  message: string;
}

export type ServerMessage =
  | { type: typeof MSG_ROOM_JOINED; payload: RoomJoinedPayload }
  | { type: typeof MSG_CHAT_MESSAGE; payload: ChatMessagePayload }
  | { type: typeof MSG_ERROR; payload: ErrorPayload };

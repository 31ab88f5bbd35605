/**
 * @chatrelay/server - chat rooms on a per-room log, relayed into a durable
 * SQL store by a consumer-group worker.
 */

// Server API
export {
  createServer,
  createRequestHandler,
  createWebSocketServer,
  createWebSocketHandler,
  closeServer,
  type ServerOptions,
  type WebSocketServerOptions,
  type HttpHandlerOptions,
  type ChatHttpServer,
} from "./server.js";

// Chat service
export { ChatService, DEFAULT_HISTORY_LIMIT } from "./chat-service.js";
export type { ChatServiceOptions, ChatHistoryItem } from "./chat-service.js";

// Protocol
export type {
  UserInfo,
  ClientMessage,
  ServerMessage,
  JoinRoomPayload,
  LeaveRoomPayload,
  SendChatPayload,
  RoomJoinedPayload,
  ChatMessagePayload,
  ErrorCode,
  ErrorPayload,
} from "./protocol.js";
export {
  clientMessageSchema,
  MSG_JOIN_ROOM,
  MSG_LEAVE_ROOM,
  MSG_SEND_CHAT,
  MSG_ROOM_JOINED,
  MSG_CHAT_MESSAGE,
  MSG_ERROR,
} from "./protocol.js";

// Relay worker and bootstrap
export {
  RelayWorker,
  DEFAULT_GROUP_NAME,
  DEFAULT_CONSUMER_NAME,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_BATCH_SIZE,
  DEFAULT_RETENTION,
} from "./relay/relay-worker.js";
export type {
  RelayWorkerOptions,
  RelayState,
  TopicCycleResult,
  ReconcileResult,
  CycleResult,
} from "./relay/relay-worker.js";
export { restoreTopic, restoreAllTopics, DEFAULT_RESTORE_LIMIT } from "./relay/restore.js";
export type { RestoreOptions, RestoreResult } from "./relay/restore.js";

// Log clients
export type { LogClient, LogEntry, ChatEntryFields, TrimOptions } from "./log/log-client.js";
export { decodeChatEntry, entryTimestamp } from "./log/log-client.js";
export { createInMemoryLogClient } from "./log/in-memory.js";
export type { InMemoryLogClient, InMemoryLogClientOptions } from "./log/in-memory.js";
export { createRedisLogClient, createRedisLogClientFromConnection } from "./log/redis.js";
export type { RedisLogClientOptions, RedisConnectionConfig } from "./log/redis.js";

// Message stores (require pg / mysql2 / better-sqlite3 for the SQL adapters)
export type { MessageStore, Topic, MessageInput, PersistedMessage, MessageOrder } from "./storage/message-store.js";
export { createInMemoryMessageStore } from "./storage/in-memory.js";
export type { InMemoryMessageStoreOptions } from "./storage/in-memory.js";
export { createPostgresMessageStore } from "./storage/postgres.js";
export type { PostgresMessageStoreOptions, PostgresConnectionConfig } from "./storage/postgres.js";
export { createMySQLMessageStore } from "./storage/mysql.js";
export type { MySQLMessageStoreOptions, MySQLConnectionConfig } from "./storage/mysql.js";
export { createSQLiteMessageStore } from "./storage/sqlite.js";
export type { SQLiteMessageStoreOptions, SQLiteConnectionConfig } from "./storage/sqlite.js";

// Ambient
export { loadConfig, STORE_DRIVERS, type AppConfig, type StoreDriver } from "./config.js";
export { createLogger, componentLogger, type Logger, type LoggerOptions } from "./logger.js";
export {
  RelayError,
  LogUnavailableError,
  GroupMissingError,
  StoreUnavailableError,
  MalformedEntryError,
  ConfigError,
} from "./errors.js";

/**
 * Durable store interface for rooms and their persisted messages.
 * Implementations: in-memory, Postgres, MySQL, SQLite.
 */

/** A chat room. Its id doubles as the log key. */
export interface Topic {
  id: string;
  name: string;
  /** Epoch ms, assigned by the store. */
  createdAt: number;
}

export interface MessageInput {
  senderId: string;
  text: string;
  /** Id of the log entry this row was relayed from; the dedup anchor when present. */
  originEntryId?: string | null;
}

export interface PersistedMessage {
  id: string;
  topicId: string;
  senderId: string;
  text: string;
  originEntryId: string | null;
  /** Epoch ms, assigned by the store. */
  createdAt: number;
}

export type MessageOrder = "newest-first" | "oldest-first";

export interface MessageStore {
  /** Create tables and indexes if they do not exist. Idempotent. */
  init(): Promise<void>;

  listTopicIds(): Promise<string[]>;

  listTopics(): Promise<Topic[]>;

  getTopic(topicId: string): Promise<Topic | null>;

  /**
   * Insert the room if absent; tolerant of concurrent creation.
   * Resolves true when this call created it. Default name: "Room <id>".
   */
  ensureTopic(topicId: string, name?: string): Promise<boolean>;

  /**
   * Insert unless a row with the same (topicId, originEntryId) exists.
   * Atomic in the store: of two concurrent calls exactly one resolves true.
   * The room must already exist.
   */
  insertMessageIfAbsent(topicId: string, message: MessageInput): Promise<boolean>;

  /** The most recent `limit` messages of the room, in the requested order. */
  listMessages(topicId: string, limit: number, order?: MessageOrder): Promise<PersistedMessage[]>;

  /** Release connections. */
  close(): Promise<void>;
}

export const DEFAULT_ROOMS_TABLE = "rooms";
export const DEFAULT_MESSAGES_TABLE = "messages";

export interface SqlTableOptions {
  roomsTable?: string;
  messagesTable?: string;
}

export function defaultTopicName(topicId: string): string {
  return `Room ${topicId}`;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Table names are interpolated into SQL; only plain identifiers are accepted. */
export function resolveTableNames(options: SqlTableOptions): { rooms: string; messages: string } {
  const rooms = options.roomsTable ?? DEFAULT_ROOMS_TABLE;
  const messages = options.messagesTable ?? DEFAULT_MESSAGES_TABLE;
  for (const name of [rooms, messages]) {
    if (!IDENTIFIER.test(name)) throw new Error(`Invalid table name: ${name}`);
  }
  return { rooms, messages };
}

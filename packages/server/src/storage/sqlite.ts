/**
 * SQLite message store (better-sqlite3). Synchronous driver, so every call is
 * its own implicit transaction.
 */

import { createRequire } from "node:module";
import type BetterSqlite3 from "better-sqlite3";
import { StoreUnavailableError } from "../errors.js";
import {
  defaultTopicName,
  resolveTableNames,
  type MessageInput,
  type MessageOrder,
  type MessageStore,
  type PersistedMessage,
  type SqlTableOptions,
  type Topic,
} from "./message-store.js";

const require = createRequire(import.meta.url);

export interface SQLiteMessageStoreOptions extends SqlTableOptions {
  /** Clock for created_at (default Date.now). */
  now?: () => number;
}

export type SQLiteConnectionConfig = string | { filename: string; options?: BetterSqlite3.Options };

interface TopicRow {
  id: string;
  name: string;
  createdAt: number;
}

interface MessageRow {
  id: number;
  topicId: string;
  senderId: string;
  text: string;
  originEntryId: string | null;
  createdAt: number;
}

function loadDriver(): typeof BetterSqlite3 {
  try {
    const driver: typeof BetterSqlite3 = require("better-sqlite3");
    return driver;
  } catch (err) {
    throw new Error('SQLite storage requires the "better-sqlite3" package. Install it with: npm install better-sqlite3', {
      cause: err,
    });
  }
}

function toMessage(row: MessageRow): PersistedMessage {
  return { ...row, id: String(row.id) };
}

export function createSQLiteMessageStore(
  connectionConfig: SQLiteConnectionConfig,
  options: SQLiteMessageStoreOptions = {}
): MessageStore {
  const Database = loadDriver();
  const config = typeof connectionConfig === "string" ? { filename: connectionConfig } : connectionConfig;
  const db = new Database(config.filename, "options" in config ? config.options : undefined);
  const { rooms, messages } = resolveTableNames(options);
  const now = options.now ?? Date.now;

  const run = <T>(operation: string, fn: () => T): Promise<T> => {
    try {
      return Promise.resolve(fn());
    } catch (err) {
      return Promise.reject(new StoreUnavailableError(operation, err));
    }
  };

  const topicColumns = `room_id AS id, room_name AS name, created_at AS createdAt`;
  const messageColumns = `id, room_id AS topicId, user_id AS senderId, message AS text,
    origin_entry_id AS originEntryId, created_at AS createdAt`;

  return {
    init(): Promise<void> {
      return run("init", () => {
        db.pragma("foreign_keys = ON");
        db.exec(`
          CREATE TABLE IF NOT EXISTS ${rooms} (
            room_id TEXT PRIMARY KEY,
            room_name TEXT NOT NULL,
            created_at INTEGER NOT NULL
          );
          CREATE TABLE IF NOT EXISTS ${messages} (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            room_id TEXT NOT NULL REFERENCES ${rooms}(room_id) ON DELETE CASCADE,
            user_id TEXT NOT NULL,
            message TEXT NOT NULL,
            origin_entry_id TEXT,
            created_at INTEGER NOT NULL,
            UNIQUE (room_id, origin_entry_id)
          );
          CREATE INDEX IF NOT EXISTS idx_${messages}_room_created ON ${messages}(room_id, created_at);
        `);
      });
    },

    listTopicIds(): Promise<string[]> {
      return run("listTopicIds", () =>
        db
          .prepare<[], { id: string }>(`SELECT room_id AS id FROM ${rooms}`)
          .all()
          .map((r) => r.id)
      );
    },

    listTopics(): Promise<Topic[]> {
      return run("listTopics", () =>
        db.prepare<[], TopicRow>(`SELECT ${topicColumns} FROM ${rooms} ORDER BY created_at, room_id`).all()
      );
    },

    getTopic(topicId: string): Promise<Topic | null> {
      return run(
        "getTopic",
        () => db.prepare<[string], TopicRow>(`SELECT ${topicColumns} FROM ${rooms} WHERE room_id = ?`).get(topicId) ?? null
      );
    },

    ensureTopic(topicId: string, name?: string): Promise<boolean> {
      return run("ensureTopic", () => {
        const result = db
          .prepare<[string, string, number]>(
            `INSERT INTO ${rooms} (room_id, room_name, created_at) VALUES (?, ?, ?)
             ON CONFLICT(room_id) DO NOTHING`
          )
          .run(topicId, name ?? defaultTopicName(topicId), now());
        return result.changes === 1;
      });
    },

    insertMessageIfAbsent(topicId: string, message: MessageInput): Promise<boolean> {
      return run("insertMessageIfAbsent", () => {
        const result = db
          .prepare<[string, string, string, string | null, number]>(
            `INSERT INTO ${messages} (room_id, user_id, message, origin_entry_id, created_at)
             VALUES (?, ?, ?, ?, ?)
             ON CONFLICT(room_id, origin_entry_id) DO NOTHING`
          )
          .run(topicId, message.senderId, message.text, message.originEntryId ?? null, now());
        return result.changes === 1;
      });
    },

    listMessages(topicId: string, limit: number, order: MessageOrder = "newest-first"): Promise<PersistedMessage[]> {
      return run("listMessages", () => {
        const rows = db
          .prepare<[string, number], MessageRow>(
            `SELECT ${messageColumns} FROM ${messages}
             WHERE room_id = ?
             ORDER BY created_at DESC, id DESC
             LIMIT ?`
          )
          .all(topicId, Math.max(0, limit))
          .map(toMessage);
        return order === "newest-first" ? rows : rows.reverse();
      });
    },

    close(): Promise<void> {
      return run("close", () => {
        db.close();
      });
    },
  };
}

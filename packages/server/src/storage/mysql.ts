/**
 * MySQL message store (mysql2). Dedup relies on the (room_id, origin_entry_id)
 * unique key: with FOUND_ROWS off, a duplicate insert reports zero affected rows.
 */

import type { Pool, PoolOptions, ResultSetHeader, RowDataPacket } from "mysql2/promise";
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

export interface MySQLMessageStoreOptions extends SqlTableOptions {
  /** Clock for created_at (default Date.now). */
  now?: () => number;
}

export type MySQLConnectionConfig = string | PoolOptions;

interface TopicRow extends RowDataPacket {
  id: string;
  name: string;
  createdAt: number | string;
}

interface MessageRow extends RowDataPacket {
  id: number | string;
  topicId: string;
  senderId: string;
  text: string;
  originEntryId: string | null;
  createdAt: number | string;
}

/**
 * Pool options with CLIENT_FOUND_ROWS turned off. mysql2 sets it by default,
 * which makes the no-op `ON DUPLICATE KEY UPDATE` report one affected row.
 */
export function poolOptions(config: MySQLConnectionConfig): PoolOptions {
  const options: PoolOptions = typeof config === "string" ? { uri: config } : { ...config };
  const flags = new Array<string>().concat(options.flags ?? []);
  return { ...options, flags: [...flags.filter((flag) => flag !== "FOUND_ROWS"), "-FOUND_ROWS"] };
}

async function createPool(config: MySQLConnectionConfig): Promise<Pool> {
  let mysql: typeof import("mysql2/promise");
  try {
    mysql = (await import("mysql2/promise")).default;
  } catch (err) {
    throw new Error('MySQL storage requires the "mysql2" package. Install it with: npm install mysql2', {
      cause: err,
    });
  }
  return mysql.createPool(poolOptions(config));
}

function toTopic(row: TopicRow): Topic {
  return { id: row.id, name: row.name, createdAt: Number(row.createdAt) };
}

function toMessage(row: MessageRow): PersistedMessage {
  return {
    id: String(row.id),
    topicId: row.topicId,
    senderId: row.senderId,
    text: row.text,
    originEntryId: row.originEntryId,
    createdAt: Number(row.createdAt),
  };
}

export async function createMySQLMessageStore(
  connectionConfig: MySQLConnectionConfig,
  options: MySQLMessageStoreOptions = {}
): Promise<MessageStore> {
  const pool = await createPool(connectionConfig);
  const { rooms, messages } = resolveTableNames(options);
  const now = options.now ?? Date.now;

  const run = async <T>(operation: string, fn: () => Promise<T>): Promise<T> => {
    try {
      return await fn();
    } catch (err) {
      throw new StoreUnavailableError(operation, err);
    }
  };

  const topicColumns = `room_id AS id, room_name AS name, created_at AS createdAt`;
  const messageColumns = `id, room_id AS topicId, user_id AS senderId, message AS text,
    origin_entry_id AS originEntryId, created_at AS createdAt`;

  return {
    init(): Promise<void> {
      return run("init", async () => {
        await pool.query(`
          CREATE TABLE IF NOT EXISTS ${rooms} (
            room_id VARCHAR(36) PRIMARY KEY,
            room_name VARCHAR(255) NOT NULL,
            created_at BIGINT NOT NULL
          )
        `);
        await pool.query(`
          CREATE TABLE IF NOT EXISTS ${messages} (
            id BIGINT AUTO_INCREMENT PRIMARY KEY,
            room_id VARCHAR(36) NOT NULL,
            user_id VARCHAR(100) NOT NULL,
            message TEXT NOT NULL,
            origin_entry_id VARCHAR(50) NULL,
            created_at BIGINT NOT NULL,
            UNIQUE KEY uq_${messages}_origin (room_id, origin_entry_id),
            INDEX idx_${messages}_room_created (room_id, created_at),
            FOREIGN KEY (room_id) REFERENCES ${rooms}(room_id) ON DELETE CASCADE
          )
        `);
      });
    },

    listTopicIds(): Promise<string[]> {
      return run("listTopicIds", async () => {
        const [rows] = await pool.query<TopicRow[]>(`SELECT ${topicColumns} FROM ${rooms}`);
        return rows.map((r) => r.id);
      });
    },

    listTopics(): Promise<Topic[]> {
      return run("listTopics", async () => {
        const [rows] = await pool.query<TopicRow[]>(`SELECT ${topicColumns} FROM ${rooms} ORDER BY created_at, room_id`);
        return rows.map(toTopic);
      });
    },

    getTopic(topicId: string): Promise<Topic | null> {
      return run("getTopic", async () => {
        const [rows] = await pool.query<TopicRow[]>(`SELECT ${topicColumns} FROM ${rooms} WHERE room_id = ?`, [topicId]);
        const row = rows[0];
        return row ? toTopic(row) : null;
      });
    },

    ensureTopic(topicId: string, name?: string): Promise<boolean> {
      return run("ensureTopic", async () => {
        const [result] = await pool.query<ResultSetHeader>(
          `INSERT INTO ${rooms} (room_id, room_name, created_at) VALUES (?, ?, ?)
           ON DUPLICATE KEY UPDATE room_id = room_id`,
          [topicId, name ?? defaultTopicName(topicId), now()]
        );
        return result.affectedRows === 1;
      });
    },

    insertMessageIfAbsent(topicId: string, message: MessageInput): Promise<boolean> {
      return run("insertMessageIfAbsent", async () => {
        // a no-op update on the duplicate reports 0 affected rows
        const [result] = await pool.query<ResultSetHeader>(
          `INSERT INTO ${messages} (room_id, user_id, message, origin_entry_id, created_at)
           VALUES (?, ?, ?, ?, ?)
           ON DUPLICATE KEY UPDATE id = id`,
          [topicId, message.senderId, message.text, message.originEntryId ?? null, now()]
        );
        return result.affectedRows === 1;
      });
    },

    listMessages(topicId: string, limit: number, order: MessageOrder = "newest-first"): Promise<PersistedMessage[]> {
      return run("listMessages", async () => {
        const [rows] = await pool.query<MessageRow[]>(
          `SELECT ${messageColumns} FROM ${messages}
           WHERE room_id = ?
           ORDER BY created_at DESC, id DESC
           LIMIT ?`,
          [topicId, Math.max(0, limit)]
        );
        const result = rows.map(toMessage);
        return order === "newest-first" ? result : result.reverse();
      });
    },

    close(): Promise<void> {
      return run("close", () => pool.end());
    },
  };
}

/**
 * Postgres message store (pg). Each call checks a client out of the pool for
 * one statement, so no transaction spans the relay's suspension points.
 */

import type { Pool, PoolConfig } from "pg";
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

export interface PostgresMessageStoreOptions extends SqlTableOptions {
  /** Clock for created_at (default Date.now). */
  now?: () => number;
}

export type PostgresConnectionConfig = { connectionString: string } | PoolConfig;

interface TopicRow {
  id: string;
  name: string;
  createdAt: string;
}

interface MessageRow {
  id: string;
  topicId: string;
  senderId: string;
  text: string;
  originEntryId: string | null;
  createdAt: string;
}

async function createPool(config: PostgresConnectionConfig): Promise<Pool> {
  let pg: typeof import("pg").default;
  try {
    pg = (await import("pg")).default;
  } catch (err) {
    throw new Error('Postgres storage requires the "pg" package. Install it with: npm install pg', { cause: err });
  }
  return new pg.Pool(config);
}

// BIGINT columns come back as strings
function toTopic(row: TopicRow): Topic {
  return { id: row.id, name: row.name, createdAt: Number(row.createdAt) };
}

function toMessage(row: MessageRow): PersistedMessage {
  return { ...row, id: String(row.id), createdAt: Number(row.createdAt) };
}

export async function createPostgresMessageStore(
  connectionConfig: PostgresConnectionConfig,
  options: PostgresMessageStoreOptions = {}
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

  const topicColumns = `room_id AS id, room_name AS name, created_at AS "createdAt"`;
  const messageColumns = `id, room_id AS "topicId", user_id AS "senderId", message AS text,
    origin_entry_id AS "originEntryId", created_at AS "createdAt"`;

  return {
    init(): Promise<void> {
      return run("init", async () => {
        await pool.query(`
          CREATE TABLE IF NOT EXISTS ${rooms} (
            room_id VARCHAR(36) PRIMARY KEY,
            room_name VARCHAR(255) NOT NULL,
            created_at BIGINT NOT NULL
          );
          CREATE TABLE IF NOT EXISTS ${messages} (
            id BIGSERIAL PRIMARY KEY,
            room_id VARCHAR(36) NOT NULL REFERENCES ${rooms}(room_id) ON DELETE CASCADE,
            user_id VARCHAR(100) NOT NULL,
            message TEXT NOT NULL,
            origin_entry_id VARCHAR(50),
            created_at BIGINT NOT NULL,
            UNIQUE (room_id, origin_entry_id)
          );
          CREATE INDEX IF NOT EXISTS idx_${messages}_room_created ON ${messages}(room_id, created_at);
        `);
      });
    },

    listTopicIds(): Promise<string[]> {
      return run("listTopicIds", async () => {
        const result = await pool.query<{ id: string }>(`SELECT room_id AS id FROM ${rooms}`);
        return result.rows.map((r) => r.id);
      });
    },

    listTopics(): Promise<Topic[]> {
      return run("listTopics", async () => {
        const result = await pool.query<TopicRow>(`SELECT ${topicColumns} FROM ${rooms} ORDER BY created_at, room_id`);
        return result.rows.map(toTopic);
      });
    },

    getTopic(topicId: string): Promise<Topic | null> {
      return run("getTopic", async () => {
        const result = await pool.query<TopicRow>(`SELECT ${topicColumns} FROM ${rooms} WHERE room_id = $1`, [topicId]);
        const row = result.rows[0];
        return row ? toTopic(row) : null;
      });
    },

    ensureTopic(topicId: string, name?: string): Promise<boolean> {
      return run("ensureTopic", async () => {
        const result = await pool.query(
          `INSERT INTO ${rooms} (room_id, room_name, created_at) VALUES ($1, $2, $3)
           ON CONFLICT (room_id) DO NOTHING`,
          [topicId, name ?? defaultTopicName(topicId), now()]
        );
        return result.rowCount === 1;
      });
    },

    insertMessageIfAbsent(topicId: string, message: MessageInput): Promise<boolean> {
      return run("insertMessageIfAbsent", async () => {
        const result = await pool.query(
          `INSERT INTO ${messages} (room_id, user_id, message, origin_entry_id, created_at)
           VALUES ($1, $2, $3, $4, $5)
           ON CONFLICT (room_id, origin_entry_id) DO NOTHING`,
          [topicId, message.senderId, message.text, message.originEntryId ?? null, now()]
        );
        return result.rowCount === 1;
      });
    },

    listMessages(topicId: string, limit: number, order: MessageOrder = "newest-first"): Promise<PersistedMessage[]> {
      return run("listMessages", async () => {
        const result = await pool.query<MessageRow>(
          `SELECT ${messageColumns} FROM ${messages}
           WHERE room_id = $1
           ORDER BY created_at DESC, id DESC
           LIMIT $2`,
          [topicId, Math.max(0, limit)]
        );
        const rows = result.rows.map(toMessage);
        return order === "newest-first" ? rows : rows.reverse();
      });
    },

    close(): Promise<void> {
      return run("close", () => pool.end());
    },
  };
}

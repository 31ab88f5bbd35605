/**
 * Redis Streams log client (ioredis). One shared connection; commands are
 * pipelined by ioredis, so request handlers may append while the relay reads.
 */

import { Redis, type RedisOptions } from "ioredis";
import { GroupMissingError, LogUnavailableError } from "../errors.js";
import { componentLogger, type Logger } from "../logger.js";
import {
  assertChatEntryFields,
  type ChatEntryFields,
  type LogClient,
  type LogEntry,
  type TrimOptions,
} from "./log-client.js";
import { isBusyGroupError, isNoGroupError, parseEntries, parseReadGroupReply } from "./redis-reply.js";

export interface RedisLogClientOptions {
  /** Per-command timeout in ms (default 500). */
  commandTimeoutMs?: number;
  logger?: Logger;
}

export type RedisConnectionConfig = string | RedisOptions;

const DEFAULT_COMMAND_TIMEOUT_MS = 500;

export function createRedisLogClient(
  connectionConfig: RedisConnectionConfig,
  options: RedisLogClientOptions = {}
): LogClient {
  const commandTimeout = options.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
  const redis =
    typeof connectionConfig === "string"
      ? new Redis(connectionConfig, { commandTimeout, lazyConnect: true })
      : new Redis({ commandTimeout, lazyConnect: true, ...connectionConfig });
  return createRedisLogClientFromConnection(redis, options);
}

/** Wrap an existing ioredis connection. `close()` quits it. */
export function createRedisLogClientFromConnection(
  redis: Redis,
  options: Pick<RedisLogClientOptions, "logger"> = {}
): LogClient {
  const log = componentLogger("redis-log", options.logger);
  // reconnect failures surface here; commands still reject on their own
  redis.on("error", (err: Error) => log.warn({ err }, "redis connection error"));

  const run = async <T>(operation: string, topicId: string | undefined, command: () => Promise<T>): Promise<T> => {
    try {
      return await command();
    } catch (err) {
      throw new LogUnavailableError(operation, topicId, err);
    }
  };

  return {
    async append(topicId: string, fields: ChatEntryFields): Promise<string> {
      assertChatEntryFields(topicId, fields);
      const id = await run("append", topicId, () =>
        redis.xadd(topicId, "*", "user", fields.user, "message", fields.message)
      );
      if (id === null) {
        throw new LogUnavailableError("append", topicId, new Error("XADD returned no id"));
      }
      log.debug({ topicId, entryId: id, user: fields.user }, "XADD");
      return id;
    },

    length(topicId: string): Promise<number> {
      return run("length", topicId, () => redis.xlen(topicId));
    },

    async reverseRange(topicId: string, count: number): Promise<LogEntry[]> {
      if (count <= 0) return [];
      const reply = await run("reverseRange", topicId, () => redis.xrevrange(topicId, "+", "-", "COUNT", count));
      const entries = await run("reverseRange", topicId, async () => parseEntries(reply));
      log.debug({ topicId, count, returned: entries.length }, "XREVRANGE");
      return entries;
    },

    async createGroup(
      topicId: string,
      groupName: string,
      startId: string,
      createTopicIfMissing: boolean
    ): Promise<boolean> {
      try {
        if (createTopicIfMissing) {
          await redis.xgroup("CREATE", topicId, groupName, startId, "MKSTREAM");
        } else {
          await redis.xgroup("CREATE", topicId, groupName, startId);
        }
      } catch (err) {
        if (isBusyGroupError(err)) {
          log.debug({ topicId, groupName }, "consumer group already exists");
          return false;
        }
        throw new LogUnavailableError("createGroup", topicId, err);
      }
      log.debug({ topicId, groupName, startId }, "XGROUP CREATE");
      return true;
    },

    async setGroupCursor(topicId: string, groupName: string, entryId: string): Promise<void> {
      try {
        await redis.xgroup("SETID", topicId, groupName, entryId);
      } catch (err) {
        if (isNoGroupError(err)) throw new GroupMissingError("setGroupCursor", topicId, groupName, err);
        throw new LogUnavailableError("setGroupCursor", topicId, err);
      }
      log.debug({ topicId, groupName, entryId }, "XGROUP SETID");
    },

    async readGroup(
      groupName: string,
      consumerName: string,
      cursors: Readonly<Record<string, string>>,
      maxCount: number
    ): Promise<Map<string, LogEntry[]>> {
      const keys = Object.keys(cursors);
      if (keys.length === 0) return new Map();
      const ids = keys.map((key) => cursors[key]);
      const topicLabel = keys.length === 1 ? keys[0] : undefined;
      let reply: unknown;
      try {
        reply = await redis.xreadgroup(
          "GROUP",
          groupName,
          consumerName,
          "COUNT",
          maxCount,
          "STREAMS",
          ...keys,
          ...ids
        );
      } catch (err) {
        if (isNoGroupError(err) && topicLabel !== undefined) {
          throw new GroupMissingError("readGroup", topicLabel, groupName, err);
        }
        throw new LogUnavailableError("readGroup", topicLabel, err);
      }
      const delivered = await run("readGroup", topicLabel, async () => parseReadGroupReply(reply));
      log.debug({ groupName, consumerName, cursors, streams: delivered.size }, "XREADGROUP");
      return delivered;
    },

    async ack(topicId: string, groupName: string, entryIds: readonly string[]): Promise<number> {
      if (entryIds.length === 0) return 0;
      const acked = await run("ack", topicId, () => redis.xack(topicId, groupName, ...entryIds));
      log.debug({ topicId, groupName, entryIds, acked }, "XACK");
      return acked;
    },

    async trim(topicId: string, maxLen: number, trimOptions: TrimOptions = {}): Promise<number> {
      const approximate = trimOptions.approximate ?? true;
      const removed = await run("trim", topicId, () =>
        approximate ? redis.xtrim(topicId, "MAXLEN", "~", maxLen) : redis.xtrim(topicId, "MAXLEN", maxLen)
      );
      log.debug({ topicId, maxLen, approximate, removed }, "XTRIM");
      return removed;
    },

    async ping(): Promise<void> {
      await run("ping", undefined, () => redis.ping());
    },

    async close(): Promise<void> {
      if (redis.status === "wait" || redis.status === "end") {
        redis.disconnect();
        return;
      }
      await redis.quit();
    },
  };
}

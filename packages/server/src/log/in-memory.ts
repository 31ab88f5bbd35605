/**
 * In-process log client. Models per-topic streams with consumer groups the
 * way the Redis implementation behaves: monotonically increasing "<ms>-<seq>"
 * ids, a last-delivered cursor per group and a pending list per consumer.
 * No server required; used by tests and local runs.
 */

import { GroupMissingError, LogUnavailableError } from "../errors.js";
import {
  assertChatEntryFields,
  LATEST_ENTRY_ID,
  NEW_ENTRIES_CURSOR,
  type ChatEntryFields,
  type LogClient,
  type LogEntry,
  type TrimOptions,
} from "./log-client.js";

interface EntryId {
  ms: number;
  seq: number;
}

interface StoredEntry {
  id: EntryId;
  key: string;
  fields: Record<string, string>;
}

interface PendingEntry {
  consumer: string;
  deliveries: number;
}

interface GroupState {
  lastDelivered: EntryId;
  /** Keyed by entry id string, in delivery order. */
  pending: Map<string, PendingEntry>;
}

interface TopicState {
  entries: StoredEntry[];
  lastId: EntryId;
  groups: Map<string, GroupState>;
}

export interface InMemoryLogClientOptions {
  /** Clock used for entry ids (default Date.now). */
  now?: () => number;
}

const ZERO_ID: EntryId = { ms: 0, seq: 0 };

function formatId(id: EntryId): string {
  return `${id.ms}-${id.seq}`;
}

function parseId(raw: string): EntryId | null {
  const match = /^(\d+)(?:-(\d+))?$/.exec(raw);
  if (!match) return null;
  return { ms: Number(match[1]), seq: match[2] === undefined ? 0 : Number(match[2]) };
}

function compareIds(a: EntryId, b: EntryId): number {
  return a.ms === b.ms ? a.seq - b.seq : a.ms - b.ms;
}

function toLogEntry(entry: StoredEntry): LogEntry {
  return { id: entry.key, fields: { ...entry.fields } };
}

export interface InMemoryLogClient extends LogClient {
  /** Drop every topic, as if the log service had been flushed. */
  clear(): void;
}

export function createInMemoryLogClient(options: InMemoryLogClientOptions = {}): InMemoryLogClient {
  const now = options.now ?? Date.now;
  const topics = new Map<string, TopicState>();
  let closed = false;

  const ensureOpen = (operation: string, topicId?: string): void => {
    if (closed) {
      throw new LogUnavailableError(operation, topicId, new Error("Connection is closed."));
    }
  };

  const nextId = (topic: TopicState): EntryId => {
    const ms = Math.max(now(), topic.lastId.ms);
    const id = ms === topic.lastId.ms ? { ms, seq: topic.lastId.seq + 1 } : { ms, seq: 0 };
    topic.lastId = id;
    return id;
  };

  const createTopic = (topicId: string): TopicState => {
    const topic: TopicState = { entries: [], lastId: ZERO_ID, groups: new Map() };
    topics.set(topicId, topic);
    return topic;
  };

  const groupOf = (operation: string, topicId: string, groupName: string): GroupState => {
    const group = topics.get(topicId)?.groups.get(groupName);
    if (!group) {
      throw new GroupMissingError(
        operation,
        topicId,
        groupName,
        new Error(`NOGROUP No such key '${topicId}' or consumer group '${groupName}'`)
      );
    }
    return group;
  };

  const readNew = (topic: TopicState, group: GroupState, consumer: string, count: number): LogEntry[] => {
    const delivered: LogEntry[] = [];
    for (const entry of topic.entries) {
      if (delivered.length >= count) break;
      if (compareIds(entry.id, group.lastDelivered) <= 0) continue;
      group.lastDelivered = entry.id;
      group.pending.set(entry.key, { consumer, deliveries: 1 });
      delivered.push(toLogEntry(entry));
    }
    return delivered;
  };

  const readPending = (
    topic: TopicState,
    group: GroupState,
    consumer: string,
    after: EntryId,
    count: number
  ): LogEntry[] => {
    const byKey = new Map(topic.entries.map((e) => [e.key, e]));
    const owned = [...group.pending.entries()]
      .filter(([key, p]) => {
        const id = parseId(key);
        return p.consumer === consumer && id !== null && compareIds(id, after) > 0;
      })
      .sort(([a], [b]) => {
        const ia = parseId(a) ?? ZERO_ID;
        const ib = parseId(b) ?? ZERO_ID;
        return compareIds(ia, ib);
      })
      .slice(0, count);
    return owned.map(([key, p]) => {
      p.deliveries += 1;
      const stored = byKey.get(key);
      // trimmed while pending: the id survives, the fields do not
      return stored ? toLogEntry(stored) : { id: key, fields: {} };
    });
  };

  return {
    async append(topicId: string, fields: ChatEntryFields): Promise<string> {
      assertChatEntryFields(topicId, fields);
      ensureOpen("append", topicId);
      const topic = topics.get(topicId) ?? createTopic(topicId);
      const id = nextId(topic);
      const key = formatId(id);
      topic.entries.push({ id, key, fields: { user: fields.user, message: fields.message } });
      return key;
    },

    async length(topicId: string): Promise<number> {
      ensureOpen("length", topicId);
      return topics.get(topicId)?.entries.length ?? 0;
    },

    async reverseRange(topicId: string, count: number): Promise<LogEntry[]> {
      ensureOpen("reverseRange", topicId);
      const entries = topics.get(topicId)?.entries ?? [];
      if (count <= 0) return [];
      return entries.slice(-count).reverse().map(toLogEntry);
    },

    async createGroup(
      topicId: string,
      groupName: string,
      startId: string,
      createTopicIfMissing: boolean
    ): Promise<boolean> {
      ensureOpen("createGroup", topicId);
      let topic = topics.get(topicId);
      if (!topic) {
        if (!createTopicIfMissing) {
          throw new LogUnavailableError(
            "createGroup",
            topicId,
            new Error("ERR The XGROUP subcommand requires the key to exist")
          );
        }
        topic = createTopic(topicId);
      }
      if (topic.groups.has(groupName)) return false;
      const start = startId === LATEST_ENTRY_ID ? topic.lastId : parseId(startId);
      if (!start) {
        throw new LogUnavailableError(
          "createGroup",
          topicId,
          new Error("ERR Invalid stream ID specified as stream command argument")
        );
      }
      topic.groups.set(groupName, { lastDelivered: start, pending: new Map() });
      return true;
    },

    async setGroupCursor(topicId: string, groupName: string, entryId: string): Promise<void> {
      ensureOpen("setGroupCursor", topicId);
      const group = groupOf("setGroupCursor", topicId, groupName);
      const topic = topics.get(topicId);
      const cursor = entryId === LATEST_ENTRY_ID && topic ? topic.lastId : parseId(entryId);
      if (!cursor) {
        throw new LogUnavailableError(
          "setGroupCursor",
          topicId,
          new Error("ERR Invalid stream ID specified as stream command argument")
        );
      }
      group.lastDelivered = cursor;
    },

    async readGroup(
      groupName: string,
      consumerName: string,
      cursors: Readonly<Record<string, string>>,
      maxCount: number
    ): Promise<Map<string, LogEntry[]>> {
      ensureOpen("readGroup");
      const result = new Map<string, LogEntry[]>();
      for (const [topicId, cursor] of Object.entries(cursors)) {
        const group = groupOf("readGroup", topicId, groupName);
        const topic = topics.get(topicId);
        if (!topic) continue;
        let entries: LogEntry[];
        if (cursor === NEW_ENTRIES_CURSOR) {
          entries = readNew(topic, group, consumerName, maxCount);
        } else {
          const after = parseId(cursor);
          if (!after) {
            throw new LogUnavailableError(
              "readGroup",
              topicId,
              new Error("ERR Invalid stream ID specified as stream command argument")
            );
          }
          entries = readPending(topic, group, consumerName, after, maxCount);
        }
        if (entries.length > 0) result.set(topicId, entries);
      }
      return result;
    },

    async ack(topicId: string, groupName: string, entryIds: readonly string[]): Promise<number> {
      ensureOpen("ack", topicId);
      const group = topics.get(topicId)?.groups.get(groupName);
      if (!group) return 0;
      let acked = 0;
      for (const id of entryIds) {
        if (group.pending.delete(id)) acked += 1;
      }
      return acked;
    },

    async trim(topicId: string, maxLen: number, _options?: TrimOptions): Promise<number> {
      // always exact: the in-process log has no macro nodes to round to
      ensureOpen("trim", topicId);
      const topic = topics.get(topicId);
      if (!topic || topic.entries.length <= maxLen) return 0;
      const removed = topic.entries.length - Math.max(0, maxLen);
      topic.entries.splice(0, removed);
      return removed;
    },

    async ping(): Promise<void> {
      ensureOpen("ping");
    },

    async close(): Promise<void> {
      closed = true;
    },

    clear(): void {
      topics.clear();
    },
  };
}

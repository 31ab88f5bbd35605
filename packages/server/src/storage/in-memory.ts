/**
 * In-memory message store. No DB required; default for local runs and tests.
 * Same contract as the SQL adapters, including the (room, origin entry) dedup.
 */

import { StoreUnavailableError } from "../errors.js";
import {
  defaultTopicName,
  type MessageInput,
  type MessageOrder,
  type MessageStore,
  type PersistedMessage,
  type Topic,
} from "./message-store.js";

export interface InMemoryMessageStoreOptions {
  /** Clock for createdAt (default Date.now). */
  now?: () => number;
}

export function createInMemoryMessageStore(options: InMemoryMessageStoreOptions = {}): MessageStore {
  const now = options.now ?? Date.now;
  const topics = new Map<string, Topic>();
  const messages = new Map<string, PersistedMessage[]>();
  const origins = new Set<string>();
  let idCounter = 0;
  let closed = false;

  const ensureOpen = (operation: string): void => {
    if (closed) throw new StoreUnavailableError(operation, new Error("store is closed"));
  };

  return {
    async init(): Promise<void> {
      ensureOpen("init");
    },

    async listTopicIds(): Promise<string[]> {
      ensureOpen("listTopicIds");
      return [...topics.keys()];
    },

    async listTopics(): Promise<Topic[]> {
      ensureOpen("listTopics");
      return [...topics.values()].map((t) => ({ ...t }));
    },

    async getTopic(topicId: string): Promise<Topic | null> {
      ensureOpen("getTopic");
      const topic = topics.get(topicId);
      return topic ? { ...topic } : null;
    },

    async ensureTopic(topicId: string, name?: string): Promise<boolean> {
      ensureOpen("ensureTopic");
      if (topics.has(topicId)) return false;
      topics.set(topicId, { id: topicId, name: name ?? defaultTopicName(topicId), createdAt: now() });
      return true;
    },

    async insertMessageIfAbsent(topicId: string, message: MessageInput): Promise<boolean> {
      ensureOpen("insertMessageIfAbsent");
      if (!topics.has(topicId)) {
        throw new StoreUnavailableError(
          "insertMessageIfAbsent",
          new Error(`foreign key violation: room "${topicId}" does not exist`)
        );
      }
      const originEntryId = message.originEntryId ?? null;
      if (originEntryId !== null) {
        const key = `${topicId}\u0000${originEntryId}`;
        if (origins.has(key)) return false;
        origins.add(key);
      }
      const list = messages.get(topicId) ?? [];
      list.push({
        id: String(++idCounter),
        topicId,
        senderId: message.senderId,
        text: message.text,
        originEntryId,
        createdAt: now(),
      });
      messages.set(topicId, list);
      return true;
    },

    async listMessages(
      topicId: string,
      limit: number,
      order: MessageOrder = "newest-first"
    ): Promise<PersistedMessage[]> {
      ensureOpen("listMessages");
      const list = messages.get(topicId) ?? [];
      const recent = limit > 0 ? list.slice(-limit).map((m) => ({ ...m })) : [];
      return order === "newest-first" ? recent.reverse() : recent;
    },

    async close(): Promise<void> {
      closed = true;
    },
  };
}

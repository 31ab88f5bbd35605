/**
 * Room creation, chat sends and the recent-history read path, on top of the
 * log and the durable store. Used by the HTTP and WebSocket handlers.
 */

import { randomUUID } from "node:crypto";
import { decodeChatEntry, entryTimestamp, type LogClient } from "./log/log-client.js";
import { componentLogger, type Logger } from "./logger.js";
import { DEFAULT_GROUP_NAME } from "./relay/relay-worker.js";
import { DEFAULT_RESTORE_LIMIT, restoreTopic } from "./relay/restore.js";
import type { MessageStore, Topic } from "./storage/message-store.js";

export const DEFAULT_HISTORY_LIMIT = 50;

export interface ChatServiceOptions {
  log: LogClient;
  store: MessageStore;
  logger?: Logger;
  /** Consumer group the relay reads with (default "db-persist-group"). */
  groupName?: string;
  /** Default page size of recentMessages (default 50). */
  historyLimit?: number;
  /** Messages backfilled into a new room's log (default 50). */
  restoreLimit?: number;
}

export interface ChatHistoryItem {
  id: string;
  user: string;
  message: string;
  /** Epoch ms; for log entries, the time part of the entry id. */
  createdAt: number | null;
  source: "log" | "store";
}

export class ChatService {
  private readonly log: LogClient;
  private readonly store: MessageStore;
  private readonly logger: Logger;
  private readonly groupName: string;
  private readonly historyLimit: number;
  private readonly restoreLimit: number;

  constructor(options: ChatServiceOptions) {
    this.log = options.log;
    this.store = options.store;
    this.logger = componentLogger("chat", options.logger);
    this.groupName = options.groupName ?? DEFAULT_GROUP_NAME;
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
    this.restoreLimit = options.restoreLimit ?? DEFAULT_RESTORE_LIMIT;
  }

  /** Persist a new room, then prepare its log (consumer group + backfill). */
  async createRoom(name: string): Promise<Topic> {
    const id = randomUUID();
    await this.store.ensureTopic(id, name);
    try {
      await restoreTopic(id, {
        log: this.log,
        store: this.store,
        logger: this.logger,
        groupName: this.groupName,
        limit: this.restoreLimit,
      });
    } catch (err) {
      // the relay's reconcile creates the group on its next cycle
      this.logger.error({ err, topicId: id }, "failed to prepare log for new room");
    }
    const topic = await this.store.getTopic(id);
    this.logger.info({ topicId: id, name }, "room created");
    return topic ?? { id, name, createdAt: Date.now() };
  }

  listRooms(): Promise<Topic[]> {
    return this.store.listTopics();
  }

  async hasRoom(roomId: string): Promise<boolean> {
    return (await this.store.getTopic(roomId)) !== null;
  }

  /**
   * Newest first. Served from the log while it holds entries, otherwise from
   * the durable store.
   */
  async recentMessages(roomId: string, limit: number = this.historyLimit): Promise<ChatHistoryItem[]> {
    const length = await this.log.length(roomId);
    if (length > 0) {
      const entries = await this.log.reverseRange(roomId, limit);
      const items: ChatHistoryItem[] = [];
      for (const entry of entries) {
        const chat = decodeChatEntry(entry);
        if (!chat) continue;
        items.push({
          id: entry.id,
          user: chat.user,
          message: chat.message,
          createdAt: entryTimestamp(entry.id) ?? null,
          source: "log",
        });
      }
      return items;
    }
    const messages = await this.store.listMessages(roomId, limit, "newest-first");
    this.logger.debug({ topicId: roomId, count: messages.length }, "history served from store");
    return messages.map((m) => ({
      id: m.originEntryId ?? m.id,
      user: m.senderId,
      message: m.text,
      createdAt: m.createdAt,
      source: "store",
    }));
  }

  /** Append to the room's log; the relay persists it. Resolves to the entry id. */
  sendMessage(roomId: string, user: string, message: string): Promise<string> {
    return this.log.append(roomId, { user, message });
  }
}

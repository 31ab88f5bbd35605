/**
 * Backfill a room's log from the durable store so read paths that rely on the
 * log are not empty after the log was cleared.
 *
 * History is appended before the consumer group exists, and the group is then
 * created at the last restored id, so restored entries are never delivered to
 * the relay. A restore that fails partway leaves entries but no group; the
 * retry finds a non-empty log and creates the group at "$".
 */

import { LATEST_ENTRY_ID, type LogClient } from "../log/log-client.js";
import { componentLogger, type Logger } from "../logger.js";
import type { MessageStore } from "../storage/message-store.js";
import { DEFAULT_GROUP_NAME } from "./relay-worker.js";

export const DEFAULT_RESTORE_LIMIT = 50;

export interface RestoreOptions {
  log: LogClient;
  store: MessageStore;
  logger?: Logger;
  groupName?: string;
  /** Most recent persisted messages to append (default 50). */
  limit?: number;
}

export interface RestoreResult {
  topicId: string;
  groupCreated: boolean;
  restored: number;
}

export async function restoreTopic(topicId: string, options: RestoreOptions): Promise<RestoreResult> {
  const logger = componentLogger("restore", options.logger);
  const groupName = options.groupName ?? DEFAULT_GROUP_NAME;
  const limit = options.limit ?? DEFAULT_RESTORE_LIMIT;

  const length = await options.log.length(topicId);
  if (length > 0) {
    const groupCreated = await options.log.createGroup(topicId, groupName, LATEST_ENTRY_ID, true);
    logger.debug({ topicId, length, groupCreated }, "log already has entries; skipping restore");
    return { topicId, groupCreated, restored: 0 };
  }

  const history = await options.store.listMessages(topicId, limit, "oldest-first");
  let startId: string = LATEST_ENTRY_ID;
  for (const message of history) {
    startId = await options.log.append(topicId, { user: message.senderId, message: message.text });
  }
  const groupCreated = await options.log.createGroup(topicId, groupName, startId, true);
  if (!groupCreated && history.length > 0) {
    // a group left on an empty log would deliver the restored entries
    await options.log.setGroupCursor(topicId, groupName, startId);
  }
  if (history.length > 0) logger.info({ topicId, restored: history.length }, "restored log from store");
  return { topicId, groupCreated, restored: history.length };
}

/**
 * Restore every room in the store; run on startup before the relay's first
 * cycle. A room that fails is logged and skipped. Listing rooms is not
 * caught: a store that cannot be read at startup is fatal.
 */
export async function restoreAllTopics(options: RestoreOptions): Promise<RestoreResult[]> {
  const logger = componentLogger("restore", options.logger);
  const topicIds = await options.store.listTopicIds();
  const results: RestoreResult[] = [];
  for (const topicId of topicIds) {
    try {
      results.push(await restoreTopic(topicId, options));
    } catch (err) {
      logger.error({ err, topicId }, "restore failed");
    }
  }
  logger.info({ rooms: topicIds.length, restored: results.reduce((n, r) => n + r.restored, 0) }, "bootstrap done");
  return results;
}

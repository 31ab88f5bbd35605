/**
 * Log client contract: an ordered, per-topic append-only log with
 * consumer-group delivery tracking. Topic ids are used directly as log keys.
 */

import { MalformedEntryError } from "../errors.js";

/** Fields every chat entry carries, in this order. */
export const ENTRY_FIELDS = ["user", "message"] as const;

export type EntryFieldName = (typeof ENTRY_FIELDS)[number];

export interface ChatEntryFields {
  /** Sender identifier. */
  user: string;
  /** Text payload. */
  message: string;
}

/**
 * One entry as read back from the log. Fields are untrusted: anything may have
 * appended to the key, and a pending entry that was trimmed comes back empty.
 */
export interface LogEntry {
  id: string;
  fields: Readonly<Record<string, string>>;
}

/** Delivers only entries never delivered to any consumer of the group. */
export const NEW_ENTRIES_CURSOR = ">";
/** Re-reads the entries delivered to this consumer but not yet acknowledged. */
export const PENDING_ENTRIES_CURSOR = "0";
/** Group start id meaning "only entries appended after the group exists". */
export const LATEST_ENTRY_ID = "$";

export interface TrimOptions {
  /** Allow the service to keep slightly more than maxLen (default true). */
  approximate?: boolean;
}

export interface LogClient {
  /** Append one entry; resolves to the log-assigned id. */
  append(topicId: string, fields: ChatEntryFields): Promise<string>;

  /** Current entry count; 0 when the topic does not exist. */
  length(topicId: string): Promise<number>;

  /** Up to `count` entries, newest first. Empty for an empty or missing topic. */
  reverseRange(topicId: string, count: number): Promise<LogEntry[]>;

  /**
   * Create a consumer group. Resolves true when created, false when the group
   * already exists.
   */
  createGroup(
    topicId: string,
    groupName: string,
    startId: string,
    createTopicIfMissing: boolean
  ): Promise<boolean>;

  /**
   * Move the group's last-delivered cursor to `entryId`; entries up to it are
   * never delivered to the group.
   */
  setGroupCursor(topicId: string, groupName: string, entryId: string): Promise<void>;

  /**
   * Group-scoped read. `cursors` maps topic id to ">" (new entries) or "0"
   * (this consumer's pending entries). Topics with nothing to deliver are
   * absent from the result.
   */
  readGroup(
    groupName: string,
    consumerName: string,
    cursors: Readonly<Record<string, string>>,
    maxCount: number
  ): Promise<Map<string, LogEntry[]>>;

  /** Acknowledge entries for the group; resolves to the number acknowledged. */
  ack(topicId: string, groupName: string, entryIds: readonly string[]): Promise<number>;

  /** Drop the oldest entries beyond `maxLen`; resolves to the number removed. */
  trim(topicId: string, maxLen: number, options?: TrimOptions): Promise<number>;

  /** Round-trip to the service; rejects with LogUnavailableError when unreachable. */
  ping(): Promise<void>;

  close(): Promise<void>;
}

/** Field names absent (or empty) in `fields`. */
export function missingEntryFields(
  fields: Readonly<Record<string, string>> | ChatEntryFields
): EntryFieldName[] {
  return ENTRY_FIELDS.filter((name) => typeof fields[name] !== "string" || fields[name] === "");
}

/** Rejects an append whose fields are incomplete before it reaches the service. */
export function assertChatEntryFields(topicId: string, fields: ChatEntryFields): void {
  const missing = missingEntryFields(fields);
  if (missing.length > 0) throw new MalformedEntryError(topicId, undefined, missing);
}

/** `user`/`message` of a read entry, or null when either is missing. */
export function decodeChatEntry(entry: LogEntry): ChatEntryFields | null {
  const { user, message } = entry.fields;
  if (!user || !message) return null;
  return { user, message };
}

/** Milliseconds part of a `<ms>-<seq>` entry id, or undefined for any other shape. */
export function entryTimestamp(entryId: string): number | undefined {
  const match = /^(\d+)-\d+$/.exec(entryId);
  return match ? Number(match[1]) : undefined;
}

/**
 * Parsers for raw Redis stream replies (XRANGE/XREVRANGE/XREADGROUP).
 */

import type { LogEntry } from "./log-client.js";

export class UnexpectedReplyError extends Error {
  constructor(what: string, reply: unknown) {
    super(`Unexpected ${what} reply: ${JSON.stringify(reply)}`);
    this.name = "UnexpectedReplyError";
  }
}

function asText(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (Buffer.isBuffer(value)) return value.toString("utf8");
  return null;
}

/** Flat [field, value, field, value, ...] list to a record. A null list is a trimmed pending entry. */
export function parseFieldList(raw: unknown): Record<string, string> {
  if (raw === null) return {};
  if (!Array.isArray(raw) || raw.length % 2 !== 0) {
    throw new UnexpectedReplyError("field list", raw);
  }
  const fields: Record<string, string> = {};
  for (let i = 0; i < raw.length; i += 2) {
    const name = asText(raw[i]);
    const value = asText(raw[i + 1]);
    if (name === null || value === null) throw new UnexpectedReplyError("field list", raw);
    fields[name] = value;
  }
  return fields;
}

/** [[id, [field, value, ...]], ...] to entries, preserving reply order. */
export function parseEntries(raw: unknown): LogEntry[] {
  if (!Array.isArray(raw)) throw new UnexpectedReplyError("entry list", raw);
  return raw.map((item: unknown) => {
    if (!Array.isArray(item) || item.length !== 2) {
      throw new UnexpectedReplyError("entry", item);
    }
    const id = asText(item[0]);
    if (id === null) throw new UnexpectedReplyError("entry id", item[0]);
    return { id, fields: parseFieldList(item[1]) };
  });
}

/**
 * XREADGROUP reply [[key, entries], ...] (or null when nothing was delivered)
 * to a map of topic id to entries. Keys with no entries are left out.
 */
export function parseReadGroupReply(raw: unknown): Map<string, LogEntry[]> {
  const result = new Map<string, LogEntry[]>();
  if (raw === null) return result;
  if (!Array.isArray(raw)) throw new UnexpectedReplyError("XREADGROUP", raw);
  for (const stream of raw) {
    if (!Array.isArray(stream) || stream.length !== 2) {
      throw new UnexpectedReplyError("XREADGROUP stream", stream);
    }
    const key = asText(stream[0]);
    if (key === null) throw new UnexpectedReplyError("stream key", stream[0]);
    const entries = parseEntries(stream[1]);
    if (entries.length > 0) result.set(key, entries);
  }
  return result;
}

/** True for the "group already exists" reply of XGROUP CREATE. */
export function isBusyGroupError(err: unknown): boolean {
  return err instanceof Error && err.message.startsWith("BUSYGROUP");
}

/** True when XREADGROUP names a stream or group that does not exist. */
export function isNoGroupError(err: unknown): boolean {
  return err instanceof Error && err.message.startsWith("NOGROUP");
}

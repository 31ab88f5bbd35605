/**
 * Relay worker: drains each room's log through a consumer group into the
 * durable store, acknowledges what reached a terminal outcome, and trims the
 * log to its retention bound.
 *
 * One cycle = reconcile the active rooms against the store, then for each room
 * drain → commit → ack → trim. Cycles repeat every pollIntervalMs, measured
 * from the end of the previous cycle, until the abort signal fires.
 */

import { setTimeout as delay } from "node:timers/promises";
import { GroupMissingError, MalformedEntryError } from "../errors.js";
import {
  decodeChatEntry,
  LATEST_ENTRY_ID,
  missingEntryFields,
  NEW_ENTRIES_CURSOR,
  PENDING_ENTRIES_CURSOR,
  type LogClient,
  type LogEntry,
} from "../log/log-client.js";
import { componentLogger, type Logger } from "../logger.js";
import type { MessageStore } from "../storage/message-store.js";

export const DEFAULT_GROUP_NAME = "db-persist-group";
export const DEFAULT_CONSUMER_NAME = "db-worker-1";
export const DEFAULT_POLL_INTERVAL_MS = 1000;
export const DEFAULT_BATCH_SIZE = 10;
export const DEFAULT_RETENTION = 50;

export type RelayState =
  | "idle"
  | "reconciling"
  | "draining"
  | "committing"
  | "acking"
  | "trimming"
  | "stopped";

export interface RelayWorkerOptions {
  log: LogClient;
  store: MessageStore;
  logger?: Logger;
  /** Consumer group shared by every relay of this log (default "db-persist-group"). */
  groupName?: string;
  /** Fixed consumer name of this process (default "db-worker-1"). */
  consumerName?: string;
  /** Pause between cycles in ms (default 1000). */
  pollIntervalMs?: number;
  /** Entries per group read (default 10). */
  batchSize?: number;
  /** Entries kept per room log after trimming (default 50). */
  retention?: number;
  /** Let the log keep slightly more than `retention` (default true). */
  approximateTrim?: boolean;
}

export interface TopicCycleResult {
  topicId: string;
  delivered: number;
  inserted: number;
  duplicates: number;
  malformed: number;
  /** Entries left un-acked for redelivery. */
  failed: number;
  acked: number;
  trimmed: number;
  /** The failure that ended this room's drain early, if any. */
  error?: Error;
}

export interface ReconcileResult {
  added: string[];
  removed: string[];
}

export interface CycleResult extends ReconcileResult {
  topics: TopicCycleResult[];
}

interface CommitOutcome {
  committed: string[];
  malformed: number;
  failure?: Error;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

async function sleep(ms: number, signal: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (!signal.aborted) throw err;
  }
}

export class RelayWorker {
  private readonly log: LogClient;
  private readonly store: MessageStore;
  private readonly logger: Logger;
  readonly groupName: string;
  readonly consumerName: string;
  private readonly pollIntervalMs: number;
  private readonly batchSize: number;
  private readonly retention: number;
  private readonly approximateTrim: boolean;

  private active: ReadonlySet<string> = new Set();
  /** Rooms whose own pending entries must be re-read before new ones. */
  private readonly recovering = new Set<string>();
  private currentState: RelayState = "idle";
  private controller: AbortController | null = null;
  private running: Promise<void> | null = null;

  constructor(options: RelayWorkerOptions) {
    this.log = options.log;
    this.store = options.store;
    this.logger = componentLogger("relay", options.logger);
    this.groupName = options.groupName ?? DEFAULT_GROUP_NAME;
    this.consumerName = options.consumerName ?? DEFAULT_CONSUMER_NAME;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.retention = options.retention ?? DEFAULT_RETENTION;
    this.approximateTrim = options.approximateTrim ?? true;
  }

  get state(): RelayState {
    return this.currentState;
  }

  get activeTopics(): ReadonlySet<string> {
    return new Set(this.active);
  }

  get isRunning(): boolean {
    return this.running !== null;
  }

  /**
   * Recompute the active set from the store. New rooms get a consumer group
   * starting after the latest entry; a room whose group cannot be created is
   * left out and retried next cycle. If the store is unreachable the previous
   * set is kept.
   */
  async reconcile(): Promise<ReconcileResult> {
    this.currentState = "reconciling";
    let storeIds: string[];
    try {
      storeIds = await this.store.listTopicIds();
    } catch (err) {
      this.logger.error({ err }, "failed to list rooms; keeping the current active set");
      return { added: [], removed: [] };
    }

    const wanted = new Set(storeIds);
    const next = new Set<string>();
    const added: string[] = [];
    for (const topicId of wanted) {
      if (this.active.has(topicId)) {
        next.add(topicId);
        continue;
      }
      try {
        await this.log.createGroup(topicId, this.groupName, LATEST_ENTRY_ID, true);
      } catch (err) {
        this.logger.error({ err, topicId }, "failed to create consumer group; will retry next cycle");
        continue;
      }
      next.add(topicId);
      this.recovering.add(topicId);
      added.push(topicId);
    }
    const removed = [...this.active].filter((topicId) => !wanted.has(topicId));
    for (const topicId of removed) this.recovering.delete(topicId);
    this.active = next;

    if (added.length > 0) this.logger.info({ added }, "discovered rooms");
    if (removed.length > 0) this.logger.info({ removed }, "rooms no longer in store");
    return { added, removed };
  }

  /** Drain, commit, ack and trim one room. Never throws. */
  async processTopic(topicId: string, signal?: AbortSignal): Promise<TopicCycleResult> {
    const result: TopicCycleResult = {
      topicId,
      delivered: 0,
      inserted: 0,
      duplicates: 0,
      malformed: 0,
      failed: 0,
      acked: 0,
      trimmed: 0,
    };

    try {
      await this.drain(topicId, result, signal);
    } catch (err) {
      result.error = toError(err);
      this.recovering.add(topicId);
      if (err instanceof GroupMissingError) {
        // level-triggered: the next reconcile re-creates the group
        const next = new Set(this.active);
        next.delete(topicId);
        this.active = next;
        this.logger.warn({ err, topicId }, "consumer group vanished; room will be re-added");
      } else {
        this.logger.error({ err, topicId }, "room drain failed; will retry next cycle");
      }
    }

    if (result.error === undefined) {
      try {
        await this.trim(topicId, result);
      } catch (err) {
        this.logger.error({ err, topicId }, "trim failed");
      }
    }

    if (result.delivered > 0 || result.error !== undefined) {
      const { error: _error, ...counts } = result;
      this.logger.debug(counts, "room cycle done");
    }
    return result;
  }

  /** One sweep over every active room. */
  async runCycle(signal?: AbortSignal): Promise<CycleResult> {
    const { added, removed } = await this.reconcile();
    const topics: TopicCycleResult[] = [];
    for (const topicId of [...this.active]) {
      if (signal?.aborted) break;
      topics.push(await this.processTopic(topicId, signal));
    }
    this.currentState = "idle";
    return { added, removed, topics };
  }

  /** Run cycles until `signal` aborts. Resolves once the in-flight step has finished. */
  async run(signal: AbortSignal): Promise<void> {
    this.logger.info(
      { groupName: this.groupName, consumerName: this.consumerName, pollIntervalMs: this.pollIntervalMs },
      "relay worker started"
    );
    while (!signal.aborted) {
      try {
        await this.runCycle(signal);
      } catch (err) {
        this.logger.error({ err }, "unexpected error in relay cycle");
      }
      if (signal.aborted) break;
      this.currentState = "idle";
      await sleep(this.pollIntervalMs, signal);
    }
    this.currentState = "stopped";
    this.logger.info("relay worker stopped");
  }

  /** Start the loop in the background. No-op when already running. */
  start(): void {
    if (this.running) return;
    const controller = new AbortController();
    this.controller = controller;
    this.running = this.run(controller.signal)
      .catch((err: unknown) => {
        this.logger.error({ err }, "relay worker crashed");
      })
      .finally(() => {
        this.running = null;
        this.controller = null;
      });
  }

  /** Signal the loop to stop and wait for the in-flight cycle step to finish. */
  async stop(): Promise<void> {
    this.controller?.abort();
    await this.running;
  }

  private async drain(topicId: string, result: TopicCycleResult, signal?: AbortSignal): Promise<void> {
    while (!signal?.aborted) {
      const cursor = this.recovering.has(topicId) ? PENDING_ENTRIES_CURSOR : NEW_ENTRIES_CURSOR;
      this.currentState = "draining";
      const delivered = await this.log.readGroup(
        this.groupName,
        this.consumerName,
        { [topicId]: cursor },
        this.batchSize
      );
      const entries = delivered.get(topicId) ?? [];

      if (entries.length === 0) {
        if (cursor === PENDING_ENTRIES_CURSOR) {
          this.recovering.delete(topicId);
          continue;
        }
        return;
      }
      if (cursor === PENDING_ENTRIES_CURSOR) {
        this.logger.info({ topicId, count: entries.length }, "redelivering pending entries");
      }
      result.delivered += entries.length;

      const { committed, malformed, failure } = await this.commit(topicId, entries, result);

      this.currentState = "acking";
      if (committed.length > 0) {
        result.acked += await this.log.ack(topicId, this.groupName, committed);
      }
      if (failure) {
        result.failed += entries.length - committed.length - malformed;
        throw failure;
      }
      if (cursor === NEW_ENTRIES_CURSOR && entries.length < this.batchSize) return;
    }
  }

  /**
   * Persist entries in delivery order. Malformed entries are acked at once.
   * The first store failure stops the batch so the rest stay pending in order.
   */
  private async commit(topicId: string, entries: LogEntry[], result: TopicCycleResult): Promise<CommitOutcome> {
    this.currentState = "committing";
    const committed: string[] = [];
    let malformed = 0;
    let topicEnsured = false;

    for (const entry of entries) {
      const chat = decodeChatEntry(entry);
      if (!chat) {
        const error = new MalformedEntryError(topicId, entry.id, missingEntryFields(entry.fields));
        this.logger.warn({ topicId, entryId: entry.id, fields: entry.fields }, error.message);
        result.acked += await this.log.ack(topicId, this.groupName, [entry.id]);
        result.malformed += 1;
        malformed += 1;
        continue;
      }

      try {
        if (!topicEnsured) {
          await this.store.ensureTopic(topicId);
          topicEnsured = true;
        }
        const inserted = await this.store.insertMessageIfAbsent(topicId, {
          senderId: chat.user,
          text: chat.message,
          originEntryId: entry.id,
        });
        if (inserted) {
          result.inserted += 1;
        } else {
          result.duplicates += 1;
          this.logger.debug({ topicId, entryId: entry.id }, "entry already persisted");
        }
        committed.push(entry.id);
      } catch (err) {
        return { committed, malformed, failure: toError(err) };
      }
    }
    return { committed, malformed };
  }

  private async trim(topicId: string, result: TopicCycleResult): Promise<void> {
    this.currentState = "trimming";
    const length = await this.log.length(topicId);
    if (length <= this.retention) return;
    result.trimmed = await this.log.trim(topicId, this.retention, { approximate: this.approximateTrim });
  }
}

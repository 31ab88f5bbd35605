import { describe, it, expect } from "vitest";
import { LogUnavailableError } from "../errors.js";
import { createInMemoryLogClient } from "../log/in-memory.js";
import type { LogClient } from "../log/log-client.js";
import { createInMemoryMessageStore } from "../storage/in-memory.js";
import type { MessageStore } from "../storage/message-store.js";
import { RelayWorker } from "./relay-worker.js";
import { restoreAllTopics, restoreTopic } from "./restore.js";

async function seedStore(store: MessageStore, topicId: string, count: number): Promise<void> {
  await store.ensureTopic(topicId);
  for (let i = 0; i < count; i++) {
    await store.insertMessageIfAbsent(topicId, { senderId: `user${i}`, text: `old${i}`, originEntryId: `1-${i}` });
  }
}

describe("restoreTopic", () => {
  it("backfills an empty log with the most recent messages, oldest first", async () => {
    const log = createInMemoryLogClient();
    const store = createInMemoryMessageStore();
    await seedStore(store, "r1", 5);

    const result = await restoreTopic("r1", { log, store, limit: 3 });
    expect(result).toEqual({ topicId: "r1", groupCreated: true, restored: 3 });

    const entries = await log.reverseRange("r1", 10);
    expect(entries.map((e) => e.fields)).toEqual([
      { user: "user4", message: "old4" },
      { user: "user3", message: "old3" },
      { user: "user2", message: "old2" },
    ]);
  });

  it("is a no-op when the group already exists", async () => {
    const log = createInMemoryLogClient();
    const store = createInMemoryMessageStore();
    await seedStore(store, "r1", 2);

    await restoreTopic("r1", { log, store });
    const again = await restoreTopic("r1", { log, store });
    expect(again).toEqual({ topicId: "r1", groupCreated: false, restored: 0 });
    expect(await log.length("r1")).toBe(2);
  });

  it("does not append when the log still holds entries", async () => {
    const log = createInMemoryLogClient();
    const store = createInMemoryMessageStore();
    await seedStore(store, "r1", 2);
    await log.append("r1", { user: "live", message: "kept" });

    const result = await restoreTopic("r1", { log, store });
    expect(result).toEqual({ topicId: "r1", groupCreated: true, restored: 0 });
    expect(await log.length("r1")).toBe(1);
  });

  it("creates the group for a room with no history", async () => {
    const log = createInMemoryLogClient();
    const store = createInMemoryMessageStore();
    await store.ensureTopic("empty");
    expect(await restoreTopic("empty", { log, store })).toEqual({
      topicId: "empty",
      groupCreated: true,
      restored: 0,
    });
    expect(await log.createGroup("empty", "db-persist-group", "$", false)).toBe(false);
  });

  it("restored entries are not relayed back into the store", async () => {
    const log = createInMemoryLogClient();
    const store = createInMemoryMessageStore();
    await seedStore(store, "r1", 4);
    await restoreTopic("r1", { log, store });

    const worker = new RelayWorker({ log, store });
    const cycle = await worker.runCycle();
    expect(cycle.topics[0]).toMatchObject({ topicId: "r1", delivered: 0, inserted: 0 });
    expect(await store.listMessages("r1", 100)).toHaveLength(4);

    await log.append("r1", { user: "alice", message: "fresh" });
    const next = await worker.runCycle();
    expect(next.topics[0]?.inserted).toBe(1);
    expect(await store.listMessages("r1", 100)).toHaveLength(5);
  });

  it("a retry after group creation failed relays none of the restored entries", async () => {
    const log = createInMemoryLogClient();
    const store = createInMemoryMessageStore();
    await seedStore(store, "r1", 4);
    let failures = 1;
    const flaky: LogClient = {
      ...log,
      async createGroup(topicId, groupName, startId, createTopicIfMissing) {
        if (failures-- > 0) throw new LogUnavailableError("createGroup", topicId, new Error("timeout"));
        return log.createGroup(topicId, groupName, startId, createTopicIfMissing);
      },
    };

    await expect(restoreTopic("r1", { log: flaky, store })).rejects.toThrow(LogUnavailableError);
    expect(await log.length("r1")).toBe(4);

    const again = await restoreTopic("r1", { log: flaky, store });
    expect(again).toEqual({ topicId: "r1", groupCreated: true, restored: 0 });
    expect(await log.length("r1")).toBe(4);

    const cycle = await new RelayWorker({ log, store }).runCycle();
    expect(cycle.topics[0]).toMatchObject({ topicId: "r1", delivered: 0, inserted: 0 });
    expect((await store.listMessages("r1", 100, "oldest-first")).map((m) => m.text)).toEqual([
      "old0",
      "old1",
      "old2",
      "old3",
    ]);
  });

  it("a retry after an append failed keeps the partial history out of the relay", async () => {
    const log = createInMemoryLogClient();
    const store = createInMemoryMessageStore();
    await seedStore(store, "r1", 3);
    let appends = 0;
    const flaky: LogClient = {
      ...log,
      async append(topicId, fields) {
        if (++appends === 2) throw new LogUnavailableError("append", topicId, new Error("timeout"));
        return log.append(topicId, fields);
      },
    };

    await expect(restoreTopic("r1", { log: flaky, store })).rejects.toThrow(LogUnavailableError);
    expect(await restoreTopic("r1", { log: flaky, store })).toEqual({
      topicId: "r1",
      groupCreated: true,
      restored: 0,
    });

    await new RelayWorker({ log, store }).runCycle();
    expect(await store.listMessages("r1", 100)).toHaveLength(3);
  });

  it("moves an existing group past the restored entries on an empty log", async () => {
    const log = createInMemoryLogClient();
    const store = createInMemoryMessageStore();
    await seedStore(store, "r1", 2);
    await log.createGroup("r1", "db-persist-group", "$", true);

    expect(await restoreTopic("r1", { log, store })).toEqual({ topicId: "r1", groupCreated: false, restored: 2 });

    const cycle = await new RelayWorker({ log, store }).runCycle();
    expect(cycle.topics[0]).toMatchObject({ topicId: "r1", delivered: 0, inserted: 0 });
    expect(await store.listMessages("r1", 100)).toHaveLength(2);
  });
});

describe("restoreAllTopics", () => {
  it("restores every room and skips the ones that fail", async () => {
    const log = createInMemoryLogClient();
    const store = createInMemoryMessageStore();
    await seedStore(store, "good", 2);
    await seedStore(store, "bad", 2);
    const view: LogClient = {
      ...log,
      async createGroup(topicId, groupName, startId, createTopicIfMissing) {
        if (topicId === "bad") throw new LogUnavailableError("createGroup", topicId, new Error("timeout"));
        return log.createGroup(topicId, groupName, startId, createTopicIfMissing);
      },
    };

    const results = await restoreAllTopics({ log: view, store });
    expect(results).toEqual([{ topicId: "good", groupCreated: true, restored: 2 }]);
    expect(await log.length("bad")).toBe(2);

    const retry = await restoreAllTopics({ log, store });
    expect(retry).toEqual([
      { topicId: "good", groupCreated: false, restored: 0 },
      { topicId: "bad", groupCreated: true, restored: 0 },
    ]);
    await new RelayWorker({ log, store }).runCycle();
    expect(await store.listMessages("bad", 100)).toHaveLength(2);
  });

  it("propagates a failure to list rooms", async () => {
    const store = createInMemoryMessageStore();
    await store.close();
    await expect(restoreAllTopics({ log: createInMemoryLogClient(), store })).rejects.toThrow("listTopicIds");
  });
});

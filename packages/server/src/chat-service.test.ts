import { describe, it, expect } from "vitest";
import { ChatService } from "./chat-service.js";
import { LogUnavailableError } from "./errors.js";
import { createInMemoryLogClient } from "./log/in-memory.js";
import type { LogClient } from "./log/log-client.js";
import { createInMemoryMessageStore } from "./storage/in-memory.js";

describe("ChatService", () => {
  it("createRoom persists the room and prepares its consumer group", async () => {
    const log = createInMemoryLogClient();
    const store = createInMemoryMessageStore({ now: () => 42 });
    const chat = new ChatService({ log, store });

    const room = await chat.createRoom("General");
    expect(room).toMatchObject({ name: "General", createdAt: 42 });
    expect(await chat.hasRoom(room.id)).toBe(true);
    expect(await chat.listRooms()).toEqual([room]);
    expect(await log.createGroup(room.id, "db-persist-group", "$", false)).toBe(false);
  });

  it("createRoom still succeeds when the log is unreachable", async () => {
    const log = createInMemoryLogClient();
    const down: LogClient = {
      ...log,
      async createGroup(topicId) {
        throw new LogUnavailableError("createGroup", topicId, new Error("connect ECONNREFUSED"));
      },
    };
    const store = createInMemoryMessageStore();
    const chat = new ChatService({ log: down, store });

    const room = await chat.createRoom("Offline");
    expect(await store.getTopic(room.id)).toMatchObject({ name: "Offline" });
  });

  it("hasRoom is false for unknown rooms", async () => {
    const chat = new ChatService({ log: createInMemoryLogClient(), store: createInMemoryMessageStore() });
    expect(await chat.hasRoom("missing")).toBe(false);
  });

  it("sendMessage appends to the room's log", async () => {
    const log = createInMemoryLogClient({ now: () => 1700 });
    const chat = new ChatService({ log, store: createInMemoryMessageStore() });
    expect(await chat.sendMessage("r1", "alice", "hi")).toBe("1700-0");
    expect(await log.reverseRange("r1", 1)).toEqual([{ id: "1700-0", fields: { user: "alice", message: "hi" } }]);
  });

  it("recentMessages reads the log newest first while it has entries", async () => {
    const log = createInMemoryLogClient({ now: () => 1700 });
    const chat = new ChatService({ log, store: createInMemoryMessageStore() });
    await chat.sendMessage("r1", "alice", "first");
    await chat.sendMessage("r1", "bob", "second");
    await chat.sendMessage("r1", "alice", "third");

    expect(await chat.recentMessages("r1", 2)).toEqual([
      { id: "1700-2", user: "alice", message: "third", createdAt: 1700, source: "log" },
      { id: "1700-1", user: "bob", message: "second", createdAt: 1700, source: "log" },
    ]);
  });

  it("recentMessages falls back to the store when the log is empty", async () => {
    const store = createInMemoryMessageStore({ now: () => 5 });
    await store.ensureTopic("r1");
    await store.insertMessageIfAbsent("r1", { senderId: "alice", text: "kept", originEntryId: "9-0" });
    await store.insertMessageIfAbsent("r1", { senderId: "bob", text: "direct" });
    const chat = new ChatService({ log: createInMemoryLogClient(), store });

    expect(await chat.recentMessages("r1")).toEqual([
      { id: "2", user: "bob", message: "direct", createdAt: 5, source: "store" },
      { id: "9-0", user: "alice", message: "kept", createdAt: 5, source: "store" },
    ]);
  });

  it("recentMessages uses the configured default limit", async () => {
    const log = createInMemoryLogClient();
    const chat = new ChatService({ log, store: createInMemoryMessageStore(), historyLimit: 2 });
    for (const m of ["a", "b", "c"]) await chat.sendMessage("r1", "u", m);
    expect((await chat.recentMessages("r1")).map((item) => item.message)).toEqual(["c", "b"]);
  });
});

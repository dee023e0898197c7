import test from "node:test";
import assert from "node:assert/strict";
import { sweepRetention } from "../src/retention.js";
import { ConversationStore } from "../src/storage/conversation-store.js";
import { StorageRouter } from "../src/storage/router.js";
import { FakeClock, withTempDir } from "./fakes.js";

const DAY = 24 * 60 * 60 * 1000;

async function seed(dir: string) {
  const clock = new FakeClock("2026-01-01T08:00:00.000Z");
  const store = new ConversationStore(new StorageRouter(dir), { now: clock.now });
  for (const content of ["old one", "old two", "old three"]) {
    await store.appendMessage("100", { role: "user", content });
    clock.advance(60_000);
  }
  await store.appendMessage("200", { role: "user", content: "lonely old message" });
  clock.advance(40 * DAY);
  await store.appendMessage("100", { role: "user", content: "fresh" });
  return store;
}

test("sweepRetention purges old messages but keeps the newest ones", async () => {
  await withTempDir(async (dir) => {
    const store = await seed(dir);
    try {
      const report = await sweepRetention(store, { retentionDays: 30, keepAtLeast: 2 });
      assert.deepEqual(report, { conversations: 2, removed: 2, removedByKey: { "100": 2 }, failed: [] });
      assert.deepEqual(
        (await store.recentMessages("100", 10)).map((m) => m.content),
        ["old three", "fresh"],
      );
      assert.deepEqual(
        (await store.recentMessages("200", 10)).map((m) => m.content),
        ["lonely old message"],
      );
      assert.equal((await store.getConversation("200"))?.messageCount, 1);
    } finally {
      store.close();
    }
  });
});

test("sweepRetention keeps going when one conversation fails", async () => {
  await withTempDir(async (dir) => {
    const store = await seed(dir);
    try {
      const report = await sweepRetention(store, { retentionDays: 30, keepAtLeast: -1 });
      assert.deepEqual(report.failed, ["100", "200"]);
      assert.equal(report.removed, 0);
      assert.equal((await store.recentMessages("100", 10)).length, 4);
    } finally {
      store.close();
    }
  });
});

test("sweepRetention over an empty data directory does nothing", async () => {
  await withTempDir(async (dir) => {
    const store = new ConversationStore(new StorageRouter(dir));
    const report = await sweepRetention(store, { retentionDays: 1, keepAtLeast: 0 });
    assert.deepEqual(report, { conversations: 0, removed: 0, removedByKey: {}, failed: [] });
  });
});

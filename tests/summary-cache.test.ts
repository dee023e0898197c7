import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import { readdir, writeFile } from "node:fs/promises";
import { initLogger } from "../src/logger.js";
import { ConversationStore } from "../src/storage/conversation-store.js";
import { StorageRouter } from "../src/storage/router.js";
import { buildSummary, readSummary, writeSummary } from "../src/storage/summary.js";
import type { Conversation } from "../src/types.js";
import { FakeClock, silentLogger, withTempDir } from "./fakes.js";

initLogger(silentLogger, false);

const conversation: Conversation = {
  key: "9",
  username: null,
  firstName: "Bia",
  lastName: null,
  level: "A2",
  createdAt: "2026-01-01T00:00:00.000Z",
  lastActiveAt: "2026-01-02T00:00:00.000Z",
  totalSessions: 3,
  messageCount: 12,
  voiceMessageCount: 2,
  correctionCount: 4,
};

test("buildSummary mirrors the profile counters", () => {
  assert.deepEqual(buildSummary(conversation, ["travel"]), {
    key: "9",
    createdAt: "2026-01-01T00:00:00.000Z",
    lastAccessAt: "2026-01-02T00:00:00.000Z",
    currentLevel: "A2",
    totalSessions: 3,
    quickStats: {
      totalMessages: 12,
      voiceMessages: 2,
      correctionsMade: 4,
      topicsDiscussed: ["travel"],
    },
  });
});

test("writeSummary round-trips and leaves no temp files behind", async () => {
  await withTempDir(async (dir) => {
    const file = path.join(dir, "chat_9", "summary.json");
    const summary = buildSummary(conversation, []);
    await Promise.all([writeSummary(file, summary), writeSummary(file, summary)]);
    assert.deepEqual(await readSummary(file), summary);
    assert.deepEqual(await readdir(path.dirname(file)), ["summary.json"]);
  });
});

test("readSummary treats missing, malformed and invalid documents as absent", async () => {
  await withTempDir(async (dir) => {
    const file = path.join(dir, "summary.json");
    assert.equal(await readSummary(file), null);
    await writeFile(file, "{ broken", "utf-8");
    assert.equal(await readSummary(file), null);
    await writeFile(file, JSON.stringify({ key: "9", currentLevel: "Z1" }), "utf-8");
    assert.equal(await readSummary(file), null);
  });
});

test("the store rebuilds a corrupted summary from the databases", async () => {
  await withTempDir(async (dir) => {
    const store = new ConversationStore(new StorageRouter(dir), {
      now: new FakeClock("2026-01-05T10:00:00.000Z").now,
    });
    try {
      await store.appendMessage("9", { role: "user", content: "My flight to Lisbon was delayed" });
      await store.appendMessage("9", { role: "user", content: "Then I had dinner with my sister" });

      await writeFile(store.router.resolve("9").summaryPath, "not json", "utf-8");
      const summary = await store.readSummary("9");
      assert.equal(summary?.quickStats.totalMessages, 2);
      assert.deepEqual(summary?.quickStats.topicsDiscussed, ["travel", "family", "food"]);
      assert.deepEqual(await readSummary(store.router.resolve("9").summaryPath), summary);
    } finally {
      store.close();
    }
  });
});

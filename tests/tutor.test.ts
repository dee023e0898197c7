import path from "node:path";
import { rm, writeFile } from "node:fs/promises";
import test from "node:test";
import assert from "node:assert/strict";
import type { ResponseGenerator } from "../src/collaborators.js";
import { StorageError } from "../src/errors.js";
import { FAILURE_APOLOGY } from "../src/handlers/dispatcher.js";
import { INVALID_AUDIO_REPLY, INVALID_TEXT_REPLY, RATE_LIMITED_REPLY, Tutor } from "../src/tutor.js";
import {
  EchoGenerator,
  FakeClock,
  RecordingReplyChannel,
  StaticTranscriber,
  silentLogger,
  sleep,
  testConfig,
  withTempDir,
} from "./fakes.js";

const DAY = 24 * 60 * 60 * 1000;

function createTutor(dir: string, overrides: Record<string, unknown> = {}, generator: ResponseGenerator = new EchoGenerator()) {
  const clock = new FakeClock("2026-03-01T12:00:00.000Z");
  const reply = new RecordingReplyChannel();
  const tutor = new Tutor(
    testConfig(dir, overrides),
    { reply, transcriber: new StaticTranscriber("good morning"), generator },
    { logger: silentLogger, now: clock.nowMs },
  );
  return { tutor, reply, clock };
}

test("receive queues a text message and the reply arrives asynchronously", async () => {
  await withTempDir(async (dir) => {
    const { tutor, reply } = createTutor(dir);
    try {
      const result = await tutor.receive({
        conversationKey: "77",
        userId: "u77",
        identity: { firstName: "Nina" },
        kind: "text",
        text: "hello <i>tutor</i>",
      });
      assert.equal(result.accepted, true);

      await tutor.queue.onIdle();
      assert.deepEqual(reply.textsFor("77"), ["You said: hello tutor"]);
      assert.equal((await tutor.store.getConversation("77"))?.firstName, "Nina");
      assert.equal((await tutor.store.recentMessages("77", 10)).length, 2);

      const status = tutor.status();
      assert.equal(status.metrics?.totalMessages, 1);
      assert.equal(status.metrics?.uniqueUsers, 1);
      assert.equal(status.totalQueuedJobs, 0);
    } finally {
      await tutor.shutdown();
    }
  });
});

test("messages in one conversation are answered in arrival order", async () => {
  await withTempDir(async (dir) => {
    const { tutor, reply } = createTutor(dir, { maxConcurrentJobs: 2 });
    try {
      for (const text of ["first", "second", "third"]) {
        await tutor.receive({ conversationKey: "1", userId: "u1", kind: "text", text });
      }
      await tutor.receive({ conversationKey: "2", userId: "u2", kind: "text", text: "other chat" });
      await tutor.queue.onIdle();

      assert.deepEqual(reply.textsFor("1"), ["You said: first", "You said: second", "You said: third"]);
      assert.deepEqual(reply.textsFor("2"), ["You said: other chat"]);
      assert.deepEqual(
        (await tutor.store.recentMessages("1", 10)).map((m) => m.content),
        ["first", "You said: first", "second", "You said: second", "third", "You said: third"],
      );
    } finally {
      await tutor.shutdown();
    }
  });
});

test("voice messages go through transcription", async () => {
  await withTempDir(async (dir) => {
    const { tutor, reply } = createTutor(dir);
    try {
      const result = await tutor.receive({
        conversationKey: "5",
        userId: "u5",
        kind: "voice",
        audioPath: `${dir}/clip.ogg`,
        durationSeconds: 2,
        sizeBytes: 2048,
      });
      assert.equal(result.accepted, true);
      await tutor.queue.onIdle();
      assert.deepEqual(reply.textsFor("5"), ["📝 I heard: good morning", "You said: good morning"]);
      assert.equal(tutor.status().metrics?.totalVoice, 1);
    } finally {
      await tutor.shutdown();
    }
  });
});

test("receive rejects invalid input before queueing", async () => {
  await withTempDir(async (dir) => {
    const { tutor, reply } = createTutor(dir);
    try {
      assert.deepEqual(
        await tutor.receive({ conversationKey: "../etc", userId: "u", kind: "text", text: "hi" }),
        { accepted: false, reason: "invalid-key" },
      );
      assert.deepEqual(
        await tutor.receive({ conversationKey: "9", userId: "u", kind: "text", text: "<script>alert(1)</script>" }),
        { accepted: false, reason: "invalid-input" },
      );
      assert.deepEqual(
        await tutor.receive({
          conversationKey: "9",
          userId: "u",
          kind: "voice",
          audioPath: "big.ogg",
          durationSeconds: 600,
          sizeBytes: 21 * 1024 * 1024,
        }),
        { accepted: false, reason: "invalid-input" },
      );
      assert.deepEqual(reply.texts, [
        { key: "9", text: INVALID_TEXT_REPLY },
        { key: "9", text: INVALID_AUDIO_REPLY },
      ]);
      assert.equal(tutor.status().totalQueuedJobs, 0);
      assert.deepEqual(await tutor.store.listConversations(), []);
    } finally {
      await tutor.shutdown();
    }
  });
});

test("receive rate-limits a user and tells them to slow down", async () => {
  await withTempDir(async (dir) => {
    const { tutor, reply } = createTutor(dir, { rateLimitMaxRequests: 1 });
    try {
      const first = await tutor.receive({ conversationKey: "3", userId: "u3", kind: "text", text: "one" });
      const second = await tutor.receive({ conversationKey: "3", userId: "u3", kind: "text", text: "two" });
      assert.equal(first.accepted, true);
      assert.deepEqual(second, { accepted: false, reason: "rate-limited" });
      await tutor.queue.onIdle();
      assert.deepEqual(reply.textsFor("3").sort(), ["You said: one", RATE_LIMITED_REPLY]);
    } finally {
      await tutor.shutdown();
    }
  });
});

test("a failing job sends the apology and counts as an error", async () => {
  await withTempDir(async (dir) => {
    const broken: ResponseGenerator = {
      generate: async () => {
        throw new Error("generator bug");
      },
    };
    const { tutor, reply } = createTutor(dir, {}, broken);
    try {
      await tutor.receive({ conversationKey: "4", userId: "u4", kind: "text", text: "hello" });
      await tutor.receive({ conversationKey: "4", userId: "u4", kind: "text", text: "again" });
      await tutor.queue.onIdle();
      assert.deepEqual(reply.textsFor("4"), [FAILURE_APOLOGY, FAILURE_APOLOGY]);
      assert.equal(tutor.status().metrics?.totalErrors, 2);
      assert.equal(tutor.status().metrics?.errorRate, 100);
    } finally {
      await tutor.shutdown();
    }
  });
});

test("shutdown stops intake and purgeAll applies the retention settings", async () => {
  await withTempDir(async (dir) => {
    const { tutor, clock } = createTutor(dir, { retentionDays: 30, retentionKeepAtLeast: 1 });
    await tutor.receive({ conversationKey: "8", userId: "u8", kind: "text", text: "old message" });
    await tutor.queue.onIdle();

    clock.advance(45 * DAY);
    const report = await tutor.purgeAll();
    assert.equal(report.conversations, 1);
    assert.equal(report.removed, 1);
    assert.deepEqual(
      (await tutor.store.recentMessages("8", 10)).map((m) => m.content),
      ["You said: old message"],
    );

    const result = await tutor.shutdown();
    assert.deepEqual(result, { discarded: 0, awaited: 0 });
    assert.deepEqual(
      await tutor.receive({ conversationKey: "8", userId: "u8", kind: "text", text: "late" }),
      { accepted: false, reason: "shutting-down" },
    );
  });
});

test("a storage failure fails the job without blocking later jobs for the key", async () => {
  await withTempDir(async (dir) => {
    const { tutor, reply } = createTutor(dir);
    const blocker = path.join(dir, "chat_66");
    await writeFile(blocker, "not a directory", "utf-8");
    try {
      await assert.rejects(tutor.store.getOrCreate("66"), StorageError);

      await tutor.receive({ conversationKey: "66", userId: "u66", kind: "text", text: "first" });
      await tutor.receive({ conversationKey: "66", userId: "u66", kind: "text", text: "second" });
      await tutor.queue.onIdle();
      assert.deepEqual(reply.textsFor("66"), [FAILURE_APOLOGY, FAILURE_APOLOGY]);

      await rm(blocker);
      await tutor.receive({ conversationKey: "66", userId: "u66", kind: "text", text: "third" });
      await tutor.queue.onIdle();
      assert.deepEqual(reply.textsFor("66"), [FAILURE_APOLOGY, FAILURE_APOLOGY, "You said: third"]);
      assert.equal(tutor.status().metrics?.totalErrors, 2);
      assert.deepEqual(
        (await tutor.store.recentMessages("66", 10)).map((m) => m.content),
        ["third", "You said: third"],
      );
    } finally {
      await tutor.shutdown();
    }
  });
});

test("deleteConversation drops queued jobs and waits for the running one", async () => {
  await withTempDir(async (dir) => {
    const echo = new EchoGenerator();
    let openGate: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      openGate = resolve;
    });
    const gated: ResponseGenerator = {
      generate: async (request) => {
        await gate;
        return echo.generate(request);
      },
    };
    const { tutor, reply } = createTutor(dir, {}, gated);
    try {
      for (const text of ["first", "second", "third"]) {
        await tutor.receive({ conversationKey: "20", userId: "u20", kind: "text", text });
      }
      await sleep(20);

      const deleting = tutor.deleteConversation("20");
      openGate();
      assert.deepEqual(await deleting, { droppedJobs: 2, deleted: true });
      assert.deepEqual(reply.textsFor("20"), ["You said: first"]);
      assert.deepEqual(await tutor.store.listConversations(), []);
      assert.deepEqual(await tutor.deleteConversation("20"), { droppedJobs: 0, deleted: false });
    } finally {
      await tutor.shutdown();
    }
  });
});

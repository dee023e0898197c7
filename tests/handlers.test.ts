import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import { access, writeFile } from "node:fs/promises";
import type { GeneratedReply, GrammarChecker, ResponseGenerator, SpeechSynthesizer } from "../src/collaborators.js";
import { ContextAssembler } from "../src/context.js";
import { UpstreamError } from "../src/errors.js";
import { FAILURE_APOLOGY, JobDispatcher } from "../src/handlers/dispatcher.js";
import { TextJobHandler } from "../src/handlers/text-handler.js";
import { TEXT_SPEECH_CAPTION, TutorTurn, type TutorTurnDeps } from "../src/handlers/turn.js";
import { UNINTELLIGIBLE_AUDIO_REPLY, VoiceJobHandler } from "../src/handlers/voice-handler.js";
import { initLogger } from "../src/logger.js";
import { ConversationStore } from "../src/storage/conversation-store.js";
import { StorageRouter } from "../src/storage/router.js";
import type { JobPayload, QueueEntry } from "../src/types.js";
import { EchoGenerator, FakeClock, RecordingReplyChannel, StaticTranscriber, silentLogger, withTempDir } from "./fakes.js";

initLogger(silentLogger, false);

function entry(payload: JobPayload): QueueEntry {
  return {
    taskId: "task-1",
    conversationKey: "42",
    userId: "user-42",
    identity: { firstName: "Rita" },
    payload,
    priority: 1,
    enqueuedAt: "2026-02-01T09:00:00.000Z",
  };
}

function setup(dir: string, overrides: Partial<TutorTurnDeps> = {}) {
  const clock = new FakeClock("2026-02-01T09:00:00.000Z");
  const store = new ConversationStore(new StorageRouter(dir), { now: clock.now });
  const reply = new RecordingReplyChannel();
  const generator = new EchoGenerator();
  const turn = new TutorTurn({
    store,
    assembler: new ContextAssembler(store),
    generator,
    reply,
    now: clock.nowMs,
    ...overrides,
  });
  return { clock, store, reply, generator, turn };
}

async function exists(p: string): Promise<boolean> {
  try {
    await access(p);
    return true;
  } catch {
    return false;
  }
}

test("a text job stores both turns and replies with the generated text", async () => {
  await withTempDir(async (dir) => {
    const { store, reply, generator, turn } = setup(dir);
    try {
      await new TextJobHandler(turn).handle(entry({ kind: "text", content: "hello there" }), {
        kind: "text",
        content: "hello there",
      });

      assert.deepEqual(reply.textsFor("42"), ["You said: hello there"]);
      assert.deepEqual(reply.actions, [{ key: "42", action: "typing" }]);

      const request = generator.requests[0];
      assert.equal(request?.context.userName, "Rita");
      assert.deepEqual(request?.context.recentMessages.map((m) => m.content), ["hello there"]);

      const messages = await store.recentMessages("42", 10);
      assert.deepEqual(messages.map((m) => [m.role, m.content]), [
        ["user", "hello there"],
        ["assistant", "You said: hello there"],
      ]);
      assert.equal(messages[1]?.context, "source=echo");
      assert.equal(messages[1]?.confidence, 0.9);
    } finally {
      store.close();
    }
  });
});

test("grammar corrections are stored with the user message and passed to generation", async () => {
  await withTempDir(async (dir) => {
    const grammar: GrammarChecker = {
      check: async () => [{ rule: "MISSING_ARTICLE", suggestion: "a car", category: "grammar" }],
    };
    const { store, generator, turn } = setup(dir, { grammar });
    try {
      await turn.respond(entry({ kind: "text", content: "I have car" }), { text: "I have car", kind: "text" });
      const [user] = await store.recentMessages("42", 2);
      assert.equal(user?.hasErrors, true);
      assert.deepEqual(generator.requests[0]?.corrections.map((c) => c.rule), ["MISSING_ARTICLE"]);
      assert.equal((await store.getConversation("42"))?.correctionCount, 1);
    } finally {
      store.close();
    }
  });
});

test("a failing grammar checker is treated as no corrections", async () => {
  await withTempDir(async (dir) => {
    const grammar: GrammarChecker = {
      check: async () => {
        throw new UpstreamError("grammar-checker", "offline");
      },
    };
    const { store, reply, turn } = setup(dir, { grammar });
    try {
      await turn.respond(entry({ kind: "text", content: "hi" }), { text: "hi", kind: "text" });
      const [user] = await store.recentMessages("42", 2);
      assert.equal(user?.hasErrors, false);
      assert.deepEqual(reply.textsFor("42"), ["You said: hi"]);
    } finally {
      store.close();
    }
  });
});

test("an upstream generation failure falls back to the local reply", async () => {
  await withTempDir(async (dir) => {
    const generator: ResponseGenerator = {
      generate: async () => {
        throw new UpstreamError("response-generator", "all 1 providers failed");
      },
    };
    const { store, reply, turn } = setup(dir, { generator });
    try {
      const result = await turn.respond(entry({ kind: "text", content: "hello" }), { text: "hello", kind: "text" });
      const expected = "Hello! It's great to hear from you. How is your day going?";
      assert.equal(result.reply.source, "local");
      assert.deepEqual(reply.textsFor("42"), [expected]);
      assert.equal(result.assistantMessage.content, expected);
      assert.equal(result.assistantMessage.context, "source=local");
      assert.equal(result.assistantMessage.confidence, 0.3);
    } finally {
      store.close();
    }
  });
});

test("the assistant message records latency from the injected clock", async () => {
  await withTempDir(async (dir) => {
    const clock = new FakeClock("2026-02-01T09:00:00.000Z");
    const slow: ResponseGenerator = {
      generate: async (): Promise<GeneratedReply> => {
        clock.advance(1500);
        return { text: "ok", englishOnly: "ok", corrections: null, source: "slow", confidence: 0.8 };
      },
    };
    const { store, turn } = setup(dir, { generator: slow, now: clock.nowMs });
    try {
      const result = await turn.respond(entry({ kind: "text", content: "hey" }), { text: "hey", kind: "text" });
      assert.equal(result.assistantMessage.latencyMs, 1500);
    } finally {
      store.close();
    }
  });
});

test("speech replies carry a caption and the audio file is removed afterwards", async () => {
  await withTempDir(async (dir) => {
    const audioPath = path.join(dir, "reply.ogg");
    const spoken: string[] = [];
    const speech: SpeechSynthesizer = {
      synthesize: async (textToSpeak) => {
        spoken.push(textToSpeak);
        await writeFile(audioPath, "audio", "utf-8");
        return audioPath;
      },
    };
    const generator: ResponseGenerator = {
      generate: async () => ({
        text: "Great job!\n---\nUse 'went' here.",
        englishOnly: "Great job!",
        corrections: "Use 'went' here.",
        source: "test",
        confidence: 0.9,
      }),
    };
    const { store, reply, turn } = setup(dir, { speech, speechEnabled: true, generator });
    try {
      await turn.respond(entry({ kind: "text", content: "I goed" }), { text: "I goed", kind: "text" });
      assert.deepEqual(spoken, ["Great job!"]);
      assert.deepEqual(reply.voices, [{ key: "42", audioPath, caption: TEXT_SPEECH_CAPTION }]);
      assert.equal(await exists(audioPath), false);
    } finally {
      store.close();
    }
  });
});

test("a voice job echoes the transcription and stores a voice message", async () => {
  await withTempDir(async (dir) => {
    const { store, reply, turn } = setup(dir);
    const clip = path.join(dir, "clip.ogg");
    await writeFile(clip, "audio", "utf-8");
    try {
      const payload = { kind: "voice" as const, audioPath: clip, durationSeconds: 3, sizeBytes: 5 };
      await new VoiceJobHandler(turn, new StaticTranscriber("  I like pizza "), reply).handle(entry(payload), payload);

      assert.deepEqual(reply.textsFor("42"), ["📝 I heard: I like pizza", "You said: I like pizza"]);
      const [user] = await store.recentMessages("42", 2);
      assert.equal(user?.isVoice, true);
      assert.equal(user?.voiceDuration, 3);
      assert.equal((await store.getConversation("42"))?.voiceMessageCount, 1);
      assert.equal(await exists(clip), false);
    } finally {
      store.close();
    }
  });
});

test("an empty transcription replies with an apology and persists nothing", async () => {
  await withTempDir(async (dir) => {
    const { store, reply, turn } = setup(dir);
    try {
      const payload = { kind: "voice" as const, audioPath: path.join(dir, "none.ogg"), durationSeconds: 1, sizeBytes: 10 };
      await new VoiceJobHandler(turn, new StaticTranscriber("   "), reply).handle(entry(payload), payload);

      assert.deepEqual(reply.textsFor("42"), [UNINTELLIGIBLE_AUDIO_REPLY]);
      assert.equal(await store.getConversation("42"), null);
    } finally {
      store.close();
    }
  });
});

test("the dispatcher routes by payload kind and apologises on failure", async () => {
  await withTempDir(async (dir) => {
    const generator: ResponseGenerator = {
      generate: async () => {
        throw new Error("unexpected bug");
      },
    };
    const { store, reply, turn } = setup(dir, { generator });
    try {
      const dispatcher = new JobDispatcher(
        {
          text: new TextJobHandler(turn),
          voice: new VoiceJobHandler(turn, new StaticTranscriber(null), reply),
        },
        reply,
      );
      const job = entry({ kind: "text", content: "hello" });
      await assert.rejects(dispatcher.run(job), /unexpected bug/);
      await dispatcher.onFailure(job);
      assert.deepEqual(reply.textsFor("42"), [FAILURE_APOLOGY]);

      const voiceJob = entry({ kind: "voice", audioPath: path.join(dir, "x.ogg"), durationSeconds: 1, sizeBytes: 1 });
      await dispatcher.run(voiceJob);
      assert.deepEqual(reply.textsFor("42"), [FAILURE_APOLOGY, UNINTELLIGIBLE_AUDIO_REPLY]);
    } finally {
      store.close();
    }
  });
});

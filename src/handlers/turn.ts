import { rm } from "node:fs/promises";
import type {
  ChatAction,
  GeneratedReply,
  GrammarChecker,
  ReplyChannel,
  ResponseGenerator,
  SpeechSynthesizer,
} from "../collaborators.js";
import type { ContextAssembler } from "../context.js";
import { UpstreamError, errorMessage } from "../errors.js";
import { localReply } from "../llm/local-reply.js";
import { log } from "../logger.js";
import type { ConversationStore } from "../storage/conversation-store.js";
import type { GrammarCorrection, MessageKind, QueueEntry, StoredMessage } from "../types.js";

export interface TutorTurnDeps {
  store: ConversationStore;
  assembler: ContextAssembler;
  generator: ResponseGenerator;
  reply: ReplyChannel;
  grammar?: GrammarChecker;
  speech?: SpeechSynthesizer;
  speechEnabled?: boolean;
  now?: () => number;
}

export interface TurnInput {
  text: string;
  kind: MessageKind;
  /** Seconds of audio, for voice turns. */
  voiceDuration?: number;
}

export interface TurnResult {
  userMessage: StoredMessage;
  assistantMessage: StoredMessage;
  reply: GeneratedReply;
}

export const TEXT_SPEECH_CAPTION = "🔊 Listen to the pronunciation";
export const VOICE_SPEECH_CAPTION = "🎯 Practice repeating this!";

/**
 * The steps every job shares once it has user text: record the message,
 * recall context, generate and record the reply, deliver it.
 */
export class TutorTurn {
  private readonly now: () => number;

  constructor(private readonly deps: TutorTurnDeps) {
    this.now = deps.now ?? Date.now;
  }

  async respond(entry: QueueEntry, input: TurnInput): Promise<TurnResult> {
    const { store, assembler, reply } = this.deps;
    const key = entry.conversationKey;
    const started = this.now();
    const isVoice = input.kind === "voice";

    await store.getOrCreate(key, entry.identity);
    await this.chatAction(key, "typing");

    const corrections = await this.checkGrammar(input.text);
    const userMessage = await store.appendMessage(key, {
      role: "user",
      content: input.text,
      isVoice,
      voiceDuration: input.voiceDuration,
      corrections,
    });

    const context = await assembler.buildContext(key);
    const generated = await this.generate({
      message: input.text,
      context,
      level: context.level,
      corrections,
      isVoice,
    });

    const latencyMs = this.now() - started;
    const assistantMessage = await store.appendMessage(key, {
      role: "assistant",
      content: generated.text,
      originalContent: generated.englishOnly,
      confidence: generated.confidence,
      latencyMs,
      context: `source=${generated.source}`,
    });

    await reply.sendText(key, generated.text);
    await this.speak(key, generated.englishOnly, isVoice ? VOICE_SPEECH_CAPTION : TEXT_SPEECH_CAPTION);

    return { userMessage, assistantMessage, reply: generated };
  }

  private async checkGrammar(text: string): Promise<GrammarCorrection[]> {
    if (!this.deps.grammar) return [];
    try {
      return await this.deps.grammar.check(text);
    } catch (err) {
      log.warn(`grammar check failed; continuing without corrections: ${errorMessage(err)}`);
      return [];
    }
  }

  private async generate(request: Parameters<ResponseGenerator["generate"]>[0]): Promise<GeneratedReply> {
    try {
      return await this.deps.generator.generate(request);
    } catch (err) {
      if (!(err instanceof UpstreamError)) throw err;
      log.warn(`response generation failed; using local reply: ${err.message}`);
      return localReply(request.message, request.level);
    }
  }

  private async speak(key: string, text: string, caption: string): Promise<void> {
    const { speech, reply } = this.deps;
    if (!speech || this.deps.speechEnabled === false || text.length === 0) return;

    let audioPath: string | null;
    try {
      await this.chatAction(key, "record_voice");
      audioPath = await speech.synthesize(text);
    } catch (err) {
      log.warn(`speech synthesis failed for ${key}: ${errorMessage(err)}`);
      return;
    }
    if (!audioPath) return;

    try {
      await reply.sendVoice(key, audioPath, caption);
    } finally {
      await removeFile(audioPath);
    }
  }

  private async chatAction(key: string, action: ChatAction): Promise<void> {
    if (!this.deps.reply.sendChatAction) return;
    try {
      await this.deps.reply.sendChatAction(key, action);
    } catch (err) {
      log.debug(`chat action ${action} failed for ${key}: ${errorMessage(err)}`);
    }
  }
}

export async function removeFile(filePath: string): Promise<void> {
  try {
    await rm(filePath, { force: true });
  } catch (err) {
    log.debug(`could not remove ${filePath}: ${errorMessage(err)}`);
  }
}

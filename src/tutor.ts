import type {
  GrammarChecker,
  ReplyChannel,
  ResponseGenerator,
  SpeechSynthesizer,
  Transcriber,
} from "./collaborators.js";
import { ContextAssembler } from "./context.js";
import { JobDispatcher } from "./handlers/dispatcher.js";
import { TextJobHandler } from "./handlers/text-handler.js";
import { TutorTurn } from "./handlers/turn.js";
import { VoiceJobHandler } from "./handlers/voice-handler.js";
import { createProviderChain } from "./llm/provider-chain.js";
import { type LoggerSink, initLogger, log } from "./logger.js";
import { MetricsService } from "./metrics.js";
import { RateLimiter } from "./middleware/rate-limiter.js";
import { InputValidator } from "./middleware/validator.js";
import { type SupervisorStatus, QueueSupervisor } from "./queue/supervisor.js";
import { type JobOutcome, type ShutdownResult, PerChatTaskQueue } from "./queue/task-queue.js";
import { type RetentionReport, sweepRetention } from "./retention.js";
import { ConversationStore } from "./storage/conversation-store.js";
import { StorageRouter, isValidConversationKey } from "./storage/router.js";
import type { IdentityHint, JobPayload, JobPriority, TutorConfig } from "./types.js";

export const RATE_LIMITED_REPLY = "⏳ You're sending messages too quickly. Please wait a moment and try again.";
export const INVALID_TEXT_REPLY = "❌ Sorry, I can't process that message. Please send plain text up to the length limit.";
export const INVALID_AUDIO_REPLY = "❌ That audio file is empty or too large. Please send a shorter voice message.";

interface InboundBase {
  conversationKey: string;
  userId: string;
  identity?: IdentityHint;
}

export type InboundMessage =
  | (InboundBase & { kind: "text"; text: string })
  | (InboundBase & { kind: "voice"; audioPath: string; durationSeconds: number; sizeBytes: number });

export type RejectionReason = "invalid-key" | "invalid-input" | "rate-limited" | "shutting-down";

export type ReceiveResult =
  | { accepted: true; taskId: string }
  | { accepted: false; reason: RejectionReason };

export interface TutorCollaborators {
  reply: ReplyChannel;
  transcriber: Transcriber;
  grammar?: GrammarChecker;
  speech?: SpeechSynthesizer;
  /** Defaults to a provider chain built from `config.providers`. */
  generator?: ResponseGenerator;
}

export interface TutorOptions {
  logger?: LoggerSink;
  now?: () => number;
}

const TEXT_PRIORITY: JobPriority = 1;
const VOICE_PRIORITY: JobPriority = 2;

/**
 * Composition root: wires storage, recall, the per-conversation queue and
 * the job handlers, and is the single entry point for inbound messages.
 */
export class Tutor {
  readonly store: ConversationStore;
  readonly assembler: ContextAssembler;
  readonly queue: PerChatTaskQueue;
  readonly supervisor: QueueSupervisor;
  readonly metrics: MetricsService;
  readonly limiter: RateLimiter;
  readonly validator: InputValidator;

  constructor(
    readonly config: TutorConfig,
    private readonly collaborators: TutorCollaborators,
    options: TutorOptions = {},
  ) {
    initLogger(options.logger, config.debug);
    const now = options.now ?? Date.now;

    this.store = new ConversationStore(new StorageRouter(config.dataDir), {
      sessionGapMinutes: config.sessionGapMinutes,
      topicWindow: config.topicWindow,
      now: () => new Date(now()),
    });
    this.assembler = new ContextAssembler(this.store, {
      recentMessageLimit: config.recentMessageLimit,
      topicWindow: config.topicWindow,
    });
    this.metrics = new MetricsService(now);
    this.limiter = new RateLimiter({
      maxRequests: config.rateLimitMaxRequests,
      windowMs: config.rateLimitWindowMs,
      now,
    });
    this.validator = new InputValidator({
      maxTextLength: config.maxTextLength,
      maxAudioBytes: config.maxAudioBytes,
    });

    const generator =
      collaborators.generator ??
      createProviderChain(config.providers, {
        timeoutMs: config.providerTimeoutMs,
        temperature: config.temperature,
        maxTokens: config.maxTokens,
      });
    const turn = new TutorTurn({
      store: this.store,
      assembler: this.assembler,
      generator,
      reply: collaborators.reply,
      grammar: collaborators.grammar,
      speech: collaborators.speech,
      speechEnabled: config.speechEnabled,
      now,
    });
    const dispatcher = new JobDispatcher(
      {
        text: new TextJobHandler(turn),
        voice: new VoiceJobHandler(turn, collaborators.transcriber, collaborators.reply),
      },
      collaborators.reply,
    );

    this.queue = new PerChatTaskQueue(dispatcher, {
      maxConcurrentJobs: config.maxConcurrentJobs,
      onJobSettled: (outcome) => this.recordOutcome(outcome),
    });
    this.supervisor = new QueueSupervisor(this.queue, this.metrics);
    log.info(
      `initialized (dataDir=${config.dataDir}, maxConcurrentJobs=${config.maxConcurrentJobs}, providers=${config.providers.length})`,
    );
  }

  /**
   * Gateway entry point. Validates and rate-limits the message, then queues
   * it and returns without waiting for the job. Rejections that the user
   * should hear about are answered through the reply channel.
   */
  async receive(inbound: InboundMessage): Promise<ReceiveResult> {
    const key = inbound.conversationKey;
    if (!isValidConversationKey(key)) {
      log.warn(`rejected message with invalid conversation key ${JSON.stringify(key)}`);
      return { accepted: false, reason: "invalid-key" };
    }
    if (this.supervisor.isShuttingDown || !this.queue.isAccepting) {
      return { accepted: false, reason: "shutting-down" };
    }
    if (!this.limiter.check(inbound.userId)) {
      log.info(`rate limited user ${inbound.userId} in ${key}`);
      await this.collaborators.reply.sendText(key, RATE_LIMITED_REPLY);
      return { accepted: false, reason: "rate-limited" };
    }

    let payload: JobPayload;
    if (inbound.kind === "text") {
      const checked = this.validator.validateText(inbound.text);
      if (!checked.ok) {
        log.info(`rejected text from ${key}: ${checked.reason}`);
        await this.collaborators.reply.sendText(key, INVALID_TEXT_REPLY);
        return { accepted: false, reason: "invalid-input" };
      }
      payload = { kind: "text", content: checked.text };
    } else {
      if (!this.validator.validateAudio(inbound.sizeBytes)) {
        log.info(`rejected audio from ${key}: ${inbound.sizeBytes} bytes`);
        await this.collaborators.reply.sendText(key, INVALID_AUDIO_REPLY);
        return { accepted: false, reason: "invalid-input" };
      }
      payload = {
        kind: "voice",
        audioPath: inbound.audioPath,
        durationSeconds: inbound.durationSeconds,
        sizeBytes: inbound.sizeBytes,
      };
    }

    const taskId = this.queue.enqueue(key, {
      userId: inbound.userId,
      identity: inbound.identity,
      payload,
      priority: payload.kind === "text" ? TEXT_PRIORITY : VOICE_PRIORITY,
    });
    return { accepted: true, taskId };
  }

  status(): SupervisorStatus {
    return this.supervisor.status();
  }

  /** Purge old messages from every conversation using the configured retention. */
  purgeAll(): Promise<RetentionReport> {
    return sweepRetention(this.store, {
      retentionDays: this.config.retentionDays,
      keepAtLeast: this.config.retentionKeepAtLeast,
    });
  }

  /**
   * Remove a conversation: queued jobs are dropped, a running job is
   * allowed to finish, then the whole storage unit is deleted.
   */
  async deleteConversation(key: string): Promise<{ droppedJobs: number; deleted: boolean }> {
    const droppedJobs = this.queue.clearConversation(key);
    await this.queue.whenIdle(key);
    const deleted = await this.store.deleteConversation(key);
    log.info(`deleted conversation ${key} (${droppedJobs} queued jobs dropped)`);
    return { droppedJobs, deleted };
  }

  /** Drain the queue, then close every open database. */
  async shutdown(options: { discardQueued?: boolean } = {}): Promise<ShutdownResult> {
    const result = await this.supervisor.shutdown(options);
    this.store.close();
    return result;
  }

  private recordOutcome(outcome: JobOutcome): void {
    this.metrics.track(outcome.userId, outcome.kind, outcome.elapsedMs, !outcome.ok);
  }
}

import { randomUUID } from "node:crypto";
import { QueueClosedError, SchedulingError, ValidationError, errorMessage } from "../errors.js";
import { log } from "../logger.js";
import { JobPayloadSchema } from "../schemas.js";
import type {
  ConversationQueueState,
  IdentityHint,
  JobPayload,
  JobPriority,
  QueueEntry,
  QueueStatus,
} from "../types.js";
import { Semaphore } from "./semaphore.js";

/** What the queue runs. `onFailure` is the best-effort "tell the user" hook. */
export interface JobRunner {
  run(entry: QueueEntry): Promise<void>;
  onFailure?(entry: QueueEntry, err: unknown): Promise<void>;
}

export interface JobOutcome {
  taskId: string;
  conversationKey: string;
  userId: string;
  kind: JobPayload["kind"];
  ok: boolean;
  elapsedMs: number;
  error?: unknown;
}

export interface EnqueueRequest {
  userId: string;
  payload: JobPayload;
  identity?: IdentityHint;
  /** 1 = high, 2 = normal, 3 = low. Reported only; never reorders. */
  priority?: JobPriority;
}

export interface TaskQueueOptions {
  maxConcurrentJobs: number;
  onJobSettled?: (outcome: JobOutcome) => void;
}

export interface ShutdownResult {
  /** Queued jobs that never started. */
  discarded: number;
  /** Jobs that were running when shutdown began and were awaited. */
  awaited: number;
}

/**
 * Per-conversation FIFO queues under one global concurrency limit.
 *
 * Each conversation with pending work has exactly one scheduling loop. The
 * loop takes a slot from the shared semaphore, runs the oldest job, gives
 * the slot back and repeats until its queue is empty, then the conversation
 * goes idle. The next enqueue starts a fresh loop. A job never starts while
 * another job for the same key is running, and `enqueue` never waits.
 */
export class PerChatTaskQueue {
  private readonly queues = new Map<string, QueueEntry[]>();
  private readonly states = new Map<string, ConversationQueueState>();
  private readonly loops = new Map<string, Promise<void>>();
  private readonly running = new Map<string, QueueEntry>();
  private readonly semaphore: Semaphore;
  private readonly idleWaiters: Array<() => void> = [];
  private accepting = true;
  private scheduling = true;

  constructor(
    private readonly runner: JobRunner,
    private readonly options: TaskQueueOptions,
  ) {
    this.semaphore = new Semaphore(options.maxConcurrentJobs);
  }

  get concurrencyLimit(): number {
    return this.semaphore.limit;
  }

  get isAccepting(): boolean {
    return this.accepting;
  }

  /**
   * Append a job to `conversationKey`'s queue and return its task id
   * immediately. Starts the conversation's scheduling loop when idle.
   */
  enqueue(conversationKey: string, request: EnqueueRequest): string {
    if (!this.accepting) {
      throw new QueueClosedError(conversationKey);
    }
    if (typeof conversationKey !== "string" || conversationKey.length === 0) {
      throw new ValidationError("conversation key must be a non-empty string", "conversationKey");
    }
    const payload = JobPayloadSchema.safeParse(request.payload);
    if (!payload.success) {
      throw new ValidationError(
        `invalid job payload: ${payload.error.issues[0]?.message ?? "unknown"}`,
        "payload",
      );
    }

    const entry: QueueEntry = {
      taskId: randomUUID(),
      conversationKey,
      userId: request.userId,
      identity: request.identity ?? {},
      payload: payload.data,
      priority: request.priority ?? 1,
      enqueuedAt: new Date().toISOString(),
    };

    let queue = this.queues.get(conversationKey);
    if (!queue) {
      queue = [];
      this.queues.set(conversationKey, queue);
    }
    queue.push(entry);

    if (this.stateOf(conversationKey) === "idle") {
      this.states.set(conversationKey, "scheduled");
      const loop = this.processConversation(conversationKey).catch((err) => {
        log.error(`scheduling loop for ${conversationKey} failed`, err);
      });
      this.loops.set(conversationKey, loop);
    }

    log.info(
      `job queued - chat ${conversationKey}, task ${entry.taskId}, kind ${entry.payload.kind}, depth ${queue.length}`,
    );
    return entry.taskId;
  }

  stateOf(conversationKey: string): ConversationQueueState {
    return this.states.get(conversationKey) ?? "idle";
  }

  /** Eventually-consistent snapshot; never blocks and never mutates. */
  status(): QueueStatus {
    const perConversationQueueDepth: Record<string, number> = {};
    let totalQueuedJobs = 0;
    for (const [key, queue] of this.queues) {
      if (queue.length === 0) continue;
      perConversationQueueDepth[key] = queue.length;
      totalQueuedJobs += queue.length;
    }
    return {
      activeConversations: this.loops.size,
      totalQueuedJobs,
      perConversationQueueDepth,
      globalConcurrencyLimit: this.semaphore.limit,
      runningJobs: this.running.size,
      processingConversations: [...this.loops.keys()],
      accepting: this.accepting,
    };
  }

  /** Drop `conversationKey`'s queued jobs that have not started. */
  clearConversation(conversationKey: string): number {
    const queue = this.queues.get(conversationKey);
    if (!queue || queue.length === 0) return 0;
    const dropped = queue.splice(0, queue.length).length;
    log.info(`cleared ${dropped} queued jobs for ${conversationKey}`);
    return dropped;
  }

  /** Resolves once `conversationKey` has nothing queued or running. */
  whenIdle(conversationKey: string): Promise<void> {
    return this.loops.get(conversationKey) ?? Promise.resolve();
  }

  /** Resolves once nothing is queued or running. */
  onIdle(): Promise<void> {
    if (this.loops.size === 0) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Stop taking jobs and wait for running ones to finish. Jobs already
   * queued but not started are discarded unless `discardQueued` is false,
   * in which case each conversation drains its queue first.
   */
  async drainAndShutdown(options: { discardQueued?: boolean } = {}): Promise<ShutdownResult> {
    const discardQueued = options.discardQueued !== false;
    this.accepting = false;
    const awaited = this.running.size;

    let discarded = 0;
    if (discardQueued) {
      this.scheduling = false;
      for (const queue of this.queues.values()) {
        discarded += queue.splice(0, queue.length).length;
      }
    }

    log.info(
      `shutting down queue: ${awaited} running, ${discarded} queued jobs discarded`,
    );
    await Promise.all([...this.loops.values()]);
    this.scheduling = false;
    this.queues.clear();
    log.info("queue shut down");
    return { discarded, awaited };
  }

  // ── scheduling ───────────────────────────────────────────────────────

  private async processConversation(conversationKey: string): Promise<void> {
    try {
      for (;;) {
        const queue = this.queues.get(conversationKey);
        if (!this.scheduling || !queue || queue.length === 0) break;

        await this.semaphore.acquire();
        try {
          const entry = this.scheduling ? queue.shift() : undefined;
          if (!entry) break;

          if (this.running.has(conversationKey)) {
            throw new SchedulingError(
              `job ${entry.taskId} would run concurrently with ${this.running.get(conversationKey)?.taskId} for ${conversationKey}`,
            );
          }
          this.running.set(conversationKey, entry);
          this.states.set(conversationKey, "running");
          await this.executeJob(entry);
        } finally {
          this.running.delete(conversationKey);
          this.semaphore.release();
        }
        this.states.set(conversationKey, "scheduled");
      }
    } finally {
      this.loops.delete(conversationKey);
      this.states.delete(conversationKey);
      const queue = this.queues.get(conversationKey);
      if (queue && queue.length === 0) this.queues.delete(conversationKey);
      if (this.loops.size === 0) this.notifyIdle();
    }
  }

  /** Run one job. Failures are logged and reported, never rethrown. */
  private async executeJob(entry: QueueEntry): Promise<void> {
    const started = Date.now();
    log.info(`job started - chat ${entry.conversationKey}, task ${entry.taskId}`);

    let outcome: JobOutcome;
    try {
      await this.runner.run(entry);
      outcome = this.outcome(entry, started, true);
      log.info(
        `job completed - chat ${entry.conversationKey}, task ${entry.taskId}, ${outcome.elapsedMs}ms`,
      );
    } catch (err) {
      outcome = { ...this.outcome(entry, started, false), error: err };
      log.error(
        `job failed - chat ${entry.conversationKey}, task ${entry.taskId}, ${outcome.elapsedMs}ms: ${errorMessage(err)}`,
      );
      if (this.runner.onFailure) {
        try {
          await this.runner.onFailure(entry, err);
        } catch (notifyErr) {
          log.error(
            `failed to report job failure to chat ${entry.conversationKey}: ${errorMessage(notifyErr)}`,
          );
        }
      }
    }

    if (this.options.onJobSettled) {
      try {
        this.options.onJobSettled(outcome);
      } catch (err) {
        log.warn(`onJobSettled hook threw: ${errorMessage(err)}`);
      }
    }
  }

  private outcome(entry: QueueEntry, started: number, ok: boolean): JobOutcome {
    return {
      taskId: entry.taskId,
      conversationKey: entry.conversationKey,
      userId: entry.userId,
      kind: entry.payload.kind,
      ok,
      elapsedMs: Date.now() - started,
    };
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters.splice(0, this.idleWaiters.length);
    for (const resolve of waiters) resolve();
  }
}

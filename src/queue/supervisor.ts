import { log } from "../logger.js";
import type { MetricsService } from "../metrics.js";
import type { MetricsSnapshot, QueueStatus } from "../types.js";
import type { PerChatTaskQueue, ShutdownResult } from "./task-queue.js";

export interface SupervisorStatus extends QueueStatus {
  startedAt: string;
  metrics?: MetricsSnapshot;
}

/**
 * Owns the queue's lifecycle: status passthrough for the operator surface
 * and a single graceful shutdown.
 */
export class QueueSupervisor {
  private shutdownPromise: Promise<ShutdownResult> | null = null;
  private readonly startedAt = new Date().toISOString();

  constructor(
    readonly queue: PerChatTaskQueue,
    private readonly metrics?: MetricsService,
  ) {}

  status(): SupervisorStatus {
    return {
      ...this.queue.status(),
      startedAt: this.startedAt,
      ...(this.metrics ? { metrics: this.metrics.snapshot() } : {}),
    };
  }

  get isShuttingDown(): boolean {
    return this.shutdownPromise !== null;
  }

  /** Idempotent: later calls share the first call's result. */
  shutdown(options: { discardQueued?: boolean } = {}): Promise<ShutdownResult> {
    if (!this.shutdownPromise) {
      log.info("supervisor: shutdown requested");
      this.shutdownPromise = this.queue.drainAndShutdown(options);
    }
    return this.shutdownPromise;
  }
}

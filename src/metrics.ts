import type { MessageKind, MetricsSnapshot } from "./types.js";

const LATENCY_WINDOW = 100;

/**
 * In-process counters for the operator status command. Latency is a moving
 * average over the last 100 jobs.
 */
export class MetricsService {
  private totalMessages = 0;
  private totalVoice = 0;
  private totalErrors = 0;
  private readonly users = new Set<string>();
  private readonly latencies: number[] = [];
  private readonly startedAt: number;

  constructor(private readonly now: () => number = Date.now) {
    this.startedAt = now();
  }

  track(userId: string, kind: MessageKind, latencyMs: number, failed = false): void {
    this.totalMessages += 1;
    if (kind === "voice") this.totalVoice += 1;
    if (failed) this.totalErrors += 1;
    this.users.add(userId);

    this.latencies.push(latencyMs);
    if (this.latencies.length > LATENCY_WINDOW) {
      this.latencies.splice(0, this.latencies.length - LATENCY_WINDOW);
    }
  }

  snapshot(): MetricsSnapshot {
    const uptimeMs = this.now() - this.startedAt;
    const avg =
      this.latencies.length > 0
        ? this.latencies.reduce((a, b) => a + b, 0) / this.latencies.length
        : 0;
    return {
      uptimeHours: Math.round((uptimeMs / 3_600_000) * 100) / 100,
      totalMessages: this.totalMessages,
      totalVoice: this.totalVoice,
      totalErrors: this.totalErrors,
      uniqueUsers: this.users.size,
      avgResponseTimeMs: Math.round(avg * 100) / 100,
      errorRate: Math.round((this.totalErrors / Math.max(this.totalMessages, 1)) * 10_000) / 100,
    };
  }
}

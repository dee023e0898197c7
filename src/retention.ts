import { errorMessage } from "./errors.js";
import { log } from "./logger.js";
import type { ConversationStore } from "./storage/conversation-store.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface RetentionPolicy {
  retentionDays: number;
  keepAtLeast: number;
}

export interface RetentionReport {
  conversations: number;
  removed: number;
  /** Per key, only where something was removed. */
  removedByKey: Record<string, number>;
  failed: string[];
}

/**
 * Purge old messages from every stored conversation. A failure in one
 * conversation is logged and does not stop the sweep.
 */
export async function sweepRetention(store: ConversationStore, policy: RetentionPolicy): Promise<RetentionReport> {
  const keys = await store.listConversations();
  const report: RetentionReport = { conversations: keys.length, removed: 0, removedByKey: {}, failed: [] };
  const ageMs = policy.retentionDays * DAY_MS;

  for (const key of keys) {
    try {
      const removed = await store.purgeOlderThan(key, ageMs, policy.keepAtLeast);
      if (removed > 0) {
        report.removed += removed;
        report.removedByKey[key] = removed;
      }
    } catch (err) {
      report.failed.push(key);
      log.error(`retention sweep failed for ${key}: ${errorMessage(err)}`);
    }
  }

  log.info(
    `retention sweep: ${report.removed} messages removed across ${keys.length} conversations` +
      (report.failed.length > 0 ? `, ${report.failed.length} failed` : ""),
  );
  return report;
}

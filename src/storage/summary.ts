import { randomUUID } from "node:crypto";
import path from "node:path";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { log } from "../logger.js";
import { ConversationSummarySchema } from "../schemas.js";
import type { Conversation, ConversationSummary } from "../types.js";

/**
 * Summary document mirrored from the authoritative profile and message log.
 * It is an accelerator only: anything unreadable is regenerated.
 */
export function buildSummary(
  conversation: Conversation,
  topics: string[],
  lastAccessAt: string = conversation.lastActiveAt,
): ConversationSummary {
  return {
    key: conversation.key,
    createdAt: conversation.createdAt,
    lastAccessAt,
    currentLevel: conversation.level,
    totalSessions: conversation.totalSessions,
    quickStats: {
      totalMessages: conversation.messageCount,
      voiceMessages: conversation.voiceMessageCount,
      correctionsMade: conversation.correctionCount,
      topicsDiscussed: [...topics],
    },
  };
}

export async function readSummary(summaryPath: string): Promise<ConversationSummary | null> {
  let raw: string;
  try {
    raw = await readFile(summaryPath, "utf-8");
  } catch {
    return null;
  }

  try {
    const parsed = ConversationSummarySchema.safeParse(JSON.parse(raw));
    if (parsed.success) return parsed.data;
    log.debug(`summary at ${summaryPath} failed validation; will rebuild`);
  } catch {
    log.debug(`summary at ${summaryPath} is not valid JSON; will rebuild`);
  }
  return null;
}

/** Write via a temp file + rename so readers never see a half-written document. */
export async function writeSummary(summaryPath: string, summary: ConversationSummary): Promise<void> {
  await mkdir(path.dirname(summaryPath), { recursive: true });
  const tmp = `${summaryPath}.${randomUUID()}.tmp`;
  await writeFile(tmp, JSON.stringify(summary, null, 2) + "\n", "utf-8");
  await rename(tmp, summaryPath);
}

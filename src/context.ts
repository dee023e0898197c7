import type { ConversationStore } from "./storage/conversation-store.js";
import { extractRecentTopics } from "./topics.js";
import {
  DEFAULT_LEVEL,
  type Conversation,
  type StoredMessage,
  type TutorContext,
} from "./types.js";

export const FIRST_CONVERSATION_SUMMARY = "This is our first conversation!";

const LAST_MESSAGE_PREVIEW_CHARS = 80;
const REGULAR_STUDENT_THRESHOLD = 20;
/** Window (in messages) searched for the last user turn. */
const SUMMARY_WINDOW = 6;

export interface ContextAssemblerOptions {
  /** Bound on recent messages returned in the context. */
  recentMessageLimit?: number;
  /** Messages scanned for topic tags. */
  topicWindow?: number;
}

function preview(content: string): string {
  return content.length > LAST_MESSAGE_PREVIEW_CHARS
    ? `${content.slice(0, LAST_MESSAGE_PREVIEW_CHARS)}...`
    : content;
}

/**
 * Deterministic one-paragraph recap used to prime the response generator.
 */
export function summarizeConversation(
  conversation: Conversation,
  recent: StoredMessage[],
  topics: string[],
): string {
  if (recent.length === 0) return FIRST_CONVERSATION_SUMMARY;

  const name = conversation.firstName || "Student";
  const level = conversation.level;
  const userTurns = recent.slice(-SUMMARY_WINDOW).filter((m) => m.role === "user");
  if (userTurns.length === 0) {
    return `Welcoming back ${name} (Level: ${level})`;
  }

  let summary = `Continuing conversation with ${name} (Level: ${level}). `;
  if (topics.length > 0) {
    summary += `Recent topics: ${topics.join(", ")}. `;
  }
  if (conversation.messageCount > REGULAR_STUDENT_THRESHOLD) {
    summary += `Regular student with ${conversation.messageCount} total messages. `;
  }
  const last = userTurns[userTurns.length - 1];
  if (last) summary += `Last message: '${preview(last.content)}'`;
  return summary;
}

function emptyConversation(key: string): Conversation {
  const now = new Date().toISOString();
  return {
    key,
    username: null,
    firstName: null,
    lastName: null,
    level: DEFAULT_LEVEL,
    createdAt: now,
    lastActiveAt: now,
    totalSessions: 0,
    messageCount: 0,
    voiceMessageCount: 0,
    correctionCount: 0,
  };
}

/**
 * Builds the bounded recall view handed to response generation. Reads only:
 * it never creates a conversation and never holds anything an append would
 * wait on.
 */
export class ContextAssembler {
  private readonly recentMessageLimit: number;
  private readonly topicWindow: number;

  constructor(
    private readonly store: ConversationStore,
    options: ContextAssemblerOptions = {},
  ) {
    this.recentMessageLimit = options.recentMessageLimit ?? 8;
    this.topicWindow = options.topicWindow ?? 5;
  }

  async buildContext(key: string): Promise<TutorContext> {
    const conversation = (await this.store.getConversation(key)) ?? emptyConversation(key);
    const recentMessages = await this.store.recentMessages(key, this.recentMessageLimit);
    const topics = extractRecentTopics(recentMessages, this.topicWindow);

    return {
      conversation,
      userName: conversation.firstName || "there",
      level: conversation.level,
      summary: summarizeConversation(conversation, recentMessages, topics),
      topics,
      recentMessages,
      isFirstConversation: recentMessages.length === 0,
    };
  }
}

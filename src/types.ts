export const ENGLISH_LEVELS = ["A1", "A2", "B1", "B2", "C1", "C2"] as const;
export type EnglishLevel = (typeof ENGLISH_LEVELS)[number];

/** Mid-scale level given to conversations that never set one. */
export const DEFAULT_LEVEL: EnglishLevel = "B1";

export function isEnglishLevel(value: unknown): value is EnglishLevel {
  return ENGLISH_LEVELS.some((level) => level === value);
}

export const MESSAGE_ROLES = ["user", "assistant", "system"] as const;
export type MessageRole = (typeof MESSAGE_ROLES)[number];

export type ProviderApi = "openai-completions" | "anthropic-messages";

export interface ProviderConfig {
  id: string;
  api: ProviderApi;
  baseUrl: string;
  model: string;
  apiKey?: string;
  headers?: Record<string, string>;
}

export interface TutorConfig {
  dataDir: string;
  maxConcurrentJobs: number;
  recentMessageLimit: number;
  topicWindow: number;
  sessionGapMinutes: number;
  retentionDays: number;
  retentionKeepAtLeast: number;
  rateLimitMaxRequests: number;
  rateLimitWindowMs: number;
  maxTextLength: number;
  maxAudioBytes: number;
  providerTimeoutMs: number;
  providers: ProviderConfig[];
  temperature: number;
  maxTokens: number;
  speechEnabled: boolean;
  debug: boolean;
}

export interface IdentityHint {
  username?: string | null;
  firstName?: string | null;
  lastName?: string | null;
}

export interface Conversation {
  key: string;
  username: string | null;
  firstName: string | null;
  lastName: string | null;
  level: EnglishLevel;
  createdAt: string;
  lastActiveAt: string;
  totalSessions: number;
  messageCount: number;
  voiceMessageCount: number;
  correctionCount: number;
}

export interface GrammarCorrection {
  rule: string;
  suggestion: string;
  category: string;
}

export interface VocabularySuggestion {
  word: string;
  suggestion: string;
}

/** Input to ConversationStore.appendMessage. */
export interface NewMessage {
  role: MessageRole;
  content: string;
  originalContent?: string;
  isVoice?: boolean;
  voiceDuration?: number;
  corrections?: GrammarCorrection[];
  vocabulary?: VocabularySuggestion[];
  confidence?: number;
  latencyMs?: number;
  sessionId?: string;
  context?: string;
  /** Only set when importing history; live messages are stamped by the store. */
  createdAt?: string;
}

export interface StoredMessage {
  id: number;
  conversationKey: string;
  sessionId: string;
  role: MessageRole;
  content: string;
  originalContent: string;
  isVoice: boolean;
  voiceDuration: number;
  hasErrors: boolean;
  corrections: GrammarCorrection[] | null;
  vocabulary: VocabularySuggestion[] | null;
  confidence: number;
  latencyMs: number;
  createdAt: string;
  context: string | null;
}

export interface ConversationSession {
  sessionId: string;
  startedAt: string;
  endedAt: string;
  messageCount: number;
}

export interface QuickStats {
  totalMessages: number;
  voiceMessages: number;
  correctionsMade: number;
  topicsDiscussed: string[];
}

/** Derived, non-authoritative summary document kept beside each conversation. */
export interface ConversationSummary {
  key: string;
  createdAt: string;
  lastAccessAt: string;
  currentLevel: EnglishLevel;
  totalSessions: number;
  quickStats: QuickStats;
}

export interface ConversationStatistics {
  messages: number;
  userMessages: number;
  voiceMessages: number;
  messagesWithErrors: number;
  averageConfidence: number | null;
  averageLatencyMs: number | null;
  profile: Conversation;
}

export interface ConversationExport {
  exportedAt: string;
  conversation: Conversation;
  summary: ConversationSummary;
  sessions: ConversationSession[];
  messages: StoredMessage[];
  statistics: ConversationStatistics;
}

export interface TutorContext {
  conversation: Conversation;
  userName: string;
  level: EnglishLevel;
  summary: string;
  topics: string[];
  recentMessages: StoredMessage[];
  isFirstConversation: boolean;
}

export type MessageKind = "text" | "voice";

export type JobPayload =
  | { kind: "text"; content: string }
  | { kind: "voice"; audioPath: string; durationSeconds: number; sizeBytes: number };

/** Priority is advisory metadata: it never reorders a conversation's queue. */
export type JobPriority = 1 | 2 | 3;

export interface QueueEntry {
  taskId: string;
  conversationKey: string;
  userId: string;
  identity: IdentityHint;
  payload: JobPayload;
  priority: JobPriority;
  enqueuedAt: string;
}

export type ConversationQueueState = "idle" | "scheduled" | "running";

export interface QueueStatus {
  activeConversations: number;
  totalQueuedJobs: number;
  perConversationQueueDepth: Record<string, number>;
  globalConcurrencyLimit: number;
  runningJobs: number;
  processingConversations: string[];
  accepting: boolean;
}

export interface MetricsSnapshot {
  uptimeHours: number;
  totalMessages: number;
  totalVoice: number;
  totalErrors: number;
  uniqueUsers: number;
  avgResponseTimeMs: number;
  errorRate: number;
}

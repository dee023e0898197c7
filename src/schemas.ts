import { z } from "zod";
import { ENGLISH_LEVELS, MESSAGE_ROLES } from "./types.js";

export const EnglishLevelSchema = z.enum(ENGLISH_LEVELS);
export const MessageRoleSchema = z.enum(MESSAGE_ROLES);

export const GrammarCorrectionSchema = z.object({
  rule: z.string().min(1),
  suggestion: z.string(),
  category: z.string(),
});

export const VocabularySuggestionSchema = z.object({
  word: z.string(),
  suggestion: z.string(),
});

export const NewMessageSchema = z.object({
  role: MessageRoleSchema,
  content: z.string(),
  originalContent: z.string().optional(),
  isVoice: z.boolean().optional(),
  voiceDuration: z.number().nonnegative().optional(),
  corrections: z.array(GrammarCorrectionSchema).optional(),
  vocabulary: z.array(VocabularySuggestionSchema).optional(),
  confidence: z.number().min(0).max(1).optional(),
  latencyMs: z.number().nonnegative().optional(),
  sessionId: z.string().min(1).optional(),
  context: z.string().optional(),
  createdAt: z.string().datetime().optional(),
});

export const ConversationSummarySchema = z.object({
  key: z.string(),
  createdAt: z.string(),
  lastAccessAt: z.string(),
  currentLevel: EnglishLevelSchema,
  totalSessions: z.number().int().nonnegative(),
  quickStats: z.object({
    totalMessages: z.number().int().nonnegative(),
    voiceMessages: z.number().int().nonnegative(),
    correctionsMade: z.number().int().nonnegative(),
    topicsDiscussed: z.array(z.string()),
  }),
});

export const JobPayloadSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("text"), content: z.string().min(1) }),
  z.object({
    kind: z.literal("voice"),
    audioPath: z.string().min(1),
    durationSeconds: z.number().nonnegative(),
    sizeBytes: z.number().int().nonnegative(),
  }),
]);

export const ProviderConfigSchema = z.object({
  id: z.string().min(1),
  api: z.enum(["openai-completions", "anthropic-messages"]).default("openai-completions"),
  baseUrl: z.string().url(),
  model: z.string().min(1),
  apiKey: z.string().optional(),
  headers: z.record(z.string()).optional(),
});

// ── SQLite rows ──────────────────────────────────────────────────────────

const sqliteBool = z.union([z.number(), z.bigint()]).transform((v) => Number(v) !== 0);
const sqliteInt = z.union([z.number(), z.bigint()]).transform((v) => Number(v));

export const ProfileRowSchema = z.object({
  chat_key: z.string(),
  username: z.string().nullable(),
  first_name: z.string().nullable(),
  last_name: z.string().nullable(),
  english_level: z.string(),
  created_at: z.string(),
  last_active: z.string(),
  total_sessions: sqliteInt,
  total_messages: sqliteInt,
  voice_messages: sqliteInt,
  corrected_errors: sqliteInt,
});
export type ProfileRow = z.infer<typeof ProfileRowSchema>;

export const MessageRowSchema = z.object({
  id: sqliteInt,
  chat_key: z.string(),
  session_id: z.string(),
  message_type: MessageRoleSchema,
  content: z.string(),
  original_content: z.string(),
  is_voice: sqliteBool,
  voice_duration: z.number().nullable(),
  has_errors: sqliteBool,
  grammar_corrections: z.string().nullable(),
  vocabulary_suggestions: z.string().nullable(),
  confidence_score: z.number().nullable(),
  response_time: z.number().nullable(),
  created_at: z.string(),
  message_context: z.string().nullable(),
});
export type MessageRow = z.infer<typeof MessageRowSchema>;

export const SessionRowSchema = z.object({
  session_id: z.string(),
  session_start: z.string(),
  session_end: z.string(),
  messages_count: sqliteInt,
});

export const MessageStatsRowSchema = z.object({
  total: sqliteInt,
  user_messages: sqliteInt.nullable(),
  voice_messages: sqliteInt.nullable(),
  messages_with_errors: sqliteInt.nullable(),
  avg_confidence: z.number().nullable(),
  avg_response_time: z.number().nullable(),
});

export const LastMessageRowSchema = z.object({
  session_id: z.string(),
  created_at: z.string(),
});

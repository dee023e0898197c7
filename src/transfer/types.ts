import { z } from "zod";
import { EnglishLevelSchema, GrammarCorrectionSchema, MessageRoleSchema, VocabularySuggestionSchema } from "../schemas.js";

export const EXPORT_FORMAT = "chat-tutor-export";
export const EXPORT_SCHEMA_VERSION = 1;

export const ExportManifestV1Schema = z.object({
  format: z.literal(EXPORT_FORMAT),
  schemaVersion: z.literal(EXPORT_SCHEMA_VERSION),
  createdAt: z.string(),
  conversationKey: z.string(),
  messageCount: z.number().int().nonnegative(),
  /** Hash of the serialized `messages` array. */
  sha256: z.string(),
});

export type ExportManifestV1 = z.infer<typeof ExportManifestV1Schema>;

export const ExportMessageV1Schema = z.object({
  sessionId: z.string().min(1),
  role: MessageRoleSchema,
  content: z.string(),
  originalContent: z.string(),
  isVoice: z.boolean(),
  voiceDuration: z.number().nonnegative(),
  corrections: z.array(GrammarCorrectionSchema).nullable(),
  vocabulary: z.array(VocabularySuggestionSchema).nullable(),
  confidence: z.number().min(0).max(1),
  latencyMs: z.number().nonnegative(),
  createdAt: z.string().datetime(),
  context: z.string().nullable(),
});

export type ExportMessageV1 = z.infer<typeof ExportMessageV1Schema>;

export const ExportBundleV1Schema = z.object({
  manifest: ExportManifestV1Schema,
  profile: z.object({
    username: z.string().nullable(),
    firstName: z.string().nullable(),
    lastName: z.string().nullable(),
    level: EnglishLevelSchema,
  }),
  messages: z.array(ExportMessageV1Schema),
});

export type ExportBundleV1 = z.infer<typeof ExportBundleV1Schema>;

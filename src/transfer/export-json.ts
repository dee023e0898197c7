import path from "node:path";
import { ValidationError } from "../errors.js";
import type { ConversationStore } from "../storage/conversation-store.js";
import type { StoredMessage } from "../types.js";
import { sha256String, writeJsonFile } from "./fs-utils.js";
import { EXPORT_FORMAT, EXPORT_SCHEMA_VERSION, type ExportBundleV1, type ExportMessageV1 } from "./types.js";

function toExportMessage(m: StoredMessage): ExportMessageV1 {
  return {
    sessionId: m.sessionId,
    role: m.role,
    content: m.content,
    originalContent: m.originalContent,
    isVoice: m.isVoice,
    voiceDuration: m.voiceDuration,
    corrections: m.corrections,
    vocabulary: m.vocabulary,
    confidence: m.confidence,
    latencyMs: m.latencyMs,
    createdAt: m.createdAt,
    context: m.context,
  };
}

/** Portable bundle of one conversation: profile basics and the full message log. */
export async function buildExportBundle(
  store: ConversationStore,
  key: string,
  now: () => Date = () => new Date(),
): Promise<ExportBundleV1> {
  const exported = await store.exportConversation(key);
  if (!exported) {
    throw new ValidationError(`no conversation stored for ${key}`, "conversationKey");
  }
  const messages = exported.messages.map(toExportMessage);
  const { conversation } = exported;
  return {
    manifest: {
      format: EXPORT_FORMAT,
      schemaVersion: EXPORT_SCHEMA_VERSION,
      createdAt: now().toISOString(),
      conversationKey: key,
      messageCount: messages.length,
      sha256: sha256String(JSON.stringify(messages)).sha256,
    },
    profile: {
      username: conversation.username,
      firstName: conversation.firstName,
      lastName: conversation.lastName,
      level: conversation.level,
    },
    messages,
  };
}

export interface ExportJsonOptions {
  store: ConversationStore;
  key: string;
  outDir: string;
}

/** Writes `<outDir>/chat_<key>.json` and returns its path. */
export async function exportJsonBundle(opts: ExportJsonOptions): Promise<string> {
  const bundle = await buildExportBundle(opts.store, opts.key);
  const outPath = path.join(path.resolve(opts.outDir), `chat_${opts.key}.json`);
  await writeJsonFile(outPath, bundle);
  return outPath;
}

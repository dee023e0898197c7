import { ValidationError, errorMessage } from "../errors.js";
import { log } from "../logger.js";
import type { ConversationStore } from "../storage/conversation-store.js";
import { readJsonFile, sha256String } from "./fs-utils.js";
import { ExportBundleV1Schema, type ExportBundleV1 } from "./types.js";

export function parseExportBundle(raw: unknown): ExportBundleV1 {
  const parsed = ExportBundleV1Schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(
      `invalid export bundle: ${issue?.path.join(".") || "bundle"} ${issue?.message ?? ""}`.trim(),
      "bundle",
    );
  }
  const bundle = parsed.data;
  if (bundle.manifest.messageCount !== bundle.messages.length) {
    throw new ValidationError("export bundle message count does not match its manifest", "bundle");
  }
  if (sha256String(JSON.stringify(bundle.messages)).sha256 !== bundle.manifest.sha256) {
    throw new ValidationError("export bundle checksum mismatch", "bundle");
  }
  return bundle;
}

export interface ImportJsonOptions {
  store: ConversationStore;
  /** Defaults to the key recorded in the bundle. */
  key?: string;
}

/**
 * Replays a bundle into a conversation that has no messages yet, keeping
 * original timestamps and session ids. Returns the number of messages
 * written. When a message fails part way, the messages already written are
 * removed again (and a conversation created by the import is deleted), so
 * the import can be retried.
 */
export async function importExportBundle(bundle: ExportBundleV1, opts: ImportJsonOptions): Promise<number> {
  const key = opts.key ?? bundle.manifest.conversationKey;
  const { store } = opts;

  const existing = await store.recentMessages(key, 1);
  if (existing.length > 0) {
    throw new ValidationError(`conversation ${key} already has messages; refusing to import`, "conversationKey");
  }
  const existed = (await store.getConversation(key)) !== null;

  try {
    await store.getOrCreate(key, {
      username: bundle.profile.username,
      firstName: bundle.profile.firstName,
      lastName: bundle.profile.lastName,
    });
    await store.setLevel(key, bundle.profile.level);

    for (const m of bundle.messages) {
      await store.appendMessage(key, {
        role: m.role,
        content: m.content,
        originalContent: m.originalContent,
        isVoice: m.isVoice,
        voiceDuration: m.voiceDuration,
        corrections: m.corrections ?? undefined,
        vocabulary: m.vocabulary ?? undefined,
        confidence: m.confidence,
        latencyMs: m.latencyMs,
        sessionId: m.sessionId,
        context: m.context ?? undefined,
        createdAt: m.createdAt,
      });
    }
  } catch (err) {
    log.warn(`import into ${key} failed; rolling back: ${errorMessage(err)}`);
    if (existed) {
      await store.clearMessages(key);
    } else {
      await store.deleteConversation(key);
    }
    throw err;
  }
  log.info(`imported ${bundle.messages.length} messages into ${key}`);
  return bundle.messages.length;
}

export async function importJsonFile(filePath: string, opts: ImportJsonOptions): Promise<number> {
  return importExportBundle(parseExportBundle(await readJsonFile(filePath)), opts);
}

import { access, mkdir, rm } from "node:fs/promises";
import Database from "better-sqlite3";
import { z } from "zod";
import { StorageError, ValidationError, errorMessage } from "../errors.js";
import { log } from "../logger.js";
import {
  EnglishLevelSchema,
  GrammarCorrectionSchema,
  LastMessageRowSchema,
  MessageRowSchema,
  MessageStatsRowSchema,
  NewMessageSchema,
  ProfileRowSchema,
  SessionRowSchema,
  VocabularySuggestionSchema,
  type MessageRow,
  type ProfileRow,
} from "../schemas.js";
import { resolveSessionId } from "../sessions.js";
import { extractRecentTopics } from "../topics.js";
import {
  DEFAULT_LEVEL,
  isEnglishLevel,
  type Conversation,
  type ConversationExport,
  type ConversationSession,
  type ConversationStatistics,
  type ConversationSummary,
  type EnglishLevel,
  type IdentityHint,
  type NewMessage,
  type StoredMessage,
} from "../types.js";
import type { StorageHandle, StorageRouter } from "./router.js";
import { CONVERSATION_TABLES_SQL, PROFILE_TABLES_SQL, STORE_SCHEMA_VERSION } from "./sqlite-schema.js";
import { buildSummary, readSummary, writeSummary } from "./summary.js";

export interface ConversationStoreOptions {
  /** Gap after which a new session id is started. */
  sessionGapMinutes?: number;
  /** Messages scanned for topic tags when the summary is refreshed. */
  topicWindow?: number;
  now?: () => Date;
}

/** Open database pair for one conversation. */
export interface OpenStore {
  handle: StorageHandle;
  profile: Database.Database;
  conversations: Database.Database;
}

const CorrectionListSchema = z.array(GrammarCorrectionSchema);
const VocabularyListSchema = z.array(VocabularySuggestionSchema);

async function exists(p: string): Promise<boolean> {
  try {
    await access(p);
    return true;
  } catch {
    return false;
  }
}

function parseJsonList<T>(raw: string | null, schema: z.ZodType<T[]>): T[] | null {
  if (!raw) return null;
  try {
    const parsed = schema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

function toConversation(row: ProfileRow): Conversation {
  return {
    key: row.chat_key,
    username: row.username,
    firstName: row.first_name,
    lastName: row.last_name,
    level: isEnglishLevel(row.english_level) ? row.english_level : DEFAULT_LEVEL,
    createdAt: row.created_at,
    lastActiveAt: row.last_active,
    totalSessions: row.total_sessions,
    messageCount: row.total_messages,
    voiceMessageCount: row.voice_messages,
    correctionCount: row.corrected_errors,
  };
}

function toStoredMessage(row: MessageRow): StoredMessage {
  return {
    id: row.id,
    conversationKey: row.chat_key,
    sessionId: row.session_id,
    role: row.message_type,
    content: row.content,
    originalContent: row.original_content,
    isVoice: row.is_voice,
    voiceDuration: row.voice_duration ?? 0,
    hasErrors: row.has_errors,
    corrections: parseJsonList(row.grammar_corrections, CorrectionListSchema),
    vocabulary: parseJsonList(row.vocabulary_suggestions, VocabularyListSchema),
    confidence: row.confidence_score ?? 1,
    latencyMs: row.response_time ?? 0,
    createdAt: row.created_at,
    context: row.message_context,
  };
}

/**
 * Durable per-conversation store.
 *
 * Each conversation key owns its own directory with a profile database, a
 * message-log database and a summary document (see StorageRouter). Nothing
 * is shared between keys, so no cross-conversation locking exists here.
 * Within one key the message queue guarantees a single writer.
 */
export class ConversationStore {
  private readonly open = new Map<string, OpenStore>();
  private readonly opening = new Map<string, Promise<OpenStore | null>>();
  private readonly sessionGapMinutes: number;
  private readonly topicWindow: number;
  private readonly now: () => Date;

  constructor(
    readonly router: StorageRouter,
    options: ConversationStoreOptions = {},
  ) {
    this.sessionGapMinutes = options.sessionGapMinutes ?? 30;
    this.topicWindow = options.topicWindow ?? 5;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Return the conversation for `key`, creating its storage unit and a
   * default profile (level B1) on first use. Repeated or concurrent calls
   * for a new key produce one record.
   */
  async getOrCreate(key: string, identity: IdentityHint = {}): Promise<Conversation> {
    const store = await this.openStore(key, true);
    const at = this.now().toISOString();
    const { created, conversation } = this.ensureProfile(store, key, identity, at);
    if (created) {
      await this.refreshSummary(store, conversation);
    } else {
      await this.touchSummary(store, conversation, at);
    }
    return conversation;
  }

  async getConversation(key: string): Promise<Conversation | null> {
    const store = await this.openStore(key, false);
    if (!store) return null;
    const row = this.run(key, "load profile", () => this.profileRow(store, key));
    return row ? toConversation(row) : null;
  }

  /**
   * Append one immutable message. The message row and its session
   * bookkeeping commit in one transaction; profile counters follow, then
   * the summary document is refreshed.
   */
  async appendMessage(key: string, message: NewMessage): Promise<StoredMessage> {
    const parsed = NewMessageSchema.safeParse(message);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ValidationError(
        `invalid message: ${issue?.path.join(".") || "message"} ${issue?.message ?? ""}`.trim(),
        issue?.path.join("."),
      );
    }
    const input = parsed.data;

    const store = await this.openStore(key, true);
    const at = input.createdAt ? new Date(input.createdAt) : this.now();
    const createdAt = at.toISOString();
    this.ensureProfile(store, key, {}, this.now().toISOString());
    const corrections = input.corrections ?? [];
    const hasErrors = corrections.length > 0;
    const isVoice = input.isVoice === true;

    const written = this.run(key, "append message", () => {
      const tx = store.conversations.transaction(() => {
        const lastRaw = store.conversations
          .prepare("SELECT session_id, created_at FROM messages ORDER BY created_at DESC, id DESC LIMIT 1")
          .get();
        const last = lastRaw ? LastMessageRowSchema.parse(lastRaw) : null;
        const sessionId =
          input.sessionId ??
          resolveSessionId(
            last ? { sessionId: last.session_id, createdAt: last.created_at } : null,
            at,
            this.sessionGapMinutes,
          );

        const info = store.conversations
          .prepare(
            `INSERT INTO messages
               (chat_key, session_id, message_type, content, original_content, is_voice,
                voice_duration, has_errors, grammar_corrections, vocabulary_suggestions,
                confidence_score, response_time, created_at, message_context)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
          )
          .run(
            key,
            sessionId,
            input.role,
            input.content,
            input.originalContent ?? input.content,
            isVoice ? 1 : 0,
            input.voiceDuration ?? 0,
            hasErrors ? 1 : 0,
            hasErrors ? JSON.stringify(corrections) : null,
            input.vocabulary && input.vocabulary.length > 0 ? JSON.stringify(input.vocabulary) : null,
            input.confidence ?? 1,
            input.latencyMs ?? 0,
            createdAt,
            input.context ?? null,
          );

        const existingSession = store.conversations
          .prepare("SELECT 1 FROM conversation_sessions WHERE session_id = ?")
          .get(sessionId);
        store.conversations
          .prepare(
            `INSERT INTO conversation_sessions (chat_key, session_id, session_start, session_end, messages_count)
             VALUES (?, ?, ?, ?, 1)
             ON CONFLICT(session_id) DO UPDATE SET
               session_end = MAX(session_end, excluded.session_end),
               messages_count = messages_count + 1`,
          )
          .run(key, sessionId, createdAt, createdAt);

        const row = store.conversations
          .prepare("SELECT * FROM messages WHERE id = ?")
          .get(info.lastInsertRowid);
        return { row: MessageRowSchema.parse(row), newSession: existingSession === undefined };
      });
      return tx();
    });

    const profileRow = this.run(key, "update counters", () => {
      store.profile
        .prepare(
          `UPDATE user_profile SET
             total_messages = total_messages + 1,
             voice_messages = voice_messages + ?,
             corrected_errors = corrected_errors + ?,
             total_sessions = total_sessions + ?,
             last_active = MAX(last_active, ?)
           WHERE chat_key = ?`,
        )
        .run(isVoice ? 1 : 0, hasErrors ? 1 : 0, written.newSession ? 1 : 0, createdAt, key);
      return this.profileRow(store, key);
    });

    if (profileRow) await this.refreshSummary(store, toConversation(profileRow));
    return toStoredMessage(written.row);
  }

  /** The most recent `limit` messages, oldest first. */
  async recentMessages(key: string, limit: number): Promise<StoredMessage[]> {
    if (!Number.isInteger(limit) || limit < 0) {
      throw new ValidationError(`limit must be a non-negative integer, got ${limit}`, "limit");
    }
    if (limit === 0) return [];
    const store = await this.openStore(key, false);
    if (!store) return [];

    const rows = this.run(key, "read messages", () =>
      store.conversations
        .prepare("SELECT * FROM messages ORDER BY created_at DESC, id DESC LIMIT ?")
        .all(limit),
    );
    return rows.map((r) => toStoredMessage(MessageRowSchema.parse(r))).reverse();
  }

  async sessionMessages(key: string, sessionId: string): Promise<StoredMessage[]> {
    const store = await this.openStore(key, false);
    if (!store) return [];
    const rows = this.run(key, "read session", () =>
      store.conversations
        .prepare("SELECT * FROM messages WHERE session_id = ? ORDER BY created_at ASC, id ASC")
        .all(sessionId),
    );
    return rows.map((r) => toStoredMessage(MessageRowSchema.parse(r)));
  }

  async sessions(key: string): Promise<ConversationSession[]> {
    const store = await this.openStore(key, false);
    if (!store) return [];
    const rows = this.run(key, "read sessions", () =>
      store.conversations
        .prepare(
          "SELECT session_id, session_start, session_end, messages_count FROM conversation_sessions ORDER BY session_start ASC, id ASC",
        )
        .all(),
    );
    return rows.map((r) => {
      const row = SessionRowSchema.parse(r);
      return {
        sessionId: row.session_id,
        startedAt: row.session_start,
        endedAt: row.session_end,
        messageCount: row.messages_count,
      };
    });
  }

  async setLevel(key: string, level: unknown): Promise<Conversation> {
    const parsed = EnglishLevelSchema.safeParse(level);
    if (!parsed.success) {
      throw new ValidationError(
        `invalid level ${JSON.stringify(level)}: expected one of A1, A2, B1, B2, C1, C2`,
        "level",
      );
    }
    const next: EnglishLevel = parsed.data;

    await this.getOrCreate(key);
    const store = await this.openStore(key, true);
    const row = this.run(key, "set level", () => {
      store.profile
        .prepare("UPDATE user_profile SET english_level = ? WHERE chat_key = ?")
        .run(next, key);
      return this.profileRow(store, key);
    });
    if (!row) throw new StorageError(`profile for ${key} missing`, key);

    const conversation = toConversation(row);
    await this.refreshSummary(store, conversation);
    log.debug(`level for ${key} set to ${next}`);
    return conversation;
  }

  /** Aggregates computed from the message log; null when the key has no store. */
  async statistics(key: string): Promise<ConversationStatistics | null> {
    const store = await this.openStore(key, false);
    if (!store) return null;

    return this.run(key, "compute statistics", () => {
      const stats = MessageStatsRowSchema.parse(
        store.conversations
          .prepare(
            `SELECT
               COUNT(*) AS total,
               SUM(CASE WHEN message_type = 'user' THEN 1 ELSE 0 END) AS user_messages,
               SUM(CASE WHEN is_voice = 1 THEN 1 ELSE 0 END) AS voice_messages,
               SUM(CASE WHEN has_errors = 1 THEN 1 ELSE 0 END) AS messages_with_errors,
               AVG(confidence_score) AS avg_confidence,
               AVG(response_time) AS avg_response_time
             FROM messages`,
          )
          .get(),
      );
      const profile = this.profileRow(store, key);
      if (!profile) throw new Error("profile row missing");
      return {
        messages: stats.total,
        userMessages: stats.user_messages ?? 0,
        voiceMessages: stats.voice_messages ?? 0,
        messagesWithErrors: stats.messages_with_errors ?? 0,
        averageConfidence: stats.avg_confidence,
        averageLatencyMs: stats.avg_response_time,
        profile: toConversation(profile),
      };
    });
  }

  /**
   * Delete messages older than `ageMs`, always keeping the newest
   * `keepAtLeast`. The profile record is never removed.
   */
  async purgeOlderThan(key: string, ageMs: number, keepAtLeast: number): Promise<number> {
    if (!Number.isFinite(ageMs) || ageMs < 0) {
      throw new ValidationError(`age must be a non-negative number of ms, got ${ageMs}`, "age");
    }
    if (!Number.isInteger(keepAtLeast) || keepAtLeast < 0) {
      throw new ValidationError(`keepAtLeast must be a non-negative integer, got ${keepAtLeast}`, "keepAtLeast");
    }
    const store = await this.openStore(key, false);
    if (!store) return 0;

    const cutoff = new Date(this.now().getTime() - ageMs).toISOString();
    const removed = this.run(key, "purge messages", () =>
      store.conversations
        .prepare(
          `DELETE FROM messages
           WHERE created_at < ?
             AND id NOT IN (
               SELECT id FROM messages ORDER BY created_at DESC, id DESC LIMIT ?
             )`,
        )
        .run(cutoff, keepAtLeast).changes,
    );

    if (removed > 0) {
      log.info(`purged ${removed} messages older than ${cutoff} from ${key}`);
      const row = this.run(key, "load profile", () => this.profileRow(store, key));
      if (row) await this.refreshSummary(store, toConversation(row));
    }
    return removed;
  }

  /**
   * Delete every message and session of `key` and zero the message
   * counters. The profile itself stays. Returns the number of messages removed.
   */
  async clearMessages(key: string): Promise<number> {
    const store = await this.openStore(key, false);
    if (!store) return 0;

    const removed = this.run(key, "clear messages", () => {
      const tx = store.conversations.transaction(() => {
        const changes = store.conversations.prepare("DELETE FROM messages").run().changes;
        store.conversations.prepare("DELETE FROM conversation_sessions").run();
        return changes;
      });
      return tx();
    });
    const row = this.run(key, "reset counters", () => {
      store.profile
        .prepare(
          `UPDATE user_profile SET
             total_messages = 0, voice_messages = 0, corrected_errors = 0, total_sessions = 0
           WHERE chat_key = ?`,
        )
        .run(key);
      return this.profileRow(store, key);
    });
    if (row) await this.refreshSummary(store, toConversation(row));
    log.info(`cleared ${removed} messages from ${key}`);
    return removed;
  }

  /** Summary document, regenerated from the databases when absent or invalid. */
  async readSummary(key: string): Promise<ConversationSummary | null> {
    const store = await this.openStore(key, false);
    if (!store) return null;
    const cached = await readSummary(store.handle.summaryPath);
    if (cached) return cached;
    const row = this.run(key, "load profile", () => this.profileRow(store, key));
    if (!row) return null;
    return this.refreshSummary(store, toConversation(row));
  }

  async exportConversation(key: string): Promise<ConversationExport | null> {
    const conversation = await this.getConversation(key);
    if (!conversation) return null;
    const store = await this.openStore(key, false);
    if (!store) return null;

    const rows = this.run(key, "read messages", () =>
      store.conversations.prepare("SELECT * FROM messages ORDER BY created_at ASC, id ASC").all(),
    );
    const statistics = await this.statistics(key);
    const summary = await this.readSummary(key);
    if (!statistics || !summary) return null;

    return {
      exportedAt: this.now().toISOString(),
      conversation,
      summary,
      sessions: await this.sessions(key),
      messages: rows.map((r) => toStoredMessage(MessageRowSchema.parse(r))),
      statistics,
    };
  }

  /** Explicit removal of one conversation's whole storage unit. */
  async deleteConversation(key: string): Promise<boolean> {
    const handle = this.router.resolve(key);
    this.closeOne(key);
    if (!(await exists(handle.root))) return false;
    try {
      await rm(handle.root, { recursive: true, force: true });
    } catch (err) {
      throw new StorageError(`failed to delete ${key}: ${errorMessage(err)}`, key, { cause: err });
    }
    this.router.forget(key);
    log.info(`deleted conversation store for ${key}`);
    return true;
  }

  async listConversations(): Promise<string[]> {
    return this.router.listKeys();
  }

  close(): void {
    for (const key of [...this.open.keys()]) this.closeOne(key);
  }

  // ── internals ────────────────────────────────────────────────────────

  private closeOne(key: string): void {
    const store = this.open.get(key);
    if (!store) return;
    this.open.delete(key);
    try {
      store.profile.close();
      store.conversations.close();
    } catch (err) {
      log.warn(`failed to close databases for ${key}: ${errorMessage(err)}`);
    }
  }

  /**
   * Insert the default profile when missing; otherwise merge `identity`
   * and stamp `last_active`. Summary upkeep is left to the caller.
   */
  private ensureProfile(
    store: OpenStore,
    key: string,
    identity: IdentityHint,
    at: string,
  ): { created: boolean; conversation: Conversation } {
    const result = this.run(key, "load profile", () => {
      const tx = store.profile.transaction(() => {
        const created = store.profile
          .prepare(
            `INSERT OR IGNORE INTO user_profile
               (chat_key, username, first_name, last_name, english_level, created_at, last_active)
             VALUES (?, ?, ?, ?, ?, ?, ?)`,
          )
          .run(
            key,
            identity.username ?? null,
            identity.firstName ?? null,
            identity.lastName ?? null,
            DEFAULT_LEVEL,
            at,
            at,
          );

        if (created.changes > 0) {
          store.profile
            .prepare("INSERT OR IGNORE INTO user_preferences (chat_key) VALUES (?)")
            .run(key);
        } else {
          store.profile
            .prepare(
              `UPDATE user_profile SET
                 username = COALESCE(?, username),
                 first_name = COALESCE(?, first_name),
                 last_name = COALESCE(?, last_name),
                 last_active = ?
               WHERE chat_key = ?`,
            )
            .run(
              identity.username ?? null,
              identity.firstName ?? null,
              identity.lastName ?? null,
              at,
              key,
            );
        }
        return { created: created.changes > 0, row: this.profileRow(store, key) };
      });
      return tx();
    });

    if (!result.row) {
      throw new StorageError(`profile for ${key} missing after insert`, key);
    }
    if (result.created) log.info(`created conversation store for ${key}`);
    return { created: result.created, conversation: toConversation(result.row) };
  }

  private profileRow(store: OpenStore, key: string): ProfileRow | null {
    const raw = store.profile.prepare("SELECT * FROM user_profile WHERE chat_key = ?").get(key);
    return raw ? ProfileRowSchema.parse(raw) : null;
  }

  /** Run a synchronous database step, mapping failures to StorageError. */
  private run<T>(key: string, action: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof StorageError || err instanceof ValidationError) throw err;
      throw new StorageError(`${action} failed for ${key}: ${errorMessage(err)}`, key, { cause: err });
    }
  }

  private openStore(key: string, create: true): Promise<OpenStore>;
  private openStore(key: string, create: false): Promise<OpenStore | null>;
  private async openStore(key: string, create: boolean): Promise<OpenStore | null> {
    const handle = this.router.resolve(key);
    for (;;) {
      const cached = this.open.get(key);
      if (cached) return cached;

      // Join an open already in flight; a read that found nothing on disk
      // does not satisfy a caller that needs the store created.
      const pending = this.opening.get(key);
      if (pending) {
        const store = await pending;
        if (store || !create) return store;
        continue;
      }

      const opening = this.openExisting(handle, create);
      this.opening.set(key, opening);
      try {
        const store = await opening;
        if (store) this.open.set(key, store);
        return store;
      } finally {
        if (this.opening.get(key) === opening) this.opening.delete(key);
      }
    }
  }

  private async openExisting(handle: StorageHandle, create: boolean): Promise<OpenStore | null> {
    if (!create && !(await exists(handle.profileDb))) return null;
    return this.initStorage(handle);
  }

  protected async initStorage(handle: StorageHandle): Promise<OpenStore> {
    try {
      await mkdir(handle.root, { recursive: true });
    } catch (err) {
      throw new StorageError(
        `cannot create storage root ${handle.root}: ${errorMessage(err)}`,
        handle.key,
        { cause: err },
      );
    }

    return this.run(handle.key, "open databases", () => {
      const profile = new Database(handle.profileDb);
      let conversations: Database.Database;
      try {
        conversations = new Database(handle.conversationsDb);
      } catch (err) {
        profile.close();
        throw err;
      }
      for (const [db, sql] of [
        [profile, PROFILE_TABLES_SQL],
        [conversations, CONVERSATION_TABLES_SQL],
      ] as const) {
        db.pragma("journal_mode = WAL");
        db.exec(sql);
        db.prepare("INSERT OR IGNORE INTO meta(key, value) VALUES (?, ?)").run(
          "schemaVersion",
          String(STORE_SCHEMA_VERSION),
        );
      }
      return { handle, profile, conversations };
    });
  }

  private async refreshSummary(store: OpenStore, conversation: Conversation): Promise<ConversationSummary> {
    const rows = this.run(conversation.key, "read messages", () =>
      store.conversations
        .prepare("SELECT content FROM messages ORDER BY created_at DESC, id DESC LIMIT ?")
        .all(this.topicWindow),
    );
    const contents = rows
      .map((r) => z.object({ content: z.string() }).parse(r))
      .reverse();
    const summary = buildSummary(conversation, extractRecentTopics(contents, this.topicWindow));
    await this.persistSummary(store, summary);
    return summary;
  }

  private async touchSummary(store: OpenStore, conversation: Conversation, at: string): Promise<void> {
    const cached = await readSummary(store.handle.summaryPath);
    if (!cached) {
      await this.refreshSummary(store, conversation);
      return;
    }
    await this.persistSummary(store, { ...cached, lastAccessAt: at });
  }

  protected async persistSummary(store: OpenStore, summary: ConversationSummary): Promise<void> {
    try {
      await writeSummary(store.handle.summaryPath, summary);
    } catch (err) {
      log.warn(`summary write failed for ${summary.key}: ${errorMessage(err)}`);
    }
  }
}

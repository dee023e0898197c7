import { access, copyFile } from "node:fs/promises";
import Database from "better-sqlite3";
import { z } from "zod";
import { errorMessage } from "../errors.js";
import { log } from "../logger.js";
import { GrammarCorrectionSchema } from "../schemas.js";
import type { ConversationStore } from "../storage/conversation-store.js";
import { isValidConversationKey } from "../storage/router.js";
import { type GrammarCorrection, isEnglishLevel } from "../types.js";

/**
 * Importer for the older single-database layout, where every chat shared
 * one `users` table and one `conversations` table keyed by chat_id.
 */

const sqliteBool = z.union([z.number(), z.bigint()]).transform((v) => Number(v) !== 0);

const LegacyUserRowSchema = z.object({
  chat_id: z.union([z.number(), z.bigint()]).transform((v) => String(v)),
  username: z.string().nullable(),
  first_name: z.string().nullable(),
  last_name: z.string().nullable(),
  english_level: z.string().nullable(),
});

const LegacyMessageRowSchema = z.object({
  message_type: z.string(),
  content: z.string().nullable(),
  is_voice: sqliteBool.nullable(),
  grammar_corrections: z.string().nullable(),
  timestamp: z.string().nullable(),
});

type LegacyMessageRow = z.infer<typeof LegacyMessageRowSchema>;

export interface LegacyMigrationReport {
  conversations: number;
  messages: number;
  skipped: string[];
}

/** SQLite CURRENT_TIMESTAMP values are UTC without a zone marker. */
export function legacyTimestampToIso(value: string | null): string | undefined {
  if (!value) return undefined;
  const normalized = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}/.test(value)
    ? `${value.replace(" ", "T")}Z`
    : value;
  const date = new Date(normalized);
  return Number.isNaN(date.getTime()) ? undefined : date.toISOString();
}

function legacyCorrections(raw: string | null): GrammarCorrection[] {
  if (!raw) return [];
  try {
    const parsed = z.array(GrammarCorrectionSchema).safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : [];
  } catch {
    return [];
  }
}

function legacyRole(messageType: string): "user" | "assistant" {
  return messageType === "user" ? "user" : "assistant";
}

async function fileExists(p: string): Promise<boolean> {
  try {
    await access(p);
    return true;
  } catch {
    return false;
  }
}

export interface LegacyMigrationOptions {
  /** Copy the legacy file to `<path>.bak` before reading it. */
  backup?: boolean;
  dryRun?: boolean;
}

/**
 * Replay each legacy chat into its own conversation store. Chats that
 * already have messages in the new layout are skipped.
 */
export async function migrateLegacyDatabase(
  legacyPath: string,
  store: ConversationStore,
  options: LegacyMigrationOptions = {},
): Promise<LegacyMigrationReport> {
  const report: LegacyMigrationReport = { conversations: 0, messages: 0, skipped: [] };
  if (!(await fileExists(legacyPath))) {
    log.warn(`legacy database not found at ${legacyPath}; nothing to migrate`);
    return report;
  }
  if (options.backup && !options.dryRun) {
    await copyFile(legacyPath, `${legacyPath}.bak`);
    log.info(`backed up legacy database to ${legacyPath}.bak`);
  }

  const db = new Database(legacyPath, { readonly: true, fileMustExist: true });
  try {
    const users = db
      .prepare("SELECT chat_id, username, first_name, last_name, english_level FROM users ORDER BY chat_id")
      .all()
      .map((r) => LegacyUserRowSchema.parse(r));
    const messagesFor = db.prepare(
      `SELECT message_type, content, is_voice, grammar_corrections, timestamp
       FROM conversations WHERE chat_id = ? ORDER BY timestamp ASC, id ASC`,
    );

    for (const user of users) {
      const key = user.chat_id;
      if (!isValidConversationKey(key)) {
        report.skipped.push(key);
        continue;
      }
      if ((await store.recentMessages(key, 1)).length > 0) {
        log.info(`skipping legacy chat ${key}: already migrated`);
        report.skipped.push(key);
        continue;
      }

      const rows: LegacyMessageRow[] = messagesFor.all(key).map((r) => LegacyMessageRowSchema.parse(r));
      report.conversations += 1;
      report.messages += rows.length;
      if (options.dryRun) continue;

      try {
        await store.getOrCreate(key, {
          username: user.username,
          firstName: user.first_name,
          lastName: user.last_name,
        });
        if (isEnglishLevel(user.english_level)) await store.setLevel(key, user.english_level);
        for (const row of rows) {
          await store.appendMessage(key, {
            role: legacyRole(row.message_type),
            content: row.content ?? "",
            isVoice: row.is_voice === true,
            corrections: legacyCorrections(row.grammar_corrections),
            createdAt: legacyTimestampToIso(row.timestamp),
          });
        }
        log.info(`migrated legacy chat ${key} (${rows.length} messages)`);
      } catch (err) {
        report.skipped.push(key);
        log.error(`failed to migrate legacy chat ${key}: ${errorMessage(err)}`);
      }
    }
  } finally {
    db.close();
  }
  return report;
}

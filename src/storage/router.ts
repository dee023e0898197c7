import path from "node:path";
import { readdir } from "node:fs/promises";
import { ValidationError } from "../errors.js";

const ROOT_PREFIX = "chat_";

/**
 * Where one conversation's durable state lives. Every file a conversation
 * owns sits under `root`; no two keys share a root.
 */
export interface StorageHandle {
  key: string;
  root: string;
  profileDb: string;
  conversationsDb: string;
  summaryPath: string;
}

const KEY_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

/**
 * Keys become directory names verbatim. Telegram chat ids, including
 * negative group ids, pass as-is.
 */
export function isValidConversationKey(key: unknown): key is string {
  return typeof key === "string" && KEY_PATTERN.test(key);
}

/**
 * Storage routing for conversations.
 *
 * Layout:
 *   <dataDir>/chat_<key>/profile.db
 *   <dataDir>/chat_<key>/conversations.db
 *   <dataDir>/chat_<key>/summary.json
 */
export class StorageRouter {
  private readonly cache = new Map<string, StorageHandle>();

  constructor(readonly dataDir: string) {}

  resolve(conversationKey: string): StorageHandle {
    const cached = this.cache.get(conversationKey);
    if (cached) return cached;

    if (!isValidConversationKey(conversationKey)) {
      throw new ValidationError(
        `invalid conversation key ${JSON.stringify(conversationKey)}: expected 1-128 characters of [A-Za-z0-9_-]`,
        "conversationKey",
      );
    }

    const root = path.join(this.dataDir, `${ROOT_PREFIX}${conversationKey}`);
    const handle: StorageHandle = {
      key: conversationKey,
      root,
      profileDb: path.join(root, "profile.db"),
      conversationsDb: path.join(root, "conversations.db"),
      summaryPath: path.join(root, "summary.json"),
    };
    this.cache.set(conversationKey, handle);
    return handle;
  }

  /** Keys of every conversation that has a root on disk. */
  async listKeys(): Promise<string[]> {
    try {
      const entries = await readdir(this.dataDir, { withFileTypes: true });
      return entries
        .filter((e) => e.isDirectory() && e.name.startsWith(ROOT_PREFIX))
        .map((e) => e.name.slice(ROOT_PREFIX.length))
        .filter(isValidConversationKey)
        .sort();
    } catch (err) {
      const code = err && typeof err === "object" && "code" in err ? err.code : undefined;
      if (code === "ENOENT") return [];
      throw err;
    }
  }

  forget(conversationKey: string): void {
    this.cache.delete(conversationKey);
  }
}

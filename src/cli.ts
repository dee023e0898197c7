import { Command, InvalidArgumentError } from "commander";
import { loadConfigFile } from "./config.js";
import { initLogger } from "./logger.js";
import { ConversationStore } from "./storage/conversation-store.js";
import { StorageRouter } from "./storage/router.js";
import { exportJsonBundle } from "./transfer/export-json.js";
import { importJsonFile } from "./transfer/import-json.js";
import { sweepRetention } from "./retention.js";
import type { TutorConfig } from "./types.js";

export const DEFAULT_CONFIG_PATH = "chat-tutor.config.json";

function parseCount(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError("expected a non-negative integer");
  }
  return n;
}

interface GlobalOptions {
  config: string;
}

async function openStore(program: Command): Promise<{ config: TutorConfig; store: ConversationStore }> {
  const { config: configPath } = program.opts<GlobalOptions>();
  const config = await loadConfigFile(configPath);
  initLogger(undefined, config.debug);
  const store = new ConversationStore(new StorageRouter(config.dataDir), {
    sessionGapMinutes: config.sessionGapMinutes,
    topicWindow: config.topicWindow,
  });
  return { config, store };
}

async function withStore(
  program: Command,
  fn: (store: ConversationStore, config: TutorConfig) => Promise<void>,
): Promise<void> {
  const { config, store } = await openStore(program);
  try {
    await fn(store, config);
  } finally {
    store.close();
  }
}

/** Operator commands over the on-disk conversation stores. */
export function buildCli(): Command {
  const program = new Command("chat-tutor")
    .description("Inspect and maintain chat-tutor conversation stores")
    .option("--config <path>", "Path to a JSON config file", DEFAULT_CONFIG_PATH);

  program
    .command("list")
    .description("List stored conversations")
    .action(() =>
      withStore(program, async (store) => {
        const keys = await store.listConversations();
        if (keys.length === 0) {
          console.log("No conversations stored.");
          return;
        }
        for (const key of keys) {
          const conversation = await store.getConversation(key);
          if (!conversation) continue;
          console.log(
            `${key}  level=${conversation.level}  messages=${conversation.messageCount}  last=${conversation.lastActiveAt}`,
          );
        }
      }),
    );

  program
    .command("stats")
    .description("Show statistics for one conversation")
    .argument("<key>", "Conversation key")
    .action((key: string) =>
      withStore(program, async (store) => {
        const stats = await store.statistics(key);
        if (!stats) {
          console.log(`No conversation stored for ${key}.`);
          return;
        }
        const summary = await store.readSummary(key);
        console.log(`=== Conversation ${key} ===\n`);
        console.log(`Name: ${stats.profile.firstName ?? "(unknown)"}`);
        console.log(`Level: ${stats.profile.level}`);
        console.log(`Sessions: ${stats.profile.totalSessions}`);
        console.log(`Messages: ${stats.messages} (${stats.userMessages} from the student)`);
        console.log(`Voice messages: ${stats.voiceMessages}`);
        console.log(`Messages with corrections: ${stats.messagesWithErrors}`);
        if (stats.averageLatencyMs !== null) {
          console.log(`Average response time: ${Math.round(stats.averageLatencyMs)}ms`);
        }
        const topics = summary?.quickStats.topicsDiscussed ?? [];
        if (topics.length > 0) console.log(`Recent topics: ${topics.join(", ")}`);
      }),
    );

  program
    .command("history")
    .description("Print the most recent messages of a conversation")
    .argument("<key>", "Conversation key")
    .option("--limit <n>", "Number of messages", parseCount, 20)
    .action((key: string, opts: { limit: number }) =>
      withStore(program, async (store) => {
        const messages = await store.recentMessages(key, opts.limit);
        for (const m of messages) {
          const voice = m.isVoice ? " [voice]" : "";
          console.log(`[${m.createdAt}] ${m.role}${voice}: ${m.content}`);
        }
      }),
    );

  program
    .command("export")
    .description("Export one conversation to a JSON bundle")
    .argument("<key>", "Conversation key")
    .option("--out <dir>", "Output directory", "exports")
    .action((key: string, opts: { out: string }) =>
      withStore(program, async (store) => {
        const outPath = await exportJsonBundle({ store, key, outDir: opts.out });
        console.log(`Exported ${key} to ${outPath}`);
      }),
    );

  program
    .command("import")
    .description("Import a JSON bundle into a conversation with no messages")
    .argument("<file>", "Bundle written by the export command")
    .option("--key <key>", "Target conversation key (defaults to the bundle's)")
    .action((file: string, opts: { key?: string }) =>
      withStore(program, async (store) => {
        const count = await importJsonFile(file, { store, key: opts.key });
        console.log(`Imported ${count} messages.`);
      }),
    );

  program
    .command("set-level")
    .description("Set a conversation's English level (A1-C2)")
    .argument("<key>", "Conversation key")
    .argument("<level>", "A1, A2, B1, B2, C1 or C2")
    .action((key: string, level: string) =>
      withStore(program, async (store) => {
        const conversation = await store.setLevel(key, level.toUpperCase());
        console.log(`${key} is now at level ${conversation.level}.`);
      }),
    );

  program
    .command("purge")
    .description("Delete old messages from every conversation")
    .option("--days <n>", "Retention in days (default: config retentionDays)", parseCount)
    .option("--keep <n>", "Messages always kept per conversation (default: config retentionKeepAtLeast)", parseCount)
    .action((opts: { days?: number; keep?: number }) =>
      withStore(program, async (store, config) => {
        const report = await sweepRetention(store, {
          retentionDays: opts.days ?? config.retentionDays,
          keepAtLeast: opts.keep ?? config.retentionKeepAtLeast,
        });
        console.log(`Removed ${report.removed} messages from ${report.conversations} conversations.`);
        if (report.failed.length > 0) {
          console.log(`Failed: ${report.failed.join(", ")}`);
          process.exitCode = 1;
        }
      }),
    );

  program
    .command("delete")
    .description("Delete a conversation's whole store")
    .argument("<key>", "Conversation key")
    .action((key: string) =>
      withStore(program, async (store) => {
        const removed = await store.deleteConversation(key);
        console.log(removed ? `Deleted ${key}.` : `No conversation stored for ${key}.`);
      }),
    );

  return program;
}

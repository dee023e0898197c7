/**
 * Migration script: move chats from the older single-database layout
 * (data/user_history.db) into per-conversation stores.
 *
 * Usage: npx tsx scripts/migrate-legacy.ts [--dry-run] [--source=<path>] [--config=<path>]
 */

import { loadConfigFile } from "../src/config.js";
import { errorMessage } from "../src/errors.js";
import { initLogger } from "../src/logger.js";
import { ConversationStore } from "../src/storage/conversation-store.js";
import { StorageRouter } from "../src/storage/router.js";
import { migrateLegacyDatabase } from "../src/transfer/legacy.js";

const args = process.argv.slice(2);
const dryRun = args.includes("--dry-run");
const sourceArg = args.find((a) => a.startsWith("--source="));
const configArg = args.find((a) => a.startsWith("--config="));
const source = sourceArg ? sourceArg.slice("--source=".length) : "data/user_history.db";
const configPath = configArg ? configArg.slice("--config=".length) : "chat-tutor.config.json";

async function main(): Promise<void> {
  const config = await loadConfigFile(configPath);
  initLogger(undefined, config.debug);
  const store = new ConversationStore(new StorageRouter(config.dataDir), {
    sessionGapMinutes: config.sessionGapMinutes,
    topicWindow: config.topicWindow,
  });

  try {
    console.log(`Source: ${source}`);
    console.log(`Destination: ${config.dataDir}${dryRun ? " (dry run)" : ""}`);
    const report = await migrateLegacyDatabase(source, store, { backup: true, dryRun });
    console.log(`Conversations: ${report.conversations}`);
    console.log(`Messages: ${report.messages}`);
    if (report.skipped.length > 0) console.log(`Skipped: ${report.skipped.join(", ")}`);
  } finally {
    store.close();
  }
}

main().catch((err: unknown) => {
  console.error(`migration failed: ${errorMessage(err)}`);
  process.exitCode = 1;
});

import { readFileSync } from "node:fs";
import { z } from "zod";

const TopicVocabularySchema = z.record(z.array(z.string().min(1)));

export type TopicVocabulary = ReadonlyMap<string, readonly string[]>;

/** Default cap on topics reported for one conversation. */
export const MAX_TOPICS = 8;

let defaultVocabulary: TopicVocabulary | null = null;

export function loadTopicVocabulary(
  file: URL | string = new URL("./data/topics.json", import.meta.url),
): TopicVocabulary {
  const parsed = TopicVocabularySchema.parse(JSON.parse(readFileSync(file, "utf-8")));
  return new Map(
    Object.entries(parsed).map(([topic, keywords]) => [
      topic,
      keywords.map((k) => k.toLowerCase().trim()),
    ]),
  );
}

function vocabulary(): TopicVocabulary {
  if (!defaultVocabulary) defaultVocabulary = loadTopicVocabulary();
  return defaultVocabulary;
}

/** Lowercase and pad with spaces so keywords match on word boundaries. */
function normalizeForMatch(content: string): string {
  return ` ${content.toLowerCase().replace(/[^a-z0-9']+/g, " ").trim()} `;
}

/** Topics whose keywords appear in `content`, in vocabulary order. */
export function topicsIn(content: string, vocab: TopicVocabulary = vocabulary()): string[] {
  const text = normalizeForMatch(content);
  const found: string[] = [];
  for (const [topic, keywords] of vocab) {
    if (keywords.some((k) => text.includes(` ${k} `))) found.push(topic);
  }
  return found;
}

/**
 * Topic tags for the last `window` messages, deduplicated, ordered by
 * first appearance (oldest message first) and capped at `maxTopics`.
 */
export function extractRecentTopics(
  messages: ReadonlyArray<{ content: string }>,
  window: number,
  options: { maxTopics?: number; vocabulary?: TopicVocabulary } = {},
): string[] {
  if (window <= 0 || messages.length === 0) return [];
  const maxTopics = options.maxTopics ?? MAX_TOPICS;
  const vocab = options.vocabulary ?? vocabulary();

  const topics: string[] = [];
  for (const message of messages.slice(-window)) {
    for (const topic of topicsIn(message.content, vocab)) {
      if (!topics.includes(topic)) topics.push(topic);
      if (topics.length >= maxTopics) return topics;
    }
  }
  return topics;
}

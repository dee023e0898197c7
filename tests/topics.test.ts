import test from "node:test";
import assert from "node:assert/strict";
import { extractRecentTopics, loadTopicVocabulary, topicsIn } from "../src/topics.js";

const vocabulary = new Map<string, readonly string[]>([
  ["music", ["guitar", "song"]],
  ["pets", ["dog", "cat"]],
  ["cooking", ["recipe", "oven"]],
]);

test("topicsIn matches whole words only, in vocabulary order", () => {
  assert.deepEqual(topicsIn("My DOG hates my guitar!", vocabulary), ["music", "pets"]);
  assert.deepEqual(topicsIn("catalog of songs", vocabulary), []);
});

test("extractRecentTopics scans only the window and orders by first appearance", () => {
  const messages = [
    { content: "I baked with a new recipe" },
    { content: "My cat sleeps all day" },
    { content: "I play guitar" },
    { content: "The cat again" },
  ];
  assert.deepEqual(extractRecentTopics(messages, 3, { vocabulary }), ["pets", "music"]);
  assert.deepEqual(extractRecentTopics(messages, 10, { vocabulary }), ["cooking", "pets", "music"]);
  assert.deepEqual(extractRecentTopics(messages, 10, { vocabulary, maxTopics: 1 }), ["cooking"]);
  assert.deepEqual(extractRecentTopics(messages, 0, { vocabulary }), []);
});

test("the bundled vocabulary covers everyday topics and multi-word keywords", () => {
  const bundled = loadTopicVocabulary();
  assert.ok(bundled.has("travel"));
  assert.deepEqual(topicsIn("In my free time I watch a movie", bundled), ["movies", "hobbies"]);
});

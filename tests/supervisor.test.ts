import test from "node:test";
import assert from "node:assert/strict";
import { initLogger } from "../src/logger.js";
import { MetricsService } from "../src/metrics.js";
import { QueueSupervisor } from "../src/queue/supervisor.js";
import { PerChatTaskQueue } from "../src/queue/task-queue.js";
import { silentLogger, sleep } from "./fakes.js";

initLogger(silentLogger, false);

test("QueueSupervisor passes status through and adds metrics", () => {
  const queue = new PerChatTaskQueue({ run: async () => {} }, { maxConcurrentJobs: 3 });
  const metrics = new MetricsService(() => 0);
  metrics.track("u1", "text", 100);
  const supervisor = new QueueSupervisor(queue, metrics);

  const status = supervisor.status();
  assert.equal(status.globalConcurrencyLimit, 3);
  assert.equal(status.accepting, true);
  assert.equal(status.metrics?.totalMessages, 1);
  assert.match(status.startedAt, /^\d{4}-\d{2}-\d{2}T/);
});

test("QueueSupervisor.shutdown runs the drain exactly once", async () => {
  let runs = 0;
  const queue = new PerChatTaskQueue(
    {
      run: async () => {
        runs += 1;
        await sleep(20);
      },
    },
    { maxConcurrentJobs: 1 },
  );
  const supervisor = new QueueSupervisor(queue);
  queue.enqueue("k", { userId: "u", payload: { kind: "text", content: "one" } });
  queue.enqueue("k", { userId: "u", payload: { kind: "text", content: "two" } });
  await sleep(5);

  const first = supervisor.shutdown();
  const second = supervisor.shutdown();
  assert.equal(first, second);
  assert.equal(supervisor.isShuttingDown, true);
  assert.deepEqual(await first, { discarded: 1, awaited: 1 });
  assert.equal(runs, 1);
  assert.equal(supervisor.status().accepting, false);
});

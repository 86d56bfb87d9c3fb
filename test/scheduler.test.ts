import test from "node:test";
import assert from "node:assert/strict";
import { setTimeout as delay } from "node:timers/promises";
import { LoopScheduler } from "../src/services/scheduler.ts";
import { createRecordingLogger } from "./fakes.ts";

test("loops run a unit immediately and stop wakes sleeping loops", async () => {
  const scheduler = new LoopScheduler({ stopTimeoutMs: 1000, logger: createRecordingLogger().logger });
  const runs: string[] = [];

  assert.equal(scheduler.state, "idle");
  scheduler.start([
    { name: "post", intervalMs: 60_000, unit: async () => void runs.push("post") },
    { name: "mentions", intervalMs: 60_000, unit: async () => void runs.push("mentions") },
  ]);
  assert.equal(scheduler.state, "running");

  await delay(20);
  const started = Date.now();
  const result = await scheduler.stop();

  assert.deepEqual(result, { timedOut: false });
  assert.ok(Date.now() - started < 1000);
  assert.deepEqual([...runs].sort(), ["mentions", "post"]);
  assert.equal(scheduler.state, "stopped");
});

test("a failing unit is logged and the loop keeps going", async () => {
  const { logger, events } = createRecordingLogger();
  const scheduler = new LoopScheduler({ stopTimeoutMs: 1000, logger });
  let attempts = 0;

  scheduler.start([
    {
      name: "dms",
      intervalMs: 1,
      unit: async () => {
        attempts += 1;
        throw new Error("fetch failed");
      },
    },
  ]);

  await delay(50);
  await scheduler.stop();

  assert.ok(attempts >= 2);
  const failures = events.filter((event) => event.msg === "Loop iteration failed");
  assert.equal(failures.length, attempts);
  assert.equal(failures[0].obj.err, "fetch failed");
  assert.equal(scheduler.failures.length, 0);
});

test("start is refused while running and allowed again after stop", async () => {
  const { logger, events } = createRecordingLogger();
  const scheduler = new LoopScheduler({ stopTimeoutMs: 1000, logger });
  const loop = { name: "post", intervalMs: 60_000, unit: async () => {} };

  assert.equal(scheduler.start([loop]), true);
  assert.equal(scheduler.start([loop]), false);
  assert.ok(events.some((event) => event.level === "warn" && event.msg === "Scheduler is already running"));

  await scheduler.stop();
  assert.equal(scheduler.start([loop]), true);
  await scheduler.stop();
  assert.equal(scheduler.state, "stopped");
});

test("stop reports a timeout when an in-flight unit outlives the bound", async () => {
  const scheduler = new LoopScheduler({ stopTimeoutMs: 20, logger: createRecordingLogger().logger });
  let finished = false;

  scheduler.start([
    {
      name: "post",
      intervalMs: 60_000,
      unit: async () => {
        await delay(200);
        finished = true;
      },
    },
  ]);

  await delay(5);
  const result = await scheduler.stop();
  assert.deepEqual(result, { timedOut: true });
  assert.equal(scheduler.state, "stopped");
  assert.equal(finished, false);

  await delay(250);
  assert.equal(finished, true);
});

test("the abort signal reaches the unit", async () => {
  const scheduler = new LoopScheduler({ stopTimeoutMs: 1000, logger: createRecordingLogger().logger });
  let seen: AbortSignal | undefined;

  scheduler.start([
    {
      name: "mentions",
      intervalMs: 60_000,
      unit: async (signal) => {
        seen = signal;
      },
    },
  ]);
  await delay(5);
  assert.equal(seen?.aborted, false);
  await scheduler.stop();
  assert.equal(seen?.aborted, true);
});

test("stop before start is a no-op", async () => {
  const scheduler = new LoopScheduler({ logger: createRecordingLogger().logger });
  assert.deepEqual(await scheduler.stop(), { timedOut: false });
  assert.equal(scheduler.state, "idle");
});

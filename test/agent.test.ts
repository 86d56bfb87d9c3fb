import test from "node:test";
import assert from "node:assert/strict";
import type { Character } from "../src/character.ts";
import type { DirectMessage, PlatformItem } from "../src/types/platform.ts";
import { SocialAgent, resolveDmSender } from "../src/services/agent.ts";
import { EngagementOrchestrator } from "../src/services/engagement.ts";
import { ActionGateway } from "../src/services/gateway.ts";
import { PlatformError } from "../src/services/platform-error.ts";
import { QuotaCursorTracker } from "../src/services/quota.ts";
import { LoopScheduler } from "../src/services/scheduler.ts";
import { DEFAULT_PLATFORM_SETTINGS } from "../src/config/runtime.ts";
import { FakePlatformClient, StubGenerator, createRecordingLogger } from "./fakes.ts";

const CHARACTER: Character = { name: "Test Owl", description: "a calm market watcher.", instructions: "Be brief." };

function createAgent(options: {
  primary?: FakePlatformClient;
  secondary?: FakePlatformClient;
  text?: string;
  maxDailyPosts?: number;
  actionDelayMs?: number;
  now?: () => Date;
}) {
  const { logger, events } = createRecordingLogger();
  const gateway = new ActionGateway({ primary: options.primary, secondary: options.secondary }, logger);
  const generator = new StubGenerator(options.text ?? "generated text");
  const tracker = new QuotaCursorTracker({ maxDailyPosts: options.maxDailyPosts ?? 5, now: options.now });
  const scheduler = new LoopScheduler({ stopTimeoutMs: 1000, logger });
  const platform = { ...DEFAULT_PLATFORM_SETTINGS, actionDelayMs: options.actionDelayMs ?? 0 };
  const engagement = new EngagementOrchestrator(gateway, generator, { actionDelayMs: 0, logger });
  const agent = new SocialAgent({
    character: CHARACTER,
    gateway,
    generator,
    tracker,
    scheduler,
    engagement,
    platform,
    testMode: true,
    logger,
    now: options.now,
  });
  return { agent, tracker, generator, scheduler, events };
}

const MENTIONS: PlatformItem[] = [
  { id: "303", text: "newest mention" },
  { id: "302", text: "middle mention" },
  { id: "301", text: "oldest mention" },
];

test("scheduled post truncates, publishes and counts", async () => {
  const primary = new FakePlatformClient({ name: "v2" });
  const { agent, tracker, generator } = createAgent({ primary, text: "x".repeat(300) });

  assert.equal(await agent.postScheduledContent(), true);
  assert.equal(primary.callsFor("post")[0].args[0], `${"x".repeat(277)}...`);
  assert.equal(generator.prompts[0].maxTokens, 100);
  assert.equal(tracker.snapshot().dailyPostCount, 1);
});

test("scheduled post is skipped once the quota is used", async () => {
  const primary = new FakePlatformClient({ name: "v2" });
  const { agent, events } = createAgent({ primary, maxDailyPosts: 1 });

  await agent.postScheduledContent();
  assert.equal(await agent.postScheduledContent(), false);
  assert.equal(primary.callsFor("post").length, 1);
  assert.ok(events.some((event) => event.msg === "Daily post limit reached, skipping scheduled post"));
});

test("failed post does not count against the quota", async () => {
  const primary = new FakePlatformClient({ name: "v2", failures: { post: new Error("down") } });
  const { agent, tracker } = createAgent({ primary });

  assert.equal(await agent.postScheduledContent(), false);
  assert.equal(tracker.snapshot().dailyPostCount, 0);
});

test("mentions advance the cursor and are answered oldest first", async () => {
  const primary = new FakePlatformClient({ name: "v2", mentions: MENTIONS });
  const { agent, tracker, generator } = createAgent({ primary });

  assert.equal(await agent.handleMentions(), 3);
  assert.equal(tracker.lastMentionCursor, "303");
  assert.deepEqual(
    primary.callsFor("reply").map((call) => call.args[1]),
    ["301", "302", "303"]
  );
  assert.equal(generator.prompts[0].maxTokens, 200);
  assert.ok(generator.prompts[0].prompt.includes("oldest mention"));

  await agent.handleMentions();
  assert.equal(primary.callsFor("fetchMentions")[1].args[0], "303");
});

test("stopping mid-batch still answers every mention of that batch", async () => {
  const primary = new FakePlatformClient({ name: "v2", mentions: MENTIONS });
  const { agent, tracker } = createAgent({ primary, actionDelayMs: 30 });

  agent.start({ postSeconds: 60, mentionSeconds: 60, dmSeconds: 60 });
  await new Promise((resolve) => setTimeout(resolve, 10));
  const stopped = await agent.stop();

  assert.deepEqual(stopped, { timedOut: false });
  assert.equal(tracker.lastMentionCursor, "303");
  assert.deepEqual(
    primary.callsFor("reply").map((call) => call.args[1]),
    ["301", "302", "303"]
  );
});

test("mention fetch failure is logged and nothing is answered", async () => {
  const primary = new FakePlatformClient({ name: "v2", failures: { fetchMentions: new Error("timeout") } });
  const { agent, tracker, events } = createAgent({ primary });

  assert.equal(await agent.handleMentions(), 0);
  assert.equal(tracker.lastMentionCursor, null);
  assert.ok(events.some((event) => event.level === "error" && event.msg === "Failed to fetch mentions"));
});

test("DMs skip own messages and malformed entries", async () => {
  const directMessages: DirectMessage[] = [
    { kind: "message-create", id: "905", senderId: "9000", text: "my own outgoing message" },
    { kind: "dm-event", id: "904", eventType: "MessageCreate", senderId: "41", text: "v2 hello" },
    { kind: "message-create", id: "903", senderId: "42", text: "   " },
    { kind: "message-create", id: "902", text: "no sender" },
    { kind: "message-create", id: "901", senderId: "43", text: "what about fees?" },
  ];
  const secondary = new FakePlatformClient({ name: "v1.1", directMessages, selfId: "9000" });
  const primary = new FakePlatformClient({ name: "v2", supportsDirectMessages: false });
  const { agent, tracker, generator, events } = createAgent({ primary, secondary, text: "y".repeat(400) });

  assert.equal(await agent.handleDirectMessages(), 2);
  assert.equal(tracker.lastDmCursor, "905");
  assert.deepEqual(
    secondary.callsFor("sendDirectMessage").map((call) => call.args[0]),
    ["43", "41"]
  );
  // DM 답장은 자르지 않는다
  assert.equal(secondary.callsFor("sendDirectMessage")[0].args[1], "y".repeat(400));
  assert.equal(generator.prompts[0].maxTokens, 500);
  assert.equal(events.filter((event) => event.level === "warn").length, 2);

  await agent.handleDirectMessages();
  assert.equal(primary.callsFor("fetchSelf").length, 1);
});

test("DM fetch blocked by access tier is an empty batch", async () => {
  const secondary = new FakePlatformClient({
    name: "v1.1",
    failures: {
      fetchDirectMessages: new PlatformError("access-tier", "403 access to a subset of X API", { status: 403 }),
    },
  });
  const { agent, tracker, events } = createAgent({ secondary });

  assert.equal(await agent.handleDirectMessages(), 0);
  assert.equal(tracker.lastDmCursor, null);
  assert.ok(events.some((event) => event.msg === "No new direct messages"));
});

test("dm-event sender resolution only trusts MessageCreate events", () => {
  assert.equal(resolveDmSender({ kind: "dm-event", id: "1", eventType: "ParticipantsJoin", senderId: "5" }), undefined);
  assert.equal(resolveDmSender({ kind: "message-create", id: "1", senderId: "5" }), "5");
});

test("one-shot post and reply truncate and report the result", async () => {
  const primary = new FakePlatformClient({ name: "v2" });
  const { agent, tracker } = createAgent({ primary });

  const posted = await agent.postSingle("z".repeat(281));
  assert.deepEqual(posted, { success: true, payload: { tweetId: "v2-1" }, client: "v2" });
  assert.equal(primary.callsFor("post")[0].args[0], `${"z".repeat(277)}...`);
  assert.equal(tracker.snapshot().dailyPostCount, 1);

  const replied = await agent.replySingle("88", "thanks");
  assert.deepEqual(replied, { success: true, payload: { tweetId: "v2-2", inReplyTo: "88" }, client: "v2" });
});

test("one-shot DM without a DM-capable client fails cleanly", async () => {
  const primary = new FakePlatformClient({ name: "v2", supportsDirectMessages: false });
  const { agent } = createAgent({ primary });
  assert.deepEqual(await agent.sendSingleDm("12", "hello"), {
    success: false,
    error: "no suitable client",
    errorKind: "unsupported",
  });
});

test("metrics report counts and uptime without compute in test mode", async () => {
  let now = new Date("2026-05-01T00:00:00.000Z");
  const primary = new FakePlatformClient({ name: "v2" });
  const { agent } = createAgent({ primary, now: () => now });

  await agent.postScheduledContent();
  now = new Date("2026-05-01T00:01:30.000Z");
  const metrics = await agent.getMetrics();

  assert.deepEqual(metrics, {
    agentName: "Test Owl",
    dailyPostCount: 1,
    maxDailyPosts: 5,
    uptimeSeconds: 90,
    testMode: true,
    schedulerState: "idle",
    lastMentionCursor: null,
    lastDmCursor: null,
  });
});

test("start runs the loops and shutdown stops them", async () => {
  const primary = new FakePlatformClient({ name: "v2" });
  const { agent, scheduler } = createAgent({ primary, maxDailyPosts: 3 });

  assert.equal(agent.start({ postSeconds: 60, mentionSeconds: 60, dmSeconds: 60, maxDailyPosts: 1 }), true);
  assert.equal(scheduler.state, "running");
  await new Promise((resolve) => setTimeout(resolve, 20));

  const stopped = await agent.shutdown();
  assert.deepEqual(stopped, { timedOut: false });
  assert.equal(scheduler.state, "stopped");
  assert.equal(primary.callsFor("post").length, 1);
  assert.equal(primary.callsFor("fetchMentions").length, 1);
});

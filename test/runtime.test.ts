import test from "node:test";
import assert from "node:assert/strict";
import type { Character } from "../src/character.ts";
import { loadRuntimeConfig } from "../src/config/runtime.ts";
import { buildAgentRuntime, printStartupBanner, warmUpCompute } from "../src/services/runtime.ts";
import { FakePlatformClient, createRecordingLogger } from "./fakes.ts";

const CHARACTER: Character = { name: "Test Owl", description: "a calm market watcher.", instructions: "Be brief." };

const COMPUTE_ENV = {
  TWITTER_BEARER_TOKEN: "test-token",
  COMPUTE_API_KEY: "test-secret",
  COMPUTE_BASE_URL: "https://compute.test",
};

function createFetchStub(status: number, body: unknown) {
  const requests: string[] = [];
  const fetchImpl = async (input: string, init?: RequestInit): Promise<Response> => {
    requests.push(`${init?.method ?? "GET"} ${new URL(input).pathname}`);
    return new Response(JSON.stringify(body), { status });
  };
  return { fetchImpl, requests };
}

test("test mode wires the offline generator without a compute session", () => {
  const { logger, events } = createRecordingLogger();
  const config = loadRuntimeConfig({ TEST_MODE: "true" });
  const runtime = buildAgentRuntime(config, CHARACTER, { primary: new FakePlatformClient({ name: "v2" }) }, { logger });

  assert.equal(runtime.computeSession, null);
  const initialized = events.find((event) => event.msg === "Agent initialized");
  assert.deepEqual(initialized?.obj, { character: "Test Owl", mode: "offline" });
});

test("compute backend wires a session whose billing shows up in metrics", async () => {
  const { logger } = createRecordingLogger();
  const { fetchImpl, requests } = createFetchStub(200, [{ amount: 1.5 }, { amount: 0.5 }]);
  const config = loadRuntimeConfig(COMPUTE_ENV);
  const runtime = buildAgentRuntime(config, CHARACTER, { primary: new FakePlatformClient({ name: "v2" }) }, {
    logger,
    fetchImpl,
  });

  assert.notEqual(runtime.computeSession, null);
  const metrics = await runtime.agent.getMetrics();
  assert.equal(metrics.testMode, false);
  assert.equal(metrics.gpuStatus, null);
  assert.deepEqual(metrics.billing, { entries: 2, totalCost: 2 });

  await runtime.agent.shutdown();
  assert.deepEqual(requests, ["GET /v1/billing/history"]);
});

test("warmUpCompute logs a failed reservation instead of throwing", async () => {
  const { logger, events } = createRecordingLogger();
  const { fetchImpl } = createFetchStub(500, { error: "no capacity" });
  const config = loadRuntimeConfig(COMPUTE_ENV);
  const runtime = buildAgentRuntime(config, CHARACTER, { primary: new FakePlatformClient({ name: "v2" }) }, {
    logger,
    fetchImpl,
  });

  await warmUpCompute(runtime.computeSession, logger);
  assert.equal(
    events.filter((event) => event.level === "error" && event.msg === "Failed to prepare compute, will retry on first generation").length,
    1
  );
  assert.equal(runtime.computeSession?.reservedGpuId, null);
});

test("warmUpCompute is a no-op without a session", async () => {
  const { logger, events } = createRecordingLogger();
  await warmUpCompute(null, logger);
  assert.equal(events.length, 0);
});

test("startup banner flags test mode", () => {
  const { logger, events } = createRecordingLogger();
  printStartupBanner(loadRuntimeConfig({ TEST_MODE: "true" }), CHARACTER, logger);

  assert.deepEqual(
    events.map((event) => event.msg),
    ["Agent online", "[TEST MODE] generating canned content, X calls are real"]
  );
  assert.equal(events[0]?.obj.backend, "offline");
});

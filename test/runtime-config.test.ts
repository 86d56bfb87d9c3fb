import test from "node:test";
import assert from "node:assert/strict";
import {
  DEFAULT_COMPUTE_SETTINGS,
  DEFAULT_INTERVAL_SETTINGS,
  loadRuntimeConfig,
  validateEnvironment,
} from "../src/config/runtime.ts";

const OAUTH_ENV = {
  TWITTER_API_KEY: "test-key",
  TWITTER_API_SECRET: "test-secret",
  TWITTER_ACCESS_TOKEN: "test-token",
  TWITTER_ACCESS_SECRET: "test-secret",
};

test("loadRuntimeConfig applies defaults on an empty environment", () => {
  const config = loadRuntimeConfig({});
  assert.equal(config.testMode, false);
  assert.equal(config.characterFile, "character.json");
  assert.equal(config.maxDailyPosts, 12);
  assert.deepEqual(config.intervals, DEFAULT_INTERVAL_SETTINGS);
  assert.equal(config.platform.maxPostLength, 280);
  assert.equal(config.platform.actionDelayMs, 2000);
  assert.equal(config.platform.v2DirectMessages, false);
  assert.equal(config.compute.baseUrl, DEFAULT_COMPUTE_SETTINGS.baseUrl);
  assert.equal(config.generation.backend, "compute");
  assert.equal(config.generation.temperature, 0.7);
  assert.equal(config.generation.topP, 0.9);
  assert.equal(config.generation.topK, 40);
  assert.equal(config.scheduler.stopTimeoutMs, 5000);
  assert.equal(config.logLevel, "info");
});

test("loadRuntimeConfig parses and clamps overrides", () => {
  const config = loadRuntimeConfig({
    TEST_MODE: "TRUE",
    POST_INTERVAL_SECONDS: "5",
    MENTION_INTERVAL_SECONDS: "600",
    DM_FETCH_LIMIT: "500",
    MAX_DAILY_POSTS: "-3",
    COMPUTE_BASE_URL: "https://compute.test///",
    COMPUTE_MAX_PRICE: "2.5",
    GENERATION_BACKEND: "Anthropic",
    GENERATION_TEMPERATURE: "9",
    TWITTER_V2_DIRECT_MESSAGES: "true",
    LOG_LEVEL: "DEBUG",
  });
  assert.equal(config.testMode, true);
  assert.equal(config.intervals.postSeconds, 10);
  assert.equal(config.intervals.mentionSeconds, 600);
  assert.equal(config.platform.dmFetchLimit, 50);
  assert.equal(config.maxDailyPosts, 0);
  assert.equal(config.compute.baseUrl, "https://compute.test");
  assert.equal(config.compute.maxPrice, 2.5);
  assert.equal(config.generation.backend, "anthropic");
  assert.equal(config.generation.temperature, 2);
  assert.equal(config.platform.v2DirectMessages, true);
  assert.equal(config.logLevel, "debug");
});

test("loadRuntimeConfig falls back on invalid values", () => {
  const config = loadRuntimeConfig({
    TEST_MODE: "maybe",
    POST_INTERVAL_SECONDS: "soon",
    GENERATION_BACKEND: "local",
    CHARACTER_FILE: "   ",
    LOG_LEVEL: "loud",
  });
  assert.equal(config.testMode, false);
  assert.equal(config.intervals.postSeconds, 7200);
  assert.equal(config.generation.backend, "compute");
  assert.equal(config.characterFile, "character.json");
  assert.equal(config.logLevel, "info");
});

test("validateEnvironment lists X credentials when none are set", () => {
  const missing = validateEnvironment(loadRuntimeConfig({ TEST_MODE: "true" }));
  assert.deepEqual(missing, [
    "TWITTER_API_KEY",
    "TWITTER_API_SECRET",
    "TWITTER_ACCESS_TOKEN",
    "TWITTER_ACCESS_SECRET",
    "TWITTER_BEARER_TOKEN",
  ]);
});

test("validateEnvironment asks for the selected generation key outside test mode", () => {
  assert.deepEqual(validateEnvironment(loadRuntimeConfig(OAUTH_ENV)), ["COMPUTE_API_KEY"]);
  assert.deepEqual(
    validateEnvironment(loadRuntimeConfig({ ...OAUTH_ENV, GENERATION_BACKEND: "anthropic" })),
    ["ANTHROPIC_API_KEY"]
  );
  assert.deepEqual(validateEnvironment(loadRuntimeConfig({ ...OAUTH_ENV, TEST_MODE: "true" })), []);
  assert.deepEqual(
    validateEnvironment(loadRuntimeConfig({ TWITTER_BEARER_TOKEN: "test-bearer", COMPUTE_API_KEY: "test-secret" })),
    []
  );
});

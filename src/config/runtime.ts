import type {
  ComputeRuntimeSettings,
  GenerationBackend,
  GenerationRuntimeSettings,
  LoopIntervalSettings,
  PlatformRuntimeSettings,
  SchedulerRuntimeSettings,
  TwitterCredentials,
} from "../types/runtime.js";
import { type LogLevel, parseLogLevel } from "../utils/logger.js";

export interface RuntimeConfig {
  testMode: boolean;
  characterFile: string;
  maxDailyPosts: number;
  intervals: LoopIntervalSettings;
  platform: PlatformRuntimeSettings;
  compute: ComputeRuntimeSettings;
  generation: GenerationRuntimeSettings;
  scheduler: SchedulerRuntimeSettings;
  twitter: TwitterCredentials;
  logLevel: LogLevel;
}

const DEFAULT_CHARACTER_FILE = "character.json";
const DEFAULT_MAX_DAILY_POSTS = 12;

export const DEFAULT_INTERVAL_SETTINGS: LoopIntervalSettings = {
  postSeconds: 7200,
  mentionSeconds: 300,
  dmSeconds: 300,
};

export const DEFAULT_PLATFORM_SETTINGS: PlatformRuntimeSettings = {
  maxPostLength: 280,
  mentionFetchLimit: 100,
  dmFetchLimit: 50,
  actionDelayMs: 2000,
  v2DirectMessages: false,
};

export const DEFAULT_COMPUTE_SETTINGS: ComputeRuntimeSettings = {
  apiKey: "",
  baseUrl: "https://api.hyperbolic.xyz",
  modelId: "meta-llama/Meta-Llama-3.1-70B-Instruct",
  maxPrice: 10,
  readyMaxAttempts: 10,
  readyPollSeconds: 5,
};

export const DEFAULT_GENERATION_SETTINGS: GenerationRuntimeSettings = {
  backend: "compute",
  temperature: 0.7,
  topP: 0.9,
  topK: 40,
  anthropicApiKey: "",
  anthropicModel: "claude-3-5-haiku-latest",
};

export const DEFAULT_SCHEDULER_SETTINGS: SchedulerRuntimeSettings = {
  stopTimeoutMs: 5000,
};

function parseIntInRange(
  raw: string | undefined,
  fallback: number,
  min: number,
  max: number
): number {
  const parsed = Number.parseInt(raw || "", 10);
  if (!Number.isFinite(parsed)) return fallback;
  return Math.min(max, Math.max(min, parsed));
}

function parseFloatInRange(
  raw: string | undefined,
  fallback: number,
  min: number,
  max: number
): number {
  const parsed = Number.parseFloat(raw || "");
  if (!Number.isFinite(parsed)) return fallback;
  return Math.min(max, Math.max(min, parsed));
}

function parseBoolean(raw: string | undefined, fallback: boolean): boolean {
  if (typeof raw !== "string") return fallback;
  const normalized = raw.trim().toLowerCase();
  if (normalized === "true") return true;
  if (normalized === "false") return false;
  return fallback;
}

function parseNonEmptyString(raw: string | undefined, fallback: string, maxLength: number = 200): string {
  if (typeof raw !== "string") return fallback;
  const normalized = raw.trim();
  if (!normalized) return fallback;
  return normalized.slice(0, maxLength);
}

function parseGenerationBackend(raw: string | undefined, fallback: GenerationBackend): GenerationBackend {
  if (typeof raw !== "string") return fallback;
  const normalized = raw.trim().toLowerCase();
  if (normalized === "compute" || normalized === "anthropic") {
    return normalized;
  }
  return fallback;
}

function readSecret(raw: string | undefined): string {
  return typeof raw === "string" ? raw.trim() : "";
}

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const intervals: LoopIntervalSettings = {
    postSeconds: parseIntInRange(env.POST_INTERVAL_SECONDS, DEFAULT_INTERVAL_SETTINGS.postSeconds, 10, 86400),
    mentionSeconds: parseIntInRange(
      env.MENTION_INTERVAL_SECONDS,
      DEFAULT_INTERVAL_SETTINGS.mentionSeconds,
      10,
      86400
    ),
    dmSeconds: parseIntInRange(env.DM_INTERVAL_SECONDS, DEFAULT_INTERVAL_SETTINGS.dmSeconds, 10, 86400),
  };

  const platform: PlatformRuntimeSettings = {
    maxPostLength: parseIntInRange(env.MAX_POST_LENGTH, DEFAULT_PLATFORM_SETTINGS.maxPostLength, 20, 4000),
    mentionFetchLimit: parseIntInRange(
      env.MENTION_FETCH_LIMIT,
      DEFAULT_PLATFORM_SETTINGS.mentionFetchLimit,
      5,
      100
    ),
    dmFetchLimit: parseIntInRange(env.DM_FETCH_LIMIT, DEFAULT_PLATFORM_SETTINGS.dmFetchLimit, 1, 50),
    actionDelayMs: parseIntInRange(env.ACTION_DELAY_MS, DEFAULT_PLATFORM_SETTINGS.actionDelayMs, 0, 60000),
    v2DirectMessages: parseBoolean(env.TWITTER_V2_DIRECT_MESSAGES, DEFAULT_PLATFORM_SETTINGS.v2DirectMessages),
  };

  const compute: ComputeRuntimeSettings = {
    apiKey: readSecret(env.COMPUTE_API_KEY),
    baseUrl: parseNonEmptyString(env.COMPUTE_BASE_URL, DEFAULT_COMPUTE_SETTINGS.baseUrl, 400).replace(/\/+$/, ""),
    modelId: parseNonEmptyString(env.COMPUTE_MODEL, DEFAULT_COMPUTE_SETTINGS.modelId),
    maxPrice: parseFloatInRange(env.COMPUTE_MAX_PRICE, DEFAULT_COMPUTE_SETTINGS.maxPrice, 0, 1000),
    readyMaxAttempts: parseIntInRange(
      env.COMPUTE_READY_MAX_ATTEMPTS,
      DEFAULT_COMPUTE_SETTINGS.readyMaxAttempts,
      1,
      60
    ),
    readyPollSeconds: parseIntInRange(
      env.COMPUTE_READY_POLL_SECONDS,
      DEFAULT_COMPUTE_SETTINGS.readyPollSeconds,
      1,
      120
    ),
  };

  const generation: GenerationRuntimeSettings = {
    backend: parseGenerationBackend(env.GENERATION_BACKEND, DEFAULT_GENERATION_SETTINGS.backend),
    temperature: parseFloatInRange(
      env.GENERATION_TEMPERATURE,
      DEFAULT_GENERATION_SETTINGS.temperature,
      0,
      2
    ),
    topP: parseFloatInRange(env.GENERATION_TOP_P, DEFAULT_GENERATION_SETTINGS.topP, 0, 1),
    topK: parseIntInRange(env.GENERATION_TOP_K, DEFAULT_GENERATION_SETTINGS.topK, 1, 500),
    anthropicApiKey: readSecret(env.ANTHROPIC_API_KEY),
    anthropicModel: parseNonEmptyString(env.ANTHROPIC_MODEL, DEFAULT_GENERATION_SETTINGS.anthropicModel),
  };

  const scheduler: SchedulerRuntimeSettings = {
    stopTimeoutMs: parseIntInRange(env.STOP_TIMEOUT_MS, DEFAULT_SCHEDULER_SETTINGS.stopTimeoutMs, 0, 60000),
  };

  const twitter: TwitterCredentials = {
    apiKey: readSecret(env.TWITTER_API_KEY),
    apiSecret: readSecret(env.TWITTER_API_SECRET),
    accessToken: readSecret(env.TWITTER_ACCESS_TOKEN),
    accessSecret: readSecret(env.TWITTER_ACCESS_SECRET),
    bearerToken: readSecret(env.TWITTER_BEARER_TOKEN),
  };

  return {
    testMode: parseBoolean(env.TEST_MODE, false),
    characterFile: parseNonEmptyString(env.CHARACTER_FILE, DEFAULT_CHARACTER_FILE, 400),
    maxDailyPosts: parseIntInRange(env.MAX_DAILY_POSTS, DEFAULT_MAX_DAILY_POSTS, 0, 500),
    intervals,
    platform,
    compute,
    generation,
    scheduler,
    twitter,
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}

export function hasUserContextCredentials(twitter: TwitterCredentials): boolean {
  return Boolean(twitter.apiKey && twitter.apiSecret && twitter.accessToken && twitter.accessSecret);
}

// 실행 모드별 필수 환경 변수 확인 (누락 목록 반환)
export function validateEnvironment(config: RuntimeConfig): string[] {
  const missing: string[] = [];

  if (!hasUserContextCredentials(config.twitter) && !config.twitter.bearerToken) {
    missing.push(
      "TWITTER_API_KEY",
      "TWITTER_API_SECRET",
      "TWITTER_ACCESS_TOKEN",
      "TWITTER_ACCESS_SECRET",
      "TWITTER_BEARER_TOKEN"
    );
  }

  if (!config.testMode) {
    if (config.generation.backend === "compute" && !config.compute.apiKey) {
      missing.push("COMPUTE_API_KEY");
    }
    if (config.generation.backend === "anthropic" && !config.generation.anthropicApiKey) {
      missing.push("ANTHROPIC_API_KEY");
    }
  }

  return missing;
}

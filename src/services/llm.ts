import fs from "fs";
import path from "path";
import Anthropic from "@anthropic-ai/sdk";
import type { Character } from "../character.js";
import type { GenerationRuntimeSettings } from "../types/runtime.js";
import { errorMessage, isRecord } from "../utils/guards.js";
import { type LogSink, createLogger } from "../utils/logger.js";
import { previewText } from "../utils/text.js";
import type { ComputeSession } from "./compute.js";

export const GENERATION_APOLOGY =
  "I apologize, but I'm having trouble generating content right now. Please try again later.";

export interface ContentGenerator {
  readonly mode: "live" | "offline";
  generate(prompt: string, maxTokens: number): Promise<string>;
}

export interface CompletionBackend {
  readonly name: string;
  complete(character: Character, prompt: string, maxTokens: number): Promise<string>;
}

export interface ClaudeTextLikeBlock {
  type: string;
  text?: string;
}

export function extractTextFromClaude(content: ClaudeTextLikeBlock[]): string {
  const textBlock = content.find((block) => block.type === "text");
  if (!textBlock || typeof textBlock.text !== "string") {
    return "";
  }
  return textBlock.text;
}

export function buildCharacterContext(character: Character): string {
  return `You are ${character.name}, ${character.description}

Instructions: ${character.instructions}`;
}

// 캐릭터 프레이밍
export function frameCharacterPrompt(character: Character, prompt: string): string {
  return `${buildCharacterContext(character)}

Please respond to the following prompt:
${prompt}`;
}

/* ------------------------------------------------------------------ */
/* 백엔드                                                              */
/* ------------------------------------------------------------------ */

export class ComputeCompletionBackend implements CompletionBackend {
  readonly name = "compute";
  private readonly session: ComputeSession;
  private readonly settings: GenerationRuntimeSettings;

  constructor(session: ComputeSession, settings: GenerationRuntimeSettings) {
    this.session = session;
    this.settings = settings;
  }

  complete(character: Character, prompt: string, maxTokens: number): Promise<string> {
    return this.session.generate(frameCharacterPrompt(character, prompt), {
      maxTokens,
      temperature: this.settings.temperature,
      topP: this.settings.topP,
      topK: this.settings.topK,
    });
  }
}

/**
 * The part of the Anthropic SDK the backend calls. `new Anthropic().messages` fits it.
 */
export interface AnthropicMessagesLike {
  create(params: {
    model: string;
    max_tokens: number;
    system: string;
    messages: Array<{ role: "user"; content: string }>;
    temperature?: number;
  }): Promise<{ content: ClaudeTextLikeBlock[] }>;
}

export class AnthropicCompletionBackend implements CompletionBackend {
  readonly name = "anthropic";
  private readonly messages: AnthropicMessagesLike;
  private readonly settings: GenerationRuntimeSettings;

  constructor(messages: AnthropicMessagesLike, settings: GenerationRuntimeSettings) {
    this.messages = messages;
    this.settings = settings;
  }

  async complete(character: Character, prompt: string, maxTokens: number): Promise<string> {
    const message = await this.messages.create({
      model: this.settings.anthropicModel,
      max_tokens: maxTokens,
      system: buildCharacterContext(character),
      messages: [{ role: "user", content: prompt }],
      temperature: this.settings.temperature,
    });
    return extractTextFromClaude(message.content);
  }
}

// Claude 클라이언트 초기화
export function initAnthropicBackend(settings: GenerationRuntimeSettings): AnthropicCompletionBackend {
  const claude = new Anthropic({ apiKey: settings.anthropicApiKey });
  return new AnthropicCompletionBackend(claude.messages, settings);
}

/* ------------------------------------------------------------------ */
/* 생성기                                                              */
/* ------------------------------------------------------------------ */

/**
 * Live generation. Never throws: any backend failure turns into
 * {@link GENERATION_APOLOGY}.
 */
export class LiveContentGenerator implements ContentGenerator {
  readonly mode = "live";
  private readonly character: Character;
  private readonly backend: CompletionBackend;
  private readonly logger: LogSink;

  constructor(character: Character, backend: CompletionBackend, logger: LogSink = createLogger("llm")) {
    this.character = character;
    this.backend = backend;
    this.logger = logger;
  }

  async generate(prompt: string, maxTokens: number): Promise<string> {
    try {
      const text = await this.backend.complete(this.character, prompt, maxTokens);
      return text.trim();
    } catch (error) {
      this.logger.error({ backend: this.backend.name, err: errorMessage(error) }, "Failed to generate content");
      return GENERATION_APOLOGY;
    }
  }
}

export interface OfflineContentPools {
  tweets: string[];
  replies: string[];
  dms: string[];
  search: string;
  generic: string;
}

const OFFLINE_CONTENT_PATH = path.join(process.cwd(), "data", "offline-content.json");
export const DEFAULT_OFFLINE_SEED = 20240611;

function readStringList(record: Record<string, unknown>, key: string): string[] {
  const value = record[key];
  if (!Array.isArray(value)) return [];
  return value.filter((entry): entry is string => typeof entry === "string" && entry.trim().length > 0);
}

export function parseOfflineContentPools(raw: unknown): OfflineContentPools {
  if (!isRecord(raw)) {
    throw new Error("offline content must be a JSON object");
  }
  const pools: OfflineContentPools = {
    tweets: readStringList(raw, "tweets"),
    replies: readStringList(raw, "replies"),
    dms: readStringList(raw, "dms"),
    search: typeof raw.search === "string" ? raw.search : "",
    generic: typeof raw.generic === "string" ? raw.generic : "",
  };
  if (pools.tweets.length === 0 || pools.replies.length === 0 || pools.dms.length === 0) {
    throw new Error("offline content needs non-empty tweets, replies and dms lists");
  }
  return pools;
}

export function loadOfflineContentPools(filePath: string = OFFLINE_CONTENT_PATH): OfflineContentPools {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  return parseOfflineContentPools(raw);
}

// mulberry32
export function createSeededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export type OfflinePool = "tweets" | "replies" | "dms" | "search" | "generic";

// 프롬프트 키워드로 풀 선택 (순서 중요)
export function selectOfflinePool(prompt: string): OfflinePool {
  const normalized = prompt.toLowerCase();
  if (normalized.includes("tweet")) return "tweets";
  if (normalized.includes("reply") || normalized.includes("respond") || normalized.includes("mention")) {
    return "replies";
  }
  if (normalized.includes("direct message") || normalized.includes("dm")) return "dms";
  if (normalized.includes("search")) return "search";
  return "generic";
}

/**
 * Canned text for test mode. The same seed yields the same sequence of picks.
 */
export class OfflineContentGenerator implements ContentGenerator {
  readonly mode = "offline";
  private readonly character: Character;
  private readonly pools: OfflineContentPools;
  private readonly random: () => number;
  private readonly logger: LogSink;

  constructor(
    character: Character,
    options: { pools?: OfflineContentPools; seed?: number; logger?: LogSink } = {}
  ) {
    this.character = character;
    this.pools = options.pools ?? loadOfflineContentPools();
    this.random = createSeededRandom(options.seed ?? DEFAULT_OFFLINE_SEED);
    this.logger = options.logger ?? createLogger("llm");
  }

  private pick(list: string[]): string {
    const index = Math.min(list.length - 1, Math.floor(this.random() * list.length));
    return list[index];
  }

  async generate(prompt: string, _maxTokens: number): Promise<string> {
    const pool = selectOfflinePool(prompt);
    this.logger.info({ pool, prompt: previewText(prompt) }, "Test mode: generating canned content");
    switch (pool) {
      case "tweets":
        return this.pick(this.pools.tweets).trim();
      case "replies":
        return this.pick(this.pools.replies).trim();
      case "dms":
        return this.pick(this.pools.dms).trim();
      case "search":
        return this.pools.search.trim();
      case "generic":
        return this.pools.generic.replace("{name}", this.character.name).trim();
    }
  }
}

import type { PlatformItem } from "../types/platform.js";
import { buildSearchReplyPrompt } from "../prompts.js";
import { type LogSink, createLogger } from "../utils/logger.js";
import { sleep } from "../utils/sleep.js";
import { PLATFORM_MAX_POST_LENGTH, previewText, truncateForPlatform } from "../utils/text.js";
import type { ActionGateway } from "./gateway.js";
import type { ContentGenerator } from "./llm.js";

export const ENGAGEMENT_ACTIONS = ["reply", "retweet", "like"] as const;
export type EngagementActionType = (typeof ENGAGEMENT_ACTIONS)[number];
export type EngagementSelector = EngagementActionType | "all";

export const SEARCH_REPLY_MAX_TOKENS = 200;

export interface EngagementActionOutcome {
  type: EngagementActionType;
  success: boolean;
  content?: string;
  error?: string;
}

export interface EngagementOutcome {
  tweetId: string;
  text: string;
  actions: EngagementActionOutcome[];
}

export interface EngagementOptions {
  actionDelayMs?: number;
  maxPostLength?: number;
  logger?: LogSink;
  wait?: (ms: number) => Promise<unknown>;
}

export function parseEngagementSelector(raw: string): EngagementSelector | null {
  const normalized = raw.trim().toLowerCase();
  if (normalized === "all") return "all";
  return ENGAGEMENT_ACTIONS.find((action) => action === normalized) ?? null;
}

export function actionsForSelector(selector: EngagementSelector): EngagementActionType[] {
  return selector === "all" ? [...ENGAGEMENT_ACTIONS] : [selector];
}

/**
 * 검색 후 반응 (답글/리트윗/좋아요)
 */
export class EngagementOrchestrator {
  private readonly gateway: ActionGateway;
  private readonly generator: ContentGenerator;
  private readonly actionDelayMs: number;
  private readonly maxPostLength: number;
  private readonly logger: LogSink;
  private readonly wait: (ms: number) => Promise<unknown>;

  constructor(gateway: ActionGateway, generator: ContentGenerator, options: EngagementOptions = {}) {
    this.gateway = gateway;
    this.generator = generator;
    this.actionDelayMs = Math.max(0, options.actionDelayMs ?? 2000);
    this.maxPostLength = options.maxPostLength ?? PLATFORM_MAX_POST_LENGTH;
    this.logger = options.logger ?? createLogger("engagement");
    this.wait = options.wait ?? ((ms: number) => sleep(ms));
  }

  async searchAndEngage(
    query: string,
    selector: EngagementSelector,
    maxResults: number = 10
  ): Promise<EngagementOutcome[]> {
    const search = await this.gateway.perform("search", { query, limit: maxResults });
    if (!search.success) {
      this.logger.error({ query, err: search.error, kind: search.errorKind }, "Search failed");
      return [];
    }

    const tweets = search.payload.tweets;
    if (tweets.length === 0) {
      this.logger.info({ query }, "Search returned no tweets");
      return [];
    }

    this.logger.info({ query, count: tweets.length, selector }, "Engaging with search results");
    const actions = actionsForSelector(selector);
    const outcomes: EngagementOutcome[] = [];

    for (const [index, tweet] of tweets.entries()) {
      const outcome: EngagementOutcome = { tweetId: tweet.id, text: tweet.text, actions: [] };
      for (const action of actions) {
        outcome.actions.push(await this.runAction(action, tweet));
      }
      outcomes.push(outcome);
      // 트윗 사이 지연 (마지막 뒤는 없음)
      if (index < tweets.length - 1) {
        await this.wait(this.actionDelayMs);
      }
    }

    return outcomes;
  }

  private async runAction(action: EngagementActionType, tweet: PlatformItem): Promise<EngagementActionOutcome> {
    switch (action) {
      case "reply": {
        const generated = await this.generator.generate(buildSearchReplyPrompt(tweet.text), SEARCH_REPLY_MAX_TOKENS);
        const content = truncateForPlatform(generated, this.maxPostLength);
        const result = await this.gateway.perform("reply", { text: content, parentId: tweet.id });
        if (result.success) {
          this.logger.info({ tweetId: tweet.id, reply: previewText(content) }, "Replied to search result");
          return { type: "reply", success: true, content };
        }
        return { type: "reply", success: false, content, error: result.error };
      }
      case "retweet": {
        const result = await this.gateway.perform("retweet", { tweetId: tweet.id });
        return result.success ? { type: "retweet", success: true } : { type: "retweet", success: false, error: result.error };
      }
      case "like": {
        const result = await this.gateway.perform("like", { tweetId: tweet.id });
        return result.success ? { type: "like", success: true } : { type: "like", success: false, error: result.error };
      }
    }
  }
}

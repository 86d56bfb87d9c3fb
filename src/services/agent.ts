import type { Character } from "../character.js";
import type { DirectMessage } from "../types/platform.js";
import type { LoopIntervalSettings, PlatformRuntimeSettings } from "../types/runtime.js";
import { buildDirectMessagePrompt, buildMentionReplyPrompt, buildScheduledPostPrompt } from "../prompts.js";
import { errorMessage } from "../utils/guards.js";
import { type LogSink, createLogger } from "../utils/logger.js";
import { sleep } from "../utils/sleep.js";
import { previewText, truncateForPlatform } from "../utils/text.js";
import { type GpuStatus, type ComputeSession, summarizeBilling } from "./compute.js";
import type { EngagementOrchestrator, EngagementOutcome, EngagementSelector } from "./engagement.js";
import type { ActionGateway, ActionResult } from "./gateway.js";
import type { ContentGenerator } from "./llm.js";
import type { QuotaCursorTracker } from "./quota.js";
import type { LoopScheduler, StopResult } from "./scheduler.js";

export const POST_MAX_TOKENS = 100;
export const MENTION_REPLY_MAX_TOKENS = 200;
export const DM_REPLY_MAX_TOKENS = 500;

export interface AgentDependencies {
  character: Character;
  gateway: ActionGateway;
  generator: ContentGenerator;
  tracker: QuotaCursorTracker;
  scheduler: LoopScheduler;
  engagement: EngagementOrchestrator;
  platform: PlatformRuntimeSettings;
  testMode: boolean;
  computeSession?: ComputeSession | null;
  logger?: LogSink;
  now?: () => Date;
}

export interface AgentStartSettings extends LoopIntervalSettings {
  maxDailyPosts?: number;
}

export interface AgentMetrics {
  agentName: string;
  dailyPostCount: number;
  maxDailyPosts: number;
  uptimeSeconds: number;
  testMode: boolean;
  schedulerState: string;
  lastMentionCursor: string | null;
  lastDmCursor: string | null;
  gpuStatus?: GpuStatus["raw"] | { error: string } | null;
  billing?: { entries: number; totalCost?: number } | { error: string };
}

// DM 종류별 발신자/본문 추출
export function resolveDmSender(message: DirectMessage): string | undefined {
  switch (message.kind) {
    case "message-create":
      return message.senderId;
    case "dm-event":
      return message.eventType === "MessageCreate" ? message.senderId : undefined;
  }
}

export function resolveDmText(message: DirectMessage): string | undefined {
  const text = message.text?.trim();
  return text ? text : undefined;
}

/**
 * 자율 에이전트
 *
 * Owns the three loop bodies (scheduled posts, mentions, DMs) and the
 * one-shot actions the CLI exposes.
 */
export class SocialAgent {
  private readonly deps: AgentDependencies;
  private readonly logger: LogSink;
  private readonly now: () => Date;
  private readonly startedAt: Date;
  private selfUserId: string | null = null;

  constructor(deps: AgentDependencies) {
    this.deps = deps;
    this.logger = deps.logger ?? createLogger("agent");
    this.now = deps.now ?? (() => new Date());
    this.startedAt = this.now();
    this.logger.info({ character: deps.character.name, mode: deps.generator.mode }, "Agent initialized");
  }

  get character(): Character {
    return this.deps.character;
  }

  /* -------------------------------------------------------------- */
  /* 루프 본문                                                       */
  /* -------------------------------------------------------------- */

  async postScheduledContent(): Promise<boolean> {
    const { tracker, generator, gateway, platform } = this.deps;
    if (!tracker.shouldPostNow()) {
      this.logger.info({ max: tracker.snapshot().maxDailyPosts }, "Daily post limit reached, skipping scheduled post");
      return false;
    }

    const generated = await generator.generate(buildScheduledPostPrompt(platform.maxPostLength), POST_MAX_TOKENS);
    const content = truncateForPlatform(generated, platform.maxPostLength);
    const result = await gateway.perform("post", { text: content });
    if (!result.success) {
      this.logger.error({ err: result.error, kind: result.errorKind }, "Scheduled post failed");
      return false;
    }

    tracker.recordPost();
    this.logger.info(
      { tweetId: result.payload.tweetId, client: result.client, count: tracker.snapshot().dailyPostCount },
      "Scheduled post published"
    );
    return true;
  }

  // 커서가 이미 배치 맨 앞으로 이동했으므로 시작된 배치는 끝까지 처리한다
  async handleMentions(): Promise<number> {
    const { tracker, generator, gateway, platform } = this.deps;
    const result = await gateway.perform("fetchMentions", {
      sinceId: tracker.lastMentionCursor ?? undefined,
      limit: platform.mentionFetchLimit,
    });
    if (!result.success) {
      this.logger.error({ err: result.error, kind: result.errorKind }, "Failed to fetch mentions");
      return 0;
    }

    const mentions = result.payload.mentions;
    if (mentions.length === 0) {
      this.logger.info({}, "No new mentions");
      return 0;
    }

    tracker.advanceMentionCursor(mentions);
    this.logger.info({ count: mentions.length, cursor: tracker.lastMentionCursor }, "Processing mentions");

    let replied = 0;
    // 오래된 것부터 처리
    for (const mention of [...mentions].reverse()) {
      const generated = await generator.generate(
        buildMentionReplyPrompt(mention.text, platform.maxPostLength),
        MENTION_REPLY_MAX_TOKENS
      );
      const content = truncateForPlatform(generated, platform.maxPostLength);
      const reply = await gateway.perform("reply", { text: content, parentId: mention.id });
      if (reply.success) {
        replied += 1;
        this.logger.info({ mentionId: mention.id, reply: previewText(content) }, "Replied to mention");
      } else {
        this.logger.error({ mentionId: mention.id, err: reply.error }, "Failed to reply to mention");
      }
      await sleep(platform.actionDelayMs);
    }
    return replied;
  }

  async handleDirectMessages(): Promise<number> {
    const { tracker, generator, gateway, platform } = this.deps;
    const result = await gateway.perform("fetchDirectMessages", {
      sinceId: tracker.lastDmCursor ?? undefined,
      limit: platform.dmFetchLimit,
    });
    if (!result.success) {
      this.logger.error({ err: result.error, kind: result.errorKind }, "Failed to fetch direct messages");
      return 0;
    }

    const messages = result.payload.directMessages;
    if (messages.length === 0) {
      this.logger.info({}, "No new direct messages");
      return 0;
    }

    tracker.advanceDmCursor(messages);
    const selfId = await this.resolveSelfId();
    this.logger.info({ count: messages.length, cursor: tracker.lastDmCursor }, "Processing direct messages");

    let answered = 0;
    for (const message of [...messages].reverse()) {
      const senderId = resolveDmSender(message);
      if (!senderId) {
        this.logger.warn({ messageId: message.id, kind: message.kind }, "Direct message has no sender, skipping");
        continue;
      }
      if (selfId && senderId === selfId) {
        continue;
      }
      const text = resolveDmText(message);
      if (!text) {
        this.logger.warn({ messageId: message.id, kind: message.kind }, "Direct message has no text, skipping");
        continue;
      }

      const content = await generator.generate(buildDirectMessagePrompt(text), DM_REPLY_MAX_TOKENS);
      const sent = await gateway.perform("sendDirectMessage", { recipientId: senderId, text: content });
      if (sent.success) {
        answered += 1;
        this.logger.info({ recipientId: senderId, messageId: sent.payload.messageId }, "Answered direct message");
      } else {
        this.logger.error({ recipientId: senderId, err: sent.error, kind: sent.errorKind }, "Failed to send direct message");
      }
      await sleep(platform.actionDelayMs);
    }
    return answered;
  }

  // 본인 계정 ID (성공 시 캐시)
  private async resolveSelfId(): Promise<string | null> {
    if (this.selfUserId) return this.selfUserId;
    const result = await this.deps.gateway.perform("fetchSelf", {});
    if (!result.success) {
      this.logger.warn({ err: result.error }, "Could not resolve own account id");
      return null;
    }
    this.selfUserId = result.payload.userId;
    return this.selfUserId;
  }

  /* -------------------------------------------------------------- */
  /* 단발 액션                                                       */
  /* -------------------------------------------------------------- */

  async postSingle(text: string): Promise<ActionResult<"post">> {
    const content = truncateForPlatform(text, this.deps.platform.maxPostLength);
    const result = await this.deps.gateway.perform("post", { text: content });
    if (result.success) this.deps.tracker.recordPost();
    return result;
  }

  async replySingle(tweetId: string, text: string): Promise<ActionResult<"reply">> {
    const content = truncateForPlatform(text, this.deps.platform.maxPostLength);
    return this.deps.gateway.perform("reply", { text: content, parentId: tweetId });
  }

  async sendSingleDm(recipientId: string, text: string): Promise<ActionResult<"sendDirectMessage">> {
    return this.deps.gateway.perform("sendDirectMessage", { recipientId, text });
  }

  searchAndEngage(query: string, selector: EngagementSelector, maxResults: number = 10): Promise<EngagementOutcome[]> {
    return this.deps.engagement.searchAndEngage(query, selector, maxResults);
  }

  /* -------------------------------------------------------------- */
  /* 실행 제어                                                       */
  /* -------------------------------------------------------------- */

  start(settings: AgentStartSettings): boolean {
    if (settings.maxDailyPosts !== undefined) {
      this.deps.tracker.setMaxDailyPosts(settings.maxDailyPosts);
    }
    return this.deps.scheduler.start([
      { name: "post", intervalMs: settings.postSeconds * 1000, unit: () => this.postScheduledContent().then(() => {}) },
      { name: "mentions", intervalMs: settings.mentionSeconds * 1000, unit: () => this.handleMentions().then(() => {}) },
      { name: "dms", intervalMs: settings.dmSeconds * 1000, unit: () => this.handleDirectMessages().then(() => {}) },
    ]);
  }

  stop(): Promise<StopResult> {
    return this.deps.scheduler.stop();
  }

  async shutdown(): Promise<StopResult> {
    const stopped = await this.stop();
    const session = this.deps.computeSession;
    if (session?.reservedGpuId) {
      try {
        await session.release();
      } catch (error) {
        this.logger.error({ err: errorMessage(error) }, "Error releasing GPU");
      }
    }
    this.logger.info({ timedOut: stopped.timedOut }, "Agent shut down");
    return stopped;
  }

  async getMetrics(): Promise<AgentMetrics> {
    const snapshot = this.deps.tracker.snapshot();
    const metrics: AgentMetrics = {
      agentName: this.deps.character.name,
      dailyPostCount: snapshot.dailyPostCount,
      maxDailyPosts: snapshot.maxDailyPosts,
      uptimeSeconds: Math.max(0, (this.now().getTime() - this.startedAt.getTime()) / 1000),
      testMode: this.deps.testMode,
      schedulerState: this.deps.scheduler.state,
      lastMentionCursor: snapshot.lastMentionCursor,
      lastDmCursor: snapshot.lastDmCursor,
    };

    const session = this.deps.computeSession;
    if (this.deps.testMode || !session) {
      return metrics;
    }

    try {
      const status = await session.status();
      metrics.gpuStatus = status ? status.raw : null;
    } catch (error) {
      metrics.gpuStatus = { error: errorMessage(error) };
    }
    try {
      metrics.billing = summarizeBilling(await session.billing());
    } catch (error) {
      metrics.billing = { error: errorMessage(error) };
    }
    return metrics;
  }
}

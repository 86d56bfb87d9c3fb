import { TwitterApi } from "twitter-api-v2";
import type { TwitterCredentials } from "../types/runtime.js";
import type { ActionPayloads, ClientBundle, DirectMessage, PlatformClient, PlatformItem } from "../types/platform.js";
import { hasUserContextCredentials } from "../config/runtime.js";
import { isRecord, readString } from "../utils/guards.js";
import { isNewerId } from "../utils/ids.js";
import { type LogSink, createLogger } from "../utils/logger.js";
import { PlatformError, classifyPlatformError } from "./platform-error.js";

/** Fields of a v2 tweet the clients read. */
export interface V2TweetLike {
  id: string;
  text: string;
  author_id?: string;
  created_at?: string;
}

export interface V2DmEventLike {
  id: string;
  event_type: string;
  text?: string;
  sender_id?: string;
  dm_conversation_id?: string;
  created_at?: string;
}

type V2TweetField = "author_id" | "created_at" | "conversation_id";

/**
 * The typed methods of twitter-api-v2's `TwitterApiv2` the v2 client calls.
 * `client.v2` satisfies it; tests pass an object with the same methods.
 */
export interface TwitterV2Api {
  tweet(text: string): Promise<{ data: { id: string } }>;
  reply(text: string, toTweetId: string): Promise<{ data: { id: string } }>;
  retweet(loggedUserId: string, tweetId: string): Promise<unknown>;
  like(loggedUserId: string, tweetId: string): Promise<unknown>;
  me(): Promise<{ data: { id: string; username?: string } }>;
  userMentionTimeline(
    userId: string,
    options: { max_results?: number; since_id?: string; "tweet.fields"?: V2TweetField[] }
  ): Promise<{ data: { data?: V2TweetLike[] } }>;
  search(
    query: string,
    options: { max_results?: number; "tweet.fields"?: V2TweetField[] }
  ): Promise<{ data: { data?: V2TweetLike[] } }>;
  userByUsername(username: string): Promise<{ data?: { id: string } }>;
  userTimeline(
    userId: string,
    options: { max_results?: number; "tweet.fields"?: V2TweetField[] }
  ): Promise<{ data: { data?: V2TweetLike[] } }>;
  listDmEvents(options: {
    max_results?: number;
    "dm_event.fields"?: Array<"created_at" | "dm_conversation_id" | "sender_id">;
  }): Promise<{ events: V2DmEventLike[] }>;
  sendDmToParticipant(participantId: string, options: { text: string }): Promise<{ dm_event_id: string }>;
}

export interface V1TweetLike {
  id_str: string;
  full_text?: string;
  text?: string;
  created_at?: string;
  user?: { id_str?: string };
}

export interface V1DmEventLike {
  id: string;
  created_timestamp?: string;
  message_create?: {
    sender_id?: string;
    target?: { recipient_id?: string };
    message_data?: { text?: string };
  };
}

/**
 * The typed methods of twitter-api-v2's `TwitterApiv1` the v1.1 client calls.
 * Retweet and favorite have no typed wrapper and go through `post`.
 */
export interface TwitterV1Api {
  tweet(status: string): Promise<V1TweetLike>;
  reply(status: string, inReplyToStatusId: string): Promise<V1TweetLike>;
  post(url: string, body?: Record<string, string>): Promise<unknown>;
  mentionTimeline(options: { count?: number; since_id?: string }): Promise<{ tweets: V1TweetLike[] }>;
  listDmEvents(options: { count?: number }): Promise<{ events: V1DmEventLike[] }>;
  sendDm(params: { recipient_id: string; text: string }): Promise<{ event: { id: string } }>;
  search(query: string, options: { count?: number }): Promise<{ tweets: V1TweetLike[] }>;
  userTimelineByUsername(username: string, options: { count?: number }): Promise<{ tweets: V1TweetLike[] }>;
  verifyCredentials(): Promise<{ id_str: string; screen_name?: string }>;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, Math.floor(value)));
}

function stripHandle(username: string): string {
  return username.trim().replace(/^@/, "");
}

// API 경계에서 한 번만 에러 분류
async function guarded<T>(call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (error) {
    throw classifyPlatformError(error);
  }
}

/* ------------------------------------------------------------------ */
/* v2                                                                  */
/* ------------------------------------------------------------------ */

export function toPlatformItemV2(tweet: V2TweetLike): PlatformItem {
  return { id: tweet.id, text: tweet.text, authorId: tweet.author_id, createdAt: tweet.created_at };
}

export function toDirectMessageV2(event: V2DmEventLike): DirectMessage {
  return {
    kind: "dm-event",
    id: event.id,
    eventType: event.event_type,
    senderId: event.sender_id,
    text: event.text,
    conversationId: event.dm_conversation_id,
    createdAt: event.created_at,
  };
}

const V2_TWEET_FIELDS: V2TweetField[] = ["created_at", "author_id", "conversation_id"];

export interface V2ClientOptions {
  directMessages?: boolean;
}

/**
 * X API v2 capability set. Retweet/like need the authenticated user id,
 * which is resolved once through `me()`.
 */
export class V2PlatformClient implements PlatformClient {
  readonly name = "v2";
  readonly supportsDirectMessages: boolean;
  private readonly api: TwitterV2Api;
  private self: ActionPayloads["fetchSelf"] | null = null;

  constructor(api: TwitterV2Api, options: V2ClientOptions = {}) {
    this.api = api;
    this.supportsDirectMessages = options.directMessages ?? false;
  }

  async post(text: string): Promise<ActionPayloads["post"]> {
    const result = await guarded(() => this.api.tweet(text));
    return { tweetId: result.data.id };
  }

  async reply(text: string, parentId: string): Promise<ActionPayloads["reply"]> {
    const result = await guarded(() => this.api.reply(text, parentId));
    return { tweetId: result.data.id, inReplyTo: parentId };
  }

  async retweet(tweetId: string): Promise<ActionPayloads["retweet"]> {
    const { userId } = await this.fetchSelf();
    await guarded(() => this.api.retweet(userId, tweetId));
    return { tweetId };
  }

  async like(tweetId: string): Promise<ActionPayloads["like"]> {
    const { userId } = await this.fetchSelf();
    await guarded(() => this.api.like(userId, tweetId));
    return { tweetId };
  }

  async fetchMentions(sinceId: string | undefined, limit: number): Promise<ActionPayloads["fetchMentions"]> {
    const { userId } = await this.fetchSelf();
    const timeline = await guarded(() =>
      this.api.userMentionTimeline(userId, {
        max_results: clamp(limit, 5, 100),
        "tweet.fields": V2_TWEET_FIELDS,
        ...(sinceId ? { since_id: sinceId } : {}),
      })
    );
    return { mentions: (timeline.data.data ?? []).map(toPlatformItemV2) };
  }

  async fetchDirectMessages(
    sinceId: string | undefined,
    limit: number
  ): Promise<ActionPayloads["fetchDirectMessages"]> {
    if (!this.supportsDirectMessages) {
      throw new PlatformError("unsupported", "direct messages are disabled for the v2 client");
    }
    const paginator = await guarded(() =>
      this.api.listDmEvents({
        max_results: clamp(limit, 1, 100),
        "dm_event.fields": ["created_at", "dm_conversation_id", "sender_id"],
      })
    );
    const directMessages = paginator.events
      .filter((event) => isNewerId(event.id, sinceId))
      .map(toDirectMessageV2);
    return { directMessages };
  }

  async sendDirectMessage(recipientId: string, text: string): Promise<ActionPayloads["sendDirectMessage"]> {
    if (!this.supportsDirectMessages) {
      throw new PlatformError("unsupported", "direct messages are disabled for the v2 client");
    }
    const result = await guarded(() => this.api.sendDmToParticipant(recipientId, { text }));
    return { messageId: result.dm_event_id };
  }

  async search(query: string, limit: number): Promise<ActionPayloads["search"]> {
    const result = await guarded(() =>
      this.api.search(query, { max_results: clamp(limit, 10, 100), "tweet.fields": V2_TWEET_FIELDS })
    );
    // 최소 요청 수(10)보다 적게 원할 수 있음
    return { tweets: (result.data.data ?? []).slice(0, Math.max(0, limit)).map(toPlatformItemV2) };
  }

  async fetchTimeline(username: string, limit: number): Promise<ActionPayloads["fetchTimeline"]> {
    const handle = stripHandle(username);
    const user = await guarded(() => this.api.userByUsername(handle));
    if (!user.data) throw new PlatformError("not-found", `user @${handle} not found`);
    const userId = user.data.id;
    const timeline = await guarded(() =>
      this.api.userTimeline(userId, { max_results: clamp(limit, 5, 100), "tweet.fields": V2_TWEET_FIELDS })
    );
    return { tweets: (timeline.data.data ?? []).slice(0, Math.max(0, limit)).map(toPlatformItemV2) };
  }

  async fetchSelf(): Promise<ActionPayloads["fetchSelf"]> {
    if (this.self) return this.self;
    const me = await guarded(() => this.api.me());
    this.self = { userId: me.data.id, username: me.data.username };
    return this.self;
  }
}

/* ------------------------------------------------------------------ */
/* v1.1                                                                */
/* ------------------------------------------------------------------ */

export function toPlatformItemV1(tweet: V1TweetLike): PlatformItem {
  return {
    id: tweet.id_str,
    text: tweet.full_text ?? tweet.text ?? "",
    authorId: tweet.user?.id_str,
    createdAt: tweet.created_at,
  };
}

export function toDirectMessageV1(event: V1DmEventLike): DirectMessage {
  const create = event.message_create;
  return {
    kind: "message-create",
    id: event.id,
    senderId: create?.sender_id,
    recipientId: create?.target?.recipient_id,
    text: create?.message_data?.text,
    createdAt: event.created_timestamp ? new Date(Number(event.created_timestamp)).toISOString() : undefined,
  };
}

/**
 * X API v1.1 capability set. The only client that can reach direct messages
 * on the standard access tiers.
 */
export class V1PlatformClient implements PlatformClient {
  readonly name = "v1.1";
  readonly supportsDirectMessages = true;
  private readonly api: TwitterV1Api;
  private self: ActionPayloads["fetchSelf"] | null = null;

  constructor(api: TwitterV1Api) {
    this.api = api;
  }

  async post(text: string): Promise<ActionPayloads["post"]> {
    const tweet = await guarded(() => this.api.tweet(text));
    return { tweetId: tweet.id_str };
  }

  async reply(text: string, parentId: string): Promise<ActionPayloads["reply"]> {
    const tweet = await guarded(() => this.api.reply(text, parentId));
    return { tweetId: tweet.id_str, inReplyTo: parentId };
  }

  async retweet(tweetId: string): Promise<ActionPayloads["retweet"]> {
    const body = await guarded(() => this.api.post(`statuses/retweet/${tweetId}.json`));
    return { tweetId, retweetId: isRecord(body) ? readString(body, "id_str") : undefined };
  }

  async like(tweetId: string): Promise<ActionPayloads["like"]> {
    await guarded(() => this.api.post("favorites/create.json", { id: tweetId }));
    return { tweetId };
  }

  async fetchMentions(sinceId: string | undefined, limit: number): Promise<ActionPayloads["fetchMentions"]> {
    const timeline = await guarded(() =>
      this.api.mentionTimeline({ count: clamp(limit, 1, 200), ...(sinceId ? { since_id: sinceId } : {}) })
    );
    return { mentions: timeline.tweets.map(toPlatformItemV1) };
  }

  async fetchDirectMessages(
    sinceId: string | undefined,
    limit: number
  ): Promise<ActionPayloads["fetchDirectMessages"]> {
    const paginator = await guarded(() => this.api.listDmEvents({ count: clamp(limit, 1, 50) }));
    // since_id 파라미터가 없어서 직접 거른다
    const directMessages = paginator.events
      .filter((event) => isNewerId(event.id, sinceId))
      .map(toDirectMessageV1);
    return { directMessages };
  }

  async sendDirectMessage(recipientId: string, text: string): Promise<ActionPayloads["sendDirectMessage"]> {
    const result = await guarded(() => this.api.sendDm({ recipient_id: recipientId, text }));
    return { messageId: result.event.id };
  }

  async search(query: string, limit: number): Promise<ActionPayloads["search"]> {
    const result = await guarded(() => this.api.search(query, { count: clamp(limit, 1, 100) }));
    return { tweets: result.tweets.slice(0, Math.max(0, limit)).map(toPlatformItemV1) };
  }

  async fetchTimeline(username: string, limit: number): Promise<ActionPayloads["fetchTimeline"]> {
    const timeline = await guarded(() =>
      this.api.userTimelineByUsername(stripHandle(username), { count: clamp(limit, 1, 200) })
    );
    return { tweets: timeline.tweets.slice(0, Math.max(0, limit)).map(toPlatformItemV1) };
  }

  async fetchSelf(): Promise<ActionPayloads["fetchSelf"]> {
    if (this.self) return this.self;
    const user = await guarded(() => this.api.verifyCredentials());
    this.self = { userId: user.id_str, username: user.screen_name };
    return this.self;
  }
}

/* ------------------------------------------------------------------ */
/* 초기화                                                              */
/* ------------------------------------------------------------------ */

export interface ClientBundleOptions {
  v2DirectMessages?: boolean;
}

// Twitter 클라이언트 초기화 (v2 = primary, v1.1 = secondary)
export function createClientBundle(
  credentials: TwitterCredentials,
  options: ClientBundleOptions = {}
): ClientBundle {
  if (hasUserContextCredentials(credentials)) {
    const userClient = new TwitterApi({
      appKey: credentials.apiKey,
      appSecret: credentials.apiSecret,
      accessToken: credentials.accessToken,
      accessSecret: credentials.accessSecret,
    });
    return {
      primary: new V2PlatformClient(userClient.v2, { directMessages: options.v2DirectMessages }),
      secondary: new V1PlatformClient(userClient.v1),
    };
  }

  if (credentials.bearerToken) {
    // 앱 전용 토큰은 읽기만 가능
    const appClient = new TwitterApi(credentials.bearerToken);
    return { primary: new V2PlatformClient(appClient.v2) };
  }

  throw new Error("No X API credentials configured: set the OAuth 1.0a user keys or TWITTER_BEARER_TOKEN");
}

/**
 * Builds the bundle and checks that one of its clients can identify the account.
 * A failed check is logged, not fatal: reads may still work on app-only auth.
 */
export async function initTwitterClients(
  credentials: TwitterCredentials,
  options: ClientBundleOptions = {},
  logger: LogSink = createLogger("twitter")
): Promise<ClientBundle> {
  const bundle = createClientBundle(credentials, options);
  const verifier = bundle.secondary ?? bundle.primary;
  if (!verifier) return bundle;

  try {
    const self = await verifier.fetchSelf();
    logger.info({ client: verifier.name, userId: self.userId, username: self.username }, "X credentials verified");
  } catch (error) {
    const classified = classifyPlatformError(error);
    logger.warn({ client: verifier.name, kind: classified.kind, err: classified.message }, "X credential check failed");
  }
  return bundle;
}

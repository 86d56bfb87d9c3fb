/**
 * 플랫폼(X) 능력 집합 타입 정의
 *
 * v2 / v1.1 클라이언트가 같은 인터페이스를 구현하고,
 * 게이트웨이가 둘 사이의 폴백을 담당한다.
 */

/**
 * 검색/멘션/타임라인에서 넘어오는 트윗 한 건
 */
export interface PlatformItem {
  id: string;
  text: string;
  authorId?: string;
  createdAt?: string;
}

/**
 * DM 표현 (API 경계에서 한 번만 디코딩)
 * - message-create: v1.1 direct_messages/events 형태
 * - dm-event: v2 dm_events 형태
 */
export type DirectMessage =
  | {
      kind: "message-create";
      id: string;
      senderId?: string;
      recipientId?: string;
      text?: string;
      createdAt?: string;
    }
  | {
      kind: "dm-event";
      id: string;
      eventType: string;
      senderId?: string;
      text?: string;
      conversationId?: string;
      createdAt?: string;
    };

export interface ActionArgs {
  post: { text: string };
  reply: { text: string; parentId: string };
  retweet: { tweetId: string };
  like: { tweetId: string };
  fetchMentions: { sinceId?: string; limit: number };
  fetchDirectMessages: { sinceId?: string; limit: number };
  sendDirectMessage: { recipientId: string; text: string };
  search: { query: string; limit: number };
  fetchTimeline: { username: string; limit: number };
  fetchSelf: Record<string, never>;
}

export interface ActionPayloads {
  post: { tweetId: string };
  reply: { tweetId: string; inReplyTo: string };
  retweet: { tweetId: string; retweetId?: string };
  like: { tweetId: string };
  fetchMentions: { mentions: PlatformItem[] };
  fetchDirectMessages: { directMessages: DirectMessage[] };
  sendDirectMessage: { messageId: string };
  search: { tweets: PlatformItem[] };
  fetchTimeline: { tweets: PlatformItem[] };
  fetchSelf: { userId: string; username?: string };
}

export type PlatformAction = keyof ActionArgs;

export const DIRECT_MESSAGE_ACTIONS: ReadonlySet<PlatformAction> = new Set<PlatformAction>([
  "fetchDirectMessages",
  "sendDirectMessage",
]);

/**
 * 한 API 버전의 능력 집합. 실패는 PlatformError로 throw 한다.
 */
export interface PlatformClient {
  readonly name: string;
  readonly supportsDirectMessages: boolean;
  post(text: string): Promise<ActionPayloads["post"]>;
  reply(text: string, parentId: string): Promise<ActionPayloads["reply"]>;
  retweet(tweetId: string): Promise<ActionPayloads["retweet"]>;
  like(tweetId: string): Promise<ActionPayloads["like"]>;
  fetchMentions(sinceId: string | undefined, limit: number): Promise<ActionPayloads["fetchMentions"]>;
  fetchDirectMessages(
    sinceId: string | undefined,
    limit: number
  ): Promise<ActionPayloads["fetchDirectMessages"]>;
  sendDirectMessage(recipientId: string, text: string): Promise<ActionPayloads["sendDirectMessage"]>;
  search(query: string, limit: number): Promise<ActionPayloads["search"]>;
  fetchTimeline(username: string, limit: number): Promise<ActionPayloads["fetchTimeline"]>;
  fetchSelf(): Promise<ActionPayloads["fetchSelf"]>;
}

export interface ClientBundle {
  readonly primary?: PlatformClient;
  readonly secondary?: PlatformClient;
}

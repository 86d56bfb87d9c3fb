import type {
  ActionArgs,
  ActionPayloads,
  ClientBundle,
  PlatformAction,
  PlatformClient,
} from "../types/platform.js";
import { DIRECT_MESSAGE_ACTIONS } from "../types/platform.js";
import { type LogSink, createLogger } from "../utils/logger.js";
import { type PlatformErrorKind, classifyPlatformError } from "./platform-error.js";

export type ActionResult<A extends PlatformAction> =
  | { success: true; payload: ActionPayloads[A]; client: string }
  | { success: false; error: string; errorKind: PlatformErrorKind };

type ActionInvokers = {
  [K in PlatformAction]: (client: PlatformClient, args: ActionArgs[K]) => Promise<ActionPayloads[K]>;
};

// 액션별로 각 클라이언트의 호출 시그니처로 변환
const INVOKERS: ActionInvokers = {
  post: (client, args) => client.post(args.text),
  reply: (client, args) => client.reply(args.text, args.parentId),
  retweet: (client, args) => client.retweet(args.tweetId),
  like: (client, args) => client.like(args.tweetId),
  fetchMentions: (client, args) => client.fetchMentions(args.sinceId, args.limit),
  fetchDirectMessages: (client, args) => client.fetchDirectMessages(args.sinceId, args.limit),
  sendDirectMessage: (client, args) => client.sendDirectMessage(args.recipientId, args.text),
  search: (client, args) => client.search(args.query, args.limit),
  fetchTimeline: (client, args) => client.fetchTimeline(args.username, args.limit),
  fetchSelf: (client) => client.fetchSelf(),
};

// 요금제 제한 시 실패 대신 돌려줄 빈 결과
const ACCESS_TIER_FALLBACKS: { [K in PlatformAction]?: () => ActionPayloads[K] } = {
  fetchDirectMessages: () => ({ directMessages: [] }),
};

export const NO_SUITABLE_CLIENT = "no suitable client";

/**
 * Runs one logical action against the v2 / v1.1 clients with sequential fallback.
 * Never throws: every outcome comes back as an {@link ActionResult}.
 */
export class ActionGateway {
  private readonly bundle: ClientBundle;
  private readonly logger: LogSink;

  constructor(bundle: ClientBundle, logger: LogSink = createLogger("gateway")) {
    this.bundle = bundle;
    this.logger = logger;
  }

  candidatesFor(action: PlatformAction): PlatformClient[] {
    const { primary, secondary } = this.bundle;
    if (DIRECT_MESSAGE_ACTIONS.has(action)) {
      return [secondary, primary].filter(
        (client): client is PlatformClient => client !== undefined && client.supportsDirectMessages
      );
    }
    return [primary, secondary].filter((client): client is PlatformClient => client !== undefined);
  }

  async perform<A extends PlatformAction>(action: A, args: ActionArgs[A]): Promise<ActionResult<A>> {
    const candidates = this.candidatesFor(action);
    if (candidates.length === 0) {
      this.logger.warn({ action }, "No client can perform action");
      return { success: false, error: NO_SUITABLE_CLIENT, errorKind: "unsupported" };
    }

    const invoke: (client: PlatformClient, args: ActionArgs[A]) => Promise<ActionPayloads[A]> = INVOKERS[action];
    const accessTierFallback: (() => ActionPayloads[A]) | undefined = ACCESS_TIER_FALLBACKS[action];
    const failures: Array<{ client: string; message: string; kind: PlatformErrorKind }> = [];

    for (const client of candidates) {
      try {
        const payload = await invoke(client, args);
        if (failures.length > 0) {
          this.logger.info({ action, client: client.name }, "Fallback client succeeded");
        }
        return { success: true, payload, client: client.name };
      } catch (error) {
        const classified = classifyPlatformError(error);
        this.logger.warn(
          { action, client: client.name, kind: classified.kind, err: classified.message },
          "Platform call failed"
        );

        if (classified.kind === "access-tier" && accessTierFallback) {
          this.logger.warn({ action, client: client.name }, "Action unavailable on this access tier, returning empty result");
          return { success: true, payload: accessTierFallback(), client: client.name };
        }

        failures.push({ client: client.name, message: classified.message, kind: classified.kind });
      }
    }

    return {
      success: false,
      error: failures.map((failure) => `${failure.client}: ${failure.message}`).join("; "),
      errorKind: failures[0].kind,
    };
  }
}

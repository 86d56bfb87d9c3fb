import { Command, InvalidArgumentError } from "commander";
import type { RuntimeConfig } from "./config/runtime.js";
import { type EngagementSelector, parseEngagementSelector } from "./services/engagement.js";

export type CliAction =
  | { kind: "post"; text: string }
  | { kind: "reply"; tweetId: string; text: string }
  | { kind: "dm"; recipientId: string; text: string }
  | { kind: "engage"; query: string; selector: EngagementSelector; maxResults: number }
  | { kind: "autonomous" };

export interface CliOptions {
  characterFile: string;
  testMode: boolean;
  postSeconds: number;
  mentionSeconds: number;
  dmSeconds: number;
  maxDailyPosts: number;
  action: CliAction;
}

interface RawCliOptions {
  character?: string;
  testMode?: boolean;
  postTweet?: string;
  replyTo?: string;
  replyContent?: string;
  sendDm?: string;
  dmContent?: string;
  search?: string;
  engage?: EngagementSelector;
  maxResults?: number;
  tweetInterval?: number;
  mentionInterval?: number;
  dmInterval?: number;
  maxDailyTweets?: number;
}

function positiveInt(raw: string): number {
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value < 1) {
    throw new InvalidArgumentError("expected a positive integer");
  }
  return value;
}

function nonNegativeInt(raw: string): number {
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidArgumentError("expected a non-negative integer");
  }
  return value;
}

function selectorArg(raw: string): EngagementSelector {
  const selector = parseEngagementSelector(raw);
  if (!selector) {
    throw new InvalidArgumentError("expected one of reply, retweet, like, all");
  }
  return selector;
}

export function createProgram(config: RuntimeConfig): Command {
  const program = new Command();

  program
    .name("compute-social-agent")
    .description("Autonomous X agent that writes with a model running on rented GPUs")
    .option("--character <file>", "character JSON file", config.characterFile)
    .option("--test-mode", "use canned content instead of live generation", config.testMode)
    .option("--post-tweet <text>", "post one tweet and exit")
    .option("--reply-to <tweetId>", "tweet id to reply to (with --reply-content)")
    .option("--reply-content <text>", "reply text")
    .option("--send-dm <userId>", "user id to message (with --dm-content)")
    .option("--dm-content <text>", "direct message text")
    .option("--search <query>", "search query to engage with (with --engage)")
    .option("--engage <action>", "reply | retweet | like | all", selectorArg)
    .option("--max-results <n>", "search results to engage with", positiveInt, 10)
    .option("--tweet-interval <seconds>", "seconds between scheduled posts", positiveInt, config.intervals.postSeconds)
    .option("--mention-interval <seconds>", "seconds between mention checks", positiveInt, config.intervals.mentionSeconds)
    .option("--dm-interval <seconds>", "seconds between DM checks", positiveInt, config.intervals.dmSeconds)
    .option("--max-daily-tweets <n>", "scheduled posts per rolling 24h", nonNegativeInt, config.maxDailyPosts)
    .exitOverride();

  return program;
}

// 단발 액션 우선순위: post > reply > dm > search
function resolveAction(raw: RawCliOptions): CliAction {
  if (raw.postTweet) return { kind: "post", text: raw.postTweet };
  if (raw.replyTo && raw.replyContent) return { kind: "reply", tweetId: raw.replyTo, text: raw.replyContent };
  if (raw.sendDm && raw.dmContent) return { kind: "dm", recipientId: raw.sendDm, text: raw.dmContent };
  if (raw.search && raw.engage) {
    return { kind: "engage", query: raw.search, selector: raw.engage, maxResults: raw.maxResults ?? 10 };
  }
  return { kind: "autonomous" };
}

/**
 * Parses `argv` (user arguments only, without the node and script entries).
 */
export function parseCliOptions(argv: string[], config: RuntimeConfig): CliOptions {
  const program = createProgram(config);
  program.parse(argv, { from: "user" });
  const raw = program.opts<RawCliOptions>();

  return {
    characterFile: raw.character ?? config.characterFile,
    testMode: raw.testMode ?? config.testMode,
    postSeconds: raw.tweetInterval ?? config.intervals.postSeconds,
    mentionSeconds: raw.mentionInterval ?? config.intervals.mentionSeconds,
    dmSeconds: raw.dmInterval ?? config.intervals.dmSeconds,
    maxDailyPosts: raw.maxDailyTweets ?? config.maxDailyPosts,
    action: resolveAction(raw),
  };
}

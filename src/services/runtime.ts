import type { Character } from "../character.js";
import type { RuntimeConfig } from "../config/runtime.js";
import type { ClientBundle } from "../types/platform.js";
import { errorMessage } from "../utils/guards.js";
import { type LogSink, createLogger } from "../utils/logger.js";
import { SocialAgent } from "./agent.js";
import { ComputeClient, ComputeSession, type FetchLike } from "./compute.js";
import { EngagementOrchestrator } from "./engagement.js";
import { ActionGateway } from "./gateway.js";
import {
  type ContentGenerator,
  ComputeCompletionBackend,
  LiveContentGenerator,
  OfflineContentGenerator,
  initAnthropicBackend,
} from "./llm.js";
import { QuotaCursorTracker } from "./quota.js";
import { LoopScheduler } from "./scheduler.js";

export interface AgentRuntime {
  agent: SocialAgent;
  gateway: ActionGateway;
  computeSession: ComputeSession | null;
}

export interface BuildAgentOptions {
  fetchImpl?: FetchLike;
  generator?: ContentGenerator;
  logger?: LogSink;
  now?: () => Date;
}

export function printStartupBanner(config: RuntimeConfig, character: Character, logger: LogSink = createLogger("runtime")): void {
  logger.info(
    {
      character: character.name,
      testMode: config.testMode,
      backend: config.testMode ? "offline" : config.generation.backend,
      model: config.generation.backend === "compute" ? config.compute.modelId : config.generation.anthropicModel,
      intervals: config.intervals,
      maxDailyPosts: config.maxDailyPosts,
    },
    "Agent online"
  );
  if (config.testMode) {
    logger.info({}, "[TEST MODE] generating canned content, X calls are real");
  }
}

// 실행 모드에 맞는 생성기 구성
function createGenerator(
  config: RuntimeConfig,
  character: Character,
  fetchImpl: FetchLike | undefined,
  logger: LogSink | undefined
): { generator: ContentGenerator; computeSession: ComputeSession | null } {
  if (config.testMode) {
    return { generator: new OfflineContentGenerator(character, { logger }), computeSession: null };
  }
  if (config.generation.backend === "anthropic") {
    return {
      generator: new LiveContentGenerator(character, initAnthropicBackend(config.generation), logger),
      computeSession: null,
    };
  }
  const client = new ComputeClient(config.compute.apiKey, config.compute.baseUrl, fetchImpl);
  const computeSession = new ComputeSession(client, config.compute, { logger });
  return {
    generator: new LiveContentGenerator(character, new ComputeCompletionBackend(computeSession, config.generation), logger),
    computeSession,
  };
}

/**
 * Wires tracker, scheduler, gateway, generator and orchestrator into one agent.
 */
export function buildAgentRuntime(
  config: RuntimeConfig,
  character: Character,
  bundle: ClientBundle,
  options: BuildAgentOptions = {}
): AgentRuntime {
  const gateway = new ActionGateway(bundle, options.logger);
  const built = options.generator
    ? { generator: options.generator, computeSession: null }
    : createGenerator(config, character, options.fetchImpl, options.logger);

  const tracker = new QuotaCursorTracker({ maxDailyPosts: config.maxDailyPosts, now: options.now });
  const scheduler = new LoopScheduler({ stopTimeoutMs: config.scheduler.stopTimeoutMs, logger: options.logger });
  const engagement = new EngagementOrchestrator(gateway, built.generator, {
    actionDelayMs: config.platform.actionDelayMs,
    maxPostLength: config.platform.maxPostLength,
    logger: options.logger,
  });

  const agent = new SocialAgent({
    character,
    gateway,
    generator: built.generator,
    tracker,
    scheduler,
    engagement,
    platform: config.platform,
    testMode: config.testMode,
    computeSession: built.computeSession,
    logger: options.logger,
    now: options.now,
  });

  return { agent, gateway, computeSession: built.computeSession };
}

/**
 * Reserves the GPU up front so the first post does not wait on it.
 * A failure is logged; generation reserves again on demand.
 */
export async function warmUpCompute(session: ComputeSession | null, logger: LogSink = createLogger("runtime")): Promise<void> {
  if (!session) return;
  try {
    const gpuId = await session.ensureReady();
    logger.info({ gpuId }, "Compute ready");
  } catch (error) {
    logger.error({ err: errorMessage(error) }, "Failed to prepare compute, will retry on first generation");
  }
}

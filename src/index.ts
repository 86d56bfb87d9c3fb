#!/usr/bin/env node
import "dotenv/config";
import { CommanderError } from "commander";
import { loadCharacter } from "./character.js";
import { type CliOptions, parseCliOptions } from "./cli.js";
import { type RuntimeConfig, loadRuntimeConfig, validateEnvironment } from "./config/runtime.js";
import type { AgentRuntime } from "./services/runtime.js";
import { buildAgentRuntime, printStartupBanner, warmUpCompute } from "./services/runtime.js";
import { initTwitterClients } from "./services/twitter.js";
import { errorMessage } from "./utils/guards.js";
import { createLogger, setLogLevel } from "./utils/logger.js";

/**
 * 진입점: 단발 액션 또는 자율 모드
 */

const logger = createLogger("main");

async function runOneShot(runtime: AgentRuntime, options: CliOptions): Promise<boolean> {
  const { agent } = runtime;
  const action = options.action;

  switch (action.kind) {
    case "post": {
      const result = await agent.postSingle(action.text);
      if (!result.success) {
        logger.error({ err: result.error }, "Failed to post tweet");
        return false;
      }
      logger.info({ tweetId: result.payload.tweetId, client: result.client }, "Tweet posted");
      return true;
    }
    case "reply": {
      const result = await agent.replySingle(action.tweetId, action.text);
      if (!result.success) {
        logger.error({ err: result.error }, "Failed to post reply");
        return false;
      }
      logger.info({ tweetId: result.payload.tweetId, inReplyTo: action.tweetId }, "Reply posted");
      return true;
    }
    case "dm": {
      const result = await agent.sendSingleDm(action.recipientId, action.text);
      if (!result.success) {
        logger.error({ err: result.error, kind: result.errorKind }, "Failed to send direct message");
        return false;
      }
      logger.info({ messageId: result.payload.messageId }, "Direct message sent");
      return true;
    }
    case "engage": {
      const outcomes = await agent.searchAndEngage(action.query, action.selector, action.maxResults);
      const succeeded = outcomes.flatMap((outcome) => outcome.actions).filter((entry) => entry.success).length;
      logger.info({ query: action.query, tweets: outcomes.length, succeeded }, "Search engagement finished");
      return true;
    }
    case "autonomous":
      return true;
  }
}

async function runAutonomous(runtime: AgentRuntime, options: CliOptions): Promise<void> {
  const { agent } = runtime;
  await warmUpCompute(runtime.computeSession);

  agent.start({
    postSeconds: options.postSeconds,
    mentionSeconds: options.mentionSeconds,
    dmSeconds: options.dmSeconds,
    maxDailyPosts: options.maxDailyPosts,
  });
  logger.info({}, "Running autonomously (Ctrl+C to stop)");

  await new Promise<void>((resolve) => {
    let shuttingDown = false;
    const onSignal = (signal: NodeJS.Signals) => {
      if (shuttingDown) return;
      shuttingDown = true;
      logger.info({ signal }, "Shutting down");
      agent
        .getMetrics()
        .then((metrics) => logger.info({ metrics }, "Final metrics"))
        .catch((error: unknown) => logger.warn({ err: errorMessage(error) }, "Could not collect metrics"))
        .then(() => agent.shutdown())
        .catch((error: unknown) => logger.error({ err: errorMessage(error) }, "Shutdown failed"))
        .finally(resolve);
    };
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);
  });
}

async function main(): Promise<number> {
  const baseConfig = loadRuntimeConfig();
  setLogLevel(baseConfig.logLevel);

  let options: CliOptions;
  try {
    options = parseCliOptions(process.argv.slice(2), baseConfig);
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }

  const config: RuntimeConfig = {
    ...baseConfig,
    testMode: options.testMode,
    characterFile: options.characterFile,
    maxDailyPosts: options.maxDailyPosts,
  };

  const missing = validateEnvironment(config);
  if (missing.length > 0) {
    logger.error({ missing }, "Required environment variables are missing, check your .env file");
    return 1;
  }

  const character = loadCharacter(config.characterFile);
  printStartupBanner(config, character);

  const bundle = await initTwitterClients(config.twitter, { v2DirectMessages: config.platform.v2DirectMessages });
  const runtime = buildAgentRuntime(config, character, bundle);

  if (options.action.kind !== "autonomous") {
    const ok = await runOneShot(runtime, options);
    await runtime.agent.shutdown();
    return ok ? 0 : 1;
  }

  await runAutonomous(runtime, options);
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.fatal({ err: errorMessage(error) }, "Fatal error");
    process.exitCode = 1;
  });

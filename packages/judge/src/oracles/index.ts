import { ConfigurationError, type DecisionConfig, type DecisionOracle } from "@pretool-judge/core";
import type { JudgeLogger } from "../logger.js";
import type { JudgeEnvironment, OracleKind } from "../settings.js";
import { createChatCompletionsOracle, type ChatCompletionsOracleOptions } from "./chat-completions.js";
import { createClaudeCliOracle, type ClaudeCliOracleOptions } from "./claude-cli.js";
import type { ProcessRunner } from "./process.js";

export * from "./chat-completions.js";
export * from "./claude-cli.js";
export * from "./process.js";

export type CreateOracleOptions = {
  kind: OracleKind;
  config: DecisionConfig;
  env?: JudgeEnvironment;
  logger?: JudgeLogger;
  fetchImpl?: typeof fetch;
  run?: ProcessRunner;
};

export function createOracle(options: CreateOracleOptions): DecisionOracle {
  const env = options.env ?? process.env;
  const { config } = options;

  if (options.kind === "chat") {
    const apiKey = env.PRETOOL_JUDGE_API_KEY ?? env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new ConfigurationError("The chat oracle needs PRETOOL_JUDGE_API_KEY or OPENAI_API_KEY", {
        source: "environment"
      });
    }
    if (config.allowedTools && config.allowedTools.length > 0) {
      options.logger?.warn?.(
        `[judge] chat oracle cannot run tools; ignoring allowed_tools (${config.allowedTools.join(", ")})`
      );
    }
    const chatOptions: ChatCompletionsOracleOptions = { apiKey };
    const baseUrl = env.PRETOOL_JUDGE_BASE_URL;
    if (baseUrl) {
      chatOptions.baseUrl = baseUrl;
    }
    const model = config.model ?? env.PRETOOL_JUDGE_CHAT_MODEL;
    if (model) {
      chatOptions.model = model;
    }
    if (options.fetchImpl) {
      chatOptions.fetchImpl = options.fetchImpl;
    }
    return createChatCompletionsOracle(chatOptions);
  }

  const cliOptions: ClaudeCliOracleOptions = {};
  const command = env.PRETOOL_JUDGE_CLAUDE_BIN;
  if (command) {
    cliOptions.command = command;
  }
  if (config.model) {
    cliOptions.model = config.model;
  }
  if (config.allowedTools) {
    cliOptions.allowedTools = config.allowedTools;
  }
  if (options.run) {
    cliOptions.run = options.run;
  }
  return createClaudeCliOracle(cliOptions);
}

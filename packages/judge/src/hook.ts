import {
  JudgeError,
  RequestValidationError,
  isJudgeError,
  runDecisionLoop,
  synthesize,
  validate,
  type DecisionConfig,
  type DecisionOracle,
  type DecisionRequest,
  type ResponseEnvelope,
  type TerminalState
} from "@pretool-judge/core";
import type { RedactionMode } from "@pretool-judge/redaction";
import { resolveConfig, type ConfigSelector } from "./config.js";
import type { JudgeLogger, LogLevel } from "./logger.js";
import { buildDecisionRecord, formatDecisionRecord } from "./record.js";

export type OracleFactory = (config: DecisionConfig) => DecisionOracle;

export type JudgeHookOptions = {
  selector: ConfigSelector;
  createOracle: OracleFactory;
  timeoutMs?: number;
  logger?: JudgeLogger;
  logLevel?: LogLevel;
  redaction?: RedactionMode;
  presetDir?: string;
  now?: () => Date;
};

// One hook invocation: raw stdin text in, schema-valid envelope out.
// Every failure along the way is folded into a deny.
export async function judgeHookInput(rawInput: string, options: JudgeHookOptions): Promise<ResponseEnvelope> {
  const { logger } = options;
  let request: DecisionRequest | undefined;
  let policySource: string | undefined;
  let terminal: TerminalState;

  try {
    request = parseRequest(rawInput);
    const loaded = resolveConfig(options.selector, { presetDir: options.presetDir });
    policySource = loaded.source;
    const oracle = options.createOracle(loaded.config);
    terminal = await runDecisionLoop({
      oracle,
      config: loaded.config,
      request,
      timeoutMs: options.timeoutMs,
      logger
    });
  } catch (err) {
    terminal = { status: "rejected", error: toJudgeError(err) };
  }

  reportFailure(terminal, logger);
  const envelope = synthesize(terminal, request, logger);
  logger?.info?.(
    formatDecisionRecord(
      buildDecisionRecord({
        envelope,
        terminal,
        request,
        redaction: options.redaction ?? "standard",
        policySource,
        includePreview: options.logLevel === "debug",
        now: options.now ? options.now() : new Date()
      })
    )
  );
  return envelope;
}

export function parseRequest(rawInput: string): DecisionRequest {
  let data: unknown;
  try {
    data = JSON.parse(rawInput);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new RequestValidationError([`(root): input is not valid JSON (${message})`], { cause: err });
  }
  const outcome = validate("request", data);
  if (!outcome.ok) {
    throw new RequestValidationError(outcome.violations);
  }
  return outcome.value;
}

function toJudgeError(err: unknown): JudgeError {
  if (isJudgeError(err)) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return new JudgeError("internal", `Unexpected failure: ${message}`, { cause: err });
}

function reportFailure(terminal: TerminalState, logger?: JudgeLogger): void {
  switch (terminal.status) {
    case "success":
      return;
    case "exhausted":
      logger?.warn?.(
        `[judge] ${terminal.failure.kind} after ${terminal.attempts} attempts: ${terminal.failure.violations.join("; ")}`
      );
      return;
    case "fatal":
      logger?.error?.(`[judge] ${terminal.error.name}: ${terminal.error.message}`);
      return;
    case "rejected":
      logger?.error?.(`[judge] ${terminal.error.name}: ${terminal.error.message}`);
  }
}

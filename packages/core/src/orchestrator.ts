import {
  DEFAULT_DECISION_TIMEOUT_MS,
  HOOK_EVENT_NAME,
  MAX_DECISION_TIMEOUT_MS,
  MAX_RETRY_ATTEMPTS
} from "./constants.js";
import { CommunicationError } from "./errors.js";
import { buildFeedbackTurn, buildRequestTurn, buildSystemPrompt } from "./prompt.js";
import { extractDecisionObject } from "./response-parser.js";
import { validate, type DecisionRequest, type ResponseEnvelope } from "./schema.js";
import type {
  ConversationState,
  ConversationTurn,
  DecisionConfig,
  DecisionLogger,
  DecisionOracle,
  OracleReply,
  RoundFailure,
  TerminalState
} from "./types.js";

export type DecisionLoopOptions = {
  oracle: DecisionOracle;
  config: DecisionConfig;
  request: DecisionRequest;
  timeoutMs?: number;
  logger?: DecisionLogger;
};

type Step =
  | { phase: "init" }
  | { phase: "await_oracle" }
  | { phase: "parse"; text: string }
  | { phase: "validate"; text: string; candidate: Record<string, unknown> }
  | { phase: "feedback"; text: string; failure: RoundFailure }
  | { phase: "success"; response: ResponseEnvelope }
  | { phase: "exhausted"; failure: RoundFailure }
  | { phase: "fatal"; error: CommunicationError };

type ActiveStep = Exclude<Step, { phase: "success" | "exhausted" | "fatal" }>;

type Deadline = {
  signal: AbortSignal;
  timeoutMs: number;
  clear: () => void;
};

type OracleRound = { ok: true; text: string } | { ok: false; error: CommunicationError };

// Drive the oracle toward one schema-valid decision. Content defects are fed
// back and retried up to MAX_RETRY_ATTEMPTS; channel failures end the loop.
export async function runDecisionLoop(options: DecisionLoopOptions): Promise<TerminalState> {
  const { oracle, config, request, logger } = options;
  const deadline = startDeadline(resolveTimeout(options.timeoutMs));
  const state: ConversationState = { turns: [], attempts: 0 };
  let oracleCalls = 0;
  let step: Step = { phase: "init" };

  const reject = (text: string, failure: RoundFailure): Step => {
    state.attempts += 1;
    state.lastFailure = failure;
    logger?.debug?.(`[judge] reply ${state.attempts}/${MAX_RETRY_ATTEMPTS} rejected: ${failure.violations.join("; ")}`);
    if (state.attempts >= MAX_RETRY_ATTEMPTS) {
      return { phase: "exhausted", failure };
    }
    return { phase: "feedback", text, failure };
  };

  const advance = async (current: ActiveStep): Promise<Step> => {
    switch (current.phase) {
      case "init":
        state.turns.push(
          { role: "system", content: buildSystemPrompt(config) },
          { role: "user", content: buildRequestTurn(request) }
        );
        return { phase: "await_oracle" };

      case "await_oracle": {
        oracleCalls += 1;
        const round = await callOracle(oracle, state.turns, deadline);
        return round.ok ? { phase: "parse", text: round.text } : { phase: "fatal", error: round.error };
      }

      case "parse": {
        const parsed = extractDecisionObject(current.text);
        if (!parsed.ok) {
          return reject(current.text, { kind: "response_parse", violations: [parsed.error.message] });
        }
        return { phase: "validate", text: current.text, candidate: parsed.candidate };
      }

      case "validate": {
        const outcome = validate("response", asResponseEnvelope(current.candidate));
        if (!outcome.ok) {
          return reject(current.text, { kind: "response_validation", violations: outcome.violations });
        }
        return { phase: "success", response: outcome.value };
      }

      case "feedback":
        state.turns.push(
          { role: "assistant", content: current.text },
          { role: "user", content: buildFeedbackTurn(current.failure, state.attempts, MAX_RETRY_ATTEMPTS) }
        );
        return { phase: "await_oracle" };
    }
  };

  try {
    while (true) {
      if (step.phase === "success") {
        return { status: "success", response: step.response, attempts: state.attempts, oracleCalls };
      }
      if (step.phase === "exhausted") {
        return { status: "exhausted", failure: step.failure, attempts: state.attempts, oracleCalls };
      }
      if (step.phase === "fatal") {
        logger?.debug?.(`[judge] oracle failure: ${step.error.message}`);
        return { status: "fatal", error: step.error, attempts: state.attempts, oracleCalls };
      }
      const next = await advance(step);
      logger?.debug?.(`[judge] ${step.phase} -> ${next.phase}`);
      step = next;
    }
  } finally {
    deadline.clear();
  }
}

// Oracles may answer with the bare decision; wrap it under hookSpecificOutput
// without filling in any missing value.
export function asResponseEnvelope(candidate: Record<string, unknown>): Record<string, unknown> {
  if ("hookSpecificOutput" in candidate) {
    return candidate;
  }
  const { updatedInput, ...decision } = candidate;
  const envelope: Record<string, unknown> = {
    hookSpecificOutput: { hookEventName: HOOK_EVENT_NAME, ...decision }
  };
  if (typeof updatedInput !== "undefined") {
    envelope.updatedInput = updatedInput;
  }
  return envelope;
}

async function callOracle(
  oracle: DecisionOracle,
  turns: readonly ConversationTurn[],
  deadline: Deadline
): Promise<OracleRound> {
  if (deadline.signal.aborted) {
    return { ok: false, error: deadlineError(deadline) };
  }
  let reply: OracleReply;
  try {
    // The oracle gets a copy; the conversation is never shared with it.
    const snapshot = turns.map((turn) => ({ ...turn }));
    reply = await Promise.race([oracle.send(snapshot, { signal: deadline.signal }), whenAborted(deadline.signal)]);
  } catch (err) {
    if (deadline.signal.aborted) {
      return { ok: false, error: deadlineError(deadline) };
    }
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, error: new CommunicationError(`Oracle call failed: ${message}`, { cause: err }) };
  }
  if (!reply.ok) {
    return { ok: false, error: new CommunicationError(`Oracle call failed: ${reply.error}`) };
  }
  if (reply.text.trim().length === 0) {
    return { ok: false, error: new CommunicationError("Oracle returned no text") };
  }
  return { ok: true, text: reply.text };
}

function startDeadline(timeoutMs: number): Deadline {
  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(new CommunicationError(`Oracle did not answer within ${timeoutMs} ms`));
  }, timeoutMs);
  return {
    signal: controller.signal,
    timeoutMs,
    clear: () => clearTimeout(timer)
  };
}

function whenAborted(signal: AbortSignal): Promise<never> {
  return new Promise<never>((_resolve, rejectPromise) => {
    if (signal.aborted) {
      rejectPromise(signal.reason);
      return;
    }
    signal.addEventListener("abort", () => rejectPromise(signal.reason), { once: true });
  });
}

function deadlineError(deadline: Deadline): CommunicationError {
  return new CommunicationError(`Oracle did not answer within ${deadline.timeoutMs} ms`);
}

export function resolveTimeout(value: number | undefined): number {
  if (typeof value === "number" && Number.isFinite(value) && value > 0) {
    return Math.min(Math.floor(value), MAX_DECISION_TIMEOUT_MS);
  }
  return DEFAULT_DECISION_TIMEOUT_MS;
}

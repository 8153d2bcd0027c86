import { HOOK_EVENT_NAME, MAX_RETRY_ATTEMPTS } from "./constants.js";
import type { ErrorKind } from "./errors.js";
import type { DecisionRequest, ResponseEnvelope } from "./schema.js";
import { stableStringify } from "./stable-json.js";
import type { DecisionLogger, DecisionOutcome, TerminalState } from "./types.js";

// Fixed deny reasons. Raw diagnostics stay in the outcome detail and the log.
export function describeFailure(kind: ErrorKind, attempts: number = MAX_RETRY_ATTEMPTS): string {
  switch (kind) {
    case "request_validation":
      return "Denied for safety: the tool request did not match the expected PreToolUse input format.";
    case "configuration":
      return "Denied for safety: the judge policy configuration could not be loaded.";
    case "communication":
      return "Denied for safety: the decision oracle was unavailable or returned no response.";
    case "response_parse":
      return `Denied for safety: the decision oracle did not return a parseable decision after ${attempts} attempts.`;
    case "response_validation":
      return `Denied for safety: the decision oracle did not return a schema-valid decision after ${attempts} attempts.`;
    case "internal":
      return "Denied for safety: the judge failed unexpectedly.";
  }
}

export function toOutcome(terminal: TerminalState): DecisionOutcome {
  switch (terminal.status) {
    case "success": {
      const output = terminal.response.hookSpecificOutput;
      const outcome: DecisionOutcome = {
        type: "decided",
        permission: output.permissionDecision,
        reason: output.permissionDecisionReason
      };
      if (terminal.response.updatedInput) {
        outcome.updatedInput = terminal.response.updatedInput;
      }
      return outcome;
    }
    case "exhausted":
      return {
        type: "failed",
        kind: terminal.failure.kind,
        detail: `${terminal.attempts} attempts rejected; last: ${terminal.failure.violations.join("; ")}`
      };
    case "fatal":
      return { type: "failed", kind: "communication", detail: terminal.error.message };
    case "rejected":
      return { type: "failed", kind: terminal.error.kind, detail: terminal.error.message };
  }
}

// Build the wire envelope. `updatedInput` is always a copy of the request's
// tool_parameters ({} without a valid request); an oracle-supplied echo is
// never forwarded.
export function toEnvelope(
  outcome: DecisionOutcome,
  request?: DecisionRequest,
  logger?: DecisionLogger
): ResponseEnvelope {
  const updatedInput = request ? structuredClone(request.tool_parameters) : {};
  if (outcome.type === "failed") {
    return denyEnvelope(describeFailure(outcome.kind), updatedInput);
  }
  if (outcome.updatedInput && stableStringify(outcome.updatedInput) !== stableStringify(updatedInput)) {
    logger?.warn?.("[judge] oracle-supplied updatedInput differs from the request and was discarded");
  }
  return {
    hookSpecificOutput: {
      hookEventName: HOOK_EVENT_NAME,
      permissionDecision: outcome.permission,
      permissionDecisionReason: outcome.reason
    },
    updatedInput
  };
}

export function synthesize(
  terminal: TerminalState,
  request?: DecisionRequest,
  logger?: DecisionLogger
): ResponseEnvelope {
  return toEnvelope(toOutcome(terminal), request, logger);
}

export function denyEnvelope(reason: string, updatedInput: Record<string, unknown> = {}): ResponseEnvelope {
  return {
    hookSpecificOutput: {
      hookEventName: HOOK_EVENT_NAME,
      permissionDecision: "deny",
      permissionDecisionReason: reason
    },
    updatedInput
  };
}

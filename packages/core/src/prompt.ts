import { HOOK_EVENT_NAME, MAX_HISTORY_ENTRIES } from "./constants.js";
import { stableStringify } from "./stable-json.js";
import type { DecisionRequest } from "./schema.js";
import type { DecisionConfig, RoundFailure } from "./types.js";

const RESPONSE_FORMAT = `{"permissionDecision": "allow" | "deny" | "ask", "permissionDecisionReason": "<one or two sentences>"}`;

// System preamble: fixed judge instructions followed by the policy prompt.
export function buildSystemPrompt(config: DecisionConfig): string {
  return [
    `You are a ${HOOK_EVENT_NAME} permission judge for an autonomous coding agent.`,
    "You receive one tool call the agent wants to make, with the tail of its conversation.",
    "Decide whether the call may run (allow), must not run (deny), or needs the user's confirmation (ask).",
    "When the policy below does not clearly permit the call, prefer ask or deny.",
    "",
    "# Policy",
    config.prompt.trim(),
    "",
    "# Response format",
    "Reply with exactly one JSON object and nothing else:",
    RESPONSE_FORMAT,
    "Do not add keys. Do not include more than one JSON object."
  ].join("\n");
}

// First user turn: the request, serialized deterministically.
export function buildRequestTurn(request: DecisionRequest): string {
  const history = request.message_history.slice(-MAX_HISTORY_ENTRIES);
  const context: Record<string, unknown> = {
    tool_name: request.tool_name,
    tool_parameters: request.tool_parameters
  };
  if (request.cwd) {
    context.cwd = request.cwd;
  }
  if (request.permission_mode) {
    context.permission_mode = request.permission_mode;
  }
  const lines = [
    "# Tool call under review",
    stableStringify(context, 2)
  ];
  if (history.length > 0) {
    const omitted = request.message_history.length - history.length;
    lines.push(
      "",
      omitted > 0
        ? `# Recent conversation (last ${history.length} of ${request.message_history.length} entries)`
        : "# Recent conversation",
      stableStringify(history, 2)
    );
  }
  return lines.join("\n");
}

// Corrective turn: restates the concrete defects of the previous reply.
export function buildFeedbackTurn(failure: RoundFailure, attempt: number, maxAttempts: number): string {
  const heading =
    failure.kind === "response_parse"
      ? "Your previous reply could not be parsed as a single JSON object."
      : "Your previous reply did not match the required response schema.";
  return [
    `${heading} (attempt ${attempt} of ${maxAttempts})`,
    "Problems:",
    ...failure.violations.map((violation) => `- ${violation}`),
    "",
    "Reply again with exactly one JSON object of this form and nothing else:",
    RESPONSE_FORMAT
  ].join("\n");
}

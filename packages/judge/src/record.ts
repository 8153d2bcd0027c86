import {
  sha256Hex,
  type DecisionRequest,
  type ErrorKind,
  type PermissionDecision,
  type ResponseEnvelope,
  type TerminalState
} from "@pretool-judge/core";
import { previewParams, type RedactionMode, type RedactionReport } from "@pretool-judge/redaction";

export type DecisionRecord = {
  id: string;
  timestamp: string;
  sessionId?: string;
  toolName?: string;
  decision: PermissionDecision;
  reason: string;
  outcome: "decided" | ErrorKind;
  attempts?: number;
  paramsHash?: string;
  redaction?: RedactionReport;
  metadata: Record<string, unknown>;
};

export type DecisionRecordInput = {
  envelope: ResponseEnvelope;
  terminal: TerminalState;
  request?: DecisionRequest;
  redaction: RedactionMode;
  policySource?: string;
  includePreview?: boolean;
  now?: Date;
};

// One record per invocation. Parameters only appear redacted and hashed.
export function buildDecisionRecord(input: DecisionRecordInput): DecisionRecord {
  const { envelope, terminal, request } = input;
  const timestamp = (input.now ?? new Date()).toISOString();
  const output = envelope.hookSpecificOutput;
  const record: DecisionRecord = {
    id: sha256Hex(`${request?.session_id ?? ""}:${request?.tool_name ?? ""}:${timestamp}`).slice(0, 16),
    timestamp,
    decision: output.permissionDecision,
    reason: output.permissionDecisionReason,
    outcome: outcomeOf(terminal),
    metadata: {}
  };
  if (request) {
    record.sessionId = request.session_id;
    record.toolName = request.tool_name;
    const preview = previewParams(request.tool_parameters, { mode: input.redaction });
    record.paramsHash = preview.paramsHash;
    record.redaction = preview.report;
    if (input.includePreview) {
      record.metadata.paramsPreview = preview.preview;
    }
  }
  if (terminal.status !== "rejected") {
    record.attempts = terminal.attempts;
    record.metadata.oracleCalls = terminal.oracleCalls;
  }
  if (input.policySource) {
    record.metadata.policySource = input.policySource;
  }
  return record;
}

export function formatDecisionRecord(record: DecisionRecord): string {
  return `[judge] decision ${JSON.stringify(record)}`;
}

function outcomeOf(terminal: TerminalState): DecisionRecord["outcome"] {
  switch (terminal.status) {
    case "success":
      return "decided";
    case "exhausted":
      return terminal.failure.kind;
    case "fatal":
      return "communication";
    case "rejected":
      return terminal.error.kind;
  }
}

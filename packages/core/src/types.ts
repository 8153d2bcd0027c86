import type { CommunicationError, ErrorKind, JudgeError } from "./errors.js";
import type { PermissionDecision, ResponseEnvelope } from "./schema.js";

// Policy for one invocation, resolved before the pipeline starts.
export type DecisionConfig = {
  prompt: string;
  model?: string;
  allowedTools?: string[];
};

export type TurnRole = "system" | "user" | "assistant";

export type ConversationTurn = {
  role: TurnRole;
  content: string;
};

export type OracleReply = { ok: true; text: string } | { ok: false; error: string };

export type OracleSendOptions = {
  signal?: AbortSignal;
};

// External reasoning service. Every call carries the full turn history;
// the first turn is the system preamble.
export type DecisionOracle = {
  send: (turns: readonly ConversationTurn[], options?: OracleSendOptions) => Promise<OracleReply>;
};

export type DecisionLogger = {
  debug?: (message: string) => void;
  info?: (message: string) => void;
  warn?: (message: string) => void;
  error?: (message: string) => void;
};

// Content defects are the only retryable failures.
export type RoundFailure = {
  kind: "response_parse" | "response_validation";
  violations: string[];
};

export type ConversationState = {
  turns: ConversationTurn[];
  attempts: number;
  lastFailure?: RoundFailure;
};

export type TerminalState =
  | { status: "success"; response: ResponseEnvelope; attempts: number; oracleCalls: number }
  | { status: "exhausted"; failure: RoundFailure; attempts: number; oracleCalls: number }
  | { status: "fatal"; error: CommunicationError; attempts: number; oracleCalls: number }
  | { status: "rejected"; error: JudgeError };

export type DecisionOutcome =
  | {
      type: "decided";
      permission: PermissionDecision;
      reason: string;
      updatedInput?: Record<string, unknown>;
    }
  | {
      type: "failed";
      kind: ErrorKind;
      detail: string;
    };

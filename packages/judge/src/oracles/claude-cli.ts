import {
  isPlainObject,
  type ConversationTurn,
  type DecisionOracle,
  type OracleReply
} from "@pretool-judge/core";
import { runProcess, type ProcessResult, type ProcessRunner } from "./process.js";

export type ClaudeCliOracleOptions = {
  command?: string;
  model?: string;
  allowedTools?: string[];
  run?: ProcessRunner;
};

export const DEFAULT_CLAUDE_COMMAND = "claude";
const TOOL_TURN_LIMIT = 8;
const STDERR_TAIL = 400;

// Drives the local `claude` binary in print mode, one process per call.
export function createClaudeCliOracle(options: ClaudeCliOracleOptions = {}): DecisionOracle {
  const command = options.command ?? DEFAULT_CLAUDE_COMMAND;
  const run = options.run ?? runProcess;
  return {
    async send(turns, sendOptions) {
      const { system, prompt } = renderTranscript(turns);
      const args = buildClaudeArgs(options, system);
      let result: ProcessResult;
      try {
        result = await run(command, args, prompt, sendOptions?.signal);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        return { ok: false, error: `could not run ${command}: ${message}` };
      }
      if (result.code !== 0) {
        const detail = result.stderr.trim().slice(-STDERR_TAIL);
        return {
          ok: false,
          error: `${command} exited with code ${String(result.code)}${detail ? `: ${detail}` : ""}`
        };
      }
      return parseClaudeOutput(result.stdout);
    }
  };
}

export function buildClaudeArgs(options: ClaudeCliOracleOptions, systemPrompt: string): string[] {
  const args = ["-p", "--output-format", "json", "--system-prompt", systemPrompt];
  if (options.model) {
    args.push("--model", options.model);
  }
  const tools = options.allowedTools ?? [];
  if (tools.length > 0) {
    args.push("--allowedTools", tools.join(","), "--max-turns", String(TOOL_TURN_LIMIT));
  } else {
    args.push("--max-turns", "1");
  }
  return args;
}

// Print mode takes a single prompt, so later turns are folded into one
// labelled transcript that ends on the newest user message.
export function renderTranscript(turns: readonly ConversationTurn[]): { system: string; prompt: string } {
  const system = turns
    .filter((turn) => turn.role === "system")
    .map((turn) => turn.content)
    .join("\n\n");
  const dialogue = turns.filter((turn) => turn.role !== "system");
  if (dialogue.length === 1 && dialogue[0]) {
    return { system, prompt: dialogue[0].content };
  }
  const blocks = dialogue.map((turn) => `[${turn.role}]\n${turn.content}`);
  return {
    system,
    prompt: ["Conversation so far. Answer the last [user] message.", "", blocks.join("\n\n")].join("\n")
  };
}

export function parseClaudeOutput(stdout: string): OracleReply {
  let data: unknown;
  try {
    data = JSON.parse(stdout);
  } catch {
    return { ok: false, error: "claude output is not JSON" };
  }
  if (!isPlainObject(data)) {
    return { ok: false, error: "claude output is not a JSON object" };
  }
  if (data.is_error === true) {
    const subtype = typeof data.subtype === "string" ? data.subtype : "unknown";
    return { ok: false, error: `claude reported an error (${subtype})` };
  }
  if (typeof data.result !== "string") {
    return { ok: false, error: "claude output has no result text" };
  }
  return { ok: true, text: data.result };
}

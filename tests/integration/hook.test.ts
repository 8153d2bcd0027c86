import { describe, expect, it } from "vitest";
import {
  ConfigurationError,
  type DecisionConfig,
  type DecisionOracle,
  type OracleReply
} from "../../packages/core/src/index.js";
import { judgeHookInput, type JudgeHookOptions } from "../../packages/judge/src/hook.js";
import type { DecisionRecord } from "../../packages/judge/src/record.js";

const ALLOW = '{"permissionDecision": "allow", "permissionDecisionReason": "read-only"}';
const RECORD_PREFIX = "[judge] decision ";

function hookInput(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    session_id: "session-1",
    hook_event_name: "PreToolUse",
    tool_name: "Bash",
    tool_parameters: { command: "SELECT * FROM t" },
    message_history: [],
    ...overrides
  });
}

type Harness = {
  options: JudgeHookOptions;
  oracleCalls: () => number;
  configs: DecisionConfig[];
  lines: { info: string[]; warn: string[]; error: string[] };
  record: () => DecisionRecord | undefined;
};

function harness(replies: OracleReply[], overrides: Partial<JudgeHookOptions> = {}): Harness {
  let calls = 0;
  const configs: DecisionConfig[] = [];
  const lines = { info: [] as string[], warn: [] as string[], error: [] as string[] };
  const oracle: DecisionOracle = {
    send: async () => {
      calls += 1;
      return replies[Math.min(calls, replies.length) - 1] ?? { ok: false, error: "no scripted reply" };
    }
  };
  const options: JudgeHookOptions = {
    selector: { kind: "builtin", name: "validate_bq_query" },
    createOracle: (config) => {
      configs.push(config);
      return oracle;
    },
    logger: {
      info: (line) => lines.info.push(line),
      warn: (line) => lines.warn.push(line),
      error: (line) => lines.error.push(line)
    },
    now: () => new Date("2026-01-02T03:04:05.000Z"),
    ...overrides
  };
  return {
    options,
    oracleCalls: () => calls,
    configs,
    lines,
    record: () => {
      const line = lines.info.find((entry) => entry.startsWith(RECORD_PREFIX));
      return line ? (JSON.parse(line.slice(RECORD_PREFIX.length)) as DecisionRecord) : undefined;
    }
  };
}

describe("judgeHookInput", () => {
  it("allows a read-only query after one oracle call", async () => {
    const h = harness([{ ok: true, text: ALLOW }]);
    const envelope = await judgeHookInput(hookInput(), h.options);
    expect(envelope).toEqual({
      hookSpecificOutput: {
        hookEventName: "PreToolUse",
        permissionDecision: "allow",
        permissionDecisionReason: "read-only"
      },
      updatedInput: { command: "SELECT * FROM t" }
    });
    expect(h.oracleCalls()).toBe(1);
    expect(h.configs[0]?.allowedTools).toEqual(["Read", "Grep"]);
    expect(h.record()).toMatchObject({
      timestamp: "2026-01-02T03:04:05.000Z",
      sessionId: "session-1",
      toolName: "Bash",
      decision: "allow",
      reason: "read-only",
      outcome: "decided",
      attempts: 0,
      metadata: { oracleCalls: 1, policySource: "builtin:validate_bq_query" }
    });
    expect(h.record()?.paramsHash).toHaveLength(16);
    expect(h.lines.error).toEqual([]);
  });

  it("denies a request without tool_name and never asks the oracle", async () => {
    const h = harness([{ ok: true, text: ALLOW }]);
    const raw = JSON.parse(hookInput()) as Record<string, unknown>;
    delete raw.tool_name;
    const envelope = await judgeHookInput(JSON.stringify(raw), h.options);
    expect(envelope).toEqual({
      hookSpecificOutput: {
        hookEventName: "PreToolUse",
        permissionDecision: "deny",
        permissionDecisionReason:
          "Denied for safety: the tool request did not match the expected PreToolUse input format."
      },
      updatedInput: {}
    });
    expect(h.oracleCalls()).toBe(0);
    expect(h.configs).toEqual([]);
    expect(h.lines.error).toEqual([
      "[judge] RequestValidationError: Request failed validation: tool_name: missing required key (expected string)"
    ]);
    expect(h.record()).toMatchObject({ outcome: "request_validation", decision: "deny" });
    expect(h.record()?.attempts).toBeUndefined();
  });

  it("denies input that is not JSON", async () => {
    const h = harness([{ ok: true, text: ALLOW }]);
    const envelope = await judgeHookInput("not json", h.options);
    expect(envelope.hookSpecificOutput.permissionDecision).toBe("deny");
    expect(envelope.updatedInput).toEqual({});
    expect(h.lines.error[0]?.startsWith(
      "[judge] RequestValidationError: Request failed validation: (root): input is not valid JSON ("
    )).toBe(true);
  });

  it("denies when the policy cannot be loaded", async () => {
    const h = harness([{ ok: true, text: ALLOW }], { selector: { kind: "builtin", name: "no_such_policy" } });
    const envelope = await judgeHookInput(hookInput(), h.options);
    expect(envelope).toEqual({
      hookSpecificOutput: {
        hookEventName: "PreToolUse",
        permissionDecision: "deny",
        permissionDecisionReason: "Denied for safety: the judge policy configuration could not be loaded."
      },
      updatedInput: { command: "SELECT * FROM t" }
    });
    expect(h.oracleCalls()).toBe(0);
    expect(h.lines.error).toEqual(["[judge] ConfigurationError: Builtin policy 'no_such_policy' not found"]);
  });

  it("denies when the oracle cannot be created", async () => {
    const h = harness([], {
      createOracle: () => {
        throw new ConfigurationError("The chat oracle needs PRETOOL_JUDGE_API_KEY or OPENAI_API_KEY");
      }
    });
    const envelope = await judgeHookInput(hookInput(), h.options);
    expect(envelope.hookSpecificOutput.permissionDecisionReason).toBe(
      "Denied for safety: the judge policy configuration could not be loaded."
    );
  });

  it("denies on an unexpected failure", async () => {
    const h = harness([], {
      createOracle: () => {
        throw new TypeError("boom");
      }
    });
    const envelope = await judgeHookInput(hookInput(), h.options);
    expect(envelope.hookSpecificOutput.permissionDecisionReason).toBe(
      "Denied for safety: the judge failed unexpectedly."
    );
    expect(h.lines.error).toEqual(["[judge] JudgeError: Unexpected failure: boom"]);
  });

  it("denies after one call when the oracle is unreachable", async () => {
    const h = harness([{ ok: false, error: "connection refused" }]);
    const envelope = await judgeHookInput(hookInput(), h.options);
    expect(envelope.hookSpecificOutput.permissionDecisionReason).toBe(
      "Denied for safety: the decision oracle was unavailable or returned no response."
    );
    expect(h.oracleCalls()).toBe(1);
    expect(h.lines.error).toEqual(["[judge] CommunicationError: Oracle call failed: connection refused"]);
    expect(h.record()).toMatchObject({ outcome: "communication", attempts: 0, metadata: { oracleCalls: 1 } });
  });

  it("denies after three unusable replies", async () => {
    const h = harness([{ ok: true, text: "I would allow this." }]);
    const envelope = await judgeHookInput(hookInput(), h.options);
    expect(envelope.hookSpecificOutput.permissionDecisionReason).toBe(
      "Denied for safety: the decision oracle did not return a parseable decision after 3 attempts."
    );
    expect(h.oracleCalls()).toBe(3);
    expect(h.lines.warn).toHaveLength(1);
    expect(h.lines.warn[0]?.startsWith("[judge] response_parse after 3 attempts: No JSON object was found")).toBe(
      true
    );
  });

  it("accepts a corrected reply on the second call", async () => {
    const h = harness([
      { ok: true, text: '{"permissionDecision": "allow"}' },
      { ok: true, text: ALLOW }
    ]);
    const envelope = await judgeHookInput(hookInput(), h.options);
    expect(envelope.hookSpecificOutput.permissionDecision).toBe("allow");
    expect(h.oracleCalls()).toBe(2);
    expect(h.record()).toMatchObject({ outcome: "decided", attempts: 1 });
  });

  it("logs only a redacted preview at debug level", async () => {
    const h = harness([{ ok: true, text: ALLOW }], { logLevel: "debug" });
    await judgeHookInput(
      hookInput({ tool_parameters: { command: "curl -H 'Authorization: Bearer test-secret-token' http://x" } }),
      h.options
    );
    const record = h.record();
    expect(record?.redaction?.redacted).toBe(true);
    expect(record?.redaction?.matches.map((match) => match.type)).toEqual(["auth"]);
    expect(String(record?.metadata.paramsPreview)).toContain("Authorization: Bearer [REDACTED:auth:");
    expect(h.lines.info.some((line) => line.includes("test-secret-token"))).toBe(false);
  });

  it("omits the preview at the safe level", async () => {
    const h = harness([{ ok: true, text: ALLOW }]);
    await judgeHookInput(hookInput(), h.options);
    expect(h.record()?.metadata.paramsPreview).toBeUndefined();
  });
});

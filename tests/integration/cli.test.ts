import { describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { runCli, type JudgeCliOptions } from "../../packages/judge/src/cli.js";
import type { ProcessRunner } from "../../packages/judge/src/oracles/index.js";

const REQUEST = JSON.stringify({
  session_id: "session-1",
  hook_event_name: "PreToolUse",
  tool_name: "Bash",
  tool_parameters: { command: "bq ls analytics" },
  message_history: []
});

const CLAUDE_ALLOW = JSON.stringify({
  type: "result",
  is_error: false,
  result: '{"permissionDecision": "allow", "permissionDecisionReason": "metadata only"}'
});

type Captured = {
  stdout: string[];
  exitCodes: number[];
  info: string[];
  warn: string[];
  error: string[];
  runs: Array<{ command: string; args: string[] }>;
};

function setup(
  input: string | Error = REQUEST,
  env: Record<string, string | undefined> = {}
): { options: JudgeCliOptions; captured: Captured } {
  const captured: Captured = { stdout: [], exitCodes: [], info: [], warn: [], error: [], runs: [] };
  const runProcess: ProcessRunner = async (command, args) => {
    captured.runs.push({ command, args });
    return { code: 0, stdout: CLAUDE_ALLOW, stderr: "" };
  };
  const options: JudgeCliOptions = {
    io: {
      readInput: async () => {
        if (input instanceof Error) {
          throw input;
        }
        return input;
      },
      writeOutput: (text) => captured.stdout.push(text),
      setExitCode: (code) => captured.exitCodes.push(code),
      env
    },
    logger: {
      info: (line) => captured.info.push(line),
      warn: (line) => captured.warn.push(line),
      error: (line) => captured.error.push(line)
    },
    runProcess
  };
  return { options, captured };
}

function denyOutput(reason: string, updatedInput: Record<string, unknown>): string {
  const envelope = {
    hookSpecificOutput: { hookEventName: "PreToolUse", permissionDecision: "deny", permissionDecisionReason: reason },
    updatedInput
  };
  return `${JSON.stringify(envelope, null, 2)}\n`;
}

describe("pretool-judge run", () => {
  it("judges stdin with the default command and oracle", async () => {
    const { options, captured } = setup();
    await runCli([], options);
    expect(captured.stdout).toEqual([
      `${JSON.stringify(
        {
          hookSpecificOutput: {
            hookEventName: "PreToolUse",
            permissionDecision: "allow",
            permissionDecisionReason: "metadata only"
          },
          updatedInput: { command: "bq ls analytics" }
        },
        null,
        2
      )}\n`
    ]);
    expect(captured.exitCodes).toEqual([]);
    expect(captured.runs).toHaveLength(1);
    expect(captured.runs[0]?.command).toBe("claude");
    expect(captured.runs[0]?.args).toContain("Read,Grep");
  });

  it("uses the configured claude binary", async () => {
    const { options, captured } = setup(REQUEST, { PRETOOL_JUDGE_CLAUDE_BIN: "/usr/local/bin/claude" });
    await runCli(["run", "--policy", "guard_shell"], options);
    expect(captured.runs[0]?.command).toBe("/usr/local/bin/claude");
    expect(captured.runs[0]?.args).not.toContain("--allowedTools");
  });

  it("denies when the policy is unknown", async () => {
    const { options, captured } = setup();
    await runCli(["--policy", "no_such_policy"], options);
    expect(captured.stdout).toEqual([
      denyOutput("Denied for safety: the judge policy configuration could not be loaded.", {
        command: "bq ls analytics"
      })
    ]);
    expect(captured.runs).toEqual([]);
    expect(captured.exitCodes).toEqual([]);
  });

  it("denies when the chat oracle has no key", async () => {
    const { options, captured } = setup();
    await runCli(["--oracle", "chat"], options);
    expect(captured.stdout).toEqual([
      denyOutput("Denied for safety: the judge policy configuration could not be loaded.", {
        command: "bq ls analytics"
      })
    ]);
  });

  it("denies on an unknown flag instead of failing", async () => {
    const { options, captured } = setup();
    await runCli(["--bogus"], options);
    expect(captured.stdout).toEqual([
      denyOutput("Denied for safety: the judge policy configuration could not be loaded.", {})
    ]);
    expect(captured.exitCodes).toEqual([]);
  });

  it("treats a subcommand name given as an option value as a hook call", async () => {
    const { options, captured } = setup();
    await runCli(["--policy", "validate", "--bogus"], options);
    expect(captured.stdout).toEqual([
      denyOutput("Denied for safety: the judge policy configuration could not be loaded.", {})
    ]);
    expect(captured.exitCodes).toEqual([]);
    expect(captured.runs).toEqual([]);
  });

  it("denies when stdin cannot be read", async () => {
    const { options, captured } = setup(new Error("stream closed"));
    await runCli(["run"], options);
    expect(captured.stdout).toEqual([
      denyOutput("Denied for safety: the tool request did not match the expected PreToolUse input format.", {})
    ]);
    expect(captured.error[0]).toBe("[judge] could not read stdin: stream closed");
  });

  it("reports settings that fell back to defaults", async () => {
    const { options, captured } = setup();
    await runCli(["--log", "loud"], options);
    expect(captured.warn).toEqual(["[judge] Unknown log level 'loud'; using 'safe'"]);
  });
});

describe("pretool-judge validate", () => {
  it("describes a valid built-in policy", async () => {
    const { options, captured } = setup();
    await runCli(["validate", "--policy", "validate_bq_query"], options);
    expect(captured.info).toEqual([
      "Policy source: builtin:validate_bq_query",
      "Model: (oracle default)",
      "Allowed tools: Read, Grep"
    ]);
    expect(captured.exitCodes).toEqual([]);
    expect(captured.stdout).toEqual([]);
  });

  it("describes a policy file", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "judge-cli-"));
    const filePath = path.join(dir, "policy.yaml");
    fs.writeFileSync(filePath, "prompt: Deny everything.\nmodel: judge-model\n", "utf8");
    const { options, captured } = setup();
    await runCli(["validate", "--config", filePath], options);
    expect(captured.info).toEqual([
      `Policy source: ${path.resolve(filePath)}`,
      "Model: judge-model",
      "Allowed tools: (none)"
    ]);
  });

  it("exits with 1 for a broken policy", async () => {
    const { options, captured } = setup();
    await runCli(["validate", "--policy", "no_such_policy"], options);
    expect(captured.error).toEqual(["Builtin policy 'no_such_policy' not found"]);
    expect(captured.exitCodes).toEqual([1]);
  });
});

describe("pretool-judge policies", () => {
  it("lists the built-in policies", async () => {
    const { options, captured } = setup();
    await runCli(["policies"], options);
    expect(captured.stdout).toEqual(["guard_shell\nvalidate_bq_query\n"]);
  });
});

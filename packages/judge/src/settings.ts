import { DEFAULT_DECISION_TIMEOUT_MS, MAX_DECISION_TIMEOUT_MS } from "@pretool-judge/core";
import type { RedactionMode } from "@pretool-judge/redaction";
import { DEFAULT_POLICY_NAME, type ConfigSelector } from "./config.js";
import { isLogLevel, type LogLevel } from "./logger.js";

export type OracleKind = "claude-cli" | "chat";

export type JudgeEnvironment = Record<string, string | undefined>;

export type JudgeFlags = {
  config?: unknown;
  policy?: unknown;
  oracle?: unknown;
  timeout?: unknown;
  log?: unknown;
  redaction?: unknown;
};

export type JudgeSettings = {
  selector: ConfigSelector;
  oracle: OracleKind;
  timeoutMs: number;
  logLevel: LogLevel;
  redaction: RedactionMode;
  warnings: string[];
};

export const ENV_POLICY = "PRETOOL_JUDGE_POLICY";
export const ENV_ORACLE = "PRETOOL_JUDGE_ORACLE";
export const ENV_TIMEOUT = "PRETOOL_JUDGE_TIMEOUT_MS";
export const ENV_LOG = "PRETOOL_JUDGE_LOG";
export const ENV_REDACTION = "PRETOOL_JUDGE_REDACTION";

// Flags win over the environment; a bad value falls back to the default
// and leaves a warning instead of failing the invocation.
export function resolveJudgeSettings(flags: JudgeFlags, env: JudgeEnvironment = process.env): JudgeSettings {
  const warnings: string[] = [];

  const configPath = nonEmpty(flags.config);
  const policy = nonEmpty(flags.policy) ?? nonEmpty(env[ENV_POLICY]) ?? DEFAULT_POLICY_NAME;
  if (configPath && nonEmpty(flags.policy)) {
    warnings.push(`--config overrides --policy; ignoring policy '${policy}'`);
  }
  const selector: ConfigSelector = configPath
    ? { kind: "file", path: configPath }
    : { kind: "builtin", name: policy };

  const oracle = pick(
    "oracle",
    flags.oracle ?? env[ENV_ORACLE],
    (value): value is OracleKind => value === "claude-cli" || value === "chat",
    "claude-cli",
    warnings
  );
  const logLevel = pick("log level", flags.log ?? env[ENV_LOG], isLogLevel, "safe", warnings);
  const redaction = pick(
    "redaction mode",
    flags.redaction ?? env[ENV_REDACTION],
    (value): value is RedactionMode => value === "standard" || value === "strict" || value === "off",
    "standard",
    warnings
  );

  let timeoutMs = DEFAULT_DECISION_TIMEOUT_MS;
  const rawTimeout = flags.timeout ?? env[ENV_TIMEOUT];
  if (typeof rawTimeout !== "undefined") {
    const parsed = parseTimeout(rawTimeout);
    if (typeof parsed === "number") {
      timeoutMs = parsed;
    } else {
      warnings.push(`Invalid timeout '${String(rawTimeout)}'; using ${DEFAULT_DECISION_TIMEOUT_MS} ms`);
    }
  }

  return { selector, oracle, timeoutMs, logLevel, redaction, warnings };
}

function pick<T extends string>(
  label: string,
  value: unknown,
  accept: (value: unknown) => value is T,
  fallback: T,
  warnings: string[]
): T {
  if (typeof value === "undefined" || value === "") {
    return fallback;
  }
  if (accept(value)) {
    return value;
  }
  warnings.push(`Unknown ${label} '${String(value)}'; using '${fallback}'`);
  return fallback;
}

function parseTimeout(value: unknown): number | undefined {
  const parsed =
    typeof value === "number"
      ? value
      : typeof value === "string" && /^\d+$/.test(value.trim())
        ? Number.parseInt(value, 10)
        : Number.NaN;
  if (Number.isInteger(parsed) && parsed > 0 && parsed <= MAX_DECISION_TIMEOUT_MS) {
    return parsed;
  }
  return undefined;
}

function nonEmpty(value: unknown): string | undefined {
  return typeof value === "string" && value.trim().length > 0 ? value : undefined;
}

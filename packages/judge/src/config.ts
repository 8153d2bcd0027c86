import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigurationError, describeIssue, type DecisionConfig } from "@pretool-judge/core";

export type ConfigSelector = { kind: "builtin"; name: string } | { kind: "file"; path: string };

export type LoadedConfig = {
  config: DecisionConfig;
  source: string;
};

export type ResolveConfigOptions = {
  presetDir?: string;
};

export const DEFAULT_POLICY_NAME = "validate_bq_query";

const DEFAULT_PRESET_DIR = fileURLToPath(new URL("../presets/", import.meta.url));
const POLICY_NAME_RE = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

// On-disk policy shape. Closed, like the wire schemas.
const PolicyFileSchema = z
  .object({
    prompt: z.string().refine((value) => value.trim().length > 0, "prompt must not be empty"),
    model: z.string().regex(/^\S+$/, "model must be a single model name").optional(),
    allowed_tools: z.array(z.string().min(1)).optional()
  })
  .strict();

// Pure selector -> config lookup; nothing is cached between calls.
export function resolveConfig(selector: ConfigSelector, options: ResolveConfigOptions = {}): LoadedConfig {
  if (selector.kind === "builtin") {
    return loadBuiltinConfig(selector.name, options.presetDir);
  }
  return loadConfigFile(selector.path);
}

export function loadBuiltinConfig(name: string, presetDir: string = DEFAULT_PRESET_DIR): LoadedConfig {
  const source = `builtin:${name}`;
  if (!POLICY_NAME_RE.test(name)) {
    throw new ConfigurationError(`Builtin policy '${name}' is not a valid policy name`, { source });
  }
  const filePath = path.join(presetDir, `${name}.yaml`);
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(`Builtin policy '${name}' not found`, { source });
  }
  const label = `builtin policy '${name}'`;
  return { config: parsePolicyText(readPolicyFile(filePath, label), label), source };
}

export function loadConfigFile(filePath: string): LoadedConfig {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    throw new ConfigurationError(`Config file '${filePath}' not found`, { source: resolved });
  }
  const label = `config file '${filePath}'`;
  return { config: parsePolicyText(readPolicyFile(resolved, label), label), source: resolved };
}

export function listBuiltinPolicies(presetDir: string = DEFAULT_PRESET_DIR): string[] {
  if (!fs.existsSync(presetDir)) {
    return [];
  }
  return fs
    .readdirSync(presetDir)
    .filter((entry) => entry.endsWith(".yaml"))
    .map((entry) => entry.slice(0, -".yaml".length))
    .sort();
}

export function parsePolicyText(raw: string, label: string): DecisionConfig {
  let data: unknown;
  try {
    data = parseYaml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Failed to parse ${label}: ${message}`, { source: label, cause: err });
  }
  if (data === null || typeof data === "undefined") {
    throw new ConfigurationError(`${capitalize(label)} is empty`, { source: label });
  }
  const result = PolicyFileSchema.safeParse(data);
  if (!result.success) {
    const violations = result.error.issues.map(describeIssue).join("; ");
    throw new ConfigurationError(`Validation failed for ${label}: ${violations}`, { source: label });
  }
  const config: DecisionConfig = { prompt: result.data.prompt };
  if (result.data.model) {
    config.model = result.data.model;
  }
  if (result.data.allowed_tools) {
    config.allowedTools = Array.from(new Set(result.data.allowed_tools));
  }
  return config;
}

function readPolicyFile(filePath: string, label: string): string {
  try {
    return fs.readFileSync(filePath, "utf8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Failed to read ${label}: ${message}`, { source: label, cause: err });
  }
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

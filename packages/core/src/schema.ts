import { z } from "zod";
import { HOOK_EVENT_NAME, PERMISSION_DECISIONS, PERMISSION_MODES } from "./constants.js";

// PreToolUse hook input. Closed: unknown top-level keys are violations.
export const DecisionRequestSchema = z
  .object({
    session_id: z.string(),
    hook_event_name: z.literal(HOOK_EVENT_NAME),
    tool_name: z.string(),
    tool_parameters: z.record(z.unknown()),
    message_history: z.array(z.unknown()),
    transcript_path: z.string().optional(),
    cwd: z.string().optional(),
    permission_mode: z.enum(PERMISSION_MODES).optional()
  })
  .strict();

export const HookSpecificOutputSchema = z
  .object({
    hookEventName: z.literal(HOOK_EVENT_NAME),
    permissionDecision: z.enum(PERMISSION_DECISIONS),
    permissionDecisionReason: z.string()
  })
  .strict();

// PreToolUse hook output. `updatedInput` is optional for oracle candidates;
// the synthesizer always fills it on the way out.
export const ResponseEnvelopeSchema = z
  .object({
    hookSpecificOutput: HookSpecificOutputSchema,
    updatedInput: z.record(z.unknown()).optional()
  })
  .strict();

export type DecisionRequest = z.infer<typeof DecisionRequestSchema>;
export type HookSpecificOutput = z.infer<typeof HookSpecificOutputSchema>;
export type ResponseEnvelope = z.infer<typeof ResponseEnvelopeSchema>;
export type PermissionDecision = (typeof PERMISSION_DECISIONS)[number];

export type SchemaShape = "request" | "response";

export type ValidationOutcome<T> = { ok: true; value: T } | { ok: false; violations: string[] };

// Validate an already-parsed document against one of the two fixed schemas.
export function validate(shape: "request", value: unknown): ValidationOutcome<DecisionRequest>;
export function validate(shape: "response", value: unknown): ValidationOutcome<ResponseEnvelope>;
export function validate(
  shape: SchemaShape,
  value: unknown
): ValidationOutcome<DecisionRequest> | ValidationOutcome<ResponseEnvelope> {
  if (shape === "request") {
    return runSchema(DecisionRequestSchema, value);
  }
  return runSchema(ResponseEnvelopeSchema, value);
}

function runSchema<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): ValidationOutcome<T> {
  const result = schema.safeParse(value);
  if (result.success) {
    return { ok: true, value: result.data };
  }
  return { ok: false, violations: result.error.issues.map(describeIssue) };
}

export function formatIssuePath(path: ReadonlyArray<string | number>): string {
  if (path.length === 0) {
    return "(root)";
  }
  return path
    .map((segment, index) => {
      if (typeof segment === "number") {
        return `[${segment}]`;
      }
      return index === 0 ? segment : `.${segment}`;
    })
    .join("");
}

// One line per violation: "<path>: <constraint>".
export function describeIssue(issue: z.ZodIssue): string {
  const where = formatIssuePath(issue.path);
  switch (issue.code) {
    case "invalid_type":
      if (issue.received === "undefined") {
        return `${where}: missing required key (expected ${issue.expected})`;
      }
      return `${where}: expected ${issue.expected}, received ${issue.received}`;
    case "invalid_literal":
      if (typeof issue.received === "undefined") {
        return `${where}: missing required key (expected ${JSON.stringify(issue.expected)})`;
      }
      return `${where}: expected ${JSON.stringify(issue.expected)}, received ${JSON.stringify(issue.received)}`;
    case "invalid_enum_value":
      return `${where}: expected one of ${issue.options.map((option) => JSON.stringify(option)).join(", ")}, received ${JSON.stringify(issue.received)}`;
    case "unrecognized_keys":
      return `${where}: unexpected key(s) ${issue.keys.map((key) => JSON.stringify(key)).join(", ")}`;
    default:
      return `${where}: ${issue.message}`;
  }
}

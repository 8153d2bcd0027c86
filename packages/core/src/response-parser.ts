import { ResponseParseError } from "./errors.js";
import { isPlainObject } from "./stable-json.js";

export type ParseResult =
  | { ok: true; candidate: Record<string, unknown> }
  | { ok: false; error: ResponseParseError };

type Candidate =
  | { valid: true; value: Record<string, unknown> }
  | { valid: false; problem: string };

// Fences sit on their own lines; backticks inside a JSON string never match.
const FENCE_RE = /^[ \t]*```[A-Za-z0-9_+-]*[ \t]*\n([\s\S]*?)\n[ \t]*```[ \t]*$/gm;

// Locate the single decision object in free oracle text. Prose around it is
// tolerated; zero, several or malformed candidates are not.
export function extractDecisionObject(text: string): ParseResult {
  const candidates: Candidate[] = [];

  const unfenced = text.replace(FENCE_RE, (_match, body: string) => {
    const trimmed = body.trim();
    if (trimmed.startsWith("{")) {
      candidates.push(parseCandidate(trimmed));
    }
    return " ";
  });
  candidates.push(...scanBraceSpans(unfenced));

  if (candidates.length === 0) {
    return fail(
      "No JSON object was found in your reply. Reply with exactly one JSON object containing permissionDecision and permissionDecisionReason."
    );
  }
  if (candidates.length > 1) {
    return fail(
      `Your reply contains ${candidates.length} JSON objects. It must contain exactly one decision object and nothing that looks like a second one.`
    );
  }
  const only = candidates[0];
  if (!only.valid) {
    return fail(`Your reply contains a JSON object that could not be parsed (${only.problem}). Return syntactically valid JSON.`);
  }
  return { ok: true, candidate: only.value };
}

function fail(message: string): ParseResult {
  return { ok: false, error: new ResponseParseError(message) };
}

function parseCandidate(source: string): Candidate {
  let parsed: unknown;
  try {
    parsed = JSON.parse(source);
  } catch (err) {
    return { valid: false, problem: err instanceof Error ? err.message : String(err) };
  }
  if (!isPlainObject(parsed)) {
    return { valid: false, problem: "the value is not a JSON object" };
  }
  return { valid: true, value: parsed };
}

// Top-level balanced {...} spans, string-aware. Spans without a ':' (for
// example "{HOME}" in prose) and empty objects are not treated as JSON attempts.
function scanBraceSpans(text: string): Candidate[] {
  const found: Candidate[] = [];
  let index = 0;
  while (index < text.length) {
    const start = text.indexOf("{", index);
    if (start < 0) {
      break;
    }
    const end = findClosingBrace(text, start);
    if (end < 0) {
      const rest = text.slice(start);
      if (rest.includes(":")) {
        found.push({ valid: false, problem: `the object starting at character ${start} is never closed` });
      }
      break;
    }
    const span = text.slice(start, end + 1);
    if (span.includes(":")) {
      found.push(parseCandidate(span));
    }
    index = end + 1;
  }
  return found;
}

function findClosingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i += 1) {
    const char = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === "\"") {
        inString = false;
      }
      continue;
    }
    if (char === "\"") {
      inString = true;
    } else if (char === "{") {
      depth += 1;
    } else if (char === "}") {
      depth -= 1;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

import { sha256Hex } from "@pretool-judge/core";
import type { RedactionMatch, RedactionOptions, RedactionReport } from "./types.js";

export type RedactionResult = {
  redacted: string;
  report: RedactionReport;
};

const PRIVATE_KEY_RE = /-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g;
const EMAIL_RE = /\b[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}\b/gi;
const AUTH_HEADER_RE = /\bAuthorization:\s*(?:Bearer|Basic|Token)?\s*([A-Za-z0-9._~+\-=/]+)/gi;
const URL_CREDENTIALS_RE = /\b([a-z][a-z0-9+.-]*:\/\/)([^\s:@/]+):([^\s@/]+)@/gi;
const ANTHROPIC_KEY_RE = /\bsk-ant-[A-Za-z0-9_-]{20,}/g;
const OPENAI_KEY_RE = /\bsk-(?:proj-)?[A-Za-z0-9]{20,}\b/g;
const AWS_KEY_RE = /\bAKIA[0-9A-Z]{16}\b/g;
const GITHUB_TOKEN_RE = /\b(?:gh[pousr]_[A-Za-z0-9]{36,}|github_pat_[A-Za-z0-9_]{22,})\b/g;
const SLACK_TOKEN_RE = /\bxox[baprs]-[A-Za-z0-9-]{10,48}\b/g;
const STRIPE_KEY_RE = /\b[rs]k_live_[0-9a-zA-Z]{24,}\b/g;
const GENERIC_SECRET_RE = /\b(?:api[_-]?key|access[_-]?token|token|secret|password|passwd)\s*[:=]\s*["']?([A-Za-z0-9_\-./+]{8,})/gi;
const STRICT_TOKEN_RE = /\b(?=[A-Za-z0-9._~-]{24,})(?=[A-Za-z0-9._~-]*[A-Za-z])(?=[A-Za-z0-9._~-]*\d)[A-Za-z0-9._~-]+\b/g;
const STRICT_HEX_RE = /\b[a-fA-F0-9]{32,}\b/g;

export function emptyReport(): RedactionReport {
  return { redacted: false, matches: [] };
}

function placeholder(type: string, value: string): string {
  return `[REDACTED:${type}:${sha256Hex(value).slice(0, 8)}]`;
}

function recordMatch(report: RedactionReport, type: string, value: string): void {
  const hash = sha256Hex(value).slice(0, 12);
  const existing = report.matches.find((match) => match.type === type);
  if (existing) {
    existing.count += 1;
    existing.hashes.push(hash);
  } else {
    report.matches.push({ type, count: 1, hashes: [hash] } satisfies RedactionMatch);
  }
  report.redacted = true;
}

function redactByPattern(input: string, report: RedactionReport, type: string, pattern: RegExp): string {
  return input.replace(pattern, (match: string) => {
    recordMatch(report, type, match);
    return placeholder(type, match);
  });
}

// Replace only the captured secret, keeping the surrounding key or scheme.
function redactCapture(input: string, report: RedactionReport, type: string, pattern: RegExp, group: number): string {
  return input.replace(pattern, (...args: unknown[]) => {
    const match = String(args[0]);
    const secret = args[group];
    if (typeof secret !== "string" || secret.length === 0) {
      return match;
    }
    recordMatch(report, type, secret);
    return match.replace(secret, placeholder(type, secret));
  });
}

// Redact credentials and personal data from a string while producing a report.
export function redactString(input: string, options: RedactionOptions = {}): RedactionResult {
  const mode = options.mode ?? "standard";
  if (mode === "off") {
    return { redacted: input, report: emptyReport() };
  }
  const report = emptyReport();
  let output = input;

  output = redactByPattern(output, report, "private_key", PRIVATE_KEY_RE);
  output = redactCapture(output, report, "url_credentials", URL_CREDENTIALS_RE, 3);
  output = redactByPattern(output, report, "email", EMAIL_RE);
  output = redactCapture(output, report, "auth", AUTH_HEADER_RE, 1);
  output = redactByPattern(output, report, "anthropic_key", ANTHROPIC_KEY_RE);
  output = redactByPattern(output, report, "openai_key", OPENAI_KEY_RE);
  output = redactByPattern(output, report, "aws_key", AWS_KEY_RE);
  output = redactByPattern(output, report, "github_token", GITHUB_TOKEN_RE);
  output = redactByPattern(output, report, "slack_token", SLACK_TOKEN_RE);
  output = redactByPattern(output, report, "stripe_key", STRIPE_KEY_RE);
  output = redactCapture(output, report, "secret", GENERIC_SECRET_RE, 1);

  if (mode === "strict") {
    output = redactByPattern(output, report, "strict_hex", STRICT_HEX_RE);
    output = redactByPattern(output, report, "strict_token", STRICT_TOKEN_RE);
  }

  return { redacted: output, report };
}

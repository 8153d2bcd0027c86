import { hashObject, isPlainObject, stableStringify } from "@pretool-judge/core";
import { emptyReport, redactString } from "./detectors.js";
import type { RedactionOptions, RedactionReport } from "./types.js";

export type RedactValueResult = {
  redacted: unknown;
  report: RedactionReport;
};

export type ParamsPreview = {
  preview: string;
  paramsHash: string;
  report: RedactionReport;
};

const PREVIEW_LIMIT = 500;

function mergeReports(a: RedactionReport, b: RedactionReport): RedactionReport {
  const merged: RedactionReport = {
    redacted: a.redacted || b.redacted,
    matches: a.matches.map((match) => ({ ...match, hashes: [...match.hashes] }))
  };
  for (const match of b.matches) {
    const existing = merged.matches.find((entry) => entry.type === match.type);
    if (existing) {
      existing.count += match.count;
      existing.hashes.push(...match.hashes);
    } else {
      merged.matches.push({ ...match, hashes: [...match.hashes] });
    }
  }
  return merged;
}

// Deep-redact string fields while preserving structure (cycles included).
export function redactValue(value: unknown, options: RedactionOptions = {}): RedactValueResult {
  return redactValueWithState(value, options, new WeakMap<object, unknown>());
}

function redactValueWithState(
  value: unknown,
  options: RedactionOptions,
  seen: WeakMap<object, unknown>
): RedactValueResult {
  if (options.mode === "off") {
    return { redacted: value, report: emptyReport() };
  }
  if (typeof value === "string") {
    return redactString(value, options);
  }

  if (Array.isArray(value)) {
    const cached = seen.get(value);
    if (cached) {
      return { redacted: cached, report: emptyReport() };
    }
    let report = emptyReport();
    const redactedArray: unknown[] = [];
    seen.set(value, redactedArray);
    for (const item of value) {
      const next = redactValueWithState(item, options, seen);
      report = mergeReports(report, next.report);
      redactedArray.push(next.redacted);
    }
    return { redacted: redactedArray, report };
  }

  if (isPlainObject(value)) {
    const cached = seen.get(value);
    if (cached) {
      return { redacted: cached, report: emptyReport() };
    }
    let report = emptyReport();
    const output: Record<string, unknown> = {};
    seen.set(value, output);
    for (const key of Object.keys(value)) {
      const next = redactValueWithState(value[key], options, seen);
      output[key] = next.redacted;
      report = mergeReports(report, next.report);
    }
    return { redacted: output, report };
  }

  return { redacted: value, report: emptyReport() };
}

// Log-safe view of tool parameters: redacted, truncated, and hashed after
// redaction so the hash never fingerprints a raw secret.
export function previewParams(params: Record<string, unknown>, options: RedactionOptions = {}): ParamsPreview {
  const redaction = redactValue(params, options);
  return {
    preview: truncate(stableStringify(redaction.redacted), PREVIEW_LIMIT),
    paramsHash: hashObject(redaction.redacted).slice(0, 16),
    report: redaction.report
  };
}

export function truncate(value: string, limit: number): string {
  if (value.length <= limit) {
    return value;
  }
  return `${value.slice(0, limit)}...[truncated ${value.length - limit} chars]`;
}

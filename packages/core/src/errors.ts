export type ErrorKind =
  | "request_validation"
  | "communication"
  | "response_parse"
  | "response_validation"
  | "configuration"
  | "internal";

export class JudgeError extends Error {
  public readonly kind: ErrorKind;

  public constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "JudgeError";
    this.kind = kind;
  }
}

// Input envelope failed the request schema; never retried.
export class RequestValidationError extends JudgeError {
  public readonly violations: string[];

  public constructor(violations: string[], options?: { cause?: unknown }) {
    super("request_validation", `Request failed validation: ${violations.join("; ")}`, options);
    this.name = "RequestValidationError";
    this.violations = violations;
  }
}

// Oracle unreachable, failed, timed out, or returned no text.
export class CommunicationError extends JudgeError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super("communication", message, options);
    this.name = "CommunicationError";
  }
}

export class ResponseParseError extends JudgeError {
  public constructor(message: string) {
    super("response_parse", message);
    this.name = "ResponseParseError";
  }
}

export class ResponseValidationError extends JudgeError {
  public readonly violations: string[];

  public constructor(violations: string[]) {
    super("response_validation", `Response failed validation: ${violations.join("; ")}`);
    this.name = "ResponseValidationError";
    this.violations = violations;
  }
}

export class ConfigurationError extends JudgeError {
  public readonly source?: string;

  public constructor(message: string, options?: { source?: string; cause?: unknown }) {
    super("configuration", message, options);
    this.name = "ConfigurationError";
    this.source = options?.source;
  }
}

export function isJudgeError(value: unknown): value is JudgeError {
  return value instanceof JudgeError;
}

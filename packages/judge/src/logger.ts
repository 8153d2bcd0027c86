import type { DecisionLogger } from "@pretool-judge/core";

export type LogLevel = "silent" | "safe" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["silent", "safe", "debug"];

export type JudgeLogger = DecisionLogger;

export type LineWriter = (line: string) => void;

// stdout carries the envelope only, so every log line goes to stderr.
const writeStderr: LineWriter = (line) => {
  process.stderr.write(`${line}\n`);
};

export function createStderrLogger(level: LogLevel, write: LineWriter = writeStderr): JudgeLogger {
  if (level === "silent") {
    return {};
  }
  const logger: JudgeLogger = {
    info: write,
    warn: write,
    error: write
  };
  if (level === "debug") {
    logger.debug = write;
  }
  return logger;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

import { spawn } from "node:child_process";

export type ProcessResult = {
  code: number | null;
  stdout: string;
  stderr: string;
};

export type ProcessRunner = (
  command: string,
  args: string[],
  input: string,
  signal?: AbortSignal
) => Promise<ProcessResult>;

// Spawn, write `input` to stdin, collect both streams. Abort kills the child.
export const runProcess: ProcessRunner = (command, args, input, signal) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { signal });
    let stdout = "";
    let stderr = "";
    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });
    // A child that exits before reading its input makes stdin emit EPIPE.
    child.stdin.on("error", (err) => {
      stderr += `[stdin] ${err.message}\n`;
    });
    child.on("error", reject);
    child.on("close", (code) => resolve({ code, stdout, stderr }));
    child.stdin.end(input);
  });

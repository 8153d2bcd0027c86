import { Command, CommanderError } from "commander";
import { denyEnvelope, describeFailure, isJudgeError, type ResponseEnvelope } from "@pretool-judge/core";
import { listBuiltinPolicies, resolveConfig } from "./config.js";
import { judgeHookInput } from "./hook.js";
import { createStderrLogger, type JudgeLogger } from "./logger.js";
import { createOracle, type ProcessRunner } from "./oracles/index.js";
import { resolveJudgeSettings, type JudgeEnvironment } from "./settings.js";

export type JudgeCliIo = {
  readInput: () => Promise<string>;
  writeOutput: (text: string) => void;
  setExitCode: (code: number) => void;
  env: JudgeEnvironment;
};

export type JudgeCliOptions = {
  logger?: JudgeLogger;
  io?: Partial<JudgeCliIo>;
  presetDir?: string;
  fetchImpl?: typeof fetch;
  runProcess?: ProcessRunner;
};

const NON_HOOK_COMMANDS = new Set(["validate", "policies", "help"]);

// Register the judge commands on a commander program.
export function registerJudgeCli(program: Command, options: JudgeCliOptions = {}): void {
  const io = resolveIo(options.io);

  program
    .command("run", { isDefault: true })
    .description("Judge one PreToolUse request read from stdin and print the decision")
    .option("--config <path>", "Policy file path (overrides --policy)")
    .option("--policy <name>", "Built-in policy name")
    .option("--oracle <name>", "Decision oracle: claude-cli|chat")
    .option("--timeout <ms>", "Overall oracle deadline in milliseconds")
    .option("--log <level>", "Log level: silent|safe|debug")
    .option("--redaction <mode>", "Redaction of logged parameters: standard|strict|off")
    .action(async (...args: unknown[]) => {
      const settings = resolveJudgeSettings(getOptions(args), io.env);
      const logger = options.logger ?? createStderrLogger(settings.logLevel);
      settings.warnings.forEach((warning) => logger.warn?.(`[judge] ${warning}`));

      let raw = "";
      try {
        raw = await io.readInput();
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error?.(`[judge] could not read stdin: ${message}`);
      }

      const envelope = await judgeHookInput(raw, {
        selector: settings.selector,
        createOracle: (config) =>
          createOracle({
            kind: settings.oracle,
            config,
            env: io.env,
            logger,
            fetchImpl: options.fetchImpl,
            run: options.runProcess
          }),
        timeoutMs: settings.timeoutMs,
        logger,
        logLevel: settings.logLevel,
        redaction: settings.redaction,
        presetDir: options.presetDir
      });
      io.writeOutput(formatEnvelope(envelope));
    });

  program
    .command("validate")
    .description("Load and validate a policy without judging anything")
    .option("--config <path>", "Policy file path (overrides --policy)")
    .option("--policy <name>", "Built-in policy name")
    .action((...args: unknown[]) => {
      const logger = options.logger ?? createStderrLogger("safe");
      const settings = resolveJudgeSettings(getOptions(args), io.env);
      try {
        const loaded = resolveConfig(settings.selector, { presetDir: options.presetDir });
        logger.info?.(`Policy source: ${loaded.source}`);
        logger.info?.(`Model: ${loaded.config.model ?? "(oracle default)"}`);
        const tools = loaded.config.allowedTools ?? [];
        logger.info?.(`Allowed tools: ${tools.length > 0 ? tools.join(", ") : "(none)"}`);
      } catch (err) {
        if (!isJudgeError(err)) {
          throw err;
        }
        logger.error?.(err.message);
        io.setExitCode(1);
      }
    });

  program
    .command("policies")
    .description("List the built-in policies")
    .action(() => {
      const names = listBuiltinPolicies(options.presetDir);
      io.writeOutput(names.length > 0 ? `${names.join("\n")}\n` : "");
    });
}

// Parse argv (without the node and script entries). A malformed hook
// invocation still answers with a deny envelope and exit code 0.
export async function runCli(argv: string[], options: JudgeCliOptions = {}): Promise<void> {
  const io = resolveIo(options.io);
  const program = new Command();
  program.name("pretool-judge").exitOverride();
  registerJudgeCli(program, { ...options, io });
  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (err) {
    if (!(err instanceof CommanderError)) {
      throw err;
    }
    if (err.exitCode === 0) {
      return;
    }
    if (isHookInvocation(argv)) {
      (options.logger ?? createStderrLogger("safe")).error?.(`[judge] ${err.message}`);
      io.writeOutput(formatEnvelope(denyEnvelope(describeFailure("configuration"))));
      return;
    }
    io.setExitCode(err.exitCode);
  }
}

export function formatEnvelope(envelope: ResponseEnvelope): string {
  return `${JSON.stringify(envelope, null, 2)}\n`;
}

// Commander only dispatches a subcommand named first; anything else runs the
// default hook command, option values included.
function isHookInvocation(argv: string[]): boolean {
  const command = argv[0];
  return typeof command === "undefined" || !NON_HOOK_COMMANDS.has(command);
}

function resolveIo(io: Partial<JudgeCliIo> = {}): JudgeCliIo {
  return {
    readInput: io.readInput ?? readStdin,
    writeOutput:
      io.writeOutput ??
      ((text) => {
        process.stdout.write(text);
      }),
    setExitCode:
      io.setExitCode ??
      ((code) => {
        process.exitCode = code;
      }),
    env: io.env ?? process.env
  };
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}

function getOptions(args: unknown[]): Record<string, unknown> {
  const last = args[args.length - 1];
  if (last instanceof Command) {
    return last.opts();
  }
  if (last && typeof last === "object") {
    return { ...last };
  }
  return {};
}

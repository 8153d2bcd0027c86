#!/usr/bin/env node
import { runCli } from "./cli.js";

// Standalone entrypoint for the PreToolUse hook command.
await runCli(process.argv.slice(2));

#!/usr/bin/env node

// netprobe command-line entry point
import chalk from "chalk";
import { startCLI } from "./cli/cli-runner";
import { toError } from "./types/errors";

function die(kind: string, reason: unknown): void {
  const error = toError(reason);
  console.error(chalk.red(`❌ ${kind}: ${error.message}`));
  if (error.stack) {
    console.error(chalk.gray(error.stack));
  }
  process.exit(1);
}

process.on("unhandledRejection", (reason) => die("Unhandled rejection", reason));
process.on("uncaughtException", (error) => die("Uncaught exception", error));

// Errors from commands are reported by the runner and set process.exitCode
startCLI().catch((error: unknown) => die("CLI error", error));

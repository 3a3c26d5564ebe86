import chalk from "chalk";
import { OperatorStream } from "../types/common";
import { ProbeOutcome, isProbeSuccessful } from "../types/probe";

export interface TextOutput {
  write(chunk: string): unknown;
}

export interface OperatorConsoleOptions {
  stdout?: TextOutput;
  stderr?: TextOutput;
  color?: boolean;
}

export const SUCCESS_MARKER = ".";
export const FAILURE_MARKER = "x";

/**
 * Writes progress markers and status lines for whoever is watching the
 * terminal. Markers accumulate on one line; any status line first ends
 * that line so messages never start mid-row.
 */
export class OperatorConsole implements OperatorStream {
  private readonly stdout: TextOutput;
  private readonly stderr: TextOutput;
  private readonly paint: chalk.Chalk;
  private markerLineOpen = false;

  constructor(options: OperatorConsoleOptions = {}) {
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
    this.paint =
      options.color === false
        ? new chalk.Instance({ level: 0 })
        : new chalk.Instance({ level: chalk.level });
  }

  get colors(): chalk.Chalk {
    return this.paint;
  }

  progress(outcome: ProbeOutcome): void {
    const marker = isProbeSuccessful(outcome)
      ? this.paint.green(SUCCESS_MARKER)
      : this.paint.red(FAILURE_MARKER);
    this.stdout.write(marker);
    this.markerLineOpen = true;
  }

  info(message: string): void {
    this.line(this.stdout, message);
  }

  success(message: string): void {
    this.line(this.stdout, this.paint.green(`✅ ${message}`));
  }

  warn(message: string): void {
    this.line(this.stdout, this.paint.yellow(message));
  }

  error(message: string): void {
    this.line(this.stderr, this.paint.red(`❌ ${message}`));
  }

  private line(output: TextOutput, text: string): void {
    if (this.markerLineOpen) {
      this.stdout.write("\n");
      this.markerLineOpen = false;
    }
    output.write(`${text}\n`);
  }
}

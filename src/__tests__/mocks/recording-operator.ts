/**
 * Operator stream that keeps everything it is given, for assertions
 */

import { OperatorStream } from "../../types/common";
import { ProbeOutcome } from "../../types/probe";

export class RecordingOperator implements OperatorStream {
  public readonly outcomes: ProbeOutcome[] = [];
  public readonly infos: string[] = [];
  public readonly successes: string[] = [];
  public readonly warnings: string[] = [];
  public readonly errors: string[] = [];

  progress(outcome: ProbeOutcome): void {
    this.outcomes.push(outcome);
  }

  info(message: string): void {
    this.infos.push(message);
  }

  success(message: string): void {
    this.successes.push(message);
  }

  warn(message: string): void {
    this.warnings.push(message);
  }

  error(message: string): void {
    this.errors.push(message);
  }
}

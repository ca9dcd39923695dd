/**
 * Stage reporting for harness runs.
 *
 * Every stage transition and every spawned command goes through a
 * StageReporter, so a failed run leaves a complete trace of what was
 * executed, in order.
 */

import type { HarnessError } from "./errors";
import type { Stage } from "./types";

/**
 * Interface for stage reporting callbacks.
 *
 * Implement this interface to customize output (e.g. JSON logs, CI
 * annotations, or recording calls in tests).
 */
export interface StageReporter {
  /**
   * Called when a stage begins.
   */
  onStageStart(stage: Stage): void;

  /**
   * Called when a stage completes successfully.
   *
   * @param durationMs - Time taken by the stage in milliseconds
   */
  onStageComplete(stage: Stage, durationMs: number): void;

  /**
   * Called when a stage fails. The error is still propagated by the pipeline.
   */
  onStageError(stage: Stage, error: HarnessError): void;

  /**
   * Called right before an external command is spawned.
   *
   * @param label - Short name of the collaborator (e.g. "provisioner")
   * @param argv - Full argument vector, executable first
   */
  onCommand(label: string, argv: readonly string[]): void;

  /**
   * Called for each line a spawned command writes to stdout or stderr.
   */
  onOutput(label: string, line: string): void;
}

const quoteArg = (arg: string) => (/^[\w@%+=:,./-]+$/.test(arg) ? arg : JSON.stringify(arg));

export const renderCommand = (argv: readonly string[]): string => argv.map(quoteArg).join(" ");

/**
 * Console-based reporter.
 *
 * Stage banners and command traces are always printed; child output only
 * in verbose mode.
 *
 * @example
 * ```
 * [Stage: provision] Starting...
 *   + ./bin/provision-network setup
 * [Stage: provision] Complete in 12.40s
 * ```
 */
export class ConsoleStageReporter implements StageReporter {
  constructor(private readonly verbose = false) {}

  onStageStart(stage: Stage): void {
    console.log(`[Stage: ${stage}] Starting...`);
  }

  onStageComplete(stage: Stage, durationMs: number): void {
    const durationSec = (durationMs / 1000).toFixed(2);
    console.log(`[Stage: ${stage}] Complete in ${durationSec}s`);
  }

  onStageError(stage: Stage, error: HarnessError): void {
    console.error(`[Stage: ${stage}] [ERROR] ${error.name}: ${error.message}`);
  }

  onCommand(label: string, argv: readonly string[]): void {
    console.log(`  + (${label}) ${renderCommand(argv)}`);
  }

  onOutput(label: string, line: string): void {
    if (this.verbose) {
      console.log(`  ${label} | ${line}`);
    }
  }
}

/**
 * Reporter that does nothing.
 *
 * Useful for automated tests where output should be suppressed.
 */
export class SilentStageReporter implements StageReporter {
  onStageStart(_stage: Stage): void {
    // Silent
  }

  onStageComplete(_stage: Stage, _durationMs: number): void {
    // Silent
  }

  onStageError(_stage: Stage, _error: HarnessError): void {
    // Silent - errors are still reported in the run report
  }

  onCommand(_label: string, _argv: readonly string[]): void {
    // Silent
  }

  onOutput(_label: string, _line: string): void {
    // Silent
  }
}

/**
 * Tracks execution time for a stage.
 */
export class PhaseTimer {
  private startTime: number;

  constructor() {
    this.startTime = Date.now();
  }

  /**
   * Gets elapsed time in milliseconds since timer creation.
   */
  elapsed(): number {
    return Date.now() - this.startTime;
  }
}

/**
 * Error kinds raised by the benchmark harness.
 *
 * Every failure that leaves the pipeline is a HarnessError, so the CLI can
 * report the failing stage and map the failure to an exit code without
 * inspecting messages. Nothing in the harness retries: an error aborts
 * forward progress and short-circuits to cleanup.
 */

import type { Stage } from "./types";

export type HarnessErrorKind =
  | "precondition"
  | "configuration"
  | "external-process"
  | "teardown"
  | "interrupted";

export abstract class HarnessError extends Error {
  abstract readonly kind: HarnessErrorKind;

  /** Stage the error was raised in. Filled in by the pipeline when not known at construction. */
  stage?: Stage;

  get exitCode(): number {
    return 1;
  }
}

/**
 * A required input (environment value, CLI argument, topology directory) is
 * missing or empty.
 */
export class PreconditionError extends HarnessError {
  readonly kind = "precondition";

  constructor(
    readonly variable: string,
    message: string
  ) {
    super(message);
    this.name = "PreconditionError";
  }
}

/**
 * A supplied value is not one the harness accepts, e.g. an unknown benchmark
 * target or a malformed settings field. `value` holds the offending input.
 */
export class ConfigurationError extends HarnessError {
  readonly kind = "configuration";

  constructor(
    readonly value: string,
    message: string
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export interface ProcessFailure {
  /** Rendered command line, for the failure report */
  command: string;
  /** Exit code, or null when the process was killed by a signal */
  code: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  /** Last lines of combined stdout/stderr, ANSI codes stripped */
  outputTail: string[];
}

/**
 * A spawned collaborator (provisioner, client or workload generator) failed.
 */
export class ExternalProcessError extends HarnessError {
  readonly kind = "external-process";
  readonly command: string;
  readonly code: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly timedOut: boolean;
  readonly outputTail: string[];

  constructor(failure: ProcessFailure, message = describeProcessFailure(failure)) {
    super(message);
    this.name = "ExternalProcessError";
    this.command = failure.command;
    this.code = failure.code;
    this.signal = failure.signal;
    this.timedOut = failure.timedOut;
    this.outputTail = failure.outputTail;
  }

  override get exitCode(): number {
    return this.code !== null && this.code !== 0 ? this.code : 1;
  }
}

/**
 * The workload generator failed, timed out or produced no result artifact.
 */
export class BenchmarkError extends ExternalProcessError {
  constructor(failure: ProcessFailure, message?: string) {
    super(failure, message);
    this.name = "BenchmarkError";
  }
}

export class TeardownError extends HarnessError {
  readonly kind = "teardown";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TeardownError";
  }
}

/**
 * The operator interrupted the run (SIGINT/SIGTERM).
 */
export class InterruptedError extends HarnessError {
  readonly kind = "interrupted";

  constructor(message = "Run interrupted") {
    super(message);
    this.name = "InterruptedError";
  }

  override get exitCode(): number {
    return 130;
  }
}

export function describeProcessFailure(failure: ProcessFailure): string {
  if (failure.timedOut) {
    return `Command timed out: ${failure.command}`;
  }
  if (failure.signal) {
    return `Command killed by ${failure.signal}: ${failure.command}`;
  }
  return `Command exited with code ${failure.code}: ${failure.command}`;
}

const isAbortError = (err: unknown): boolean => err instanceof Error && err.name === "AbortError";

/**
 * Classifies anything thrown by a stage. Harness errors keep their kind and
 * only gain the stage if they don't have one yet; aborts become
 * InterruptedError; anything else is treated as a failure of the external
 * collaborator behind that stage.
 */
export function toHarnessError(err: unknown, stage: Stage): HarnessError {
  let error: HarnessError;
  if (err instanceof HarnessError) {
    error = err;
  } else if (isAbortError(err)) {
    error = new InterruptedError();
  } else if (stage === "teardown") {
    error = new TeardownError(`Teardown failed: ${errorMessage(err)}`, { cause: err });
  } else {
    error = new ExternalProcessError(
      { command: stage, code: null, signal: null, timedOut: false, outputTail: [] },
      `Stage ${stage} failed: ${errorMessage(err)}`
    );
  }
  error.stage ??= stage;
  return error;
}

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);
